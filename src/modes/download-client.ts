import type { DownloadClientModeConfig } from '../models/config';
import { MagicPodClient } from '../integrations/magicpod-client';
import { downloadClient } from '../pipeline/client-downloader';
import { HttpClient } from '../utils/http-client';
import type { ContextLogger } from '../utils/logger';

export async function runDownloadClientMode(config: DownloadClientModeConfig, log: ContextLogger): Promise<void> {
  const magicpod = new MagicPodClient(config.magicpod, new HttpClient(undefined, config.http.timeout_ms));
  const result = await downloadClient(magicpod, config.download);

  log.info('Successfully downloaded and extracted MagicPod API client', {
    target_dir: result.target_dir,
    file_count: result.extracted_files.length,
  });
}
