import type { RunTestsModeConfig } from '../models/config';
import { MagicPodClient } from '../integrations/magicpod-client';
import { TestRailClient } from '../integrations/testrail-client';
import { runAndReport } from '../pipeline/run-orchestrator';
import { HttpClient } from '../utils/http-client';
import type { ContextLogger } from '../utils/logger';

export async function runTestsMode(config: RunTestsModeConfig, log: ContextLogger): Promise<void> {
  const http = new HttpClient(undefined, config.http.timeout_ms);
  const magicpod = new MagicPodClient(config.magicpod, http);
  const testrail = new TestRailClient(config.testrail, http);

  const outcome = await runAndReport(config, { magicpod, testrail, logger: log });

  log.info('MagicPod run reported to TestRail', {
    batch_run_number: outcome.batch_run_number,
    status: outcome.status,
    timed_out: outcome.timed_out,
    run_id: outcome.run_id,
    posted: outcome.report.posted,
    failed: outcome.report.failed,
  });
}
