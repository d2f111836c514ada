import AdmZip from 'adm-zip';
import type { ClientDownloadConfig } from '../models/config';
import type { MagicPodClient } from '../integrations/magicpod-client';
import { ensureDirectoryExists, fileExists, listFilesRecursive } from '../storage/json-storage';
import { ArchiveError, TransportError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export const MIN_EXPECTED_ARCHIVE_BYTES = 1000;

const ACCEPTED_CONTENT_TYPES = ['application/zip', 'application/octet-stream'];

export interface ArchiveEntry {
  name: string;
  size: number;
}

export interface ClientDownloadResult {
  target_dir: string;
  bytes: number;
  entries: ArchiveEntry[];
  extracted_files: string[];
}

export function toBuffer(body: unknown): Buffer {
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (body instanceof ArrayBuffer) {
    return Buffer.from(body);
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf-8');
  }
  if (body === undefined || body === null) {
    return Buffer.alloc(0);
  }
  return Buffer.from(JSON.stringify(body), 'utf-8');
}

export function hexHeader(data: Buffer, length = 32): string {
  return Array.from(data.subarray(0, length), byte => byte.toString(16).padStart(2, '0')).join(' ');
}

/** Opens the archive and reads every entry, so a bad checksum fails here and not mid-extraction. */
export function openArchive(data: Buffer): { zip: AdmZip; entries: ArchiveEntry[] } {
  let zip: AdmZip;
  try {
    zip = new AdmZip(data);
  } catch (error) {
    throw new ArchiveError(`Invalid ZIP file: ${errorMessage(error)}`);
  }

  const entries: ArchiveEntry[] = [];
  for (const entry of zip.getEntries()) {
    if (entry.isDirectory) {
      continue;
    }
    try {
      entries.push({ name: entry.entryName, size: entry.getData().length });
    } catch (error) {
      throw new ArchiveError(`Corrupted file in ZIP: ${entry.entryName} (${errorMessage(error)})`);
    }
  }

  return { zip, entries };
}

export async function downloadClient(
  magicpod: Pick<MagicPodClient, 'requestClientArchive'>,
  config: ClientDownloadConfig
): Promise<ClientDownloadResult> {
  logger.info('Downloading MagicPod API client');

  const response = await magicpod.requestClientArchive();
  const contentType = response.headers['content-type'] ?? '';
  const data = toBuffer(response.body);

  logger.info('MagicPod client download response', {
    http_status: response.status,
    content_type: contentType || 'unknown',
    content_length: response.headers['content-length'] ?? 'unknown',
  });

  if (response.status !== 200) {
    const bodyPreview = data.toString('utf-8').substring(0, 500);
    logger.error('MagicPod client download failed', { http_status: response.status, body: bodyPreview });
    throw new TransportError(`HTTP ${response.status}: failed to download MagicPod API client`, {
      method: 'GET',
      status: response.status,
      bodyPreview,
    });
  }

  if (!ACCEPTED_CONTENT_TYPES.some(accepted => contentType.includes(accepted))) {
    logger.warn('Unexpected content-type for MagicPod client download', { content_type: contentType });
  }

  logger.info(`Downloaded ${data.length} bytes`);

  if (data.length < MIN_EXPECTED_ARCHIVE_BYTES) {
    logger.warn('Downloaded content seems too small', {
      bytes: data.length,
      preview: data.toString('utf-8').substring(0, 200),
    });
  }

  let archive: ReturnType<typeof openArchive>;
  try {
    archive = openArchive(data);
  } catch (error) {
    logger.error('Downloaded MagicPod client is not a valid ZIP archive', {
      error: errorMessage(error),
      header_hex: hexHeader(data),
    });
    throw error;
  }

  logger.info('ZIP file is valid', {
    entries: archive.entries.map(entry => `${entry.name} (${entry.size} bytes)`),
  });

  if (await fileExists(config.target_dir)) {
    logger.info('Overwriting existing MagicPod client files', { target_dir: config.target_dir });
  }
  await ensureDirectoryExists(config.target_dir);
  archive.zip.extractAllTo(config.target_dir, true);

  const extractedFiles = await listFilesRecursive(config.target_dir);
  logger.info('MagicPod API client extracted', {
    target_dir: config.target_dir,
    files: extractedFiles,
  });

  return {
    target_dir: config.target_dir,
    bytes: data.length,
    entries: archive.entries,
    extracted_files: extractedFiles,
  };
}
