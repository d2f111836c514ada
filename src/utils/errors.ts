export type BridgeErrorCode =
  | 'TRANSPORT_ERROR'
  | 'SHAPE_MISMATCH'
  | 'POLL_TIMEOUT'
  | 'CONFIGURATION_ERROR'
  | 'ARCHIVE_ERROR';

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(message: string, code: BridgeErrorCode) {
    super(message);
    this.code = code;
    this.name = 'BridgeError';
  }
}

export interface TransportErrorDetails {
  method?: string;
  url?: string;
  status?: number;
  /** Low-level error code such as ECONNRESET, when the request never got a response. */
  errorCode?: string;
  retryAfterMs?: number;
  bodyPreview?: string;
}

/**
 * A request that failed on the network or returned a non-2xx status where one
 * was required. Recoverable while polling, fatal for one-shot calls.
 */
export class TransportError extends BridgeError {
  readonly details: TransportErrorDetails;

  constructor(message: string, details: TransportErrorDetails = {}) {
    super(message, 'TRANSPORT_ERROR');
    this.details = details;
    this.name = 'TransportError';
  }

  get status(): number | undefined {
    return this.details.status;
  }
}

export class ShapeMismatchError extends BridgeError {
  readonly documentPreview: string;

  constructor(message: string, documentPreview: string) {
    super(message, 'SHAPE_MISMATCH');
    this.documentPreview = documentPreview;
    this.name = 'ShapeMismatchError';
  }
}

export class PollTimeoutError extends BridgeError {
  readonly handle: number | string;
  readonly elapsedMs: number;
  readonly lastStatus?: string;

  constructor(handle: number | string, elapsedMs: number, lastStatus?: string) {
    super(
      `Batch run ${handle} did not finish within ${Math.round(elapsedMs / 1000)}s` +
        (lastStatus ? ` (last status: ${lastStatus})` : ''),
      'POLL_TIMEOUT'
    );
    this.handle = handle;
    this.elapsedMs = elapsedMs;
    this.lastStatus = lastStatus;
    this.name = 'PollTimeoutError';
  }
}

export class ConfigurationError extends BridgeError {
  readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super(message, 'CONFIGURATION_ERROR');
    this.keys = keys;
    this.name = 'ConfigurationError';
  }
}

export class ArchiveError extends BridgeError {
  constructor(message: string) {
    super(message, 'ARCHIVE_ERROR');
    this.name = 'ArchiveError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
