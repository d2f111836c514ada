import { isTerminalStatus } from '../models/batch-run';
import { TransportError } from '../utils/errors';
import { createContextLogger } from '../utils/logger';
import type { ContextLogger } from '../utils/logger';
import { sleep } from '../utils/retry-handler';

export interface PollOptions {
  pollIntervalMs: number;
  maxWaitMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: ContextLogger;
}

export type PollOutcome<S> =
  | { kind: 'terminal'; snapshot: S; attempts: number; elapsedMs: number }
  | { kind: 'timeout'; lastSnapshot?: S; attempts: number; elapsedMs: number };

/**
 * Fetches the job status every `pollIntervalMs` until it is terminal or
 * `maxWaitMs` of polling time has been spent.
 *
 * Elapsed time is counted in whole intervals, so a run that never finishes
 * costs `ceil(maxWaitMs / pollIntervalMs)` fetches. Transport failures count
 * as a missed tick; any other error from `fetchSnapshot` propagates. A timeout
 * is returned, not thrown: the caller decides whether it is fatal.
 */
export async function pollUntilTerminal<H extends number | string, S extends { status: string }>(
  handle: H,
  fetchSnapshot: (handle: H) => Promise<S>,
  options: PollOptions
): Promise<PollOutcome<S>> {
  const { pollIntervalMs, maxWaitMs, sleep: wait = sleep } = options;
  const log = options.logger ?? createContextLogger({ step: 'poll', batch_run_number: handle });

  if (!(pollIntervalMs > 0)) {
    throw new RangeError(`pollIntervalMs must be positive, got ${pollIntervalMs}`);
  }

  let elapsedMs = 0;
  let attempts = 0;
  let lastSnapshot: S | undefined;
  let lastStatus: string | undefined;

  while (elapsedMs < maxWaitMs) {
    attempts++;

    try {
      const snapshot = await fetchSnapshot(handle);
      lastSnapshot = snapshot;

      if (snapshot.status !== lastStatus) {
        log.info('Batch run status changed', {
          previous_status: lastStatus ?? null,
          status: snapshot.status,
          elapsed_ms: elapsedMs,
        });
        lastStatus = snapshot.status;
      }

      if (isTerminalStatus(snapshot.status)) {
        return { kind: 'terminal', snapshot, attempts, elapsedMs };
      }
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      log.warn('Failed to fetch batch run status, will retry', {
        attempt: attempts,
        error: error.message,
        http_status: error.status,
      });
    }

    await wait(pollIntervalMs);
    elapsedMs += pollIntervalMs;
  }

  log.warn('Batch run did not reach a terminal status in time', {
    attempts,
    elapsed_ms: elapsedMs,
    last_status: lastStatus ?? null,
  });

  return { kind: 'timeout', lastSnapshot, attempts, elapsedMs };
}
