import type { TestResultRecord } from '../models/batch-run';
import { TESTRAIL_STATUS } from '../models/test-plan';
import type { AddResultRequest, RunId } from '../models/test-plan';
import type { TestRailClient } from '../integrations/testrail-client';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export type ResultSink = Pick<TestRailClient, 'addResultForCase'>;

export interface CaseResult {
  case_id: number | string;
  /** True when the record had no test_case_id and its position was used instead. */
  case_id_from_position: boolean;
  payload: AddResultRequest;
}

export interface ReportFailure {
  case_id: number | string;
  error: string;
}

export interface ReportSummary {
  run_id: RunId;
  total: number;
  posted: number;
  failed: number;
  failures: ReportFailure[];
}

export function buildComment(record: TestResultRecord): string {
  const lines = [
    `MagicPod Test URL: ${record.test_url ?? ''}`,
    `Screenshot: ${record.screenshot_url ?? ''}`,
  ];
  if (record.error) {
    lines.push(`Error: ${record.error}`);
  }
  return lines.join('\n');
}

/** TestRail rejects a zero timespan, so non-positive durations are left out. */
export function formatElapsed(seconds: number | undefined): string | undefined {
  if (seconds === undefined || !Number.isFinite(seconds) || seconds <= 0) {
    return undefined;
  }
  return `${Math.ceil(seconds)}s`;
}

export function toCaseResult(record: TestResultRecord, index: number): CaseResult {
  const caseIdFromPosition = record.test_case_id === undefined;
  const payload: AddResultRequest = {
    status_id: record.status === 'succeeded' ? TESTRAIL_STATUS.passed : TESTRAIL_STATUS.failed,
    comment: buildComment(record),
  };

  const elapsed = formatElapsed(record.elapsed_time);
  if (elapsed) {
    payload.elapsed = elapsed;
  }

  return {
    // TODO: replace the positional fallback with an explicit MagicPod-to-TestRail case mapping file
    case_id: record.test_case_id ?? index + 1,
    case_id_from_position: caseIdFromPosition,
    payload,
  };
}

/**
 * Posts every result to the TestRail run. A failed post is logged and counted
 * and the remaining results are still posted.
 */
export async function reportResults(
  results: TestResultRecord[],
  runId: RunId,
  sink: ResultSink
): Promise<ReportSummary> {
  const summary: ReportSummary = { run_id: runId, total: results.length, posted: 0, failed: 0, failures: [] };

  for (const [index, record] of results.entries()) {
    const { case_id, case_id_from_position, payload } = toCaseResult(record, index);

    if (case_id_from_position) {
      logger.warn('Result has no test_case_id, using its position as the case id', {
        run_id: runId,
        case_id,
      });
    }

    try {
      await sink.addResultForCase(runId, case_id, payload);
      summary.posted++;
    } catch (error) {
      summary.failed++;
      summary.failures.push({ case_id, error: errorMessage(error) });
      logger.error('Failed to post result to TestRail', {
        run_id: runId,
        case_id,
        error: errorMessage(error),
      });
    }
  }

  logger.info('Finished reporting results to TestRail', {
    run_id: runId,
    total: summary.total,
    posted: summary.posted,
    failed: summary.failed,
  });

  return summary;
}
