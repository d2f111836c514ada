import type { BatchRunHandle, BatchRunSnapshot } from '../models/batch-run';
import type { RunTestsModeConfig } from '../models/config';
import type { RunId } from '../models/test-plan';
import type { MagicPodClient } from '../integrations/magicpod-client';
import { readJSON } from '../storage/json-storage';
import { PollTimeoutError } from '../utils/errors';
import { createContextLogger } from '../utils/logger';
import type { ContextLogger } from '../utils/logger';
import { pollUntilTerminal } from './job-poller';
import { resolveRunId } from './run-id-resolver';
import { reportResults } from './result-reporter';
import type { ReportSummary, ResultSink } from './result-reporter';

export interface RunDependencies {
  magicpod: Pick<MagicPodClient, 'startBatchRun' | 'getBatchRun'>;
  testrail: ResultSink;
  sleep?: (ms: number) => Promise<void>;
  logger?: ContextLogger;
}

export interface RunOutcome {
  batch_run_number: BatchRunHandle;
  status: string;
  timed_out: boolean;
  run_id: RunId;
  report: ReportSummary;
}

export async function runAndReport(config: RunTestsModeConfig, deps: RunDependencies): Promise<RunOutcome> {
  const log = deps.logger ?? createContextLogger({ step: 'run' });

  const handle = await deps.magicpod.startBatchRun(config.batch_run);
  const runLog = log.child({ batch_run_number: handle });

  const outcome = await pollUntilTerminal(
    handle,
    batchRunNumber => deps.magicpod.getBatchRun(config.batch_run, batchRunNumber),
    {
      pollIntervalMs: config.polling.poll_interval_ms,
      maxWaitMs: config.polling.max_wait_ms,
      sleep: deps.sleep,
      logger: runLog,
    }
  );

  let snapshot: BatchRunSnapshot;
  if (outcome.kind === 'terminal') {
    snapshot = outcome.snapshot;
  } else {
    const timeout = new PollTimeoutError(handle, outcome.elapsedMs, outcome.lastSnapshot?.status);
    if (!config.polling.proceed_on_timeout || !outcome.lastSnapshot) {
      throw timeout;
    }
    runLog.warn('Continuing with the last non-terminal batch run status', { error: timeout.message });
    snapshot = outcome.lastSnapshot;
  }

  runLog.info('Batch run finished', {
    status: snapshot.status,
    result_count: snapshot.test_results.length,
    attempts: outcome.attempts,
  });

  const planDocument = await readJSON(config.plan.plan_file);
  const runId = resolveRunId(planDocument);

  const report = await reportResults(snapshot.test_results, runId, deps.testrail);
  if (report.failed > 0) {
    runLog.warn('Some results could not be posted to TestRail', {
      failed: report.failed,
      failures: report.failures,
    });
  }

  return {
    batch_run_number: handle,
    status: snapshot.status,
    timed_out: outcome.kind === 'timeout',
    run_id: runId,
    report,
  };
}
