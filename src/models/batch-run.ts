export type BatchRunHandle = number;

export type TerminalStatus = 'succeeded' | 'failed' | 'aborted';

export const TERMINAL_STATUSES: readonly TerminalStatus[] = ['succeeded', 'failed', 'aborted'];

export interface TestResultRecord {
  test_case_id?: number | string;
  status: string;
  test_url?: string;
  screenshot_url?: string;
  error?: string;
  elapsed_time?: number; // seconds
}

export interface BatchRunSnapshot {
  batch_run_number?: BatchRunHandle;
  status: string; // not-running, running, succeeded, failed, aborted, ...
  test_results: TestResultRecord[];
}

export interface BatchRunStartRequest {
  test_setting_id: number | string;
  environment?: string;
  browser?: string;
}

export function isTerminalStatus(status: string): status is TerminalStatus {
  return TERMINAL_STATUSES.some(terminal => terminal === status);
}
