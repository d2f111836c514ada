export type RunId = number | string;

export interface TestPlanRunTemplate {
  include_all?: boolean;
  case_ids?: number[];
  config_ids?: number[];
  [key: string]: unknown;
}

export interface TestPlanEntryTemplate {
  suite_id: number;
  include_all?: boolean;
  config_ids?: number[];
  runs?: TestPlanRunTemplate[];
  [key: string]: unknown;
}

export interface TestPlanTemplate {
  entries: TestPlanEntryTemplate[];
}

export interface AddPlanRequest {
  name: string;
  entries: TestPlanEntryTemplate[];
}

export interface AddResultRequest {
  status_id: number;
  comment: string;
  elapsed?: string;
}

export const TESTRAIL_STATUS = {
  passed: 1,
  failed: 5,
} as const;
