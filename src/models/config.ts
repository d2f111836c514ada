export interface HttpConfig {
  timeout_ms: number;
}

export interface MagicPodConfig {
  api_token: string;
  base_url: string;
}

export interface BatchRunConfig {
  organization_name: string;
  project_name: string;
  test_setting_id: number | string;
  environment?: string;
  browser?: string;
}

export interface PollingConfig {
  poll_interval_ms: number;
  max_wait_ms: number;
  proceed_on_timeout: boolean;
}

export interface ClientDownloadConfig {
  target_dir: string;
}

export interface TestRailConfig {
  base_url: string;
  user: string;
  password: string;
}

export interface PlanConfig {
  plan_file: string;
}

export interface PlanPreparationConfig extends PlanConfig {
  project_id: number;
  template_file: string;
  name_suffix: string;
}

export interface PreparePlanModeConfig {
  http: HttpConfig;
  testrail: TestRailConfig;
  plan: PlanPreparationConfig;
}

export interface DownloadClientModeConfig {
  http: HttpConfig;
  magicpod: MagicPodConfig;
  download: ClientDownloadConfig;
}

export interface RunTestsModeConfig {
  http: HttpConfig;
  magicpod: MagicPodConfig;
  batch_run: BatchRunConfig;
  polling: PollingConfig;
  testrail: TestRailConfig;
  plan: PlanConfig;
}
