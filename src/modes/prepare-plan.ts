import type { PreparePlanModeConfig } from '../models/config';
import { TestRailClient } from '../integrations/testrail-client';
import { preparePlan } from '../pipeline/plan-preparer';
import { HttpClient } from '../utils/http-client';
import type { ContextLogger } from '../utils/logger';

export async function runPreparePlanMode(config: PreparePlanModeConfig, log: ContextLogger): Promise<void> {
  log.info('Preparing TestRail test plan', { project_id: config.plan.project_id });

  const testrail = new TestRailClient(config.testrail, new HttpClient(undefined, config.http.timeout_ms));
  await preparePlan(config.plan, testrail);

  log.info('Test plan prepared', { plan_file: config.plan.plan_file });
}
