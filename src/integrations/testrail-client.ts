import type { TestRailConfig } from '../models/config';
import type { AddPlanRequest, AddResultRequest, RunId } from '../models/test-plan';
import type { HttpClient } from '../utils/http-client';
import { isResendableError, retryWithBackoff } from '../utils/retry-handler';
import logger from '../utils/logger';

export interface TestRailClientOptions {
  /** Base delay between retries of rate-limited or failed calls. */
  retryDelayMs?: number;
  maxAttempts?: number;
}

export class TestRailClient {
  private readonly config: TestRailConfig;
  private readonly http: HttpClient;
  private readonly retryDelayMs: number;
  private readonly maxAttempts: number;

  constructor(config: TestRailConfig, http: HttpClient, options: TestRailClientOptions = {}) {
    this.config = config;
    this.http = http;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.maxAttempts = options.maxAttempts ?? 3;
  }

  async addPlan(projectId: number, plan: AddPlanRequest): Promise<unknown> {
    logger.info('Creating TestRail test plan', {
      project_id: projectId,
      name: plan.name,
      entry_count: plan.entries.length,
    });

    return this.sendPost(`add_plan/${projectId}`, plan);
  }

  async addResultForCase(runId: RunId, caseId: number | string, result: AddResultRequest): Promise<unknown> {
    logger.debug('Posting TestRail result', {
      run_id: runId,
      case_id: caseId,
      status_id: result.status_id,
    });

    return this.sendPost(`add_result_for_case/${runId}/${caseId}`, result);
  }

  private async sendPost(endpoint: string, data: unknown): Promise<unknown> {
    const response = await retryWithBackoff(
      () =>
        this.http.request({
          method: 'POST',
          url: `${this.config.base_url}/index.php?/api/v2/${endpoint}`,
          headers: { 'Content-Type': 'application/json' },
          auth: { username: this.config.user, password: this.config.password },
          json: data,
          raiseForStatus: true,
        }),
      {
        maxAttempts: this.maxAttempts,
        delayMs: this.retryDelayMs,
        exponentialBackoff: true,
        shouldRetry: isResendableError,
      }
    );

    return response.body;
  }
}
