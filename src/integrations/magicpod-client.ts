import Joi from 'joi';
import type {
  BatchRunHandle,
  BatchRunSnapshot,
  BatchRunStartRequest,
  TestResultRecord,
} from '../models/batch-run';
import type { BatchRunConfig, MagicPodConfig } from '../models/config';
import { TransportError } from '../utils/errors';
import type { HttpClient, HttpResponse } from '../utils/http-client';
import { isResendableError, retryWithBackoff } from '../utils/retry-handler';
import logger from '../utils/logger';

export type BatchRunTarget = Pick<BatchRunConfig, 'organization_name' | 'project_name'>;

const USER_AGENT = 'magicpod-testrail-bridge/1.0';

const missing = Joi.any().valid(null, '');

const testResultSchema = Joi.object<TestResultRecord>({
  test_case_id: Joi.alternatives().try(Joi.number().integer(), Joi.string()).empty(missing),
  status: Joi.string().empty(missing).default('unknown'),
  test_url: Joi.string().empty(missing),
  screenshot_url: Joi.string().empty(missing),
  error: Joi.string().empty(missing),
  elapsed_time: Joi.number().min(0).empty(missing),
}).unknown(true);

interface SnapshotEnvelope {
  batch_run_number?: unknown;
  status: string;
  test_results?: unknown;
}

const snapshotSchema = Joi.object<SnapshotEnvelope>({
  batch_run_number: Joi.any(),
  status: Joi.string().required(),
  test_results: Joi.any(),
}).unknown(true);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Fields that fail validation are dropped; an object `error` is kept as JSON text. */
export function normalizeTestResult(item: unknown): TestResultRecord {
  const fields: Record<string, unknown> = isRecord(item) ? { ...item } : {};
  if (typeof fields.error === 'object' && fields.error !== null) {
    fields.error = JSON.stringify(fields.error);
  }

  const checked = testResultSchema.validate(fields, { convert: true, abortEarly: false });
  if (!checked.error) {
    return checked.value;
  }

  for (const detail of checked.error.details) {
    const [key] = detail.path;
    if (key !== undefined) {
      delete fields[String(key)];
    }
  }

  const stripped = testResultSchema.validate(fields, { convert: true });
  return stripped.error ? { status: 'unknown' } : stripped.value;
}

const startResponseSchema = Joi.object<{ batch_run_number: number }>({
  batch_run_number: Joi.number().integer().required(),
}).unknown(true);

function parseBody<T>(schema: Joi.ObjectSchema<T>, body: unknown, what: string): T {
  const result = schema.validate(body, { convert: true });

  if (result.error) {
    throw new TransportError(`Unexpected ${what} response: ${result.error.message}`);
  }

  return result.value;
}

export interface MagicPodClientOptions {
  retryDelayMs?: number;
  maxAttempts?: number;
}

export class MagicPodClient {
  private readonly config: MagicPodConfig;
  private readonly http: HttpClient;
  private readonly retryDelayMs: number;
  private readonly maxAttempts: number;

  constructor(config: MagicPodConfig, http: HttpClient, options: MagicPodClientOptions = {}) {
    this.config = config;
    this.http = http;
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.maxAttempts = options.maxAttempts ?? 3;
  }

  async startBatchRun(target: BatchRunConfig): Promise<BatchRunHandle> {
    const payload: BatchRunStartRequest = { test_setting_id: target.test_setting_id };
    if (target.environment) {
      payload.environment = target.environment;
    }
    if (target.browser) {
      payload.browser = target.browser;
    }

    logger.info('Starting MagicPod batch run', {
      organization: target.organization_name,
      project: target.project_name,
      test_setting_id: target.test_setting_id,
    });

    const response = await retryWithBackoff(
      () =>
        this.http.request({
          method: 'POST',
          url: this.batchRunUrl(target),
          headers: this.headers(),
          json: payload,
          raiseForStatus: true,
        }),
      {
        maxAttempts: this.maxAttempts,
        delayMs: this.retryDelayMs,
        exponentialBackoff: true,
        shouldRetry: isResendableError,
      }
    );

    const { batch_run_number } = parseBody(startResponseSchema, response.body, 'batch run start');
    logger.info('MagicPod batch run started', { batch_run_number });

    return batch_run_number;
  }

  async getBatchRun(target: BatchRunTarget, handle: BatchRunHandle): Promise<BatchRunSnapshot> {
    const response = await this.http.request({
      method: 'GET',
      url: this.batchRunUrl(target, handle),
      headers: this.headers(),
      raiseForStatus: true,
    });

    const envelope = parseBody(snapshotSchema, response.body, 'batch run status');
    const { status, batch_run_number: batchRunNumber, test_results: rawResults } = envelope;

    if (rawResults !== undefined && rawResults !== null && !Array.isArray(rawResults)) {
      logger.warn('Ignoring malformed test_results in batch run status', { batch_run_number: handle });
    }

    const snapshot: BatchRunSnapshot = {
      status,
      test_results: Array.isArray(rawResults) ? rawResults.map(normalizeTestResult) : [],
    };
    if (typeof batchRunNumber === 'number' && Number.isInteger(batchRunNumber)) {
      snapshot.batch_run_number = batchRunNumber;
    }

    return snapshot;
  }

  /** Fetches the API client archive. The response is returned whatever its status. */
  async requestClientArchive(): Promise<HttpResponse> {
    return this.http.request({
      method: 'GET',
      url: `${this.config.base_url}/client/`,
      headers: {
        Authorization: `Token ${this.config.api_token}`,
        Accept: 'application/zip',
        'User-Agent': USER_AGENT,
      },
      responseType: 'arraybuffer',
    });
  }

  private batchRunUrl(target: BatchRunTarget, handle?: BatchRunHandle): string {
    const base = `${this.config.base_url}/${encodeURIComponent(target.organization_name)}/${encodeURIComponent(
      target.project_name
    )}/batch-run/`;
    return handle === undefined ? base : `${base}${handle}/`;
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Token ${this.config.api_token}`,
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
    };
  }
}
