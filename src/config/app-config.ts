import path from 'path';
import Joi from 'joi';
import type {
  BatchRunConfig,
  ClientDownloadConfig,
  DownloadClientModeConfig,
  HttpConfig,
  MagicPodConfig,
  PlanConfig,
  PlanPreparationConfig,
  PollingConfig,
  PreparePlanModeConfig,
  RunTestsModeConfig,
  TestRailConfig,
} from '../models/config';
import { ConfigurationError } from '../utils/errors';

type Env = NodeJS.ProcessEnv;

export const DEFAULT_MAGICPOD_BASE_URL = 'https://app.magicpod.com/api/v1.0';

// Empty values coming from unset CI secrets count as missing.
const requiredString = () => Joi.string().trim().empty('').required();
const optionalString = () => Joi.string().trim().empty('');
const seconds = (fallback: number) => Joi.number().positive().empty('').default(fallback);
const flag = (fallback: boolean) =>
  Joi.boolean().truthy('1', 'yes', 'on').falsy('0', 'no', 'off').empty('').default(fallback);
const identifier = () =>
  Joi.alternatives()
    .try(Joi.number().integer().positive(), Joi.string().trim())
    .empty('')
    .required();

function validateEnv<T>(schema: Joi.ObjectSchema<T>, env: Env, section: string): T {
  const result = schema.unknown(true).validate(env, { abortEarly: false, convert: true });

  if (result.error) {
    const keys = result.error.details.map(detail => String(detail.context?.key ?? detail.path.join('.')));
    const messages = result.error.details.map(detail => detail.message);
    throw new ConfigurationError(`Invalid ${section} configuration: ${messages.join('; ')}`, keys);
  }

  return result.value;
}

interface HttpEnv {
  HTTP_TIMEOUT_SECONDS: number;
}

export function loadHttpConfig(env: Env): HttpConfig {
  const value = validateEnv(
    Joi.object<HttpEnv>({ HTTP_TIMEOUT_SECONDS: seconds(30) }),
    env,
    'HTTP'
  );
  return { timeout_ms: value.HTTP_TIMEOUT_SECONDS * 1000 };
}

interface MagicPodEnv {
  MAGICPOD_API_TOKEN: string;
  MAGICPOD_BASE_URL: string;
}

export function loadMagicPodConfig(env: Env): MagicPodConfig {
  const value = validateEnv(
    Joi.object<MagicPodEnv>({
      MAGICPOD_API_TOKEN: requiredString(),
      MAGICPOD_BASE_URL: Joi.string()
        .trim()
        .uri({ scheme: ['http', 'https'] })
        .empty('')
        .default(DEFAULT_MAGICPOD_BASE_URL),
    }),
    env,
    'MagicPod'
  );
  return {
    api_token: value.MAGICPOD_API_TOKEN,
    base_url: value.MAGICPOD_BASE_URL.replace(/\/+$/, ''),
  };
}

interface BatchRunEnv {
  MAGICPOD_ORGANIZATION_NAME: string;
  MAGICPOD_PROJECT_NAME: string;
  MAGICPOD_TEST_SETTING_ID: number | string;
  MAGICPOD_ENVIRONMENT?: string;
  MAGICPOD_BROWSER?: string;
}

export function loadBatchRunConfig(env: Env): BatchRunConfig {
  const value = validateEnv(
    Joi.object<BatchRunEnv>({
      MAGICPOD_ORGANIZATION_NAME: requiredString(),
      MAGICPOD_PROJECT_NAME: requiredString(),
      MAGICPOD_TEST_SETTING_ID: identifier(),
      MAGICPOD_ENVIRONMENT: optionalString(),
      MAGICPOD_BROWSER: optionalString(),
    }),
    env,
    'batch run'
  );
  return {
    organization_name: value.MAGICPOD_ORGANIZATION_NAME,
    project_name: value.MAGICPOD_PROJECT_NAME,
    test_setting_id: value.MAGICPOD_TEST_SETTING_ID,
    environment: value.MAGICPOD_ENVIRONMENT,
    browser: value.MAGICPOD_BROWSER,
  };
}

interface PollingEnv {
  MAGICPOD_POLL_INTERVAL_SECONDS: number;
  MAGICPOD_MAX_WAIT_SECONDS: number;
  MAGICPOD_PROCEED_ON_TIMEOUT: boolean;
}

export function loadPollingConfig(env: Env): PollingConfig {
  const value = validateEnv(
    Joi.object<PollingEnv>({
      MAGICPOD_POLL_INTERVAL_SECONDS: seconds(10),
      MAGICPOD_MAX_WAIT_SECONDS: seconds(3600),
      MAGICPOD_PROCEED_ON_TIMEOUT: flag(false),
    }),
    env,
    'polling'
  );
  return {
    poll_interval_ms: value.MAGICPOD_POLL_INTERVAL_SECONDS * 1000,
    max_wait_ms: value.MAGICPOD_MAX_WAIT_SECONDS * 1000,
    proceed_on_timeout: value.MAGICPOD_PROCEED_ON_TIMEOUT,
  };
}

interface ClientDownloadEnv {
  MAGICPOD_CLIENT_DIR: string;
}

export function loadClientDownloadConfig(env: Env, cwd: string = process.cwd()): ClientDownloadConfig {
  const value = validateEnv(
    Joi.object<ClientDownloadEnv>({
      MAGICPOD_CLIENT_DIR: optionalString().default('magicpod-api-client'),
    }),
    env,
    'client download'
  );
  return { target_dir: path.resolve(cwd, value.MAGICPOD_CLIENT_DIR) };
}

interface TestRailEnv {
  TESTRAIL_URL: string;
  TESTRAIL_USER: string;
  TESTRAIL_PASSWORD: string;
}

export function loadTestRailConfig(env: Env): TestRailConfig {
  const value = validateEnv(
    Joi.object<TestRailEnv>({
      TESTRAIL_URL: Joi.string()
        .trim()
        .uri({ scheme: ['http', 'https'] })
        .empty('')
        .required(),
      TESTRAIL_USER: requiredString(),
      TESTRAIL_PASSWORD: requiredString(),
    }),
    env,
    'TestRail'
  );
  return {
    base_url: value.TESTRAIL_URL.replace(/\/+$/, ''),
    user: value.TESTRAIL_USER,
    password: value.TESTRAIL_PASSWORD,
  };
}

interface PlanEnv {
  TESTRAIL_TESTPLAN_JSON_FILENAME: string;
}

export function loadPlanConfig(env: Env, cwd: string = process.cwd()): PlanConfig {
  const value = validateEnv(
    Joi.object<PlanEnv>({ TESTRAIL_TESTPLAN_JSON_FILENAME: requiredString() }),
    env,
    'test plan'
  );
  return { plan_file: path.resolve(cwd, value.TESTRAIL_TESTPLAN_JSON_FILENAME) };
}

interface PlanPreparationEnv extends PlanEnv {
  TESTRAIL_PROJECT_ID: number;
  TESTRAIL_PLAN_TEMPLATE: string;
  TESTRAIL_PLAN_NAME_SUFFIX: string;
}

export function loadPlanPreparationConfig(env: Env, cwd: string = process.cwd()): PlanPreparationConfig {
  const value = validateEnv(
    Joi.object<PlanPreparationEnv>({
      TESTRAIL_TESTPLAN_JSON_FILENAME: requiredString(),
      TESTRAIL_PROJECT_ID: Joi.number().integer().positive().empty('').required(),
      TESTRAIL_PLAN_TEMPLATE: optionalString().default(path.join('config', 'testplan-template.json')),
      TESTRAIL_PLAN_NAME_SUFFIX: optionalString().default('MagicPod Test'),
    }),
    env,
    'test plan'
  );
  return {
    plan_file: path.resolve(cwd, value.TESTRAIL_TESTPLAN_JSON_FILENAME),
    project_id: value.TESTRAIL_PROJECT_ID,
    template_file: path.resolve(cwd, value.TESTRAIL_PLAN_TEMPLATE),
    name_suffix: value.TESTRAIL_PLAN_NAME_SUFFIX,
  };
}

// Collects every section's problems into a single ConfigurationError.
class SectionCollector {
  private readonly errors: ConfigurationError[] = [];

  load<T>(loader: () => T): T | undefined {
    try {
      return loader();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.errors.push(error);
        return undefined;
      }
      throw error;
    }
  }

  failure(): ConfigurationError {
    return new ConfigurationError(
      this.errors.map(error => error.message).join('\n'),
      this.errors.flatMap(error => error.keys)
    );
  }
}

export function loadPreparePlanModeConfig(env: Env, cwd?: string): PreparePlanModeConfig {
  const sections = new SectionCollector();
  const http = sections.load(() => loadHttpConfig(env));
  const testrail = sections.load(() => loadTestRailConfig(env));
  const plan = sections.load(() => loadPlanPreparationConfig(env, cwd));

  if (!http || !testrail || !plan) {
    throw sections.failure();
  }
  return { http, testrail, plan };
}

export function loadDownloadClientModeConfig(env: Env, cwd?: string): DownloadClientModeConfig {
  const sections = new SectionCollector();
  const http = sections.load(() => loadHttpConfig(env));
  const magicpod = sections.load(() => loadMagicPodConfig(env));
  const download = sections.load(() => loadClientDownloadConfig(env, cwd));

  if (!http || !magicpod || !download) {
    throw sections.failure();
  }
  return { http, magicpod, download };
}

export function loadRunTestsModeConfig(env: Env, cwd?: string): RunTestsModeConfig {
  const sections = new SectionCollector();
  const http = sections.load(() => loadHttpConfig(env));
  const magicpod = sections.load(() => loadMagicPodConfig(env));
  const batchRun = sections.load(() => loadBatchRunConfig(env));
  const polling = sections.load(() => loadPollingConfig(env));
  const testrail = sections.load(() => loadTestRailConfig(env));
  const plan = sections.load(() => loadPlanConfig(env, cwd));

  if (!http || !magicpod || !batchRun || !polling || !testrail || !plan) {
    throw sections.failure();
  }
  return { http, magicpod, batch_run: batchRun, polling, testrail, plan };
}
