import Joi from 'joi';
import type { PlanPreparationConfig } from '../models/config';
import type { AddPlanRequest, TestPlanTemplate } from '../models/test-plan';
import type { TestRailClient } from '../integrations/testrail-client';
import { readJSON, writeJSON } from '../storage/json-storage';
import { ConfigurationError } from '../utils/errors';
import logger from '../utils/logger';

const templateSchema = Joi.object<TestPlanTemplate>({
  entries: Joi.array()
    .items(
      Joi.object({
        suite_id: Joi.number().integer().positive().required(),
        include_all: Joi.boolean(),
        config_ids: Joi.array().items(Joi.number().integer()),
        runs: Joi.array().items(Joi.object().unknown(true)),
      }).unknown(true)
    )
    .min(1)
    .required(),
}).unknown(true);

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD-HH-mm <suffix>` in local time. */
export function formatPlanName(date: Date, suffix: string): string {
  const stamp = [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
  ].join('-');
  return `${stamp} ${suffix}`;
}

export async function loadPlanTemplate(templateFile: string): Promise<TestPlanTemplate> {
  const raw = await readJSON(templateFile);
  const result = templateSchema.validate(raw, { convert: false });

  if (result.error) {
    throw new ConfigurationError(`Invalid test plan template ${templateFile}: ${result.error.message}`, [
      'TESTRAIL_PLAN_TEMPLATE',
    ]);
  }

  return result.value;
}

export async function preparePlan(
  config: PlanPreparationConfig,
  testrail: Pick<TestRailClient, 'addPlan'>,
  now: Date = new Date()
): Promise<unknown> {
  const template = await loadPlanTemplate(config.template_file);
  const request: AddPlanRequest = {
    name: formatPlanName(now, config.name_suffix),
    entries: template.entries,
  };

  const plan = await testrail.addPlan(config.project_id, request);

  logger.info('TestRail test plan created', { plan_file: config.plan_file });
  logger.debug('TestRail test plan response', { plan: JSON.stringify(plan, null, 4) });

  await writeJSON(config.plan_file, plan);

  return plan;
}
