import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { formatPlanName, loadPlanTemplate, preparePlan } from '../plan-preparer';
import type { PlanPreparationConfig } from '../../models/config';
import { ConfigurationError } from '../../utils/errors';

const template = {
  entries: [
    {
      suite_id: 1,
      include_all: true,
      config_ids: [2],
      runs: [{ include_all: true, case_ids: [1], config_ids: [2] }],
    },
  ],
};

describe('formatPlanName', () => {
  it('pads every date part', () => {
    expect(formatPlanName(new Date(2024, 2, 5, 7, 9), 'MagicPod Test')).toBe('2024-03-05-07-09 MagicPod Test');
  });
});

describe('preparePlan', () => {
  let workDir: string;
  let config: PlanPreparationConfig;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'plan-preparer-'));
    config = {
      project_id: 4,
      plan_file: path.join(workDir, 'out', 'testplan.json'),
      template_file: path.join(workDir, 'template.json'),
      name_suffix: 'Nightly',
    };
    await fs.writeFile(config.template_file, JSON.stringify(template), 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('creates the plan and writes the response to the plan file', async () => {
    const created = { id: 300, name: '2024-11-30-23-05 Nightly', entries: [{ runs: [{ id: 301 }] }] };
    const addPlan = vi.fn(async () => created);

    const plan = await preparePlan(config, { addPlan }, new Date(2024, 10, 30, 23, 5));

    expect(plan).toEqual(created);
    expect(addPlan).toHaveBeenCalledWith(4, { name: '2024-11-30-23-05 Nightly', entries: template.entries });
    const written = JSON.parse(await fs.readFile(config.plan_file, 'utf-8'));
    expect(written).toEqual(created);
  });

  it('does not call TestRail when the template is invalid', async () => {
    await fs.writeFile(config.template_file, JSON.stringify({ entries: [] }), 'utf-8');
    const addPlan = vi.fn(async () => ({}));

    await expect(preparePlan(config, { addPlan })).rejects.toThrow(ConfigurationError);
    expect(addPlan).not.toHaveBeenCalled();
  });
});

describe('loadPlanTemplate', () => {
  it('rejects entries without a suite id', async () => {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'plan-template-'));
    const file = path.join(workDir, 'template.json');
    await fs.writeFile(file, JSON.stringify({ entries: [{ include_all: true }] }), 'utf-8');

    try {
      await expect(loadPlanTemplate(file)).rejects.toThrow('"entries[0].suite_id" is required');
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  });
});
