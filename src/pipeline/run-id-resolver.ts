import type { RunId } from '../models/test-plan';
import { ShapeMismatchError } from '../utils/errors';
import logger from '../utils/logger';

export const DOCUMENT_PREVIEW_LIMIT = 1000;

/**
 * The shapes a test plan document is known to come in, in the order they are
 * tried. TestRail returns a plan with entries from add_plan; a run document
 * exposes its id at the top level.
 */
export type PlanDocumentShape =
  | { kind: 'plan-entries'; runId: RunId; entryIndex: number }
  | { kind: 'run-record'; runId: RunId }
  | { kind: 'unrecognized' };

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRunId(value: unknown): RunId | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return value;
  }
  return undefined;
}

function matchPlanEntries(document: JsonObject): PlanDocumentShape | undefined {
  const entries = document.entries;
  if (!Array.isArray(entries)) {
    return undefined;
  }

  for (const [entryIndex, entry] of entries.entries()) {
    if (!isJsonObject(entry) || !Array.isArray(entry.runs) || entry.runs.length === 0) {
      continue;
    }

    const [firstRun] = entry.runs;
    const runId = isJsonObject(firstRun) ? toRunId(firstRun.id) : undefined;
    if (runId !== undefined) {
      return { kind: 'plan-entries', runId, entryIndex };
    }
  }

  return undefined;
}

function matchRunRecord(document: JsonObject): PlanDocumentShape | undefined {
  if (!('id' in document) || !('name' in document)) {
    return undefined;
  }

  const runId = toRunId(document.id);
  return runId === undefined ? undefined : { kind: 'run-record', runId };
}

export function classifyPlanDocument(document: unknown): PlanDocumentShape {
  if (!isJsonObject(document)) {
    return { kind: 'unrecognized' };
  }

  return matchPlanEntries(document) ?? matchRunRecord(document) ?? { kind: 'unrecognized' };
}

export function previewDocument(document: unknown, limit: number = DOCUMENT_PREVIEW_LIMIT): string {
  const text = JSON.stringify(document) ?? String(document);
  return text.length > limit ? `${text.substring(0, limit)}...` : text;
}

export function resolveRunId(document: unknown): RunId {
  const shape = classifyPlanDocument(document);

  switch (shape.kind) {
    case 'plan-entries':
      logger.debug('Run id found in plan entries', { run_id: shape.runId, entry_index: shape.entryIndex });
      return shape.runId;
    case 'run-record':
      logger.debug('Run id found on run-shaped document', { run_id: shape.runId });
      return shape.runId;
    case 'unrecognized': {
      const preview = previewDocument(document);
      logger.error('Could not locate run id in test plan document', { document: preview });
      throw new ShapeMismatchError('Could not locate run id in test plan document', preview);
    }
  }
}
