import { describe, expect, it } from 'vitest';
import { classifyPlanDocument, previewDocument, resolveRunId } from '../run-id-resolver';
import { ShapeMismatchError } from '../../utils/errors';

describe('resolveRunId', () => {
  it('skips entries whose runs are empty', () => {
    expect(resolveRunId({ entries: [{ runs: [] }, { runs: [{ id: 42 }] }] })).toBe(42);
  });

  it('falls back to a run-shaped document', () => {
    expect(resolveRunId({ id: 7, name: 'plan' })).toBe(7);
  });

  it('prefers plan entries over a top-level id', () => {
    expect(resolveRunId({ entries: [{ runs: [{ id: 1 }] }], id: 99, name: 'x' })).toBe(1);
  });

  it('uses the top-level id when no entry has runs', () => {
    expect(resolveRunId({ entries: [{ suite_id: 3 }, { runs: [] }], id: 12, name: 'nightly' })).toBe(12);
  });

  it('takes the first run of the first entry with runs', () => {
    const document = {
      entries: [{ runs: [{ id: 5 }, { id: 6 }] }, { runs: [{ id: 8 }] }],
    };
    expect(classifyPlanDocument(document)).toEqual({ kind: 'plan-entries', runId: 5, entryIndex: 0 });
  });

  it('skips an entry whose first run has no id', () => {
    const document = { entries: [{ runs: [{ name: 'no id' }] }, { runs: [{ id: 'R31' }] }] };
    expect(classifyPlanDocument(document)).toEqual({ kind: 'plan-entries', runId: 'R31', entryIndex: 1 });
  });

  it('requires both id and name for the run-shaped fallback', () => {
    expect(classifyPlanDocument({ id: 7 })).toEqual({ kind: 'unrecognized' });
  });

  it('tolerates entries that are not a list', () => {
    expect(classifyPlanDocument({ entries: 'none', id: 4, name: 'run' })).toEqual({ kind: 'run-record', runId: 4 });
  });

  it.each<[unknown]>([[null], [42], ['plan'], [[{ id: 1, name: 'x' }]]])('does not match %j', document => {
    expect(classifyPlanDocument(document)).toEqual({ kind: 'unrecognized' });
  });

  it('throws ShapeMismatchError when no shape matches', () => {
    expect(() => resolveRunId({ foo: 'bar' })).toThrow(ShapeMismatchError);

    try {
      resolveRunId({ foo: 'bar' });
    } catch (error) {
      expect(error).toBeInstanceOf(ShapeMismatchError);
      expect(error instanceof ShapeMismatchError && error.documentPreview).toBe('{"foo":"bar"}');
    }
  });
});

describe('previewDocument', () => {
  it('truncates long documents', () => {
    const document = { text: 'a'.repeat(2000) };
    const preview = previewDocument(document);

    expect(preview).toHaveLength(1003);
    expect(preview.startsWith('{"text":"aaa')).toBe(true);
    expect(preview.endsWith('...')).toBe(true);
  });

  it('keeps short documents as they are', () => {
    expect(previewDocument({ id: 1 })).toBe('{"id":1}');
  });
});
