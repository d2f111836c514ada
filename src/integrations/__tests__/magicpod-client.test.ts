import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';
import { MagicPodClient } from '../magicpod-client';
import { TransportError } from '../../utils/errors';
import { HttpClient } from '../../utils/http-client';
import { createStubAxios, replySequence } from '../../test-utils/stub-axios';
import type { StubHandler } from '../../test-utils/stub-axios';
import { createFakeLogger } from '../../test-utils/fake-logger';
import { pollUntilTerminal } from '../../pipeline/job-poller';

const target = { organization_name: 'acme', project_name: 'web shop', test_setting_id: 12 };

function clientWith(handler: StubHandler) {
  const stub = createStubAxios(handler);
  const client = new MagicPodClient(
    { api_token: 'test-token', base_url: 'https://magicpod.test/api/v1.0' },
    new HttpClient(stub.instance),
    { retryDelayMs: 0 }
  );
  return { client, requests: stub.requests };
}

describe('MagicPodClient.startBatchRun', () => {
  it('posts the test setting and returns the batch run number', async () => {
    const { client, requests } = clientWith(() => ({ status: 200, body: { batch_run_number: 481, status: 'running' } }));

    const handle = await client.startBatchRun(target);

    expect(handle).toBe(481);
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('POST');
    expect(requests[0].url).toBe('https://magicpod.test/api/v1.0/acme/web%20shop/batch-run/');
    expect(requests[0].body).toEqual({ test_setting_id: 12 });
    expect(requests[0].headers.authorization).toBe('Token test-token');
  });

  it('sends environment and browser when configured', async () => {
    const { client, requests } = clientWith(() => ({ status: 200, body: { batch_run_number: 1 } }));

    await client.startBatchRun({ ...target, environment: 'staging', browser: 'firefox' });

    expect(requests[0].body).toEqual({ test_setting_id: 12, environment: 'staging', browser: 'firefox' });
  });

  it('does not start a second run after a server error', async () => {
    const { client, requests } = clientWith(
      replySequence({ status: 502, body: 'Bad gateway' }, { status: 200, body: { batch_run_number: 9 } })
    );

    await expect(client.startBatchRun(target)).rejects.toThrow('HTTP 502 from POST');
    expect(requests).toHaveLength(1);
  });

  it('retries when rate limited', async () => {
    const { client, requests } = clientWith(
      replySequence({ status: 429, body: { detail: 'throttled' } }, { status: 200, body: { batch_run_number: 9 } })
    );

    await expect(client.startBatchRun(target)).resolves.toBe(9);
    expect(requests).toHaveLength(2);
  });

  it('retries when the connection was refused', async () => {
    const { client, requests } = clientWith((_request, index) => {
      if (index === 0) {
        throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED');
      }
      return { status: 200, body: { batch_run_number: 10 } };
    });

    await expect(client.startBatchRun(target)).resolves.toBe(10);
    expect(requests).toHaveLength(2);
  });

  it('does not retry a client error', async () => {
    const { client, requests } = clientWith(() => ({ status: 400, body: { detail: 'bad test_setting_id' } }));

    await expect(client.startBatchRun(target)).rejects.toThrow('HTTP 400 from POST');
    expect(requests).toHaveLength(1);
  });

  it('rejects a response without a batch run number', async () => {
    const { client } = clientWith(() => ({ status: 200, body: { detail: 'queued' } }));

    await expect(client.startBatchRun(target)).rejects.toThrow(TransportError);
  });
});

describe('MagicPodClient.getBatchRun', () => {
  it('normalizes the snapshot', async () => {
    const { client, requests } = clientWith(() => ({
      status: 200,
      body: {
        batch_run_number: 481,
        status: 'failed',
        test_results: [
          {
            test_case_id: 3,
            status: 'failed',
            test_url: 'https://magicpod.test/r/3',
            screenshot_url: null,
            error: 'Element not found',
            elapsed_time: 31.5,
          },
          { status: null, screenshot_url: '' },
        ],
      },
    }));

    const snapshot = await client.getBatchRun(target, 481);

    expect(requests[0].url).toBe('https://magicpod.test/api/v1.0/acme/web%20shop/batch-run/481/');
    expect(snapshot).toEqual({
      batch_run_number: 481,
      status: 'failed',
      test_results: [
        {
          test_case_id: 3,
          status: 'failed',
          test_url: 'https://magicpod.test/r/3',
          error: 'Element not found',
          elapsed_time: 31.5,
        },
        { status: 'unknown' },
      ],
    });
  });

  it('defaults missing results to an empty list', async () => {
    const { client } = clientWith(() => ({ status: 200, body: { status: 'running' } }));

    await expect(client.getBatchRun(target, 1)).resolves.toEqual({ status: 'running', test_results: [] });
  });

  it('accepts a finished run whose results carry malformed diagnostics', async () => {
    const { client } = clientWith(() => ({
      status: 200,
      body: {
        status: 'succeeded',
        test_results: [
          { test_case_id: 1, status: 'failed', error: { message: 'x' }, elapsed_time: -1 },
          { test_case_id: 2, status: 'succeeded', test_url: 42, elapsed_time: 'soon' },
          'not a record',
        ],
      },
    }));

    await expect(client.getBatchRun(target, 7)).resolves.toEqual({
      status: 'succeeded',
      test_results: [
        { test_case_id: 1, status: 'failed', error: '{"message":"x"}' },
        { test_case_id: 2, status: 'succeeded' },
        { status: 'unknown' },
      ],
    });
  });

  it('treats non-list results as empty', async () => {
    const { client } = clientWith(() => ({ status: 200, body: { status: 'failed', test_results: { count: 2 } } }));

    await expect(client.getBatchRun(target, 7)).resolves.toEqual({ status: 'failed', test_results: [] });
  });

  it('lets the poller stop at a terminal status despite malformed results', async () => {
    const { client, requests } = clientWith(() => ({
      status: 200,
      body: { status: 'failed', test_results: [{ test_case_id: 1, status: 'failed', elapsed_time: -1 }] },
    }));

    const outcome = await pollUntilTerminal(7, handle => client.getBatchRun(target, handle), {
      pollIntervalMs: 1000,
      maxWaitMs: 3000,
      sleep: async () => {},
      logger: createFakeLogger(),
    });

    expect(outcome.kind).toBe('terminal');
    expect(requests).toHaveLength(1);
  });

  it('raises a transport error for a failed request', async () => {
    const { client, requests } = clientWith(() => ({ status: 502, body: 'Bad gateway' }));

    await expect(client.getBatchRun(target, 1)).rejects.toThrow(TransportError);
    expect(requests).toHaveLength(1);
  });
});
