import axios from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { normalizeHeaders } from '../utils/http-client';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  auth?: { username: string; password: string };
  body: unknown;
  timeout?: number;
}

export interface StubReply {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export type StubHandler = (request: RecordedRequest, index: number) => StubReply | Promise<StubReply>;

function decodeBody(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}

/**
 * An axios instance whose adapter answers from `handler` in process and
 * records every request it sees. Throwing from the handler simulates a
 * network failure.
 */
export function createStubAxios(handler: StubHandler): { instance: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const instance = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        headers: normalizeHeaders(config.headers.toJSON()),
        auth: config.auth,
        body: decodeBody(config.data),
        timeout: config.timeout,
      };
      requests.push(request);

      const reply = await handler(request, requests.length - 1);
      return {
        data: reply.body,
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config,
      };
    },
  });

  return { instance, requests };
}

/** Replies from a fixed list, one per request; the last reply repeats. */
export function replySequence(...replies: StubReply[]): StubHandler {
  return (_request, index) => replies[Math.min(index, replies.length - 1)];
}
