import axios from 'axios';
import type { AxiosInstance, Method } from 'axios';
import { TransportError } from './errors';

export interface HttpRequest {
  method: Method;
  url: string;
  headers?: Record<string, string>;
  /** HTTP basic credentials. */
  auth?: { username: string; password: string };
  json?: unknown;
  timeoutMs?: number;
  responseType?: 'json' | 'arraybuffer';
  /** Reject non-2xx responses with a TransportError instead of returning them. */
  raiseForStatus?: boolean;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

const BODY_PREVIEW_LENGTH = 500;

/**
 * Thin request/response wrapper over axios. Status codes are never thrown by
 * axios itself; callers opt into `raiseForStatus`.
 */
export class HttpClient {
  private readonly http: AxiosInstance;
  private readonly defaultTimeoutMs: number;

  constructor(http: AxiosInstance = axios.create(), defaultTimeoutMs = 30000) {
    this.http = http;
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    let status: number;
    let headers: Record<string, string>;
    let body: unknown;

    try {
      const response = await this.http.request({
        method: req.method,
        url: req.url,
        headers: req.headers,
        auth: req.auth,
        data: req.json,
        timeout: req.timeoutMs ?? this.defaultTimeoutMs,
        // Unset for JSON: a body that is not JSON comes back as text.
        responseType: req.responseType === 'arraybuffer' ? 'arraybuffer' : undefined,
        validateStatus: () => true,
      });
      status = response.status;
      headers = normalizeHeaders(response.headers);
      body = response.data;
    } catch (error) {
      const errorCode = axios.isAxiosError(error) ? error.code : undefined;
      throw new TransportError(
        `${req.method.toUpperCase()} ${req.url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { method: req.method, url: req.url, errorCode }
      );
    }

    if (req.raiseForStatus && (status < 200 || status >= 300)) {
      throw new TransportError(`HTTP ${status} from ${req.method.toUpperCase()} ${req.url}`, {
        method: req.method,
        url: req.url,
        status,
        retryAfterMs: parseRetryAfter(headers['retry-after']),
        bodyPreview: previewBody(body, BODY_PREVIEW_LENGTH),
      });
    }

    return { status, headers, body };
  }
}

export function normalizeHeaders(headers: object): Record<string, string> {
  const normalized: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[key.toLowerCase()] = value;
    } else if (typeof value === 'number') {
      normalized[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      normalized[key.toLowerCase()] = value.join(', ');
    }
  }

  return normalized;
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }

  return Math.max(0, date - now);
}

export function previewBody(body: unknown, maxLength: number): string {
  let text: string;

  if (typeof body === 'string') {
    text = body;
  } else if (Buffer.isBuffer(body)) {
    text = body.toString('utf-8');
  } else if (body instanceof ArrayBuffer) {
    text = Buffer.from(body).toString('utf-8');
  } else if (body === undefined || body === null) {
    text = '';
  } else {
    text = JSON.stringify(body);
  }

  return text.length > maxLength ? text.substring(0, maxLength) : text;
}
