import type { Credentials } from './harnessConfig.js';
import { logger } from './logger.js';

export type HttpMethod = 'GET' | 'POST';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };

/**
 * Uniform outcome of one request. Transport failures never throw; they come
 * back as an `error` response with status 0.
 */
export type NormalizedResponse =
  | { readonly kind: 'json'; readonly status: number; readonly body: JsonValue }
  | { readonly kind: 'text'; readonly status: number; readonly text: string }
  | { readonly kind: 'error'; readonly status: 0; readonly error: string };

/**
 * A file part of a multipart form.
 */
export interface FormFile {
  readonly filename: string;
  readonly contentType: string;
  readonly content: string;
}

export type FormPayload = Readonly<Record<string, string | FormFile>>;

export interface RequestOptions {
  readonly body?: JsonValue;
  /** Sent as multipart/form-data; takes precedence over `body`. */
  readonly form?: FormPayload;
  readonly headers?: Readonly<Record<string, string>>;
  readonly credentials?: Credentials;
}

export interface ApiClientOptions {
  readonly baseUrl: string;
  readonly timeoutMs?: number;
}

const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  Accept: 'application/json'
};

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a top-level field from a JSON object response.
 */
export function responseField(response: NormalizedResponse, key: string): JsonValue | undefined {
  if (response.kind !== 'json' || !isJsonObject(response.body)) {
    return undefined;
  }
  return Object.hasOwn(response.body, key) ? response.body[key] : undefined;
}

export function hasResponseField(response: NormalizedResponse, key: string): boolean {
  return responseField(response, key) !== undefined;
}

/**
 * Render a response for failure messages.
 */
export function describeResponse(response: NormalizedResponse): string {
  switch (response.kind) {
    case 'json':
      return JSON.stringify(response.body);
    case 'text':
      return JSON.stringify({ text: response.text, status: response.status });
    case 'error':
      return JSON.stringify({ error: response.error, status: response.status });
  }
}

function isJsonContentType(contentType: string | null): boolean {
  if (!contentType) {
    return false;
  }
  const mediaType = contentType.split(';', 1)[0]?.trim().toLowerCase() ?? '';
  return mediaType === 'application/json' || mediaType.endsWith('+json');
}

function toFormData(form: FormPayload): FormData {
  const data = new FormData();
  for (const [name, value] of Object.entries(form)) {
    if (typeof value === 'string') {
      data.append(name, value);
    } else {
      data.append(name, new Blob([value.content], { type: value.contentType }), value.filename);
    }
  }
  return data;
}

function payloadOf(options: RequestOptions): FormData | string | undefined {
  if (options.form !== undefined) {
    return toFormData(options.form);
  }
  return options.body !== undefined ? JSON.stringify(options.body) : undefined;
}

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

interface FetchedText {
  readonly status: number;
  readonly contentType: string | null;
  readonly text: string;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * HTTP client for the backend under test.
 *
 * One client is opened per run and closed exactly once when the run ends.
 * Closing aborts whatever request is still in flight.
 */
export class ApiClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number | undefined;
  private readonly session = new AbortController();

  public constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
  }

  public get closed(): boolean {
    return this.session.signal.aborted;
  }

  public close(): void {
    if (!this.closed) {
      this.session.abort(new Error('API client closed'));
      logger.debug({ baseUrl: this.baseUrl }, 'API client closed');
    }
  }

  public async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<NormalizedResponse> {
    let url: string;
    try {
      url = new URL(path, this.baseUrl).toString();
    } catch (error: unknown) {
      return { kind: 'error', status: 0, error: `Invalid request URL: ${errorMessage(error)}` };
    }

    const headers: Record<string, string> = { ...DEFAULT_HEADERS };
    if (options.form === undefined && options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    Object.assign(headers, options.headers);

    const hasAuthorization = Object.keys(headers).some(name => name.toLowerCase() === 'authorization');
    const token = options.credentials?.bearerToken;
    if (token && !hasAuthorization) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    logger.debug({ method, url }, 'Sending request');

    try {
      const payload = payloadOf(options);
      const response = await this.fetchWithTimeout(url, {
        method,
        headers,
        ...(payload !== undefined ? { body: payload } : {})
      });
      const { text } = response;

      if (isJsonContentType(response.contentType)) {
        try {
          const body: JsonValue = JSON.parse(text);
          logger.debug({ method, url, status: response.status }, 'Received JSON response');
          return { kind: 'json', status: response.status, body };
        } catch (error: unknown) {
          logger.warn({ method, url, error: errorMessage(error) }, 'JSON response body did not parse');
        }
      }

      logger.debug({ method, url, status: response.status }, 'Received non-JSON response');
      return { kind: 'text', status: response.status, text };
    } catch (error: unknown) {
      logger.debug({ method, url, error: errorMessage(error) }, 'Request failed');
      return { kind: 'error', status: 0, error: errorMessage(error) };
    }
  }

  /**
   * fetch tied to the client session, with an optional hard timeout. The
   * timeout and session close both cover reading the body, not just the
   * headers, since streamed responses can stall after the status line.
   */
  protected async fetchWithTimeout(url: string, init: RequestInit): Promise<FetchedText> {
    const controller = new AbortController();
    const onClose = (): void => {
      controller.abort(this.session.signal.reason);
    };
    if (this.session.signal.aborted) {
      onClose();
    } else {
      this.session.signal.addEventListener('abort', onClose, { once: true });
    }

    const { timeoutMs } = this;
    const timeout =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            controller.abort(new Error(`Request timed out after ${String(timeoutMs)} ms`));
          }, timeoutMs);

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      const text = await untilAborted(response.text(), controller.signal);
      return { status: response.status, contentType: response.headers.get('content-type'), text };
    } finally {
      clearTimeout(timeout);
      this.session.signal.removeEventListener('abort', onClose);
    }
  }
}
