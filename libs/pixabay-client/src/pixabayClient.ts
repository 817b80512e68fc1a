import { setTimeout as sleep } from 'timers/promises';
import {
  ApiRequestError,
  classifyStatus,
  classifyTransportFailure,
  type ApiRequestErrorOptions,
  type HttpTransport,
  type Logger,
  type QueryParams,
  type RequestErrorKind,
} from '@libs/http-client-core';
import type { PageFetcher, PageRequestParams } from '@libs/paged-search';
import type { PixabayImageType } from './types';

export const DEFAULT_BASE_URL = 'https://pixabay.com';
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_BASE_RETRY_DELAY_MS = 500;
export const DEFAULT_TIMEOUT_MS = 30_000;

const SEARCH_PATH = '/api/';

export class PixabayRequestError extends ApiRequestError {
  constructor(message: string, kind: RequestErrorKind, options: ApiRequestErrorOptions = {}) {
    super(message, kind, options);
    this.name = 'PixabayRequestError';
  }
}

export interface PixabayClientConfig {
  apiKey: string;
  baseUrl?: string;
  maxRetries?: number;
  baseRetryDelayMs?: number;
  timeoutMs?: number;
  imageType?: PixabayImageType;
  safeSearch?: boolean;
  logger?: Logger;
  transport?: HttpTransport;
}

interface RequestContext {
  operation: string;
  signal?: AbortSignal;
}

export class PixabayClient implements PageFetcher {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly baseRetryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly imageType: PixabayImageType;
  private readonly safeSearch: boolean;
  private readonly logger?: Logger;
  private readonly transport: HttpTransport;

  constructor(private readonly config: PixabayClientConfig) {
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.maxRetries = nonNegativeInteger(config.maxRetries) ?? DEFAULT_MAX_RETRIES;
    this.baseRetryDelayMs = nonNegativeNumber(config.baseRetryDelayMs) ?? DEFAULT_BASE_RETRY_DELAY_MS;
    this.timeoutMs = nonNegativeNumber(config.timeoutMs) ?? DEFAULT_TIMEOUT_MS;
    this.imageType = config.imageType ?? 'photo';
    this.safeSearch = config.safeSearch ?? true;
    this.logger = config.logger;
    this.transport = config.transport ?? ((url, init) => fetch(url, init));
  }

  /** Resolves with the undecoded JSON body of one search page. */
  fetchPage(params: PageRequestParams, signal?: AbortSignal): Promise<unknown> {
    return this.getJson(
      SEARCH_PATH,
      {
        key: this.config.apiKey,
        q: params.query,
        image_type: this.imageType,
        safesearch: this.safeSearch,
        page: params.page,
        per_page: params.perPage,
      },
      { operation: 'searchImages', signal },
    );
  }

  private async getJson(path: string, params: QueryParams, context: RequestContext): Promise<unknown> {
    const url = this.buildUrl(path, params);
    const init: RequestInit = { method: 'GET', headers: { Accept: 'application/json' } };

    for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
      const start = Date.now();
      try {
        const response = await this.executeHttp(url, init, context.signal);
        if (!response.ok) {
          throw new PixabayRequestError(
            `Pixabay request failed with status ${response.status}`,
            classifyStatus(response.status),
            {
              status: response.status,
              responseBody: await safeReadBody(response),
              retryAfterMs: parseRetryAfter(response),
            },
          );
        }

        const data = await parseJson(response);
        this.logger?.debug?.(`[PixabayClient] ${context.operation} succeeded`, {
          operation: context.operation,
          status: response.status,
          durationMs: Date.now() - start,
          attempt,
        });
        return data;
      } catch (err) {
        const error = toPixabayError(err, context.signal);
        if (!error.retryable || attempt === this.maxRetries || context.signal?.aborted) {
          this.logger?.error?.(`[PixabayClient] ${context.operation} failed: ${error.message}`, {
            operation: context.operation,
            kind: error.kind,
            status: error.status,
            attempt,
          });
          throw error;
        }
        await this.waitForRetry(error, attempt, context);
      }
    }

    throw new PixabayRequestError('Pixabay request exceeded retries', 'unknown');
  }

  private async waitForRetry(error: PixabayRequestError, attempt: number, context: RequestContext): Promise<void> {
    const delayMs = error.retryAfterMs && error.retryAfterMs > 0
      ? error.retryAfterMs
      : computeBackoffWithJitter(this.baseRetryDelayMs, attempt);

    this.logger?.warn?.(
      `[PixabayClient] Retrying ${context.operation} after ${Math.round(delayMs)}ms due to ${error.kind} (status ${error.status})`,
    );

    try {
      await sleep(delayMs, undefined, { signal: context.signal });
    } catch (sleepError) {
      throw new PixabayRequestError('Pixabay request cancelled', 'cancelled', { cause: sleepError });
    }
  }

  private async executeHttp(url: string, init: RequestInit, callerSignal?: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    const abortHandler = () => controller.abort(callerSignal?.reason);
    let timedOut = false;

    if (callerSignal) {
      if (callerSignal.aborted) {
        controller.abort(callerSignal.reason);
      } else {
        callerSignal.addEventListener('abort', abortHandler);
      }
    }

    const timeoutId = this.timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, this.timeoutMs)
      : undefined;

    try {
      return await this.transport(url, { ...init, signal: controller.signal });
    } catch (error) {
      const kind = classifyTransportFailure(error, { timedOut, cancelled: callerSignal?.aborted });
      throw new PixabayRequestError(
        `Pixabay request failed: ${error instanceof Error ? error.message : 'network error'}`,
        kind,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', abortHandler);
    }
  }

  private buildUrl(path: string, params: QueryParams): string {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) {
        continue;
      }
      url.searchParams.append(key, String(value));
    }
    return url.toString();
  }
}

export function createPixabayClientFromEnv(
  overrides: Partial<Omit<PixabayClientConfig, 'apiKey'>> = {},
): PixabayClient {
  const apiKey = process.env.PIXABAY_API_KEY;
  if (!apiKey) {
    throw new Error('PIXABAY_API_KEY environment variable is required');
  }

  const config: PixabayClientConfig = {
    apiKey,
    baseUrl: overrides.baseUrl ?? process.env.PIXABAY_BASE_URL ?? DEFAULT_BASE_URL,
    maxRetries:
      nonNegativeInteger(overrides.maxRetries) ??
      nonNegativeInteger(parseOptionalNumber(process.env.PIXABAY_MAX_RETRIES)) ??
      DEFAULT_MAX_RETRIES,
    baseRetryDelayMs:
      nonNegativeNumber(overrides.baseRetryDelayMs) ??
      nonNegativeNumber(parseOptionalNumber(process.env.PIXABAY_RETRY_DELAY_MS)) ??
      DEFAULT_BASE_RETRY_DELAY_MS,
    timeoutMs:
      nonNegativeNumber(overrides.timeoutMs) ??
      nonNegativeNumber(parseOptionalNumber(process.env.PIXABAY_TIMEOUT_MS)) ??
      DEFAULT_TIMEOUT_MS,
    imageType: overrides.imageType,
    safeSearch: overrides.safeSearch,
    logger: overrides.logger,
    transport: overrides.transport,
  };

  return new PixabayClient(config);
}

function toPixabayError(error: unknown, signal?: AbortSignal): PixabayRequestError {
  if (error instanceof PixabayRequestError) {
    return error;
  }
  const kind = classifyTransportFailure(error, { cancelled: signal?.aborted });
  return new PixabayRequestError(
    error instanceof Error ? error.message : 'Pixabay request failed',
    kind,
    { cause: error },
  );
}

function computeBackoffWithJitter(baseMs: number, attempt: number): number {
  const exp = baseMs * 2 ** attempt;
  const jitter = Math.random() * baseMs;
  return exp + jitter;
}

function parseRetryAfter(res: Response): number | undefined {
  const header = res.headers.get('retry-after');
  if (!header) {
    return undefined;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    const diff = date - Date.now();
    return diff > 0 ? diff : 0;
  }

  return undefined;
}

async function parseJson(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new PixabayRequestError('Failed to parse Pixabay response as JSON', 'decodingFailed', {
      status: response.status,
      responseBody: text.slice(0, 500),
      cause: error,
    });
  }
}

async function safeReadBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `Failed to read response body: ${error}`;
  }
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

// Negative or fractional settings fall back to the defaults.
function nonNegativeNumber(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function nonNegativeInteger(value: number | undefined): number | undefined {
  return value !== undefined && Number.isInteger(value) && value >= 0 ? value : undefined;
}
