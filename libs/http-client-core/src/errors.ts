/**
 * Failure kinds a transport collaborator can report.
 *
 * - 'notConnectedToInternet': no route to the network (DNS lookup retry, network unreachable)
 * - 'notReachedServer': host unknown or refusing connections
 * - 'connectionLost': connection dropped mid-request
 * - 'timedOut': request exceeded its time budget
 * - 'cancelled': caller aborted the request
 * - 'serverError': 5xx or 429 response
 * - 'clientError': other 4xx response
 * - 'decodingFailed': response body was not valid JSON
 * - 'unknown': unclassified
 */
export type RequestErrorKind =
  | 'notConnectedToInternet'
  | 'notReachedServer'
  | 'connectionLost'
  | 'timedOut'
  | 'cancelled'
  | 'serverError'
  | 'clientError'
  | 'decodingFailed'
  | 'unknown';

export interface ApiRequestErrorOptions {
  status?: number;
  responseBody?: string;
  retryAfterMs?: number;
  cause?: unknown;
}

export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly responseBody?: string;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    public readonly kind: RequestErrorKind,
    options: ApiRequestErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiRequestError';
    this.status = options.status ?? 0;
    this.responseBody = options.responseBody;
    this.retryAfterMs = options.retryAfterMs;
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

const NOT_CONNECTED_CODES = new Set(['ENETUNREACH', 'ENETDOWN', 'EAI_AGAIN']);
const NOT_REACHED_CODES = new Set(['ENOTFOUND', 'ECONNREFUSED', 'EHOSTUNREACH', 'EHOSTDOWN', 'UND_ERR_CONNECT_TIMEOUT']);
const CONNECTION_LOST_CODES = new Set(['ECONNRESET', 'EPIPE', 'ECONNABORTED', 'UND_ERR_SOCKET', 'UND_ERR_CLOSED']);

export interface TransportFailureContext {
  /** The per-request timer fired before the transport settled. */
  timedOut?: boolean;
  /** The caller's signal was aborted. */
  cancelled?: boolean;
}

export function classifyTransportFailure(error: unknown, context: TransportFailureContext = {}): RequestErrorKind {
  if (context.cancelled) return 'cancelled';
  if (context.timedOut) return 'timedOut';
  if (error instanceof ApiRequestError) return error.kind;
  if (isAbortError(error)) return 'cancelled';

  const code = findErrorCode(error);
  if (code === undefined) return 'unknown';
  if (NOT_CONNECTED_CODES.has(code)) return 'notConnectedToInternet';
  if (NOT_REACHED_CODES.has(code)) return 'notReachedServer';
  if (CONNECTION_LOST_CODES.has(code)) return 'connectionLost';
  if (code === 'ETIMEDOUT' || code === 'UND_ERR_HEADERS_TIMEOUT' || code === 'UND_ERR_BODY_TIMEOUT') return 'timedOut';
  return 'unknown';
}

export function classifyStatus(status: number): RequestErrorKind {
  if (status === 429 || status >= 500) return 'serverError';
  if (status >= 400) return 'clientError';
  return 'unknown';
}

export function isRetryableKind(kind: RequestErrorKind): boolean {
  switch (kind) {
    case 'notConnectedToInternet':
    case 'notReachedServer':
    case 'connectionLost':
    case 'timedOut':
    case 'serverError':
      return true;
    default:
      return false;
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

// undici wraps socket errors: TypeError('fetch failed', { cause: { code } })
function findErrorCode(error: unknown, depth = 0): string | undefined {
  if (depth > 3 || error === null || typeof error !== 'object') return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return findErrorCode(error.cause, depth + 1);
  return undefined;
}
