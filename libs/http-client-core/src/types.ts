export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug?(message: string, meta?: LoggerMeta): void;
  info?(message: string, meta?: LoggerMeta): void;
  warn?(message: string, meta?: LoggerMeta): void;
  error?(message: string, meta?: LoggerMeta): void;
}

export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}

export type QueryParamValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryParamValue>;
