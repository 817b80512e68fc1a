export interface PageRequestParams {
  readonly query: string;
  /** 1-based. */
  readonly page: number;
  readonly perPage: number;
}

export interface PageResult<TItem> {
  readonly items: readonly TItem[];
  readonly totalAvailable: number;
}

export interface AccumulatedResponse<TItem> {
  readonly totalAvailable: number;
  readonly images: readonly TItem[];
}

/**
 * Transport seam. Resolves with the raw response body for one page, or
 * rejects with whatever error the transport reports.
 */
export interface PageFetcher {
  fetchPage(params: PageRequestParams, signal?: AbortSignal): Promise<unknown>;
}

/** Throws IncorrectDataReturnedError when `raw` is not a valid page. */
export interface PageDecoder<TItem> {
  decodePage(raw: unknown, page: number): PageResult<TItem>;
}

export type CompletionReason = 'shortPage' | 'totalReached';

export type AccumulatorState =
  | 'awaitingFirstPage'
  | 'fetchingFirstPage'
  | 'accumulating'
  | 'fetchingNextPage'
  | 'completed'
  | 'failed';

export interface PageAppendResult<TItem> {
  response: AccumulatedResponse<TItem>;
  completionReason?: CompletionReason;
}
