import { IllegalStateError } from './errors';
import type {
  AccumulatedResponse,
  AccumulatorState,
  CompletionReason,
  PageAppendResult,
  PageRequestParams,
  PageResult,
} from './types';

export interface CompletionInput {
  /** Items in the page that just arrived. */
  pageItemCount: number;
  /** Accumulated items after appending that page. */
  accumulatedCount: number;
  totalAvailable: number;
  maxImagesPerPage: number;
}

/**
 * Short page wins over the total check: a page with fewer items than
 * requested means the server has nothing more, whatever total it reports.
 */
export function evaluateCompletion(input: CompletionInput): CompletionReason | undefined {
  if (input.pageItemCount < input.maxImagesPerPage) return 'shortPage';
  if (input.accumulatedCount >= input.totalAvailable) return 'totalReached';
  return undefined;
}

/**
 * Session state for one paginated search. Owns the page counter and the
 * running accumulation; performs no I/O. A driver calls `start()` once,
 * `receivePage()` for every decoded page, `advance()` for every trigger and
 * `fail()` when a fetch or decode fails.
 */
export class PagedSearchAccumulator<TItem> {
  private currentState: AccumulatorState = 'awaitingFirstPage';
  private page = 1;
  private latest?: AccumulatedResponse<TItem>;
  private reason?: CompletionReason;
  private failure?: unknown;

  constructor(
    readonly query: string,
    readonly maxImagesPerPage: number,
  ) {
    if (!Number.isInteger(maxImagesPerPage) || maxImagesPerPage < 1) {
      throw new RangeError(`maxImagesPerPage must be a positive integer, got ${maxImagesPerPage}`);
    }
  }

  get state(): AccumulatorState {
    return this.currentState;
  }

  get currentPage(): number {
    return this.page;
  }

  /** Last emitted accumulation, if any page has arrived. */
  get snapshot(): AccumulatedResponse<TItem> | undefined {
    return this.latest;
  }

  get completionReason(): CompletionReason | undefined {
    return this.reason;
  }

  get error(): unknown {
    return this.failure;
  }

  get isTerminal(): boolean {
    return this.currentState === 'completed' || this.currentState === 'failed';
  }

  get isFetching(): boolean {
    return this.currentState === 'fetchingFirstPage' || this.currentState === 'fetchingNextPage';
  }

  start(): PageRequestParams {
    if (this.currentState !== 'awaitingFirstPage') {
      throw new IllegalStateError(`Search for "${this.query}" has already started (state: ${this.currentState})`);
    }
    this.currentState = 'fetchingFirstPage';
    return this.buildRequest();
  }

  /**
   * Handles one trigger emission. Returns the next page request, or
   * undefined when the trigger is ignored (a fetch is in flight or the
   * session is over).
   */
  advance(): PageRequestParams | undefined {
    if (this.currentState !== 'accumulating') {
      return undefined;
    }
    this.page += 1;
    this.currentState = 'fetchingNextPage';
    return this.buildRequest();
  }

  receivePage(result: PageResult<TItem>): PageAppendResult<TItem> {
    if (!this.isFetching) {
      throw new IllegalStateError(`Cannot accept page ${this.page} while ${this.currentState}`);
    }

    const images = Object.freeze([...(this.latest?.images ?? []), ...result.items]);
    const response: AccumulatedResponse<TItem> = Object.freeze({
      totalAvailable: result.totalAvailable,
      images,
    });
    this.latest = response;

    this.reason = evaluateCompletion({
      pageItemCount: result.items.length,
      accumulatedCount: images.length,
      totalAvailable: result.totalAvailable,
      maxImagesPerPage: this.maxImagesPerPage,
    });
    this.currentState = this.reason ? 'completed' : 'accumulating';

    return { response, completionReason: this.reason };
  }

  fail(error: unknown): void {
    if (this.isTerminal) return;
    this.failure = error;
    this.currentState = 'failed';
  }

  private buildRequest(): PageRequestParams {
    return { query: this.query, page: this.page, perPage: this.maxImagesPerPage };
  }
}
