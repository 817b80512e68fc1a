/**
 * @libs/paged-search
 *
 * Page-by-page accumulation of search results.
 *
 * - **PagedSearchAccumulator**: per-session state machine (page counter,
 *   running accumulation, completion policy). No I/O.
 * - **PagedSearch**: drives the accumulator from a fetcher and a trigger
 *   and exposes the result as an async generator.
 * - **PageTrigger**: push-side "load more" signal.
 * - **SearchSessionController**: one live session at a time.
 *
 * ## Usage
 *
 * ```typescript
 * import { PagedSearch, PageTrigger, createZodPageDecoder } from '@libs/paged-search';
 *
 * const search = new PagedSearch({
 *   fetcher,
 *   decoder: createZodPageDecoder({ itemSchema, totalField: 'totalHits', itemsField: 'hits' }),
 * });
 *
 * const trigger = new PageTrigger();
 * for await (const response of search.search('red fox', trigger)) {
 *   console.log(`${response.images.length} of ${response.totalAvailable}`);
 * }
 * ```
 */
export * from './types';
export { IllegalStateError, IncorrectDataReturnedError } from './errors';
export { PagedSearchAccumulator, evaluateCompletion, type CompletionInput } from './accumulator';
export { createZodPageDecoder, type ZodPageDecoderConfig } from './decoder';
export {
  DEFAULT_MAX_IMAGES_PER_PAGE,
  PagedSearch,
  type PagedSearchConfig,
  type SearchOptions,
} from './pagedSearch';
export { PageTrigger, type PageTriggerOptions } from './pageTrigger';
export { SearchSessionController, type SearchSessionControllerConfig } from './searchSession';
