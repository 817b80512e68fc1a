/**
 * @libs/pixabay-client
 *
 * Pixabay image search as a `PageFetcher` for `@libs/paged-search`.
 *
 * ## Usage
 *
 * ```typescript
 * import { PageTrigger } from '@libs/paged-search';
 * import { createPixabayClientFromEnv, createPixabayImageSearch } from '@libs/pixabay-client';
 *
 * const search = createPixabayImageSearch(createPixabayClientFromEnv());
 * const trigger = new PageTrigger();
 *
 * for await (const response of search.search('lighthouse', trigger)) {
 *   console.log(response.images.map((image) => image.previewUrl));
 * }
 * ```
 *
 * ## Environment Variables
 *
 * Required:
 * - `PIXABAY_API_KEY` - Pixabay API key
 *
 * Optional:
 * - `PIXABAY_BASE_URL` - Base URL (default: https://pixabay.com)
 * - `PIXABAY_MAX_RETRIES` - Retries for 429/5xx and network failures (default: 2)
 * - `PIXABAY_RETRY_DELAY_MS` - Base backoff delay (default: 500)
 * - `PIXABAY_TIMEOUT_MS` - Per-attempt timeout (default: 30000)
 */
export {
  DEFAULT_BASE_RETRY_DELAY_MS,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT_MS,
  PixabayClient,
  PixabayRequestError,
  createPixabayClientFromEnv,
  type PixabayClientConfig,
} from './pixabayClient';
export { createPixabayPageDecoder, pixabayHitSchema, type PixabayHit } from './imageDecoder';
export { MAX_IMAGES_PER_PAGE, createPixabayImageSearch, type PixabayImageSearchOptions } from './imageSearch';
export type { ImageItem, PixabayImageType } from './types';
