import type { Logger } from '@libs/http-client-core';
import { DEFAULT_MAX_IMAGES_PER_PAGE, PagedSearch, type PageFetcher } from '@libs/paged-search';
import { createPixabayPageDecoder } from './imageDecoder';
import type { ImageItem } from './types';

export const MAX_IMAGES_PER_PAGE = DEFAULT_MAX_IMAGES_PER_PAGE;

/** Bounds Pixabay accepts for `per_page`. */
const PER_PAGE_MIN = 3;
const PER_PAGE_MAX = 200;

export interface PixabayImageSearchOptions {
  maxImagesPerPage?: number;
  logger?: Logger;
}

export function createPixabayImageSearch(
  fetcher: PageFetcher,
  options: PixabayImageSearchOptions = {},
): PagedSearch<ImageItem> {
  const maxImagesPerPage = options.maxImagesPerPage ?? MAX_IMAGES_PER_PAGE;
  if (!Number.isInteger(maxImagesPerPage) || maxImagesPerPage < PER_PAGE_MIN || maxImagesPerPage > PER_PAGE_MAX) {
    throw new RangeError(
      `maxImagesPerPage must be an integer between ${PER_PAGE_MIN} and ${PER_PAGE_MAX}, got ${maxImagesPerPage}`,
    );
  }

  return new PagedSearch({
    fetcher,
    decoder: createPixabayPageDecoder(),
    maxImagesPerPage,
    logger: options.logger,
  });
}
