import { z } from 'zod';
import { createZodPageDecoder, type PageDecoder } from '@libs/paged-search';
import type { ImageItem } from './types';

const count = z.number().int().nonnegative();
const dimension = z.number().int().nonnegative();

export const pixabayHitSchema = z
  .object({
    id: z.number().int(),
    pageURL: z.string(),
    tags: z.string().default(''),
    previewURL: z.string(),
    previewWidth: dimension,
    previewHeight: dimension,
    webformatURL: z.string(),
    webformatWidth: dimension,
    webformatHeight: dimension,
    imageWidth: dimension,
    imageHeight: dimension,
    views: count.default(0),
    downloads: count.default(0),
    likes: count.default(0),
    user: z.string().default(''),
  })
  .transform(
    (hit): ImageItem => ({
      id: hit.id,
      pageUrl: hit.pageURL,
      imageWidth: hit.imageWidth,
      imageHeight: hit.imageHeight,
      previewUrl: hit.previewURL,
      previewWidth: hit.previewWidth,
      previewHeight: hit.previewHeight,
      imageUrl: hit.webformatURL,
      imageUrlWidth: hit.webformatWidth,
      imageUrlHeight: hit.webformatHeight,
      views: hit.views,
      downloads: hit.downloads,
      likes: hit.likes,
      tags: splitTags(hit.tags),
      username: hit.user,
    }),
  );

export type PixabayHit = z.input<typeof pixabayHitSchema>;

/** Decodes `{ totalHits, hits: [...] }` search responses. */
export function createPixabayPageDecoder(): PageDecoder<ImageItem> {
  return createZodPageDecoder({ itemSchema: pixabayHitSchema, totalField: 'totalHits', itemsField: 'hits' });
}

function splitTags(tags: string): string[] {
  return tags
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}
