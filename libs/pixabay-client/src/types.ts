export type PixabayImageType = 'all' | 'photo' | 'illustration' | 'vector';

/** One search hit, normalised from Pixabay's field names. */
export interface ImageItem {
  readonly id: number;
  readonly pageUrl: string;
  /** Original image dimensions. */
  readonly imageWidth: number;
  readonly imageHeight: number;
  /** Thumbnail, max 150px on the long side. */
  readonly previewUrl: string;
  readonly previewWidth: number;
  readonly previewHeight: number;
  /** Display-size image (Pixabay `webformatURL`, max 640px). */
  readonly imageUrl: string;
  readonly imageUrlWidth: number;
  readonly imageUrlHeight: number;
  readonly views: number;
  readonly downloads: number;
  readonly likes: number;
  readonly tags: readonly string[];
  readonly username: string;
}
