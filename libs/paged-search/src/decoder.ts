import { z } from 'zod';
import { IncorrectDataReturnedError } from './errors';
import type { PageDecoder, PageResult } from './types';

export interface ZodPageDecoderConfig<TSchema extends z.ZodTypeAny> {
  itemSchema: TSchema;
  /** Top-level field holding the total number of results. */
  totalField: string;
  /** Top-level field holding the page's item list. */
  itemsField: string;
}

const envelopeSchema = z.record(z.unknown());
const totalSchema = z.number().int().nonnegative();

export function createZodPageDecoder<TSchema extends z.ZodTypeAny>(
  config: ZodPageDecoderConfig<TSchema>,
): PageDecoder<z.output<TSchema>> {
  const itemsSchema = z.array(config.itemSchema);

  return {
    decodePage(raw: unknown, page: number): PageResult<z.output<TSchema>> {
      const envelope = envelopeSchema.safeParse(raw);
      if (!envelope.success) {
        throw new IncorrectDataReturnedError(`Page ${page} response is not an object`, page, envelope.error.issues);
      }

      const total = totalSchema.safeParse(envelope.data[config.totalField]);
      if (!total.success) {
        throw new IncorrectDataReturnedError(
          `Page ${page} response has a missing or invalid "${config.totalField}"`,
          page,
          total.error.issues,
        );
      }

      const items = itemsSchema.safeParse(envelope.data[config.itemsField]);
      if (!items.success) {
        throw new IncorrectDataReturnedError(
          `Page ${page} response has a missing or invalid "${config.itemsField}"`,
          page,
          items.error.issues,
        );
      }

      return { items: items.data, totalAvailable: total.data };
    },
  };
}
