/**
 * Wire Schema Helpers
 * zod building blocks for API payloads, where a field may be missing or null
 */

import { z } from 'zod';

/** String field; missing or null reads as '' */
export const wireString = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

/** Numeric field; missing or null reads as 0 */
export const wireNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? 0);

/** Boolean field; missing or null reads as false */
export const wireBoolean = z
  .boolean()
  .nullish()
  .transform((value) => value ?? false);

/** Optional string field; missing or null reads as undefined */
export const wireOptionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

/** Array field; missing or null reads as [] */
export function wireArray<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value): z.output<T>[] => value ?? []);
}

/** Free-form JSON object */
export const wireRecord = z.record(z.unknown());
