/**
 * Response Parsing
 * Validates success bodies against their zod schema
 */

import type { z } from 'zod';
import { LeanvoxError } from '@/modules/errors';

/**
 * Parse `data` with `schema`, turning a mismatch into a LeanvoxError
 * (code `invalid_response`) that names the endpoint.
 */
export function parseResponse<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  endpoint: string
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new LeanvoxError(
      `Unexpected response from ${endpoint}${where}: ${issue?.message ?? 'invalid body'}`,
      { code: 'invalid_response', statusCode: 200 }
    );
  }
  return result.data;
}
