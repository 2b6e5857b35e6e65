import { z } from 'zod'
import { InvalidQueryError } from '../../core/errors.js'

export const DEFAULT_MAX_QUERY_LENGTH = 4_000

export function createQuerySchema(maxLength = DEFAULT_MAX_QUERY_LENGTH) {
  return z
    .string({ required_error: 'query is required', invalid_type_error: 'query must be a string' })
    .trim()
    .min(1, 'query must not be empty')
    .max(maxLength, `query must be at most ${String(maxLength)} characters`)
}

/**
 * Validate a raw query before any phase runs.
 * @throws {InvalidQueryError}
 */
export function parseQuery(raw: unknown, maxLength = DEFAULT_MAX_QUERY_LENGTH): string {
  const result = createQuerySchema(maxLength).safeParse(raw)
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? 'invalid query'
    throw new InvalidQueryError(message, { maxLength })
  }
  return result.data
}
