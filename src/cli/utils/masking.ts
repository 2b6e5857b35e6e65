/**
 * Keeps API keys out of logs, `config show` output and HTTP error bodies.
 */

export const MASKED_VALUE = '***'

/** Key-shaped substrings inside free text */
const SECRET_PATTERNS: readonly RegExp[] = [
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  /sk-[A-Za-z0-9_-]{20,}/g,
  /Bearer\s+[A-Za-z0-9._-]{16,}/g,
]

/** Fields pino replaces with "[Redacted]" */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  'headers["x-api-key"]',
  'env.ANTHROPIC_API_KEY',
]

/** Object keys whose string values are credentials; `api_key_env` only names a variable */
const CREDENTIAL_KEY = /^(api_?key|token|secret|password)$/i

export function maskSecrets(text: string): string {
  return SECRET_PATTERNS.reduce((masked, pattern) => masked.replace(pattern, MASKED_VALUE), text)
}

/** Copy of a plain-data tree with credential strings replaced */
export function deepMask(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value !== 'object' || value === null) return value
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [
      key,
      CREDENTIAL_KEY.test(key) && typeof entry === 'string' ? MASKED_VALUE : deepMask(entry),
    ])
  )
}
