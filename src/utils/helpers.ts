/**
 * General utility helpers
 */

import { randomUUID } from 'crypto'

/**
 * Sleep for a given number of milliseconds.
 * Rejects with the signal's reason if `signal` aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal === undefined) {
    return new Promise((resolve) => setTimeout(resolve, ms))
  }
  return interruptibleSleep(ms, { abortSignal: signal })
}

export interface InterruptibleSleepOptions {
  /** Aborting this ends the sleep early and resolves normally */
  skipSignal?: AbortSignal
  /** Aborting this ends the sleep early and rejects */
  abortSignal?: AbortSignal
}

/**
 * Sleep that can be cut short two ways: skipped (resolve now) or aborted
 * (reject with the abort reason). Listeners are removed on every path.
 */
export function interruptibleSleep(
  ms: number,
  options: InterruptibleSleepOptions = {}
): Promise<void> {
  const { skipSignal, abortSignal } = options
  if (abortSignal?.aborted) {
    return Promise.reject(abortReason(abortSignal))
  }
  if (ms <= 0 || skipSignal?.aborted) {
    return Promise.resolve()
  }

  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(finish, ms)

    function cleanup(): void {
      clearTimeout(timer)
      skipSignal?.removeEventListener('abort', finish)
      abortSignal?.removeEventListener('abort', fail)
    }
    function finish(): void {
      cleanup()
      resolve()
    }
    function fail(): void {
      cleanup()
      reject(abortSignal === undefined ? new Error('Aborted') : abortReason(abortSignal))
    }

    skipSignal?.addEventListener('abort', finish, { once: true })
    abortSignal?.addEventListener('abort', fail, { once: true })
  })
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason
  return reason instanceof Error ? reason : new Error(String(reason ?? 'Aborted'))
}

/**
 * Generate a unique identifier using crypto.randomUUID()
 * @param prefix - Optional prefix for the ID
 */
export function generateId(prefix = ''): string {
  const uuid = randomUUID()
  return prefix ? `${prefix}-${uuid}` : uuid
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

// ---------------------------------------------------------------------------
// Retry / timeout
// ---------------------------------------------------------------------------

export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number
  /** Delay before the second attempt; doubles for each further attempt (default: 100) */
  baseDelayMs?: number
  /** Return false to stop retrying and rethrow immediately (default: always retry) */
  shouldRetry?: (error: Error) => boolean
  /** Called before each backoff sleep */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void
  /** Aborts the backoff sleep */
  signal?: AbortSignal
}

/**
 * Retry an async operation with exponential backoff.
 * `fn` receives the 1-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 3)
  const baseDelayMs = options.baseDelayMs ?? 100
  let lastError: Error | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))
      const retryable = options.shouldRetry?.(lastError) ?? true
      if (!retryable || attempt === maxAttempts) {
        throw lastError
      }
      const delayMs = baseDelayMs * Math.pow(2, attempt - 1)
      options.onRetry?.(lastError, attempt, delayMs)
      await sleep(delayMs, options.signal)
    }
  }
  throw lastError ?? new Error('Operation failed after retries')
}

export interface TimeoutOptions {
  /** Parent signal; aborting it aborts the call as well */
  signal?: AbortSignal
  /** Builds the error thrown when the deadline passes */
  onTimeout: () => Error
}

/**
 * Run `fn` with a deadline. `fn` receives a signal that aborts when either
 * the deadline passes or the parent signal aborts.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions
): Promise<T> {
  const controller = new AbortController()
  const { signal: parent } = options
  const forwardAbort = (): void => {
    controller.abort(parent?.reason)
  }
  if (parent?.aborted) {
    forwardAbort()
  } else {
    parent?.addEventListener('abort', forwardAbort, { once: true })
  }

  let timer: NodeJS.Timeout | undefined
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = options.onTimeout()
      controller.abort(error)
      reject(error)
    }, timeoutMs)
  })

  try {
    return await Promise.race([fn(controller.signal), deadline])
  } finally {
    clearTimeout(timer)
    parent?.removeEventListener('abort', forwardAbort)
  }
}
