/**
 * Canonical audit payload and its digest.
 *
 * The canonical form sorts object keys at every depth and carries no
 * whitespace, so two payloads that are equal as values hash identically
 * regardless of key insertion order.
 */

import { createHash } from 'node:crypto'
import { AuditFailedError } from '../../core/errors.js'
import type { SessionId } from '../../core/types.js'
import { isPlainObject } from '../../utils/helpers.js'
import type { DebateContext, DebateMessage } from '../debate/types.js'
import type { SynthesisResult } from '../decision/types.js'
import type { AuditPayload } from './types.js'

export const PAYLOAD_VERSION = '1.0'

export function createPayload(
  query: string,
  messages: readonly DebateMessage[],
  synthesis: SynthesisResult,
  sessionId: SessionId,
  recordedAt: string
): AuditPayload {
  const debate: AuditPayload['debate'] = { opening: {}, rebuttal: {}, final: {} }
  for (const message of messages) {
    if (message.round === 'synthesis') continue
    debate[message.round][message.participant] = message.content
  }
  return {
    version: PAYLOAD_VERSION,
    sessionId,
    recordedAt,
    query,
    debate,
    synthesis: {
      riskLevel: synthesis.riskLevel,
      confidence: synthesis.confidence,
      approach: synthesis.approach,
      costOfDelay: synthesis.costOfDelay,
      verdict: synthesis.verdict,
      consensus: synthesis.consensus,
      dissents: [...synthesis.dissents],
    },
  }
}

/**
 * Payload for a completed debate, stamped with its completion time.
 * @throws {AuditFailedError} when the debate has not completed
 */
export function payloadFromContext(context: DebateContext): AuditPayload {
  if (context.status !== 'completed' || context.synthesis === null || context.completedAt === null) {
    throw new AuditFailedError(`Debate ${context.sessionId} has not completed`, {
      sessionId: context.sessionId,
      status: context.status,
    })
  }
  return createPayload(
    context.query,
    context.messages,
    context.synthesis,
    context.sessionId,
    context.completedAt
  )
}

/** Sorted-key, whitespace-free JSON. `undefined` object members are dropped. */
export function canonicalize(value: unknown): string {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value)
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new TypeError(`Cannot canonicalize number ${String(value)}`)
    return JSON.stringify(value)
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => canonicalize(item)).join(',')}]`
  }
  if (isPlainObject(value)) {
    const members = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${canonicalize(value[key])}`)
    return `{${members.join(',')}}`
  }
  throw new TypeError(`Cannot canonicalize value of type ${typeof value}`)
}

/** SHA-256 over the canonical serialization, hex with a 0x prefix */
export function hashPayload(payload: unknown): string {
  return `0x${createHash('sha256').update(canonicalize(payload), 'utf8').digest('hex')}`
}

export const CONTENT_HASH_PATTERN = /^0x[0-9a-f]{64}$/
