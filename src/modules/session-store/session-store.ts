/**
 * SessionStore interface definition.
 *
 * Holds the live context of every debate started through the service, plus
 * its audit status, for a bounded time. Nothing is persisted.
 */

import type { SessionId } from '../../core/types.js'
import type { AuditRecord, AuditStatusStore } from '../audit/types.js'
import type { DebateContext } from '../debate/types.js'

export interface SessionRecord {
  readonly sessionId: SessionId
  /** Live reference; a running debate keeps appending to it */
  readonly context: DebateContext
  audit: AuditRecord | null
  readonly createdAt: string
  /** Epoch milliseconds after which the record is evicted */
  readonly expiresAt: number
}

export interface SessionStore extends AuditStatusStore {
  save(context: DebateContext): SessionRecord

  get(sessionId: SessionId): SessionRecord | null

  /** @throws {SessionNotFoundError} */
  require(sessionId: SessionId): SessionRecord

  /** Live records, oldest first */
  list(): SessionRecord[]

  delete(sessionId: SessionId): boolean

  readonly size: number

  clear(): void
}
