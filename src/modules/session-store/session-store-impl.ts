/**
 * InMemorySessionStore: Map-backed SessionStore with TTL and capacity limits.
 *
 * Eviction is lazy: expired records are dropped on the next access, and the
 * oldest records are dropped when a save exceeds `maxEntries`.
 */

import { SessionNotFoundError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { systemClock, type Clock, type SessionId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { AuditRecord } from '../audit/types.js'
import type { DebateContext } from '../debate/types.js'
import type { SessionRecord, SessionStore } from './session-store.js'

const logger = createLogger('session-store')

export interface InMemorySessionStoreOptions {
  ttlMs: number
  maxEntries: number
  clock?: Clock
  eventBus?: TypedEventBus
}

export class InMemorySessionStore implements SessionStore {
  private readonly _records = new Map<SessionId, SessionRecord>()
  private readonly _ttlMs: number
  private readonly _maxEntries: number
  private readonly _clock: Clock
  private readonly _eventBus: TypedEventBus | undefined

  constructor(options: InMemorySessionStoreOptions) {
    this._ttlMs = options.ttlMs
    this._maxEntries = options.maxEntries
    this._clock = options.clock ?? systemClock
    this._eventBus = options.eventBus
  }

  get size(): number {
    this._evictExpired()
    return this._records.size
  }

  save(context: DebateContext): SessionRecord {
    this._evictExpired()
    const now = this._clock()
    const existing = this._records.get(context.sessionId)
    const record: SessionRecord = {
      sessionId: context.sessionId,
      context,
      audit: existing?.audit ?? null,
      createdAt: existing?.createdAt ?? now.toISOString(),
      expiresAt: now.getTime() + this._ttlMs,
    }
    // Re-insert so Map order stays oldest-first
    this._records.delete(context.sessionId)
    this._records.set(context.sessionId, record)

    while (this._records.size > this._maxEntries) {
      const oldest = this._records.keys().next()
      if (oldest.done === true) break
      this._evict(oldest.value, 'capacity')
    }
    return record
  }

  get(sessionId: SessionId): SessionRecord | null {
    this._evictExpired()
    return this._records.get(sessionId) ?? null
  }

  require(sessionId: SessionId): SessionRecord {
    const record = this.get(sessionId)
    if (record === null) throw new SessionNotFoundError(sessionId)
    return record
  }

  list(): SessionRecord[] {
    this._evictExpired()
    return [...this._records.values()]
  }

  delete(sessionId: SessionId): boolean {
    return this._records.delete(sessionId)
  }

  clear(): void {
    this._records.clear()
  }

  getAudit(sessionId: SessionId): AuditRecord | null {
    return this.get(sessionId)?.audit ?? null
  }

  /** @throws {SessionNotFoundError} */
  setAudit(sessionId: SessionId, record: AuditRecord): void {
    this.require(sessionId).audit = record
  }

  private _evictExpired(): void {
    const now = this._clock().getTime()
    for (const [sessionId, record] of this._records) {
      if (record.expiresAt <= now) this._evict(sessionId, 'expired')
    }
  }

  private _evict(sessionId: SessionId, reason: 'expired' | 'capacity'): void {
    this._records.delete(sessionId)
    logger.debug({ sessionId, reason }, 'Session evicted')
    this._eventBus?.emit('session:evicted', { sessionId, reason })
  }
}

export function createSessionStore(options: InMemorySessionStoreOptions): SessionStore {
  return new InMemorySessionStore(options)
}
