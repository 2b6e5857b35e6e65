/**
 * AuditRecorder: hashes a completed debate and anchors it in the ledger.
 *
 * Status moves recording → completed | failed in the session store. A
 * failed audit keeps its reason and never alters the debate itself.
 */

import type pino from 'pino'
import { AuditFailedError, SessionNotFoundError, serializeError, toError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { systemClock, type Clock } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { DebateContext } from '../debate/types.js'
import { hashPayload, payloadFromContext } from './payload.js'
import type { AuditOutcome, AuditRecord, AuditStatusStore, LedgerBackend } from './types.js'

const defaultLogger = createLogger('audit')

export interface AuditRecorderOptions {
  ledger: LedgerBackend
  store: AuditStatusStore
  eventBus?: TypedEventBus
  clock?: Clock
  logger?: pino.Logger
}

export class AuditRecorder {
  private readonly _ledger: LedgerBackend
  private readonly _store: AuditStatusStore
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _clock: Clock
  private readonly _logger: pino.Logger

  constructor(options: AuditRecorderOptions) {
    this._ledger = options.ledger
    this._store = options.store
    this._eventBus = options.eventBus
    this._clock = options.clock ?? systemClock
    this._logger = options.logger ?? defaultLogger
  }

  get ledger(): LedgerBackend {
    return this._ledger
  }

  /**
   * @throws {AuditFailedError} if the debate is incomplete, an audit for the
   *   session is already in flight, or the ledger rejects the submission
   */
  async record(context: DebateContext): Promise<AuditOutcome> {
    const { sessionId } = context
    if (this._store.getAudit(sessionId)?.status === 'recording') {
      throw new AuditFailedError(`An audit for session ${sessionId} is already recording`, { sessionId })
    }

    let contentHash: string | null = null
    try {
      const payload = payloadFromContext(context)
      const hash = hashPayload(payload)
      contentHash = hash

      this._setStatus(sessionId, {
        status: 'recording',
        contentHash: hash,
        startedAt: this._clock().toISOString(),
      })
      this._eventBus?.emit('audit:recording', { sessionId })

      const receipt = await this._ledger.submit(hash, {
        sessionId,
        riskLevel: payload.synthesis.riskLevel,
        confidence: payload.synthesis.confidence,
      })
      this._setStatus(sessionId, { status: 'completed', contentHash: hash, payload, receipt })
      this._eventBus?.emit('audit:completed', {
        sessionId,
        contentHash: hash,
        transactionId: receipt.transactionId,
      })
      this._logger.info({ sessionId, contentHash: hash, transactionId: receipt.transactionId }, 'Audit recorded')
      return { payload, contentHash: hash, receipt }
    } catch (err) {
      const cause = toError(err)
      this._setStatus(sessionId, {
        status: 'failed',
        contentHash,
        error: serializeError(cause),
        failedAt: this._clock().toISOString(),
      })
      this._eventBus?.emit('audit:failed', { sessionId, error: cause.message })
      this._logger.error({ sessionId, err: cause.message }, 'Audit failed')
      if (cause instanceof AuditFailedError) throw cause
      throw new AuditFailedError(`Audit for session ${sessionId} failed: ${cause.message}`, { sessionId }, cause)
    }
  }

  /**
   * A session evicted mid-audit loses its status record; the ledger entry and
   * the returned outcome are unaffected.
   */
  private _setStatus(sessionId: string, record: AuditRecord): void {
    try {
      this._store.setAudit(sessionId, record)
    } catch (err) {
      if (!(err instanceof SessionNotFoundError)) throw err
      this._logger.warn({ sessionId, status: record.status }, 'Session no longer stored; audit status dropped')
    }
  }
}
