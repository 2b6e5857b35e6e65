/**
 * DebateService: the facade transports talk to.
 *
 * Wires engines (one per topology, built lazily), the session store, the
 * audit recorder and the event bus. A failed audit is reported alongside a
 * valid debate result; it never turns a completed debate into a failure.
 */

import type pino from 'pino'
import {
  AuditFailedError,
  AuditUnavailableError,
  serializeError,
  toError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { createEventBus } from '../../core/event-bus.js'
import type { Clock, SessionId, TopologyName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { createRoster } from '../agents/agent-factory.js'
import type { MessagesClient } from '../agents/llm/anthropic-client.js'
import type { ScriptLibrary } from '../agents/scripted/script-library.js'
import type { ParticipantRoster } from '../agents/types.js'
import { AuditRecorder } from '../audit/audit-recorder.js'
import { renderAuditReport } from '../audit/report.js'
import { SqliteLedger } from '../audit/sqlite-ledger.js'
import type { AuditRecord, LedgerBackend, LedgerReceipt, VerificationResult } from '../audit/types.js'
import type { VerdictConfig } from '../config/config-schema.js'
import { DebateEngine } from '../debate/debate-engine.js'
import { pacingFromSettings, streamContext } from '../debate/stream-driver.js'
import { getTopology, type DebateTopology } from '../debate/topology.js'
import type { DebateContext } from '../debate/types.js'
import { createSessionStore } from '../session-store/session-store-impl.js'
import type { SessionRecord, SessionStore } from '../session-store/session-store.js'
import type {
  AuditView,
  DebateOutcome,
  DebateRequest,
  DebateStreamEvent,
  SessionSummary,
  StreamRequest,
} from './types.js'

const defaultLogger = createLogger('debate-service')

export interface DebateServiceOptions {
  config: VerdictConfig
  eventBus?: TypedEventBus
  store?: SessionStore
  /** Default: an in-memory SqliteLedger owned (and closed) by the service */
  ledger?: LedgerBackend
  /** Model client for the llm backend */
  client?: MessagesClient
  /** Scripted backend texts */
  library?: ScriptLibrary
  /** Seats agents for a topology (default: createRoster from config) */
  rosterFactory?: (topology: DebateTopology) => ParticipantRoster
  clock?: Clock
  logger?: pino.Logger
}

function toAuditView(record: AuditRecord | null): AuditView | null {
  if (record === null || record.status === 'recording') return null
  if (record.status === 'completed') {
    return { status: 'completed', contentHash: record.contentHash, receipt: record.receipt }
  }
  return { status: 'failed', contentHash: record.contentHash, error: record.error }
}

export class DebateService {
  readonly eventBus: TypedEventBus
  readonly store: SessionStore

  private readonly _config: VerdictConfig
  private readonly _ledger: LedgerBackend
  private readonly _ownedLedger: SqliteLedger | null
  private readonly _recorder: AuditRecorder
  private readonly _rosterFactory: (topology: DebateTopology) => ParticipantRoster
  private readonly _engines = new Map<TopologyName, DebateEngine>()
  private readonly _clock: Clock | undefined
  private readonly _logger: pino.Logger

  constructor(options: DebateServiceOptions) {
    const { config } = options
    this._config = config
    this._clock = options.clock
    this._logger = options.logger ?? defaultLogger
    this.eventBus = options.eventBus ?? createEventBus()
    this.store =
      options.store ??
      createSessionStore({
        ttlMs: config.sessions.ttl_ms,
        maxEntries: config.sessions.max_entries,
        clock: options.clock,
        eventBus: this.eventBus,
      })

    if (options.ledger !== undefined) {
      this._ledger = options.ledger
      this._ownedLedger = null
    } else {
      const ledger = new SqliteLedger({
        genesisBlock: config.audit.genesis_block,
        network: config.audit.network,
        clock: options.clock,
      })
      this._ledger = ledger
      this._ownedLedger = ledger
    }

    this._recorder = new AuditRecorder({
      ledger: this._ledger,
      store: this.store,
      eventBus: this.eventBus,
      clock: options.clock,
      logger: this._logger,
    })

    this._rosterFactory =
      options.rosterFactory ??
      ((topology) =>
        createRoster(
          topology.participants.map((seat) => seat.id),
          {
            agents: config.agents,
            decision: config.decision,
            client: options.client,
            library: options.library,
          }
        ))
  }

  // -------------------------------------------------------------------------
  // Debates
  // -------------------------------------------------------------------------

  /**
   * Run a debate to completion, then audit it.
   * @throws {InvalidQueryError} before any phase runs
   * @throws {DebateFailedError} when a phase exhausts its attempts
   */
  async runDebate(request: DebateRequest): Promise<DebateOutcome> {
    const engine = this._engine(request.topology ?? this._config.debate.topology)
    const context = engine.createContext(request.query)
    this.store.save(context)

    try {
      await engine.runContext(context, request.signal)
    } finally {
      // Concurrent debates may have evicted the record while this one ran
      this.store.save(context)
    }
    const synthesis = context.synthesis
    if (synthesis === null) {
      throw new Error(`Debate ${context.sessionId} completed without a synthesis`)
    }

    const audit = this._auditEnabled(request) ? await this._audit(context) : null
    return { sessionId: context.sessionId, context, messages: context.messages, synthesis, audit }
  }

  /**
   * Stream a debate as `type`-tagged events. Failures are reported as a
   * final `error` event rather than thrown.
   */
  async *streamDebate(request: StreamRequest): AsyncGenerator<DebateStreamEvent, void, undefined> {
    let engine: DebateEngine
    let context: DebateContext
    try {
      engine = this._engine(request.topology ?? this._config.debate.topology)
      context = engine.createContext(request.query)
    } catch (err) {
      yield { type: 'error', sessionId: null, error: serializeError(err) }
      return
    }

    const { sessionId } = context
    this.store.save(context)
    yield { type: 'session', sessionId, topology: context.topology, query: context.query }

    try {
      const items = streamContext(engine, context, {
        signal: request.signal,
        pacing: request.pacing ?? pacingFromSettings(this._config.pacing),
      })
      for await (const item of items) {
        if (item.kind === 'message') {
          yield { type: 'message', sessionId, message: item.message }
        } else if (item.context.synthesis !== null) {
          yield { type: 'synthesis', sessionId, synthesis: item.context.synthesis }
        }
      }
    } catch (err) {
      this.store.save(context)
      this._logger.warn({ sessionId, err: toError(err).message }, 'Streamed debate ended with an error')
      yield { type: 'error', sessionId, error: serializeError(err) }
      return
    }
    this.store.save(context)

    if (this._auditEnabled(request)) {
      yield { type: 'audit_status', sessionId, status: 'recording' }
      yield { type: 'audit', sessionId, audit: await this._audit(context) }
    }
  }

  // -------------------------------------------------------------------------
  // Sessions and audits
  // -------------------------------------------------------------------------

  /** @throws {SessionNotFoundError} */
  getSession(sessionId: SessionId): SessionRecord {
    return this.store.require(sessionId)
  }

  listSessions(): SessionSummary[] {
    return this.store.list().map((record) => ({
      sessionId: record.sessionId,
      topology: record.context.topology,
      status: record.context.status,
      query: record.context.query,
      messageCount: record.context.messages.length,
      riskLevel: record.context.synthesis?.riskLevel ?? null,
      auditStatus: record.audit?.status ?? null,
      createdAt: record.createdAt,
    }))
  }

  /** @throws {SessionNotFoundError} */
  getAudit(sessionId: SessionId): AuditRecord | null {
    return this.store.require(sessionId).audit
  }

  /**
   * @throws {SessionNotFoundError}
   * @throws {AuditUnavailableError} unless the session's audit completed
   */
  getAuditReport(sessionId: SessionId): string {
    const audit = this.getAudit(sessionId)
    if (audit?.status !== 'completed') {
      throw new AuditUnavailableError(sessionId, audit?.status ?? 'none')
    }
    const generatedAt = (this._clock?.() ?? new Date()).toISOString()
    return renderAuditReport(audit.payload, audit.receipt, generatedAt)
  }

  verify(contentHash: string): Promise<VerificationResult> {
    return this._ledger.verify(contentHash)
  }

  ledgerHistory(): Promise<LedgerReceipt[]> {
    return this._ledger.history()
  }

  close(): void {
    this._ownedLedger?.close()
    this.store.clear()
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private _engine(name: TopologyName): DebateEngine {
    const cached = this._engines.get(name)
    if (cached !== undefined) return cached

    const topology = getTopology(name)
    const { agents, debate } = this._config
    const engine = new DebateEngine({
      topology,
      roster: this._rosterFactory(topology),
      policy: {
        maxAttempts: agents.retry.max_attempts,
        baseDelayMs: agents.retry.base_delay_ms,
        timeoutMs: agents.timeout_ms,
      },
      eventBus: this.eventBus,
      clock: this._clock,
      maxQueryLength: debate.max_query_length,
      concurrentGroups: debate.council_concurrency,
      logger: this._logger.child({ component: 'debate-engine' }),
    })
    this._engines.set(name, engine)
    return engine
  }

  private _auditEnabled(request: DebateRequest): boolean {
    return request.audit ?? this._config.audit.enabled
  }

  private async _audit(context: DebateContext): Promise<AuditView> {
    try {
      const outcome = await this._recorder.record(context)
      return { status: 'completed', contentHash: outcome.contentHash, receipt: outcome.receipt }
    } catch (err) {
      if (!(err instanceof AuditFailedError)) throw err
      const view = toAuditView(this.store.getAudit(context.sessionId))
      return view ?? { status: 'failed', contentHash: null, error: serializeError(err) }
    }
  }
}

export function createDebateService(options: DebateServiceOptions): DebateService {
  return new DebateService(options)
}
