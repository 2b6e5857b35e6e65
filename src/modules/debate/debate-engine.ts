/**
 * DebateEngine: walks a topology from INIT to COMPLETE.
 *
 * Each state appends exactly the messages its turns produce, writes the
 * matching slots and hands over to the next state from the transition
 * table. `execute()` yields after every state so the streaming driver can
 * pace output; `run()` simply drains it, which keeps both modes on one
 * code path.
 */

import type pino from 'pino'
import {
  AgentContractError,
  DebateFailedError,
  TopologyError,
  serializeError,
  toError,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { DebateEvents } from '../../core/event-bus.types.js'
import { systemClock, type Clock, type ParticipantId, type SessionId } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { generateId } from '../../utils/helpers.js'
import type { AgentCallOptions, DebateAgent, ParticipantRoster } from '../agents/types.js'
import type { SidePosition, SynthesisResult } from '../decision/types.js'
import { PhaseInvoker, type InvocationPolicy } from './phase-invoker.js'
import { DEFAULT_MAX_QUERY_LENGTH, parseQuery } from './query.js'
import {
  buildTransitionTable,
  initialRound,
  nextState,
  resolveTurnInput,
  validateTopology,
  type DebateTopology,
  type PhaseDefinition,
  type ResolvedInput,
  type SlotSource,
  type SynthesisPhase,
  type TransitionTable,
  type TurnPhase,
  type TurnStep,
} from './topology.js'
import {
  COMPLETE_STATE,
  INIT_STATE,
  type DebateContext,
  type DebateMessage,
  type ParticipantSlots,
  type StepOutcome,
} from './types.js'

const defaultLogger = createLogger('debate-engine')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DebateEngineOptions {
  topology: DebateTopology
  roster: ParticipantRoster
  policy: InvocationPolicy
  eventBus?: TypedEventBus
  clock?: Clock
  maxQueryLength?: number
  /** Let grouped phases overlap their agent calls (default: true) */
  concurrentGroups?: boolean
  logger?: pino.Logger
}

export interface RunOptions {
  sessionId?: SessionId
  /** Cancels the whole debate, in-flight agent calls included */
  signal?: AbortSignal
}

export interface ExecuteOptions {
  signal?: AbortSignal
  /** Awaited before the engine enters each non-initial state */
  beforeState?: (state: string) => Promise<void>
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: Error }

function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value): Settled<T> => ({ ok: true, value }),
    (err: unknown): Settled<T> => ({ ok: false, error: toError(err) })
  )
}

function requireText(text: string, agentId: string, state: string): string {
  if (text.trim().length === 0) {
    throw new AgentContractError(`Agent "${agentId}" returned empty text in ${state}`, {
      agentId,
      state,
    })
  }
  return text
}

function callAdvisor(
  agent: DebateAgent,
  turn: TurnStep,
  query: string,
  input: ResolvedInput,
  options: AgentCallOptions
): Promise<string> {
  switch (turn.operation) {
    case 'opening':
      return agent.openingArgument(query, options)
    case 'rebuttal':
      return agent.rebut(query, input.text, input.opponentRole, options)
    case 'final':
      return agent.finalPosition(query, input.text, options)
  }
}

function requireSynthesis(result: SynthesisResult, agentId: string): SynthesisResult {
  requireText(result.verdict, agentId, 'SYNTHESIS')
  if (!Number.isFinite(result.confidence) || result.confidence < 0 || result.confidence > 100) {
    throw new AgentContractError(`Agent "${agentId}" returned confidence outside 0-100`, {
      agentId,
      confidence: result.confidence,
    })
  }
  return result
}

// ---------------------------------------------------------------------------
// DebateEngine
// ---------------------------------------------------------------------------

export class DebateEngine {
  readonly topology: DebateTopology

  private readonly _roster: ParticipantRoster
  private readonly _invoker: PhaseInvoker
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _clock: Clock
  private readonly _maxQueryLength: number
  private readonly _concurrentGroups: boolean
  private readonly _logger: pino.Logger
  private readonly _transitions: TransitionTable
  private readonly _phases: ReadonlyMap<string, PhaseDefinition>
  private readonly _groups: ReadonlyMap<string, readonly TurnPhase[]>

  constructor(options: DebateEngineOptions) {
    validateTopology(options.topology)
    this.topology = options.topology
    this._roster = options.roster
    this._eventBus = options.eventBus
    this._clock = options.clock ?? systemClock
    this._maxQueryLength = options.maxQueryLength ?? DEFAULT_MAX_QUERY_LENGTH
    this._concurrentGroups = options.concurrentGroups ?? true
    this._logger = options.logger ?? defaultLogger
    this._invoker = new PhaseInvoker({
      policy: options.policy,
      eventBus: options.eventBus,
      logger: this._logger,
    })
    this._transitions = buildTransitionTable(options.topology)
    this._phases = new Map(options.topology.phases.map((phase) => [phase.state, phase]))

    const groups = new Map<string, TurnPhase[]>()
    for (const phase of options.topology.phases) {
      if (phase.kind === 'turns' && phase.group !== undefined) {
        const members = groups.get(phase.group) ?? []
        members.push(phase)
        groups.set(phase.group, members)
      }
    }
    this._groups = groups

    for (const seat of options.topology.participants) {
      const agent = this._roster.advisors.get(seat.id)
      if (agent === undefined) {
        throw new TopologyError(`No agent seated for participant "${seat.id}"`, { participant: seat.id })
      }
      if (agent.role !== seat.role) {
        throw new TopologyError(
          `Participant "${seat.id}" needs a ${seat.role} agent, got ${agent.role}`,
          { participant: seat.id }
        )
      }
    }
  }

  /**
   * Validate the query and create a fresh context in INIT.
   * @throws {InvalidQueryError}
   */
  createContext(query: unknown, sessionId: SessionId = generateId('debate')): DebateContext {
    const text = parseQuery(query, this._maxQueryLength)
    const slots: Record<ParticipantId, ParticipantSlots> = {}
    for (const seat of this.topology.participants) {
      slots[seat.id] = {}
    }
    return {
      query: text,
      sessionId,
      topology: this.topology.name,
      state: INIT_STATE,
      round: initialRound(this.topology),
      status: 'running',
      messages: [],
      visitedStates: [INIT_STATE],
      slots,
      synthesis: null,
      failure: null,
      startedAt: this._clock().toISOString(),
      completedAt: null,
    }
  }

  /**
   * Run a debate to COMPLETE.
   * @throws {InvalidQueryError} before any phase runs
   * @throws {DebateFailedError} when a phase exhausts its attempts
   */
  async run(query: unknown, options: RunOptions = {}): Promise<DebateContext> {
    return this.runContext(this.createContext(query, options.sessionId), options.signal)
  }

  /** Drive an already-created context to COMPLETE */
  async runContext(context: DebateContext, signal?: AbortSignal): Promise<DebateContext> {
    const steps = this.execute(context, { signal })
    let step = await steps.next()
    while (step.done !== true) {
      step = await steps.next()
    }
    return step.value
  }

  /**
   * Drive `context` through every state, yielding what each one appended.
   * The generator's return value is the completed context.
   */
  async *execute(
    context: DebateContext,
    options: ExecuteOptions = {}
  ): AsyncGenerator<StepOutcome, DebateContext, undefined> {
    if (context.state !== INIT_STATE || context.status !== 'running') {
      throw new Error(`Debate ${context.sessionId} has already been started`)
    }

    const controller = new AbortController()
    const parent = options.signal
    const forwardAbort = (): void => {
      controller.abort(parent?.reason)
    }
    if (parent?.aborted) {
      forwardAbort()
    } else {
      parent?.addEventListener('abort', forwardAbort, { once: true })
    }

    const prefetched = new Map<string, Promise<Settled<string[]>>>()
    const log = this._logger.child({ sessionId: context.sessionId, topology: context.topology })
    let state = INIT_STATE

    try {
      this._emit('debate:started', {
        sessionId: context.sessionId,
        topology: context.topology,
        query: context.query,
      })
      log.info('Debate started')

      state = nextState(this._transitions, state)
      while (state !== COMPLETE_STATE) {
        const phase = this._phase(state)
        if (options.beforeState !== undefined) {
          await options.beforeState(state)
        }
        controller.signal.throwIfAborted()

        context.state = state
        context.round = phase.round
        context.visitedStates.push(state)
        this._emit('debate:phase-started', { sessionId: context.sessionId, state })
        log.debug({ state, round: phase.round }, 'Phase started')

        let messages: DebateMessage[]
        if (phase.kind === 'synthesis') {
          messages = [await this._runSynthesis(context, phase, controller.signal)]
        } else {
          if (this._concurrentGroups && phase.group !== undefined && !prefetched.has(state)) {
            this._prefetchGroup(context, phase.group, controller.signal, prefetched)
          }
          messages = await this._runTurns(context, phase, controller.signal, prefetched.get(state))
        }
        log.info({ state, messages: messages.length }, 'Phase finished')

        yield { state, messages }
        state = nextState(this._transitions, state)
      }

      const synthesis = context.synthesis
      if (synthesis === null) {
        throw new TopologyError('Debate reached COMPLETE without a synthesis', { state })
      }
      context.state = COMPLETE_STATE
      context.visitedStates.push(COMPLETE_STATE)
      context.status = 'completed'
      context.completedAt = this._clock().toISOString()
      this._emit('debate:completed', {
        sessionId: context.sessionId,
        messageCount: context.messages.length,
        riskLevel: synthesis.riskLevel,
      })
      log.info({ riskLevel: synthesis.riskLevel, messages: context.messages.length }, 'Debate completed')
      return context
    } catch (err) {
      const cause = toError(err)
      controller.abort(cause)
      context.status = 'failed'
      context.failure = { state, error: serializeError(cause) }
      const failure = new DebateFailedError(context, state, cause)
      this._emit('debate:failed', {
        sessionId: context.sessionId,
        state,
        code: failure.code,
        error: cause.message,
      })
      log.error({ state, err: cause.message, messages: context.messages.length }, 'Debate failed')
      throw failure
    } finally {
      parent?.removeEventListener('abort', forwardAbort)
      // Stops grouped calls still in flight when the consumer stops early
      if (!controller.signal.aborted) controller.abort()
    }
  }

  // -------------------------------------------------------------------------
  // Turns
  // -------------------------------------------------------------------------

  private async _runTurns(
    context: DebateContext,
    phase: TurnPhase,
    signal: AbortSignal,
    pending: Promise<Settled<string[]>> | undefined
  ): Promise<DebateMessage[]> {
    let prepared: string[] | undefined
    if (pending !== undefined) {
      const settled = await pending
      if (!settled.ok) throw settled.error
      prepared = settled.value
    }

    const messages: DebateMessage[] = []
    for (const [index, turn] of phase.turns.entries()) {
      const text = prepared?.[index] ?? (await this._turnText(context, phase, turn, signal))
      const agent = this._advisor(turn.participant)
      const slots = context.slots[turn.participant] ?? {}
      slots[turn.operation] = text
      context.slots[turn.participant] = slots
      messages.push(
        this._append(context, {
          agent: agent.displayName,
          participant: agent.id,
          role: agent.role,
          round: phase.round,
          state: phase.state,
          content: text,
          isRebuttal: turn.operation === 'rebuttal',
        })
      )
    }
    return messages
  }

  private async _turnText(
    context: DebateContext,
    phase: TurnPhase,
    turn: TurnStep,
    signal: AbortSignal
  ): Promise<string> {
    const agent = this._advisor(turn.participant)
    const input = resolveTurnInput(turn, agent.role, this._slotSource(context))
    return this._invoker.invoke({
      sessionId: context.sessionId,
      state: phase.state,
      agent,
      signal,
      call: async (callSignal) => {
        const callOptions: AgentCallOptions = callSignal === undefined ? {} : { signal: callSignal }
        const text = await callAdvisor(agent, turn, context.query, input, callOptions)
        return requireText(text, agent.id, phase.state)
      },
    })
  }

  /** Start every turn of `group` now; results are consumed in declared order */
  private _prefetchGroup(
    context: DebateContext,
    group: string,
    signal: AbortSignal,
    prefetched: Map<string, Promise<Settled<string[]>>>
  ): void {
    for (const member of this._groups.get(group) ?? []) {
      if (prefetched.has(member.state)) continue
      const texts = (async (): Promise<string[]> => {
        const out: string[] = []
        for (const turn of member.turns) {
          out.push(await this._turnText(context, member, turn, signal))
        }
        return out
      })()
      prefetched.set(member.state, settle(texts))
    }
  }

  // -------------------------------------------------------------------------
  // Synthesis
  // -------------------------------------------------------------------------

  private async _runSynthesis(
    context: DebateContext,
    phase: SynthesisPhase,
    signal: AbortSignal
  ): Promise<DebateMessage> {
    const mediator = this._roster.mediator
    const positions = this._positions(context)
    const result = await this._invoker.invoke({
      sessionId: context.sessionId,
      state: phase.state,
      agent: mediator,
      signal,
      call: async (callSignal) =>
        requireSynthesis(
          await mediator.synthesize(
            positions,
            context.query,
            callSignal === undefined ? {} : { signal: callSignal }
          ),
          mediator.id
        ),
    })
    context.synthesis = result
    return this._append(context, {
      agent: mediator.displayName,
      participant: mediator.id,
      role: 'mediator',
      round: phase.round,
      state: phase.state,
      content: result.verdict,
      isRebuttal: false,
    })
  }

  private _positions(context: DebateContext): SidePosition[] {
    return this.topology.participants.map((seat) => {
      const agent = this._advisor(seat.id)
      const slots = context.slots[seat.id] ?? {}
      if (slots.opening === undefined) {
        throw new TopologyError(`Participant "${seat.id}" reached synthesis without an opening`, {
          participant: seat.id,
        })
      }
      return {
        participantId: seat.id,
        displayName: agent.displayName,
        role: seat.role,
        opening: slots.opening,
        rebuttal: slots.rebuttal,
        final: slots.final,
      }
    })
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _append(
    context: DebateContext,
    fields: Omit<DebateMessage, 'timestamp' | 'referencesPrevious'>
  ): DebateMessage {
    const message: DebateMessage = Object.freeze({
      ...fields,
      timestamp: this._clock().toISOString(),
      referencesPrevious: fields.round === 'rebuttal',
    })
    context.messages.push(message)
    this._emit('debate:message', { sessionId: context.sessionId, message })
    return message
  }

  private _slotSource(context: DebateContext): SlotSource {
    return {
      text: (ref) => context.slots[ref.participant]?.[ref.slot],
      displayName: (participant) => this._advisor(participant).displayName,
      role: (participant) => this._advisor(participant).role,
    }
  }

  private _advisor(participant: ParticipantId): DebateAgent {
    const agent = this._roster.advisors.get(participant)
    if (agent === undefined) {
      throw new TopologyError(`No agent seated for participant "${participant}"`, { participant })
    }
    return agent
  }

  private _phase(state: string): PhaseDefinition {
    const phase = this._phases.get(state)
    if (phase === undefined) {
      throw new TopologyError(`Unknown state "${state}"`, { state })
    }
    return phase
  }

  private _emit<K extends keyof DebateEvents>(event: K, payload: DebateEvents[K]): void {
    this._eventBus?.emit(event, payload)
  }
}
