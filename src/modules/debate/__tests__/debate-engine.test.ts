/**
 * Unit tests for DebateEngine.
 *
 * Covers:
 *  - Adversarial walk: state order, rounds, flags and frozen messages
 *  - Slot threading between turns
 *  - Failure policy: retries for external agents, one attempt for scripted
 *  - Per-attempt timeouts on hanging external agents
 *  - Failed debates keep their partial transcript
 *  - Council walk, labelled multi-speaker input and overlapping analyses
 *  - Cancellation and event emission
 */

import { describe, it, expect } from 'vitest'
import { DebateEngine } from '../debate-engine.js'
import { ADVERSARIAL_TOPOLOGY, COUNCIL_TOPOLOGY } from '../topology.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { DebateEvents } from '../../../core/event-bus.types.js'
import {
  AgentCallError,
  AgentTimeoutError,
  AgentTransientError,
  DebateFailedError,
  InvalidQueryError,
  PhaseFailedError,
  TopologyError,
} from '../../../core/errors.js'
import {
  EchoAdvisor,
  FAST_POLICY,
  adversarialEchoes,
  echoRoster,
  fixedClock,
} from '../../../../test/helpers/agent-doubles.js'

const QUERY = 'Should we expand the pilot?'

async function expectDebateFailure(promise: Promise<unknown>): Promise<DebateFailedError> {
  try {
    await promise
  } catch (err) {
    expect(err).toBeInstanceOf(DebateFailedError)
    if (err instanceof DebateFailedError) return err
  }
  throw new Error('expected the debate to fail')
}

// ---------------------------------------------------------------------------
// Adversarial topology
// ---------------------------------------------------------------------------

describe('DebateEngine (adversarial)', () => {
  it('walks every state once in order and reaches COMPLETE', async () => {
    const { roster } = adversarialEchoes()
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })

    const context = await engine.run(QUERY, { sessionId: 'debate-1' })

    expect(context.status).toBe('completed')
    expect(context.state).toBe('COMPLETE')
    expect(context.visitedStates).toEqual([
      'INIT',
      'A_OPENING',
      'B_OPENING',
      'A_REBUTTAL',
      'B_REBUTTAL',
      'A_FINAL',
      'B_FINAL',
      'SYNTHESIS',
      'COMPLETE',
    ])
    expect(context.messages.map((m) => m.round)).toEqual([
      'opening',
      'opening',
      'rebuttal',
      'rebuttal',
      'final',
      'final',
      'synthesis',
    ])
    expect(context.messages.map((m) => m.participant)).toEqual([
      'legal',
      'finance',
      'legal',
      'finance',
      'legal',
      'finance',
      'mediator',
    ])
  })

  it('threads slots from earlier turns into later ones', async () => {
    const { legal, finance, roster } = adversarialEchoes()
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })

    const context = await engine.run(QUERY)
    const contents = context.messages.map((m) => m.content)

    expect(contents.slice(0, 6)).toEqual([
      'legal:opening',
      'finance:opening',
      'legal:rebuttal<-finance:opening',
      'finance:rebuttal<-legal:opening\n\nlegal:rebuttal<-finance:opening',
      'legal:final<-finance:rebuttal<-legal:opening\n\nlegal:rebuttal<-finance:opening',
      'finance:final<-legal:rebuttal<-finance:opening',
    ])
    expect(legal.callsFor('rebuttal')[0]?.opponentRole).toBe('growth')
    expect(finance.callsFor('rebuttal')[0]?.opponentRole).toBe('risk')
    expect(context.slots.legal).toEqual({
      opening: 'legal:opening',
      rebuttal: 'legal:rebuttal<-finance:opening',
      final: 'legal:final<-finance:rebuttal<-legal:opening\n\nlegal:rebuttal<-finance:opening',
    })
  })

  it('marks only rebuttal-round messages as rebuttals referencing earlier ones', async () => {
    const { roster } = adversarialEchoes()
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })

    const context = await engine.run(QUERY)

    expect(context.messages.map((m) => m.isRebuttal)).toEqual([false, false, true, true, false, false, false])
    expect(context.messages.map((m) => m.referencesPrevious)).toEqual([
      false,
      false,
      true,
      true,
      false,
      false,
      false,
    ])
  })

  it('appends frozen messages stamped by the clock', async () => {
    const { roster } = adversarialEchoes()
    const engine = new DebateEngine({
      topology: ADVERSARIAL_TOPOLOGY,
      roster,
      policy: FAST_POLICY,
      clock: fixedClock(),
    })

    const context = await engine.run(QUERY)
    const first = context.messages[0]

    expect(first).toEqual({
      agent: 'Legal Echo',
      participant: 'legal',
      role: 'risk',
      round: 'opening',
      state: 'A_OPENING',
      content: 'legal:opening',
      timestamp: '2026-01-15T10:00:00.000Z',
      isRebuttal: false,
      referencesPrevious: false,
    })
    expect(Object.isFrozen(first)).toBe(true)
    expect(context.startedAt).toBe('2026-01-15T10:00:00.000Z')
    expect(context.completedAt).toBe('2026-01-15T10:00:00.000Z')
  })

  it('ends with the mediator verdict and stores the synthesis', async () => {
    const { roster } = adversarialEchoes()
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })

    const context = await engine.run(QUERY)
    const last = context.messages[context.messages.length - 1]

    expect(context.synthesis?.riskLevel).toBe('LOW')
    expect(last?.agent).toBe('The Mediator')
    expect(last?.role).toBe('mediator')
    expect(last?.content).toBe(context.synthesis?.verdict)
  })

  it('rejects an invalid query before any agent is called', async () => {
    const { legal, roster } = adversarialEchoes()
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })

    await expect(engine.run('   ')).rejects.toBeInstanceOf(InvalidQueryError)
    await expect(engine.run(42)).rejects.toThrow('query must be a string')
    expect(legal.calls).toHaveLength(0)
  })

  it('enforces the configured maximum query length', async () => {
    const { roster } = adversarialEchoes()
    const engine = new DebateEngine({
      topology: ADVERSARIAL_TOPOLOGY,
      roster,
      policy: FAST_POLICY,
      maxQueryLength: 10,
    })

    await expect(engine.run('x'.repeat(11))).rejects.toThrow('query must be at most 10 characters')
    await expect(engine.run('x'.repeat(10))).resolves.toMatchObject({ status: 'completed' })
  })

  it('refuses to run the same context twice', async () => {
    const { roster } = adversarialEchoes()
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })
    const context = await engine.run(QUERY, { sessionId: 'debate-once' })

    await expect(engine.runContext(context)).rejects.toThrow('Debate debate-once has already been started')
  })

  it('requires a seated agent with the right role for every participant', () => {
    const wrongRole = new EchoAdvisor({ id: 'finance', role: 'risk' })
    const legal = new EchoAdvisor({ id: 'legal', role: 'risk' })

    expect(
      () => new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster: echoRoster([legal]), policy: FAST_POLICY })
    ).toThrow('No agent seated for participant "finance"')
    expect(
      () =>
        new DebateEngine({
          topology: ADVERSARIAL_TOPOLOGY,
          roster: echoRoster([legal, wrongRole]),
          policy: FAST_POLICY,
        })
    ).toThrow(TopologyError)
  })
})

// ---------------------------------------------------------------------------
// Failure policy
// ---------------------------------------------------------------------------

describe('DebateEngine failure handling', () => {
  it('retries an external agent on transient failures up to the attempt limit, then stops', async () => {
    const transient = (): AgentTransientError => new AgentTransientError('overloaded')
    const { legal, finance, roster } = adversarialEchoes({
      legal: { backend: 'external', failures: { rebuttal: [transient(), transient(), transient()] } },
    })
    const bus = createEventBus()
    const retries: DebateEvents['debate:retry'][] = []
    bus.on('debate:retry', (payload) => retries.push(payload))
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY, eventBus: bus })

    const error = await expectDebateFailure(engine.run(QUERY, { sessionId: 'debate-fail' }))

    expect(error.state).toBe('A_REBUTTAL')
    expect(error.message).toBe(
      'Debate debate-fail failed in state A_REBUTTAL: Phase A_REBUTTAL (legal) failed after 3 attempt(s): overloaded'
    )
    expect(legal.callsFor('rebuttal')).toHaveLength(3)
    expect(finance.callsFor('rebuttal')).toHaveLength(0)
    expect(retries.map((r) => [r.attempt, r.delayMs])).toEqual([
      [1, 0],
      [2, 0],
    ])

    const context = error.debate
    expect(context.status).toBe('failed')
    expect(context.state).toBe('A_REBUTTAL')
    expect(context.messages.map((m) => m.state)).toEqual(['A_OPENING', 'B_OPENING'])
    expect(context.failure).toEqual({
      state: 'A_REBUTTAL',
      error: {
        name: 'PhaseFailedError',
        message: 'Phase A_REBUTTAL (legal) failed after 3 attempt(s): overloaded',
        code: 'PHASE_FAILED',
      },
    })
    expect(context.synthesis).toBeNull()
  })

  it('times out a hanging external agent, retries it and then fails the debate', async () => {
    const { legal, finance, roster } = adversarialEchoes({
      legal: { backend: 'external', openingGate: new Promise<void>(() => undefined) },
    })
    const policy = { maxAttempts: 3, baseDelayMs: 0, timeoutMs: 30 }
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy })

    const error = await expectDebateFailure(engine.run(QUERY, { sessionId: 'debate-hang' }))

    expect(error.message).toBe(
      'Debate debate-hang failed in state A_OPENING: Phase A_OPENING (legal) failed after 3 attempt(s): ' +
        'Agent "legal" did not respond within 30ms'
    )
    expect(error.cause).toBeInstanceOf(PhaseFailedError)
    if (error.cause instanceof PhaseFailedError) {
      expect(error.cause.cause).toBeInstanceOf(AgentTimeoutError)
    }
    expect(legal.callsFor('opening')).toHaveLength(3)
    expect(legal.signals.map((signal) => signal?.aborted)).toEqual([true, true, true])
    expect(finance.calls).toHaveLength(0)
    expect(error.debate.messages).toHaveLength(0)
  })

  it('recovers when a transient failure is followed by success', async () => {
    const { legal, roster } = adversarialEchoes({
      legal: { backend: 'external', failures: { opening: [new AgentTransientError('blip')] } },
    })
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })

    const context = await engine.run(QUERY)

    expect(context.status).toBe('completed')
    expect(legal.callsFor('opening')).toHaveLength(2)
    expect(context.messages).toHaveLength(7)
  })

  it('does not retry a permanent external failure', async () => {
    const { legal, roster } = adversarialEchoes({
      legal: { backend: 'external', failures: { opening: [new AgentCallError('bad request')] } },
    })
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })

    const error = await expectDebateFailure(engine.run(QUERY))

    expect(error.state).toBe('A_OPENING')
    expect(legal.callsFor('opening')).toHaveLength(1)
    expect(error.debate.messages).toHaveLength(0)
  })

  it('gives a scripted agent exactly one attempt', async () => {
    const { finance, roster } = adversarialEchoes({
      finance: { failures: { final: [new AgentTransientError('template missing')] } },
    })
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })

    const error = await expectDebateFailure(engine.run(QUERY))

    expect(error.state).toBe('B_FINAL')
    expect(finance.callsFor('final')).toHaveLength(1)
    expect(error.debate.messages).toHaveLength(5)
    expect(error.debate.failure?.error.message).toBe(
      'Phase B_FINAL (finance) failed after 1 attempt(s): template missing'
    )
  })

  it('fails the phase when an agent returns empty text', async () => {
    const legal = new EchoAdvisor({ id: 'legal', role: 'risk' })
    const finance = new EchoAdvisor({ id: 'finance', role: 'growth' })
    finance.openingArgument = async () => '   '
    const engine = new DebateEngine({
      topology: ADVERSARIAL_TOPOLOGY,
      roster: echoRoster([legal, finance]),
      policy: FAST_POLICY,
    })

    const error = await expectDebateFailure(engine.run(QUERY))

    expect(error.state).toBe('B_OPENING')
    expect(error.debate.failure?.error.message).toBe(
      'Phase B_OPENING (finance) failed after 1 attempt(s): Agent "finance" returned empty text in B_OPENING'
    )
  })

  it('fails before the first phase when the signal is already aborted', async () => {
    const { legal, roster } = adversarialEchoes()
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY })
    const controller = new AbortController()
    controller.abort(new Error('cancelled by user'))

    const error = await expectDebateFailure(engine.run(QUERY, { signal: controller.signal }))

    expect(error.state).toBe('A_OPENING')
    expect(error.debate.failure?.error).toEqual({ name: 'Error', message: 'cancelled by user' })
    expect(legal.calls).toHaveLength(0)
  })
})

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

describe('DebateEngine events', () => {
  it('emits lifecycle events in order', async () => {
    const { roster } = adversarialEchoes()
    const bus = createEventBus()
    const seen: string[] = []
    bus.on('debate:started', () => seen.push('started'))
    bus.on('debate:phase-started', ({ state }) => seen.push(`phase:${state}`))
    bus.on('debate:message', ({ message }) => seen.push(`message:${message.state}`))
    bus.on('debate:completed', ({ messageCount }) => seen.push(`completed:${String(messageCount)}`))
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY, eventBus: bus })

    await engine.run(QUERY)

    expect(seen).toEqual([
      'started',
      'phase:A_OPENING',
      'message:A_OPENING',
      'phase:B_OPENING',
      'message:B_OPENING',
      'phase:A_REBUTTAL',
      'message:A_REBUTTAL',
      'phase:B_REBUTTAL',
      'message:B_REBUTTAL',
      'phase:A_FINAL',
      'message:A_FINAL',
      'phase:B_FINAL',
      'message:B_FINAL',
      'phase:SYNTHESIS',
      'message:SYNTHESIS',
      'completed:7',
    ])
  })

  it('emits debate:failed with the failing state', async () => {
    const { roster } = adversarialEchoes({
      finance: { failures: { opening: [new Error('boom')] } },
    })
    const bus = createEventBus()
    const failures: DebateEvents['debate:failed'][] = []
    bus.on('debate:failed', (payload) => failures.push(payload))
    const engine = new DebateEngine({ topology: ADVERSARIAL_TOPOLOGY, roster, policy: FAST_POLICY, eventBus: bus })

    await expectDebateFailure(engine.run(QUERY, { sessionId: 'debate-evt' }))

    expect(failures).toEqual([
      {
        sessionId: 'debate-evt',
        state: 'B_OPENING',
        code: 'DEBATE_FAILED',
        error: 'Phase B_OPENING (finance) failed after 1 attempt(s): boom',
      },
    ])
  })
})

// ---------------------------------------------------------------------------
// Council topology
// ---------------------------------------------------------------------------

function councilEchoes(gates: { legal?: Promise<void>; tax?: Promise<void>; finance?: Promise<void> } = {}): {
  legal: EchoAdvisor
  tax: EchoAdvisor
  finance: EchoAdvisor
} {
  return {
    legal: new EchoAdvisor({ id: 'legal', role: 'risk', displayName: 'Legal Echo', openingGate: gates.legal }),
    tax: new EchoAdvisor({ id: 'tax', role: 'risk', displayName: 'Tax Echo', openingGate: gates.tax }),
    finance: new EchoAdvisor({
      id: 'finance',
      role: 'growth',
      displayName: 'Finance Echo',
      openingGate: gates.finance,
    }),
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

describe('DebateEngine (council)', () => {
  it('runs three analyses, one debate round and a synthesis', async () => {
    const { legal, tax, finance } = councilEchoes()
    const engine = new DebateEngine({
      topology: COUNCIL_TOPOLOGY,
      roster: echoRoster([legal, tax, finance]),
      policy: FAST_POLICY,
    })

    const context = await engine.run(QUERY)

    expect(context.visitedStates).toEqual([
      'INIT',
      'LEGAL_ANALYSIS',
      'TAX_ANALYSIS',
      'GROWTH_ANALYSIS',
      'DEBATE_ROUND',
      'SYNTHESIS',
      'COMPLETE',
    ])
    expect(context.messages.map((m) => `${m.state}:${m.participant}`)).toEqual([
      'LEGAL_ANALYSIS:legal',
      'TAX_ANALYSIS:tax',
      'GROWTH_ANALYSIS:finance',
      'DEBATE_ROUND:legal',
      'DEBATE_ROUND:tax',
      'DEBATE_ROUND:finance',
      'SYNTHESIS:mediator',
    ])
    expect(context.slots.tax).toEqual({
      opening: 'tax:opening',
      rebuttal: 'tax:rebuttal<-Legal Echo:\nlegal:opening\n\nFinance Echo:\nfinance:opening',
    })
  })

  it('labels multi-speaker input and picks an opposing role', async () => {
    const { legal, tax, finance } = councilEchoes()
    const engine = new DebateEngine({
      topology: COUNCIL_TOPOLOGY,
      roster: echoRoster([legal, tax, finance]),
      policy: FAST_POLICY,
    })

    await engine.run(QUERY)

    expect(legal.callsFor('rebuttal')).toEqual([
      {
        operation: 'rebuttal',
        input: 'Tax Echo:\ntax:opening\n\nFinance Echo:\nfinance:opening',
        opponentRole: 'growth',
      },
    ])
    expect(finance.callsFor('rebuttal')[0]?.opponentRole).toBe('risk')
    expect(finance.callsFor('final')).toHaveLength(0)
  })

  it('overlaps the analyses but appends them in declared order', async () => {
    const gates = { legal: deferred(), tax: deferred(), finance: deferred() }
    const { legal, tax, finance } = councilEchoes({
      legal: gates.legal.promise,
      tax: gates.tax.promise,
      finance: gates.finance.promise,
    })
    const engine = new DebateEngine({
      topology: COUNCIL_TOPOLOGY,
      roster: echoRoster([legal, tax, finance]),
      policy: FAST_POLICY,
    })

    const running = engine.run(QUERY)
    await tick()
    expect([legal.calls.length, tax.calls.length, finance.calls.length]).toEqual([1, 1, 1])

    gates.finance.resolve()
    gates.tax.resolve()
    await tick()
    gates.legal.resolve()
    const context = await running

    expect(context.messages.slice(0, 3).map((m) => m.participant)).toEqual(['legal', 'tax', 'finance'])
  })

  it('runs the analyses one at a time when concurrency is off', async () => {
    const gates = { legal: deferred(), tax: deferred(), finance: deferred() }
    const { legal, tax, finance } = councilEchoes({
      legal: gates.legal.promise,
      tax: gates.tax.promise,
      finance: gates.finance.promise,
    })
    const engine = new DebateEngine({
      topology: COUNCIL_TOPOLOGY,
      roster: echoRoster([legal, tax, finance]),
      policy: FAST_POLICY,
      concurrentGroups: false,
    })

    const running = engine.run(QUERY)
    await tick()
    expect([legal.calls.length, tax.calls.length, finance.calls.length]).toEqual([1, 0, 0])

    gates.legal.resolve()
    gates.tax.resolve()
    gates.finance.resolve()
    const context = await running
    expect(context.status).toBe('completed')
  })

  it('stops at the failing analysis with earlier analyses kept', async () => {
    const legal = new EchoAdvisor({ id: 'legal', role: 'risk' })
    const tax = new EchoAdvisor({ id: 'tax', role: 'risk', failures: { opening: [new Error('no data')] } })
    const finance = new EchoAdvisor({ id: 'finance', role: 'growth' })
    const engine = new DebateEngine({
      topology: COUNCIL_TOPOLOGY,
      roster: echoRoster([legal, tax, finance]),
      policy: FAST_POLICY,
    })

    const error = await expectDebateFailure(engine.run(QUERY))

    expect(error.state).toBe('TAX_ANALYSIS')
    expect(error.debate.messages.map((m) => m.participant)).toEqual(['legal'])
    expect(legal.callsFor('rebuttal')).toHaveLength(0)
  })
})
