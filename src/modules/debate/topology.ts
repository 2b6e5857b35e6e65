/**
 * Debate topologies.
 *
 * A topology is plain data: the seated participants and the ordered phases
 * they walk. The engine derives its transition table from the phase order,
 * so adding a topology never touches engine code.
 */

import { TopologyError } from '../../core/errors.js'
import type {
  AdvisorRole,
  ParticipantId,
  ParticipantRole,
  RoundName,
  SlotName,
  TopologyName,
} from '../../core/types.js'
import { COMPLETE_STATE, INIT_STATE } from './types.js'

// ---------------------------------------------------------------------------
// Shape
// ---------------------------------------------------------------------------

export interface SlotRef {
  participant: ParticipantId
  slot: SlotName
}

/** One agent call; its output is written to the slot named by `operation` */
export interface TurnStep {
  participant: ParticipantId
  operation: SlotName
  /** Earlier slots handed to the agent as opponent text, in this order */
  reads: readonly SlotRef[]
}

export interface TurnPhase {
  kind: 'turns'
  state: string
  round: SlotName
  turns: readonly TurnStep[]
  /**
   * Contiguous phases sharing a group have no data dependencies on each
   * other; their calls may overlap. Messages are still appended in order.
   */
  group?: string
}

export interface SynthesisPhase {
  kind: 'synthesis'
  state: string
  round: 'synthesis'
}

export type PhaseDefinition = TurnPhase | SynthesisPhase

export interface TopologyParticipant {
  id: ParticipantId
  role: AdvisorRole
}

export interface DebateTopology {
  name: TopologyName
  participants: readonly TopologyParticipant[]
  phases: readonly PhaseDefinition[]
}

// ---------------------------------------------------------------------------
// Built-in topologies
// ---------------------------------------------------------------------------

const RISK_SIDE = 'legal'
const GROWTH_SIDE = 'finance'

/** Two sides, three rounds each, then synthesis */
export const ADVERSARIAL_TOPOLOGY: DebateTopology = {
  name: 'adversarial',
  participants: [
    { id: RISK_SIDE, role: 'risk' },
    { id: GROWTH_SIDE, role: 'growth' },
  ],
  phases: [
    {
      kind: 'turns',
      state: 'A_OPENING',
      round: 'opening',
      turns: [{ participant: RISK_SIDE, operation: 'opening', reads: [] }],
    },
    {
      kind: 'turns',
      state: 'B_OPENING',
      round: 'opening',
      turns: [{ participant: GROWTH_SIDE, operation: 'opening', reads: [] }],
    },
    {
      kind: 'turns',
      state: 'A_REBUTTAL',
      round: 'rebuttal',
      turns: [
        {
          participant: RISK_SIDE,
          operation: 'rebuttal',
          reads: [{ participant: GROWTH_SIDE, slot: 'opening' }],
        },
      ],
    },
    {
      kind: 'turns',
      state: 'B_REBUTTAL',
      round: 'rebuttal',
      turns: [
        {
          participant: GROWTH_SIDE,
          operation: 'rebuttal',
          reads: [
            { participant: RISK_SIDE, slot: 'opening' },
            { participant: RISK_SIDE, slot: 'rebuttal' },
          ],
        },
      ],
    },
    {
      kind: 'turns',
      state: 'A_FINAL',
      round: 'final',
      turns: [
        {
          participant: RISK_SIDE,
          operation: 'final',
          reads: [{ participant: GROWTH_SIDE, slot: 'rebuttal' }],
        },
      ],
    },
    {
      kind: 'turns',
      state: 'B_FINAL',
      round: 'final',
      turns: [
        {
          participant: GROWTH_SIDE,
          operation: 'final',
          reads: [{ participant: RISK_SIDE, slot: 'rebuttal' }],
        },
      ],
    },
    { kind: 'synthesis', state: 'SYNTHESIS', round: 'synthesis' },
  ],
}

const COUNCIL_SEATS: readonly TopologyParticipant[] = [
  { id: 'legal', role: 'risk' },
  { id: 'tax', role: 'risk' },
  { id: 'finance', role: 'growth' },
]

function analysisPhase(state: string, participant: ParticipantId): TurnPhase {
  return {
    kind: 'turns',
    state,
    round: 'opening',
    group: 'analysis',
    turns: [{ participant, operation: 'opening', reads: [] }],
  }
}

/** Three independent analyses, one cross-examination round, then synthesis */
export const COUNCIL_TOPOLOGY: DebateTopology = {
  name: 'council',
  participants: COUNCIL_SEATS,
  phases: [
    analysisPhase('LEGAL_ANALYSIS', 'legal'),
    analysisPhase('TAX_ANALYSIS', 'tax'),
    analysisPhase('GROWTH_ANALYSIS', 'finance'),
    {
      kind: 'turns',
      state: 'DEBATE_ROUND',
      round: 'rebuttal',
      turns: COUNCIL_SEATS.map((seat) => ({
        participant: seat.id,
        operation: 'rebuttal',
        reads: COUNCIL_SEATS.filter((other) => other.id !== seat.id).map((other) => ({
          participant: other.id,
          slot: 'opening' as const,
        })),
      })),
    },
    { kind: 'synthesis', state: 'SYNTHESIS', round: 'synthesis' },
  ],
}

export const TOPOLOGIES: Readonly<Record<TopologyName, DebateTopology>> = {
  adversarial: ADVERSARIAL_TOPOLOGY,
  council: COUNCIL_TOPOLOGY,
}

export function getTopology(name: TopologyName): DebateTopology {
  return TOPOLOGIES[name]
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function slotKey(ref: SlotRef): string {
  return `${ref.participant}.${ref.slot}`
}

/**
 * Check that a topology can be walked: unique state names, known
 * participants, every read satisfied by an earlier phase, contiguous
 * groups, an opening for every participant, and a final synthesis phase.
 *
 * @throws {TopologyError}
 */
export function validateTopology(topology: DebateTopology): void {
  const fail = (message: string, context: Record<string, unknown> = {}): never => {
    throw new TopologyError(`Topology "${topology.name}": ${message}`, { topology: topology.name, ...context })
  }

  const participantIds = new Set(topology.participants.map((p) => p.id))
  if (participantIds.size !== topology.participants.length) {
    fail('duplicate participant id')
  }

  const last = topology.phases[topology.phases.length - 1]
  if (last?.kind !== 'synthesis') {
    fail('the last phase must be a synthesis phase')
  }

  const states = new Set<string>([INIT_STATE, COMPLETE_STATE])
  const written = new Set<string>()
  const closedGroups = new Set<string>()
  let currentGroup: string | undefined
  let groupWrites = new Set<string>()

  for (const phase of topology.phases) {
    if (states.has(phase.state)) {
      fail(`state "${phase.state}" is reserved or repeated`, { state: phase.state })
    }
    states.add(phase.state)

    if (phase.kind === 'synthesis') {
      if (phase !== last) fail('synthesis must be the last phase', { state: phase.state })
      continue
    }

    if (phase.turns.length === 0) {
      fail(`state "${phase.state}" has no turns`, { state: phase.state })
    }

    if (phase.group !== currentGroup) {
      if (currentGroup !== undefined) closedGroups.add(currentGroup)
      if (phase.group !== undefined && closedGroups.has(phase.group)) {
        fail(`group "${phase.group}" is not contiguous`, { state: phase.state })
      }
      currentGroup = phase.group
      groupWrites = new Set<string>()
    }

    for (const turn of phase.turns) {
      if (!participantIds.has(turn.participant)) {
        fail(`state "${phase.state}" names unknown participant "${turn.participant}"`, {
          state: phase.state,
        })
      }
      if (turn.operation === 'opening' && turn.reads.length > 0) {
        fail(`opening in "${phase.state}" must not read other slots`, { state: phase.state })
      }
      if (turn.operation !== 'opening' && turn.reads.length === 0) {
        fail(`${turn.operation} in "${phase.state}" needs at least one slot to respond to`, {
          state: phase.state,
        })
      }
      for (const ref of turn.reads) {
        const key = slotKey(ref)
        if (!written.has(key) || (phase.group !== undefined && groupWrites.has(key))) {
          fail(`state "${phase.state}" reads ${key} before it is written`, { state: phase.state })
        }
      }
      const target = slotKey({ participant: turn.participant, slot: turn.operation })
      if (written.has(target)) {
        fail(`slot ${target} is written twice`, { state: phase.state })
      }
      written.add(target)
      groupWrites.add(target)
    }
  }

  for (const id of participantIds) {
    if (!written.has(`${id}.opening`)) {
      fail(`participant "${id}" never opens`, { participant: id })
    }
  }
}

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

export type TransitionTable = ReadonlyMap<string, string>

/**
 * Total function over non-terminal states: INIT, then every phase in
 * declared order, then COMPLETE. No content-dependent branches.
 */
export function buildTransitionTable(topology: DebateTopology): TransitionTable {
  const order = [INIT_STATE, ...topology.phases.map((phase) => phase.state), COMPLETE_STATE]
  const table = new Map<string, string>()
  for (let i = 0; i < order.length - 1; i++) {
    const from = order[i]
    const to = order[i + 1]
    if (from !== undefined && to !== undefined) table.set(from, to)
  }
  return table
}

export function nextState(table: TransitionTable, state: string): string {
  const next = table.get(state)
  if (next === undefined) {
    throw new TopologyError(`No transition out of state "${state}"`, { state })
  }
  return next
}

/** Round marker for INIT: the round of the first phase */
export function initialRound(topology: DebateTopology): RoundName {
  return topology.phases[0]?.round ?? 'opening'
}

// ---------------------------------------------------------------------------
// Turn inputs
// ---------------------------------------------------------------------------

export interface ResolvedInput {
  text: string
  opponentRole: ParticipantRole
}

export interface SlotSource {
  text(ref: SlotRef): string | undefined
  displayName(participant: ParticipantId): string
  role(participant: ParticipantId): ParticipantRole
}

/**
 * Gather the text a turn responds to. Reads from a single participant are
 * joined plainly; reads spanning several participants are labelled with
 * each speaker's display name.
 */
export function resolveTurnInput(
  turn: TurnStep,
  speakerRole: ParticipantRole,
  source: SlotSource
): ResolvedInput {
  const parts = turn.reads.map((ref) => {
    const text = source.text(ref)
    if (text === undefined) {
      throw new TopologyError(`Slot ${slotKey(ref)} is empty`, { slot: slotKey(ref) })
    }
    return { ref, text }
  })

  const speakers = new Set(parts.map((part) => part.ref.participant))
  const text =
    speakers.size <= 1
      ? parts.map((part) => part.text).join('\n\n')
      : parts
          .map((part) => `${source.displayName(part.ref.participant)}:\n${part.text}`)
          .join('\n\n')

  const roles = parts.map((part) => source.role(part.ref.participant))
  const opponentRole = roles.find((role) => role !== speakerRole) ?? roles[0] ?? speakerRole
  return { text, opponentRole }
}
