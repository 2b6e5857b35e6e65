/**
 * Types for the debate state machine.
 */

import type { SerializedError } from '../../core/errors.js'
import type {
  ParticipantId,
  ParticipantRole,
  RoundName,
  SessionId,
  SlotName,
  TopologyName,
} from '../../core/types.js'
import type { SynthesisResult } from '../decision/types.js'

export const INIT_STATE = 'INIT'
export const COMPLETE_STATE = 'COMPLETE'

/** One turn of the debate. Frozen on creation. */
export interface DebateMessage {
  readonly agent: string
  readonly participant: ParticipantId
  readonly role: ParticipantRole
  readonly round: RoundName
  /** Machine state that produced the message */
  readonly state: string
  readonly content: string
  readonly timestamp: string
  readonly isRebuttal: boolean
  /** True only for rebuttal-round messages */
  readonly referencesPrevious: boolean
}

export type ParticipantSlots = Partial<Record<SlotName, string>>

export type DebateStatus = 'running' | 'completed' | 'failed'

export interface DebateFailure {
  state: string
  error: SerializedError
}

/**
 * Mutable accumulator for one debate run. Each run owns its context; the
 * message list is append-only.
 */
export interface DebateContext {
  readonly query: string
  readonly sessionId: SessionId
  readonly topology: TopologyName
  state: string
  round: RoundName
  status: DebateStatus
  readonly messages: DebateMessage[]
  /** Every state entered, in order, INIT and COMPLETE included */
  readonly visitedStates: string[]
  /** Named text slots per participant, for later phases to read directly */
  readonly slots: Record<ParticipantId, ParticipantSlots>
  synthesis: SynthesisResult | null
  failure: DebateFailure | null
  readonly startedAt: string
  completedAt: string | null
}

/** Items yielded by the streaming driver, tagged by `kind` */
export type StreamItem =
  | { kind: 'message'; message: DebateMessage }
  | { kind: 'result'; context: DebateContext }

/** What one executed state contributed */
export interface StepOutcome {
  state: string
  messages: readonly DebateMessage[]
}
