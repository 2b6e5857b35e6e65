/**
 * Agent contract: the narrow surface the debate engine depends on.
 *
 * Advisors argue one side (risk or growth); the mediator turns every
 * advisor's accumulated text into a decision. Implementations may be
 * template-driven (`scripted`) or call a remote model (`external`); only
 * external agents are retried by the engine.
 */

import type {
  AdvisorRole,
  AgentBackend,
  ParticipantId,
  ParticipantRole,
} from '../../core/types.js'
import type { SidePosition, SynthesisResult } from '../decision/types.js'

export interface AgentCallOptions {
  /** Aborted when the call's deadline passes or the debate is cancelled */
  signal?: AbortSignal
}

export interface AgentIdentity {
  readonly id: ParticipantId
  readonly displayName: string
  readonly backend: AgentBackend
}

export interface DebateAgent extends AgentIdentity {
  readonly role: AdvisorRole

  /** Initial position from the raw query alone */
  openingArgument(query: string, options?: AgentCallOptions): Promise<string>

  /**
   * Respond to the opponent's most recent statement(s). Implementations must
   * engage with `opponentText`, not restate their opening.
   */
  rebut(
    query: string,
    opponentText: string,
    opponentRole: ParticipantRole,
    options?: AgentCallOptions
  ): Promise<string>

  /** Closing stance; may concede minor points but keeps the core recommendation */
  finalPosition(query: string, opponentLastMessage: string, options?: AgentCallOptions): Promise<string>
}

export interface MediatorAgent extends AgentIdentity {
  readonly role: 'mediator'

  synthesize(
    positions: readonly SidePosition[],
    query: string,
    options?: AgentCallOptions
  ): Promise<SynthesisResult>
}

/** The agents seated for one topology, keyed by participant id */
export interface ParticipantRoster {
  readonly advisors: ReadonlyMap<ParticipantId, DebateAgent>
  readonly mediator: MediatorAgent
}
