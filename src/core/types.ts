/**
 * Core types shared across all modules
 */

/** Unique identifier for one debate run */
export type SessionId = string

/** Stable identifier of a seat at the table (e.g. "legal", "finance", "tax") */
export type ParticipantId = string

/** Closed set of participant roles */
export type ParticipantRole = 'risk' | 'growth' | 'mediator'

/** Roles that argue a side; the mediator only synthesizes */
export type AdvisorRole = Exclude<ParticipantRole, 'mediator'>

/** Coarse grouping of phases spanning all sides */
export type RoundName = 'opening' | 'rebuttal' | 'final' | 'synthesis'

/** Text slots each advisor fills as the debate progresses */
export type SlotName = Exclude<RoundName, 'synthesis'>

/** Whether an agent's text comes from local templates or a remote model */
export type AgentBackend = 'scripted' | 'external'

/** Named debate shapes the engine knows how to walk */
export type TopologyName = 'adversarial' | 'council'

/** Ordered severity labels, lowest first */
export const RISK_LEVELS = ['LOW', 'MEDIUM', 'MEDIUM-HIGH', 'HIGH'] as const
export type RiskLevel = (typeof RISK_LEVELS)[number]

/** Severity level for log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Injectable time source */
export type Clock = () => Date

export const systemClock: Clock = () => new Date()
