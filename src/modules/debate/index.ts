export { DebateEngine } from './debate-engine.js'
export type { DebateEngineOptions, RunOptions, ExecuteOptions } from './debate-engine.js'
export { PhaseInvoker } from './phase-invoker.js'
export type { InvocationPolicy, PhaseCall, PhaseInvokerOptions } from './phase-invoker.js'
export { streamDebate, streamContext, pacingFromSettings, NO_PACING } from './stream-driver.js'
export type { PacingOptions, StreamOptions } from './stream-driver.js'
export { parseQuery, createQuerySchema, DEFAULT_MAX_QUERY_LENGTH } from './query.js'
export {
  ADVERSARIAL_TOPOLOGY,
  COUNCIL_TOPOLOGY,
  TOPOLOGIES,
  getTopology,
  validateTopology,
  buildTransitionTable,
  nextState,
  initialRound,
  resolveTurnInput,
} from './topology.js'
export type {
  DebateTopology,
  PhaseDefinition,
  TurnPhase,
  SynthesisPhase,
  TurnStep,
  SlotRef,
  TopologyParticipant,
  TransitionTable,
} from './topology.js'
export { INIT_STATE, COMPLETE_STATE } from './types.js'
export type {
  DebateContext,
  DebateMessage,
  DebateFailure,
  DebateStatus,
  ParticipantSlots,
  StreamItem,
  StepOutcome,
} from './types.js'
