/**
 * Barrel exports for the agents module.
 */

export type {
  AgentCallOptions,
  AgentIdentity,
  DebateAgent,
  MediatorAgent,
  ParticipantRoster,
} from './types.js'
export { createRoster, toDecisionOptions } from './agent-factory.js'
export type { AgentFactoryOptions } from './agent-factory.js'
export { KeywordTopicClassifier, GENERAL_TOPIC } from './topic-classifier.js'
export type { TopicClassifier, TopicRule } from './topic-classifier.js'
export { ScriptedAdvisor, extractQuote } from './scripted/scripted-advisor.js'
export { ScriptedMediator } from './scripted/scripted-mediator.js'
export { loadScriptLibrary, parseScriptLibrary, getPersonaScript } from './scripted/script-library.js'
export type { ScriptLibrary, PersonaScript, TopicScript } from './scripted/script-library.js'
export { AnthropicAdvisor } from './llm/anthropic-advisor.js'
export { AnthropicMediator, parseCostOfDelay } from './llm/anthropic-mediator.js'
export { getAnthropicClient, responseText } from './llm/anthropic-client.js'
export type { MessagesClient } from './llm/anthropic-client.js'
export { mapAnthropicError } from './llm/error-mapping.js'
export { ADVISOR_PERSONAS, LEGAL_PERSONA, FINANCE_PERSONA, TAX_PERSONA } from './llm/personas.js'
export type { AdvisorPersona } from './llm/personas.js'
