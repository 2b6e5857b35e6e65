/**
 * Builds the participant roster for a topology from configuration.
 *
 * `agents.backend` is the single switch between template-driven agents and
 * model-backed ones; the engine cannot tell them apart except by `backend`.
 */

import type { ParticipantId } from '../../core/types.js'
import { ConfigError } from '../../core/errors.js'
import type { AgentSettings, DecisionSettings } from '../config/config-schema.js'
import type { DecisionOptions } from '../decision/types.js'
import { getAnthropicClient, type MessagesClient } from './llm/anthropic-client.js'
import { AnthropicAdvisor } from './llm/anthropic-advisor.js'
import { AnthropicMediator } from './llm/anthropic-mediator.js'
import { ADVISOR_PERSONAS } from './llm/personas.js'
import { getPersonaScript, loadScriptLibrary, type ScriptLibrary } from './scripted/script-library.js'
import { ScriptedAdvisor } from './scripted/scripted-advisor.js'
import { ScriptedMediator } from './scripted/scripted-mediator.js'
import { KeywordTopicClassifier, type TopicClassifier } from './topic-classifier.js'
import type { DebateAgent, MediatorAgent, ParticipantRoster } from './types.js'

export interface AgentFactoryOptions {
  agents: AgentSettings
  decision: DecisionSettings
  /** Model client for the llm backend (default: shared SDK client) */
  client?: MessagesClient
  /** Scripted backend texts (default: data/scripted-agents.json) */
  library?: ScriptLibrary
  /** Scripted backend topic selection (default: keyword rules from the library) */
  classifier?: TopicClassifier
}

export function toDecisionOptions(settings: DecisionSettings): DecisionOptions {
  return {
    blockPhrases: settings.block_phrases,
    shipPhrases: settings.ship_phrases,
    defaultCostOfDelay: settings.default_cost_of_delay,
  }
}

export function createRoster(
  participantIds: readonly ParticipantId[],
  options: AgentFactoryOptions
): ParticipantRoster {
  const decision = toDecisionOptions(options.decision)
  const advisors = new Map<ParticipantId, DebateAgent>()
  let mediator: MediatorAgent

  if (options.agents.backend === 'llm') {
    const client = options.client ?? getAnthropicClient(options.agents)
    const common = { client, model: options.agents.model, maxTokens: options.agents.max_tokens }
    for (const id of participantIds) {
      const persona = ADVISOR_PERSONAS[id]
      if (persona === undefined) {
        throw new ConfigError(`No model persona defined for participant "${id}"`, { participant: id })
      }
      advisors.set(id, new AnthropicAdvisor({ ...common, persona }))
    }
    mediator = new AnthropicMediator({ ...common, decision })
  } else {
    const library = options.library ?? loadScriptLibrary()
    const classifier = options.classifier ?? new KeywordTopicClassifier(library.topics)
    for (const id of participantIds) {
      advisors.set(id, new ScriptedAdvisor({ id, script: getPersonaScript(library, id), classifier }))
    }
    mediator = new ScriptedMediator(decision)
  }

  return { advisors, mediator }
}
