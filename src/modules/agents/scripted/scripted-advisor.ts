/**
 * ScriptedAdvisor: template-driven advisor.
 *
 * The topic classifier picks a script; rebuttals and finals quote the first
 * substantive line of whatever the opponent said. No randomness: the same
 * inputs always yield the same text.
 */

import type { AdvisorRole, ParticipantRole } from '../../../core/types.js'
import { GENERAL_TOPIC, type TopicClassifier } from '../topic-classifier.js'
import type { DebateAgent } from '../types.js'
import type { PersonaScript, TopicScript } from './script-library.js'

const QUOTE_MAX_LENGTH = 160

const ROLE_LABELS: Record<ParticipantRole, string> = {
  risk: 'THE RISK CASE',
  growth: 'THE GROWTH CASE',
  mediator: 'THE MEDIATOR',
}

/**
 * First bullet in `text`, else its first non-heading line, trimmed of
 * markdown emphasis and capped in length.
 */
export function extractQuote(text: string): string {
  const lines = text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
  const bullet = lines.find((line) => line.startsWith('• ') || line.startsWith('- '))
  const chosen = bullet?.slice(2) ?? lines.find((line) => !line.startsWith('#')) ?? text.trim()
  const plain = chosen.replace(/\*\*/g, '').trim()
  return plain.length > QUOTE_MAX_LENGTH ? `${plain.slice(0, QUOTE_MAX_LENGTH - 1)}…` : plain
}

function bullets(items: readonly string[]): string {
  return items.map((item) => `• ${item}`).join('\n')
}

export interface ScriptedAdvisorOptions {
  id: string
  script: PersonaScript
  classifier: TopicClassifier
}

export class ScriptedAdvisor implements DebateAgent {
  readonly id: string
  readonly displayName: string
  readonly role: AdvisorRole
  readonly backend = 'scripted' as const

  private readonly _script: PersonaScript
  private readonly _classifier: TopicClassifier

  constructor(options: ScriptedAdvisorOptions) {
    this.id = options.id
    this.displayName = options.script.displayName
    this.role = options.script.role
    this._script = options.script
    this._classifier = options.classifier
  }

  async openingArgument(query: string): Promise<string> {
    const topic = this._topicFor(query)
    return [
      this._script.openingHeading.replace('{stance}', topic.stance),
      bullets(topic.opening),
      `**MY POSITION: ${topic.stance}**`,
    ].join('\n\n')
  }

  async rebut(query: string, opponentText: string, opponentRole: ParticipantRole): Promise<string> {
    const topic = this._topicFor(query)
    return [
      this._script.rebuttalHeading.replace('{opponent}', ROLE_LABELS[opponentRole]),
      `You claim: "${extractQuote(opponentText)}"`,
      bullets(topic.rebuttal),
      `**MY POSITION: ${topic.stance}**`,
    ].join('\n\n')
  }

  async finalPosition(query: string, opponentLastMessage: string): Promise<string> {
    const topic = this._topicFor(query)
    return [
      this._script.finalHeading,
      `On "${extractQuote(opponentLastMessage)}": ${topic.concession}`,
      topic.final,
      `**FINAL POSITION: ${topic.stance}**`,
    ].join('\n\n')
  }

  private _topicFor(query: string): TopicScript {
    const topicId = this._classifier.classify(query)
    const script = this._script.topics[topicId] ?? this._script.topics[GENERAL_TOPIC]
    if (script === undefined) {
      throw new Error(`Persona "${this.id}" has no script for topic "${topicId}"`)
    }
    return script
  }
}
