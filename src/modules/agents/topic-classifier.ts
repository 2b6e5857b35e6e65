/**
 * Topic classification for scripted agents.
 *
 * Content selection is a pluggable step behind the agent contract; the
 * engine never sees topics.
 */

import { containsAnyPhrase } from '../decision/phrases.js'

export const GENERAL_TOPIC = 'general'

export interface TopicRule {
  id: string
  keywords: readonly string[]
}

export interface TopicClassifier {
  classify(query: string): string
}

/** First rule with a whole-word keyword hit wins; otherwise `general` */
export class KeywordTopicClassifier implements TopicClassifier {
  private readonly _rules: readonly TopicRule[]

  constructor(rules: readonly TopicRule[]) {
    this._rules = rules
  }

  classify(query: string): string {
    const hit = this._rules.find((rule) => containsAnyPhrase(query, rule.keywords))
    return hit?.id ?? GENERAL_TOPIC
  }
}
