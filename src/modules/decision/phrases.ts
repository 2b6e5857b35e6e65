/**
 * Phrase matching and the two boolean signals the risk table keys on.
 */

import type { DecisionOptions, DecisionSignals, SidePosition } from './types.js'

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Case-insensitive match of `phrase` as a whole word run, so "BLOCK" matches
 * "block this" but not "blockchain".
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const pattern = new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(phrase.trim())}(?![A-Za-z0-9])`, 'i')
  return pattern.test(text)
}

export function containsAnyPhrase(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => containsPhrase(text, phrase))
}

/** All text an advisor produced, in slot order */
export function aggregateText(position: SidePosition): string {
  return [position.opening, position.rebuttal, position.final]
    .filter((part): part is string => part !== undefined && part.length > 0)
    .join('\n\n')
}

/** Whether this advisor, on its own, raises its role's signal */
export function raisesSignal(
  position: SidePosition,
  options: Pick<DecisionOptions, 'blockPhrases' | 'shipPhrases'>
): boolean {
  const phrases = position.role === 'risk' ? options.blockPhrases : options.shipPhrases
  return containsAnyPhrase(aggregateText(position), phrases)
}

export function detectSignals(
  positions: readonly SidePosition[],
  options: Pick<DecisionOptions, 'blockPhrases' | 'shipPhrases'>
): DecisionSignals {
  return {
    riskBlocks: positions.some((p) => p.role === 'risk' && raisesSignal(p, options)),
    growthPushes: positions.some((p) => p.role === 'growth' && raisesSignal(p, options)),
  }
}
