/**
 * Cost-of-delay estimate derived from the first monetary figure in a query.
 *
 *   below $1M   → "<x> immediate + <4x>/month"
 *   $1M or more → "<x/5>/month"
 *   no figure   → the configured default
 */

const MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  thousand: 1_000,
  m: 1_000_000,
  million: 1_000_000,
  b: 1_000_000_000,
  billion: 1_000_000_000,
}

const SUFFIX = '(k|thousand|million|m|billion|b)'

/** "$50K", "$1,200", "$2.5 million" */
const DOLLAR_FIGURE = new RegExp(`\\$\\s?(\\d+(?:,\\d{3})*(?:\\.\\d+)?)(?:\\s?${SUFFIX})?(?![A-Za-z])`, 'i')
/** "50k", "5m", "3 million" without a currency sign */
const SUFFIXED_FIGURE = new RegExp(`(?<![A-Za-z0-9.,])(\\d+(?:\\.\\d+)?)\\s?${SUFFIX}(?![A-Za-z])`, 'i')

function toAmount(digits: string, suffix: string | undefined): number {
  const base = Number(digits.replace(/,/g, ''))
  const multiplier = suffix === undefined ? 1 : (MULTIPLIERS[suffix.toLowerCase()] ?? 1)
  return base * multiplier
}

/** First monetary amount mentioned in `text`, in dollars */
export function extractMonetaryAmount(text: string): number | null {
  const dollar = DOLLAR_FIGURE.exec(text)
  const suffixed = SUFFIXED_FIGURE.exec(text)
  const candidates = [dollar, suffixed].filter((m): m is RegExpExecArray => m !== null)
  if (candidates.length === 0) return null
  const first = candidates.reduce((a, b) => (b.index < a.index ? b : a))
  const digits = first[1]
  if (digits === undefined) return null
  const amount = toAmount(digits, first[2])
  return Number.isFinite(amount) && amount > 0 ? amount : null
}

function trimDecimal(value: number): string {
  const rounded = Math.round(value * 10) / 10
  return Number.isInteger(rounded) ? String(rounded) : rounded.toFixed(1)
}

/** Compact dollar formatting: $950, $50K, $1.5M, $2B */
export function formatMoney(amount: number): string {
  if (amount >= 1_000_000_000) return `$${trimDecimal(amount / 1_000_000_000)}B`
  if (amount >= 1_000_000) return `$${trimDecimal(amount / 1_000_000)}M`
  if (amount >= 1_000) return `$${trimDecimal(amount / 1_000)}K`
  return `$${String(Math.round(amount))}`
}

export function estimateCostOfDelay(query: string, defaultEstimate: string): string {
  const amount = extractMonetaryAmount(query)
  if (amount === null) return defaultEstimate
  if (amount < 1_000_000) {
    return `${formatMoney(amount)} immediate + ${formatMoney(amount * 4)}/month`
  }
  return `${formatMoney(amount / 5)}/month`
}
