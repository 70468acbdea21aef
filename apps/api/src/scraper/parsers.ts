/**
 * Field Parsers
 *
 * The item-details page embeds its numbers in label text ("Rank 12 / 500",
 * "Rarity Score: 87.42", "Background: Blue"). Each parser here pulls one
 * value out of such a label and never throws: a label that does not match
 * yields the parser's miss value so one odd field does not sink the page.
 */

const TRAIT_PATTERN = /([\w\s_-]+):\s([\w\s_-]+)/
const RANK_PATTERN = /Rank\s([0-9]+)\s\/\s([0-9]+)/
const RARITY_SCORE_PATTERN = /Rarity\sScore:\s([0-9.]+)/
const DECIMAL_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/

/** Returned for rank, total and score when the label does not match */
export const MISSING = -1

export interface ParsedRank {
  rank: number
  total: number
}

export interface ParsedTraitEntry {
  traitType: string
  traitValue: string
}

function toInteger(digits: string): number {
  const value = Number.parseInt(digits, 10)
  return Number.isSafeInteger(value) ? value : MISSING
}

/**
 * "Rank 12 / 500" -> { rank: 12, total: 500 }
 */
export function parseRank(text: string): ParsedRank {
  const match = text.trim().match(RANK_PATTERN)
  if (!match) {
    return { rank: MISSING, total: MISSING }
  }

  const rank = toInteger(match[1])
  const total = toInteger(match[2])
  if (rank === MISSING || total === MISSING) {
    return { rank: MISSING, total: MISSING }
  }
  return { rank, total }
}

/**
 * "Rarity Score: 87.42" -> 87.42
 *
 * The capture allows any run of digits and dots, so "1.2.3" matches the
 * label but is not a number; that is treated as a miss too, as is a digit
 * run too long to be a finite double.
 */
export function parseRarityScore(text: string): number {
  const match = text.trim().match(RARITY_SCORE_PATTERN)
  if (!match || !DECIMAL_PATTERN.test(match[1])) {
    return MISSING
  }
  const score = Number.parseFloat(match[1])
  return Number.isFinite(score) ? score : MISSING
}

/**
 * "Background: Blue" -> { traitType: 'Background', traitValue: 'Blue' }
 *
 * Both sides are limited to word characters, whitespace and hyphens.
 * No match gives empty strings.
 */
export function parseTraitEntry(text: string): ParsedTraitEntry {
  const match = text.trim().match(TRAIT_PATTERN)
  if (!match) {
    return { traitType: '', traitValue: '' }
  }
  return { traitType: match[1], traitValue: match[2] }
}

/**
 * " 3.5% " -> 3.5
 *
 * Returns null for anything that is not a plain non-negative decimal once
 * the percent signs are gone, including the empty string, or that
 * overflows to Infinity.
 */
export function parsePercentage(text: string): number | null {
  const cleaned = text.replaceAll('%', '').trim()
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return null
  }
  const percentage = Number.parseFloat(cleaned)
  return Number.isFinite(percentage) ? percentage : null
}
