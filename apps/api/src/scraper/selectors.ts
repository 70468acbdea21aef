/**
 * Item-details page selectors
 *
 * One place to update when the source site's markup drifts. Each entry is a
 * tag plus an optional attribute filter; `class` filters match any one of
 * the element's class names.
 */

export interface NodeSelector {
  tag: string
  attribute?: string
  value?: string
}

export interface ItemPageSelectors {
  name: NodeSelector
  rank: NodeSelector
  score: NodeSelector
  traitTitles: NodeSelector
  traitPercentages: NodeSelector
  traitTiers: NodeSelector
}

export const SELECTORS = {
  // Item name heading ("Ape #7")
  name: { tag: 'h2' },

  // "Rank 12 / 500"
  rank: { tag: 'button', attribute: 'class', value: 'item-rarity-rank' },

  // "Rarity Score: 87.42"
  score: { tag: 'button', attribute: 'class', value: 'item-trait-data' },

  // Parallel per-trait blocks, paired by position
  traitTitles: { tag: 'h3', attribute: 'class', value: 'tier-title' },
  traitPercentages: { tag: 'div', attribute: 'class', value: 'item-rarity-percentage' },
  traitTiers: { tag: 'div', attribute: 'class', value: 'item-rarity-tier' },
} as const satisfies ItemPageSelectors
