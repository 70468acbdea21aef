/**
 * Item Extraction
 *
 * Builds an Item from one item-details page. Extraction is all-or-nothing:
 * a missing node, an empty document, mismatched trait blocks or an
 * unreadable percentage fail the whole page, and no partial Item is
 * ever returned.
 *
 * Trait blocks are three parallel lists (titles, percentages, tiers)
 * paired by position. If their lengths differ the markup has changed
 * shape and pairing them would attach tiers to the wrong traits, so the
 * page is rejected instead.
 */

import { ParseFailureError, UnbalancedTraitDataError } from '../lib/errors'
import { loadDocument, type DocumentNavigator, type DocumentNode } from './navigator'
import { parsePercentage, parseRank, parseRarityScore, parseTraitEntry } from './parsers'
import { SELECTORS, type ItemPageSelectors, type NodeSelector } from './selectors'
import type { Item, Trait } from './types'

function findOne(doc: DocumentNavigator, selector: NodeSelector): DocumentNode {
  return doc.findOne(selector.tag, selector.attribute, selector.value)
}

function findAll(doc: DocumentNavigator, selector: NodeSelector): DocumentNode[] {
  return doc.findAll(selector.tag, selector.attribute, selector.value)
}

export function extractItem(rawHtml: string, selectors: ItemPageSelectors = SELECTORS): Item {
  const doc = loadDocument(rawHtml)

  const nameNode = findOne(doc, selectors.name)
  const rankNode = findOne(doc, selectors.rank)
  const scoreNode = findOne(doc, selectors.score)

  const titles = findAll(doc, selectors.traitTitles)
  const percentages = findAll(doc, selectors.traitPercentages)
  const tiers = findAll(doc, selectors.traitTiers)

  if (titles.length !== percentages.length || percentages.length !== tiers.length) {
    throw new UnbalancedTraitDataError({
      titles: titles.length,
      percentages: percentages.length,
      tiers: tiers.length,
    })
  }

  const { rank, total } = parseRank(rankNode.text())
  const score = parseRarityScore(scoreNode.text())
  const name = nameNode.text()

  // Map keeps any trait type (even "__proto__") as plain data
  const traits = new Map<string, Trait>()
  titles.forEach((titleNode, i) => {
    const { traitType, traitValue } = parseTraitEntry(titleNode.text())

    const percentageText = percentages[i].text()
    const percentage = parsePercentage(percentageText)
    if (percentage === null) {
      throw new ParseFailureError(
        `malformed trait percentage "${percentageText.trim()}" for trait "${traitType}"`
      )
    }

    traits.set(traitType, {
      type: traitType,
      name: traitValue,
      tier: tiers[i].text(),
      percentage,
    })
  })

  return {
    name,
    rank,
    total,
    score,
    traits: Object.fromEntries(traits),
  }
}

/**
 * JSON bytes persisted in the cache and sent to clients.
 */
export function serializeItem(item: Item): Buffer {
  return Buffer.from(JSON.stringify(item, null, 2), 'utf8')
}
