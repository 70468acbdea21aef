/**
 * Document Navigator
 *
 * Thin wrapper over a cheerio document that turns "nothing matched" into
 * typed failures. A document that failed to load is still returned as a
 * navigator, and every query on it raises the load failure, so callers
 * have one place to check.
 */

import * as cheerio from 'cheerio'
import { isTag, isText, type Element } from 'domhandler'
import { NodeNotFoundError, ParseFailureError } from '../lib/errors'
import type { NodeSelector } from './selectors'

const TAG_NAME = /^[A-Za-z][A-Za-z0-9-]*$/
const ATTRIBUTE_NAME = /^[A-Za-z_:][-A-Za-z0-9_:.]*$/
const LOOKS_LIKE_MARKUP = /<[A-Za-z!?/]/

/**
 * Build the CSS selector for a tag/attribute/value query.
 * `class` matches one whitespace-separated class name, any other attribute
 * matches its whole value.
 */
export function toCssSelector({ tag, attribute, value }: NodeSelector): string {
  if (!TAG_NAME.test(tag)) {
    throw new TypeError(`Invalid tag name: ${tag}`)
  }
  if (attribute === undefined) {
    return tag
  }
  if (!ATTRIBUTE_NAME.test(attribute)) {
    throw new TypeError(`Invalid attribute name: ${attribute}`)
  }
  if (value === undefined) {
    return `${tag}[${attribute}]`
  }

  const operator = attribute.toLowerCase() === 'class' ? '~=' : '='
  const quoted = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')
  return `${tag}[${attribute}${operator}"${quoted}"]`
}

/**
 * One matched element.
 */
export class DocumentNode {
  constructor(
    private readonly element: Element,
    readonly selector: string
  ) {}

  get tag(): string {
    return this.element.tagName
  }

  attr(name: string): string | undefined {
    return this.element.attribs[name]
  }

  /**
   * First direct text child with visible content, returned as-is.
   * Field parsers consume this; a node without one is unusable.
   */
  text(): string {
    for (const child of this.element.children) {
      if (isText(child) && child.data.trim() !== '') {
        return child.data
      }
    }
    throw new NodeNotFoundError(this.selector, 'HTML node has no text content')
  }
}

export class DocumentNavigator {
  private constructor(
    private readonly $: cheerio.CheerioAPI | null,
    private readonly parseError: ParseFailureError | null
  ) {}

  static load(rawHtml: string): DocumentNavigator {
    if (rawHtml.trim() === '') {
      return new DocumentNavigator(null, new ParseFailureError('source document is empty'))
    }
    if (!LOOKS_LIKE_MARKUP.test(rawHtml)) {
      return new DocumentNavigator(null, new ParseFailureError('source document is not HTML'))
    }

    const $ = cheerio.load(rawHtml)
    if ($('body').children().length === 0 && $('head').children().length === 0) {
      return new DocumentNavigator(null, new ParseFailureError('source document has no elements'))
    }

    return new DocumentNavigator($, null)
  }

  get parsed(): boolean {
    return this.parseError === null
  }

  findOne(tag: string, attribute?: string, value?: string): DocumentNode {
    const $ = this.document()
    const selector = toCssSelector({ tag, attribute, value })
    const element = $(selector).toArray().find(isTag)
    if (!element) {
      throw new NodeNotFoundError(selector)
    }
    return new DocumentNode(element, selector)
  }

  /**
   * Every match in document order. Zero matches is a valid answer here;
   * callers decide whether they can live with it.
   */
  findAll(tag: string, attribute?: string, value?: string): DocumentNode[] {
    const $ = this.document()
    const selector = toCssSelector({ tag, attribute, value })
    return $(selector)
      .toArray()
      .filter(isTag)
      .map((element) => new DocumentNode(element, selector))
  }

  private document(): cheerio.CheerioAPI {
    if (this.parseError) {
      throw this.parseError
    }
    if (!this.$) {
      throw new ParseFailureError('source document was not loaded')
    }
    return this.$
  }
}

export function loadDocument(rawHtml: string): DocumentNavigator {
  return DocumentNavigator.load(rawHtml)
}
