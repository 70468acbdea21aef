import { createHash } from 'crypto'

/**
 * Cache key for one item: SHA-256 of "collection:id".
 *
 * The id is rendered as a base-10 integer, so "007" and "7" from the URL
 * share an entry.
 */
export function fingerprint(collection: string, id: number): Buffer {
  return createHash('sha256').update(`${collection}:${id}`, 'utf8').digest()
}

export function fingerprintHex(collection: string, id: number): string {
  return fingerprint(collection, id).toString('hex')
}
