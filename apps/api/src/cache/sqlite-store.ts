/**
 * SQLite-backed cache store
 *
 * One embedded database file with a single RarityCache table. Each get/put
 * is one statement, which SQLite runs atomically; WAL mode plus a busy
 * timeout lets several processes share the file.
 */

import fs from 'fs'
import path from 'path'
import Database from 'better-sqlite3'
import { StoreFailureError } from '../lib/errors'
import { CACHE_NAMESPACE, type CacheStore, type CacheStoreOptions } from './types'

interface CacheRow {
  value: Buffer
  stored_at: number
}

export interface SqliteCacheStoreOptions extends CacheStoreOptions {
  /** Clock used for stored_at and TTL checks */
  now?: () => number
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class SqliteCacheStore implements CacheStore {
  readonly driver = 'sqlite'

  private readonly ttlMs: number
  private readonly now: () => number
  private readonly selectStmt: Database.Statement<[Buffer], CacheRow>
  private readonly upsertStmt: Database.Statement<[Buffer, Buffer, number]>
  private closed = false

  private constructor(
    private readonly db: Database.Database,
    options: SqliteCacheStoreOptions
  ) {
    this.ttlMs = (options.ttlSeconds ?? 0) * 1000
    this.now = options.now ?? Date.now

    // Table name is a fixed constant, never user input
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS "${CACHE_NAMESPACE}" (
        key BLOB PRIMARY KEY,
        value BLOB NOT NULL,
        stored_at INTEGER NOT NULL
      ) WITHOUT ROWID
    `)

    this.selectStmt = this.db.prepare<[Buffer], CacheRow>(
      `SELECT value, stored_at FROM "${CACHE_NAMESPACE}" WHERE key = ?`
    )
    this.upsertStmt = this.db.prepare<[Buffer, Buffer, number]>(
      `INSERT INTO "${CACHE_NAMESPACE}" (key, value, stored_at) VALUES (?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, stored_at = excluded.stored_at`
    )
  }

  /**
   * Open (creating if needed) the database file. `:memory:` gives a
   * private in-process database.
   */
  static open(filename: string, options: SqliteCacheStoreOptions = {}): SqliteCacheStore {
    try {
      if (filename !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true })
      }

      const db = new Database(filename)
      db.pragma('journal_mode = WAL')
      db.pragma('busy_timeout = 5000')
      db.pragma('synchronous = NORMAL')

      return new SqliteCacheStore(db, options)
    } catch (error) {
      throw new StoreFailureError(`failed to open cache database ${filename}: ${describe(error)}`, {
        cause: error,
      })
    }
  }

  async get(fingerprint: Buffer): Promise<Buffer | null> {
    this.assertOpen()

    let row: CacheRow | undefined
    try {
      row = this.selectStmt.get(fingerprint)
    } catch (error) {
      throw new StoreFailureError(`cache read failed: ${describe(error)}`, { cause: error })
    }

    if (!row) return null
    if (this.ttlMs > 0 && this.now() - row.stored_at > this.ttlMs) return null
    return row.value
  }

  async put(fingerprint: Buffer, value: Buffer): Promise<void> {
    this.assertOpen()

    try {
      this.upsertStmt.run(fingerprint, value, this.now())
    } catch (error) {
      throw new StoreFailureError(`cache write failed: ${describe(error)}`, { cause: error })
    }
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.db.close()
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreFailureError('cache store is closed')
    }
  }
}
