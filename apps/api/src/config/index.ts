/**
 * Runtime configuration, validated once at startup.
 *
 * Every field has a default so the service starts with an empty environment:
 * a SQLite cache file in the working directory, listening on :1337.
 */

import { z } from 'zod'

export interface ListenAddress {
  host?: string
  port: number
}

/**
 * Accepts `:1337`, `1337`, `0.0.0.0:1337` or `[::1]:1337`.
 */
export function parseListenAddress(value: string): ListenAddress | null {
  const match = value.trim().match(/^(?:(?:\[([^\]]+)\]|([^:\s\[\]]+)):|:)?(\d{1,5})$/)
  if (!match) return null

  const port = Number.parseInt(match[3], 10)
  if (port < 0 || port > 65535) return null

  const host = match[1] ?? match[2]
  return host ? { host, port } : { port }
}

const listenAddressSchema = z.string().transform((value, ctx) => {
  const parsed = parseListenAddress(value)
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid listen address: ${value}` })
    return z.NEVER
  }
  return parsed
})

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean)
  )

export const configSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    RARITY_DB_PATH: z.string().min(1).default('rarity.db'),
    RARITY_LISTEN_ADDRESS: listenAddressSchema.default(':1337'),
    RARITY_SOURCE_URL: z.string().url().default('https://www.raritymon.com'),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
    CACHE_DRIVER: z.enum(['sqlite', 'redis']).default('sqlite'),
    CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(0),
    REDIS_URL: z.string().url().optional(),
    CORS_ORIGINS: commaList.default(''),
  })
  .superRefine((env, ctx) => {
    if (env.CACHE_DRIVER === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required when CACHE_DRIVER=redis',
      })
    }
  })

export interface AppConfig {
  env: 'development' | 'production' | 'test'
  dbPath: string
  listen: ListenAddress
  sourceBaseUrl: string
  fetch: {
    timeoutMs: number
    maxAttempts: number
  }
  cache: {
    driver: 'sqlite' | 'redis'
    ttlSeconds: number
    redisUrl?: string
  }
  corsOrigins: string[]
}

/**
 * Parse configuration from an environment map. Throws a ZodError listing
 * every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset so `FOO=` in an env file falls back to the default
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''))
  const parsed = configSchema.parse(present)

  return {
    env: parsed.NODE_ENV,
    dbPath: parsed.RARITY_DB_PATH,
    listen: parsed.RARITY_LISTEN_ADDRESS,
    sourceBaseUrl: parsed.RARITY_SOURCE_URL.replace(/\/+$/, ''),
    fetch: {
      timeoutMs: parsed.FETCH_TIMEOUT_MS,
      maxAttempts: parsed.FETCH_MAX_ATTEMPTS,
    },
    cache: {
      driver: parsed.CACHE_DRIVER,
      ttlSeconds: parsed.CACHE_TTL_SECONDS,
      redisUrl: parsed.REDIS_URL,
    },
    corsOrigins: parsed.CORS_ORIGINS,
  }
}
