import { z } from 'zod'
import { LOG_LEVELS } from './logger.js'

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

/**
 * Runtime configuration, read once at boot from `process.env`.
 *
 * Every store deadline is enforced by that store's own client setting:
 * `pg` query_timeout, ioredis commandTimeout and the OpenSearch
 * requestTimeout.
 */
export const configSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  PORT: positiveInt(8080),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  OPENSEARCH_URL: z.string().url().default('http://localhost:9200'),
  CACHE_TTL_SECONDS: positiveInt(86_400),
  CACHE_COMMAND_TIMEOUT_MS: positiveInt(2_000),
  SEARCH_REQUEST_TIMEOUT_MS: positiveInt(5_000),
  DB_QUERY_TIMEOUT_MS: positiveInt(10_000),
  OUTBOX_POLL_INTERVAL_MS: positiveInt(1_000),
  OUTBOX_BATCH_SIZE: positiveInt(100),
  OUTBOX_MAX_ATTEMPTS: positiveInt(10),
  OUTBOX_RETRY_DELAY_MS: positiveInt(1_000),
  HEALTH_CHECK_INTERVAL_MS: positiveInt(10_000),
  DELTA_SYNC_MAX_BATCH: positiveInt(500),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type AppConfig = z.infer<typeof configSchema>

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[]

  constructor(issues: z.ZodIssue[]) {
    const summary = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    super(`Invalid environment: ${summary}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues)
  }
  return parsed.data
}
