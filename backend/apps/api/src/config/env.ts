import dotenv from "dotenv"
import { z } from "zod"
import { ConfigError } from "../../../../engine/errors"

/*
|--------------------------------------------------------------------------
| Application Configuration
|--------------------------------------------------------------------------
| Built once at startup and passed into each component's constructor.
| Missing or malformed required values are fatal.
|--------------------------------------------------------------------------
*/

const REQUIRED = [
  "DATABASE_URL",
  "DATA_B_URL",
  "FETCH_INTERVAL_SECONDS",
  "WORKERS_COUNT",
  "APP_HOST",
  "APP_PORT",
  "MAX_RETRIES",
  "RETRY_DELAY",
] as const

// Node timers hold at most 2^31-1 ms; longer delays fire after 1 ms
const MAX_TIMER_SECONDS = 2_147_483

const positiveInt = z.coerce.number().int().positive()
const timerSeconds = z.coerce.number().max(MAX_TIMER_SECONDS)

const envSchema = z.object({
  /* ---------------- Store ---------------- */
  DATABASE_URL: z.string().trim().min(1),

  /* ---------------- Data B source ---------------- */
  DATA_B_URL: z.string().trim().url(),
  FETCH_INTERVAL_SECONDS: timerSeconds.positive(),
  MAX_RETRIES: positiveInt,
  RETRY_DELAY: timerSeconds.nonnegative(),
  FETCH_TIMEOUT_SECONDS: timerSeconds.positive().default(10),

  /* ---------------- Server ---------------- */
  APP_HOST: z.string().trim().min(1),
  APP_PORT: z.coerce.number().int().min(0).max(65535),
  WORKERS_COUNT: positiveInt,
  CORS_ORIGINS: z.string().optional(),

  /* ---------------- Runtime ---------------- */
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).optional(),
})

export type AppConfig = Readonly<{
  databaseUrl: string
  dataBUrl: string
  fetchIntervalSeconds: number
  maxRetries: number
  retryDelaySeconds: number
  fetchTimeoutSeconds: number
  host: string
  port: number
  workersCount: number
  corsOrigins: string[] | undefined
  nodeEnv: string
  logLevel: string | undefined
}>

/** Read `.env` into process.env without overriding variables already set. */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : undefined)
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const issues: string[] = []
  for (const name of REQUIRED) {
    const value = env[name]
    if (value === undefined || value.trim() === "") {
      issues.push(`Missing required environment variable: ${name}`)
    }
  }
  if (issues.length) throw new ConfigError(issues)

  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`)
    )
  }

  const e = parsed.data
  const origins = e.CORS_ORIGINS?.split(",").map(o => o.trim()).filter(Boolean)

  return Object.freeze({
    databaseUrl: e.DATABASE_URL,
    dataBUrl: e.DATA_B_URL,
    fetchIntervalSeconds: e.FETCH_INTERVAL_SECONDS,
    maxRetries: e.MAX_RETRIES,
    retryDelaySeconds: e.RETRY_DELAY,
    fetchTimeoutSeconds: e.FETCH_TIMEOUT_SECONDS,
    host: e.APP_HOST,
    port: e.APP_PORT,
    workersCount: e.WORKERS_COUNT,
    corsOrigins: origins && origins.length ? origins : undefined,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
  })
}
