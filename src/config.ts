/**
 * Configuration
 *
 * Environment → validated settings. `loadConfig` is pure over the env record
 * it is given; `loadConfigFromEnvironment` reads `.env` into process.env first.
 */

import dotenv from 'dotenv'
import { z } from 'zod'
import { isValidTimeZone } from './time-date'
import { LOG_LEVELS } from './logger'
import { InvalidConfigError } from './errors'

const configSchema = z.object({
  TIMEZONE: z
    .string()
    .default('Asia/Tokyo')
    .refine(isValidTimeZone, { message: 'must be an IANA time zone name' }),
  DB_PATH: z.string().min(1).default('reminders.db'),
  SCHEDULER_CHECK_INTERVAL_SEC: z.coerce.number().int().positive().default(30),
  MAX_CONCURRENT_SENDS: z.coerce.number().int().positive().default(3),
  /** 0 disables the overdue cutoff. */
  MAX_OVERDUE_MINUTES: z.coerce.number().int().nonnegative().default(0),
  REMINDER_CHANNEL_ID: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type ReminderConfig = {
  timeZone: string
  dbPath: string
  checkIntervalMs: number
  maxConcurrentSends: number
  maxOverdueMinutes: number
  reminderChannelId: string | null
  logLevel: (typeof LOG_LEVELS)[number]
}

type EnvRecord = Record<string, string | undefined>

/** Drops empty strings so `KEY=` in a .env file means "use the default". */
function withoutBlanks(env: EnvRecord): EnvRecord {
  return Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''))
}

export function loadConfig(env: EnvRecord): ReminderConfig {
  const parsed = configSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new InvalidConfigError(`Invalid configuration: ${detail}`)
  }

  const c = parsed.data
  return {
    timeZone: c.TIMEZONE,
    dbPath: c.DB_PATH,
    checkIntervalMs: c.SCHEDULER_CHECK_INTERVAL_SEC * 1000,
    maxConcurrentSends: c.MAX_CONCURRENT_SENDS,
    maxOverdueMinutes: c.MAX_OVERDUE_MINUTES,
    reminderChannelId: c.REMINDER_CHANNEL_ID ?? null,
    logLevel: c.LOG_LEVEL,
  }
}

export function loadConfigFromEnvironment(path?: string): ReminderConfig {
  dotenv.config(path ? { path } : undefined)
  return loadConfig(process.env)
}
