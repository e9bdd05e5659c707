/**
 * Scheduler
 *
 * Polls the store for due reminders, hands them to the notifier with a cap
 * on concurrent sends, then reschedules recurring reminders via `advance`
 * and deactivates everything else.
 */

import { type LocalDateTime, addElapsedMinutes, toEpochMs } from './time-date'
import type { Reminder, ReminderStore } from './adapter'
import { referenceInstant } from './reference-instant'
import { advance } from './recurrence'
import { formatRepeatLabel } from './format'
import { type Logger, describeError, silentLogger } from './logger'

// ============================================================================
// Types
// ============================================================================

/** `undeliverable` means the target channel is gone or not writable. */
export type DeliveryOutcome = 'sent' | 'undeliverable'

export interface ReminderNotifier {
  send(reminder: Reminder, repeatLabel: string | null): Promise<DeliveryOutcome>
}

export type SchedulerOptions = {
  store: ReminderStore
  notifier: ReminderNotifier
  timeZone: string
  intervalMs?: number
  maxConcurrentSends?: number
  /** Occurrences older than this are not sent; 0 sends regardless of age. */
  maxOverdueMinutes?: number
  /** Epoch milliseconds. */
  clock?: () => number
  logger?: Logger
}

export type TickReport = {
  due: number
  sent: number
  stale: number
  rescheduled: number
  deactivated: number
  failed: number
}

export type ReminderScheduler = {
  /** Runs one catch-up tick, then polls every `intervalMs`. */
  start(): Promise<TickReport | null>
  stop(): void
  /** Null when a previous tick is still in flight. */
  tick(): Promise<TickReport | null>
  snooze(id: number, minutes: number): Promise<LocalDateTime | null>
  complete(id: number): Promise<boolean>
  isRunning(): boolean
}

export const DEFAULT_INTERVAL_MS = 30_000
export const DEFAULT_MAX_CONCURRENT_SENDS = 3

/** Snooze choices offered on a delivered reminder, in minutes. */
export const SNOOZE_PRESETS: readonly number[] = [5, 30, 60, 1440]

// ============================================================================
// Concurrency
// ============================================================================

/** Runs `task` over `items` with at most `limit` in flight. */
export async function runWithLimit<T>(items: readonly T[], limit: number, task: (item: T) => Promise<void>): Promise<void> {
  let next = 0
  const worker = async () => {
    while (next < items.length) {
      const item = items[next++]
      if (item !== undefined) await task(item)
    }
  }
  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker))
}

// ============================================================================
// Factory
// ============================================================================

export function createReminderScheduler(options: SchedulerOptions): ReminderScheduler {
  const { store, notifier, timeZone } = options
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS
  const maxConcurrent = options.maxConcurrentSends ?? DEFAULT_MAX_CONCURRENT_SENDS
  const maxOverdueMs = (options.maxOverdueMinutes ?? 0) * 60_000
  const clock = options.clock ?? Date.now
  const log = options.logger ?? silentLogger

  let timer: ReturnType<typeof setInterval> | null = null
  let inFlight = false

  function isStale(reminder: Reminder, nowMs: number): boolean {
    return maxOverdueMs > 0 && nowMs - toEpochMs(reminder.remindAt, timeZone) > maxOverdueMs
  }

  async function deactivate(reminder: Reminder, report: TickReport): Promise<void> {
    await store.deactivateReminder(reminder.id)
    report.deactivated++
  }

  async function afterDelivery(reminder: Reminder, report: TickReport): Promise<void> {
    if (reminder.rule === null) {
      await deactivate(reminder, report)
      return
    }

    const next = advance(reminder.remindAt, reminder.rule)
    if (!next.ok) {
      log.warn(`No next occurrence for reminder ${reminder.id} (${reminder.rule.kind}): ${next.error.message}`)
      await deactivate(reminder, report)
      return
    }

    if (await store.updateReminderTime(reminder.id, next.value)) {
      log.info(`Reminder ${reminder.id} rescheduled to ${next.value}`)
      report.rescheduled++
    } else {
      log.error(`Failed to reschedule reminder ${reminder.id}`)
      await deactivate(reminder, report)
    }
  }

  async function processOne(reminder: Reminder, nowMs: number, report: TickReport): Promise<void> {
    try {
      if (isStale(reminder, nowMs)) {
        log.warn(`Reminder ${reminder.id} is overdue past the limit; skipping delivery of ${reminder.remindAt}`)
        report.stale++
      } else {
        const label = reminder.rule ? formatRepeatLabel(reminder.rule) : null
        const outcome = await notifier.send(reminder, label)
        if (outcome === 'undeliverable') {
          log.warn(`Reminder ${reminder.id} could not be delivered to channel ${reminder.channelId}`)
          await deactivate(reminder, report)
          return
        }
        log.info(`Reminder ${reminder.id} sent to user ${reminder.userId}`)
        report.sent++
      }
      await afterDelivery(reminder, report)
    } catch (err) {
      report.failed++
      log.error(`Reminder ${reminder.id} failed: ${describeError(err)}`)
      try {
        await deactivate(reminder, report)
      } catch (deactivateErr) {
        log.error(`Could not deactivate reminder ${reminder.id}: ${describeError(deactivateErr)}`)
      }
    }
  }

  async function tick(): Promise<TickReport | null> {
    if (inFlight) return null
    inFlight = true
    const report: TickReport = { due: 0, sent: 0, stale: 0, rescheduled: 0, deactivated: 0, failed: 0 }
    try {
      const nowMs = clock()
      const now = referenceInstant(nowMs, timeZone).local
      let due: Reminder[]
      try {
        due = await store.getDueReminders(now)
      } catch (err) {
        log.error(`Due-reminder query failed: ${describeError(err)}`)
        return report
      }

      report.due = due.length
      if (due.length > 0) {
        await runWithLimit(due, maxConcurrent, (r) => processOne(r, nowMs, report))
      }
      return report
    } finally {
      inFlight = false
    }
  }

  return {
    async start() {
      if (timer !== null) return null
      timer = setInterval(() => {
        tick().catch((err: unknown) => log.error(`Tick failed: ${describeError(err)}`))
      }, intervalMs)
      log.info(`Scheduler started (interval ${intervalMs / 1000}s)`)
      return tick()
    },

    stop() {
      if (timer === null) return
      clearInterval(timer)
      timer = null
      log.info('Scheduler stopped')
    },

    tick,

    async snooze(id, minutes) {
      const now = referenceInstant(clock(), timeZone).local
      const remindAt = addElapsedMinutes(now, minutes, timeZone)
      if (!(await store.snoozeReminder(id, remindAt))) return null
      log.info(`Reminder ${id} snoozed until ${remindAt}`)
      return remindAt
    },

    async complete(id) {
      return store.deactivateReminder(id)
    },

    isRunning() {
      return timer !== null
    },
  }
}
