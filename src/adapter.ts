/**
 * Adapter
 *
 * Reminder persistence interface + in-memory implementation.
 * All methods are async so the SQLite store and test doubles share one shape.
 */

import { z } from 'zod'
import type { LocalDateTime } from './time-date'
import { type RecurrenceRule, RECURRENCE_KINDS } from './recurrence'
import { InvalidDataError } from './errors'

export type { LocalDateTime } from './time-date'

// ============================================================================
// Entity Types
// ============================================================================

export type Reminder = {
  id: number
  userId: string
  guildId: string | null
  channelId: string
  content: string
  /** Next firing time, wall-clock in the configured zone. */
  remindAt: LocalDateTime
  rule: RecurrenceRule | null
  createdAt: LocalDateTime
  isActive: boolean
}

export type NewReminder = Omit<Reminder, 'id' | 'isActive'>

export type UserReminderQuery = {
  includeInactive?: boolean
}

// ============================================================================
// Rule Validation
// ============================================================================

const storedRuleSchema = z.object({
  kind: z.enum(RECURRENCE_KINDS),
  value: z.string().min(1).nullable(),
})

/**
 * Rule from its two persisted columns. Both null means a single-shot
 * reminder; anything outside the rule vocabulary is corrupt data.
 */
export function decodeRule(kind: string | null, value: string | null): RecurrenceRule | null {
  if (kind === null && value === null) return null
  const parsed = storedRuleSchema.safeParse({ kind, value })
  if (!parsed.success) {
    throw new InvalidDataError(`Stored recurrence rule is invalid: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
  }
  return parsed.data.kind === 'none' ? null : parsed.data
}

export function encodeRule(rule: RecurrenceRule | null): { kind: string | null; value: string | null } {
  if (rule === null || rule.kind === 'none') return { kind: null, value: null }
  return { kind: rule.kind, value: rule.value }
}

// ============================================================================
// Store Interface
// ============================================================================

export interface ReminderStore {
  createReminder(reminder: NewReminder): Promise<number>
  getReminder(id: number): Promise<Reminder | null>
  /** Active reminders with remindAt <= now, earliest first. */
  getDueReminders(now: LocalDateTime): Promise<Reminder[]>
  getUserReminders(userId: string, query?: UserReminderQuery): Promise<Reminder[]>
  getAllActiveReminders(): Promise<Reminder[]>

  deactivateReminder(id: number): Promise<boolean>
  /** Deletes only when `userId` owns the reminder. */
  deleteReminder(id: number, userId: string): Promise<boolean>
  updateReminderTime(id: number, remindAt: LocalDateTime): Promise<boolean>
  updateReminderTimeByUser(id: number, userId: string, remindAt: LocalDateTime): Promise<boolean>
  updateReminderContent(id: number, userId: string, content: string): Promise<boolean>
  /** Sets a new firing time and re-activates. */
  snoozeReminder(id: number, remindAt: LocalDateTime): Promise<boolean>

  // Bot state (pinned message ids and similar)
  getState(key: string): Promise<string | null>
  setState(key: string, value: string): Promise<void>

  close(): Promise<void>
}

// ============================================================================
// Memory Store
// ============================================================================

function byRemindAt(a: Reminder, b: Reminder): number {
  if (a.remindAt !== b.remindAt) return a.remindAt < b.remindAt ? -1 : 1
  return a.id - b.id
}

export function createMemoryStore(): ReminderStore {
  const reminders = new Map<number, Reminder>()
  const botState = new Map<string, string>()
  let nextId = 1

  function clone(r: Reminder): Reminder {
    return { ...r, rule: r.rule ? { ...r.rule } : null }
  }

  function select(predicate: (r: Reminder) => boolean): Reminder[] {
    return [...reminders.values()].filter(predicate).sort(byRemindAt).map(clone)
  }

  function update(id: number, changes: Partial<Reminder>, owner?: string): boolean {
    const existing = reminders.get(id)
    if (!existing) return false
    if (owner !== undefined && existing.userId !== owner) return false
    reminders.set(id, { ...existing, ...changes })
    return true
  }

  return {
    async createReminder(reminder) {
      const id = nextId++
      reminders.set(id, { ...reminder, rule: reminder.rule ? { ...reminder.rule } : null, id, isActive: true })
      return id
    },

    async getReminder(id) {
      const r = reminders.get(id)
      return r ? clone(r) : null
    },

    async getDueReminders(now) {
      return select((r) => r.isActive && r.remindAt <= now)
    },

    async getUserReminders(userId, query) {
      const includeInactive = query?.includeInactive ?? false
      return select((r) => r.userId === userId && (includeInactive || r.isActive))
    },

    async getAllActiveReminders() {
      return select((r) => r.isActive)
    },

    async deactivateReminder(id) {
      return update(id, { isActive: false })
    },

    async deleteReminder(id, userId) {
      const existing = reminders.get(id)
      if (!existing || existing.userId !== userId) return false
      return reminders.delete(id)
    },

    async updateReminderTime(id, remindAt) {
      return update(id, { remindAt })
    },

    async updateReminderTimeByUser(id, userId, remindAt) {
      return update(id, { remindAt }, userId)
    },

    async updateReminderContent(id, userId, content) {
      return update(id, { content }, userId)
    },

    async snoozeReminder(id, remindAt) {
      return update(id, { remindAt, isActive: true })
    },

    async getState(key) {
      return botState.get(key) ?? null
    },

    async setState(key, value) {
      botState.set(key, value)
    },

    async close() {
      reminders.clear()
      botState.clear()
    },
  }
}
