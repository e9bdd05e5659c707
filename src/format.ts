/**
 * Display Formatting
 *
 * Japanese display strings for reminder lists and notifications, and the
 * date/time input accepted by the edit form.
 */

import { type LocalDateTime, atTime, isValidDate, makeDate, toEpochMs, yearOf, dateOf } from './time-date'
import type { ReferenceInstant } from './reference-instant'
import type { RecurrenceKind, RecurrenceRule } from './recurrence'
import { parseMonthDay } from './recurrence'
import { normalizeDigits } from './normalize'

const KIND_LABELS: Record<RecurrenceKind, string> = {
  none: 'なし',
  daily: '毎日',
  weekly: '毎週',
  monthly: '毎月',
  biweekly: '隔週',
  weekdays: '平日',
}

/** Time left until `target`: あと2日3時間, あと45分, まもなく, or 期限切れ once passed. */
export function formatRemaining(target: LocalDateTime, now: ReferenceInstant): string {
  const diffMs = toEpochMs(target, now.timeZone) - toEpochMs(now.local, now.timeZone)
  if (diffMs < 0) return '期限切れ'

  const totalSeconds = Math.floor(diffMs / 1000)
  const days = Math.floor(totalSeconds / 86400)
  const hours = Math.floor((totalSeconds % 86400) / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)

  if (days > 0) return hours > 0 ? `あと${days}日${hours}時間` : `あと${days}日`
  if (hours > 0) return minutes > 0 ? `あと${hours}時間${minutes}分` : `あと${hours}時間`
  if (minutes > 0) return `あと${minutes}分`
  return 'まもなく'
}

/** 毎日, 毎週金曜日, 毎月25日, 毎月第3火曜日, 隔週水曜日, 平日. */
export function formatRepeatLabel(rule: RecurrenceRule): string {
  const base = KIND_LABELS[rule.kind]
  if (rule.value === null) return base
  if (rule.kind === 'monthly' && parseMonthDay(rule.value) !== null) return `毎月${rule.value}日`
  return `${base}${rule.value}`
}

/**
 * Edit-form input: `YYYY/M/D` or `M/D` (current year) plus `H` or `H:MM`.
 * Null when either part is malformed or names no real date or time.
 */
export function parseDateTimeInput(date: string, time: string, now: ReferenceInstant): LocalDateTime | null {
  const d = /^(?:(\d{4})\/)?(\d{1,2})\/(\d{1,2})$/.exec(normalizeDigits(date.trim()))
  const t = /^(\d{1,2})(?::(\d{1,2}))?$/.exec(normalizeDigits(time.trim()))
  if (!d || !t) return null

  const year = d[1] !== undefined ? Number(d[1]) : yearOf(dateOf(now.local))
  const month = Number(d[2])
  const day = Number(d[3])
  const hour = Number(t[1])
  const minute = Number(t[2] ?? 0)

  if (!isValidDate(year, month, day) || hour > 23 || minute > 59) return null
  return atTime(makeDate(year, month, day), hour, minute)
}
