/**
 * Shared ReminderStore laws, run against every store implementation.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { NewReminder, ReminderStore } from '../../src/adapter'
import type { LocalDateTime } from '../../src/time-date'

export function dt(iso: string): LocalDateTime {
  return iso as LocalDateTime
}

export function newReminder(overrides: Partial<NewReminder> = {}): NewReminder {
  return {
    userId: 'user-1',
    guildId: 'guild-1',
    channelId: 'channel-1',
    content: '歯医者',
    remindAt: dt('2024-07-02T18:00:00'),
    rule: null,
    createdAt: dt('2024-07-01T09:00:00'),
    ...overrides,
  }
}

export function describeStoreContract(name: string, factory: () => Promise<ReminderStore>): void {
  describe(`${name}: ReminderStore laws`, () => {
    let store: ReminderStore

    beforeEach(async () => {
      store = await factory()
    })

    afterEach(async () => {
      await store.close()
    })

    describe('create and read', () => {
      it('assigns increasing ids', async () => {
        const a = await store.createReminder(newReminder())
        const b = await store.createReminder(newReminder())
        expect(b).toBeGreaterThan(a)
      })

      it('round-trips every field', async () => {
        const id = await store.createReminder(newReminder({ rule: { kind: 'weekly', value: '金曜日' } }))
        expect(await store.getReminder(id)).toEqual({
          id,
          userId: 'user-1',
          guildId: 'guild-1',
          channelId: 'channel-1',
          content: '歯医者',
          remindAt: '2024-07-02T18:00:00',
          rule: { kind: 'weekly', value: '金曜日' },
          createdAt: '2024-07-01T09:00:00',
          isActive: true,
        })
      })

      it('keeps a null guild and a null rule', async () => {
        const id = await store.createReminder(newReminder({ guildId: null }))
        const r = await store.getReminder(id)
        expect(r?.guildId).toBeNull()
        expect(r?.rule).toBeNull()
      })

      it('returns null for an unknown id', async () => {
        expect(await store.getReminder(999)).toBeNull()
      })
    })

    describe('queries', () => {
      it('returns due active reminders, earliest first', async () => {
        const late = await store.createReminder(newReminder({ remindAt: dt('2024-07-01T09:00:00') }))
        const early = await store.createReminder(newReminder({ remindAt: dt('2024-07-01T08:00:00') }))
        await store.createReminder(newReminder({ remindAt: dt('2024-07-01T09:00:01') }))
        const inactive = await store.createReminder(newReminder({ remindAt: dt('2024-07-01T07:00:00') }))
        await store.deactivateReminder(inactive)

        const due = await store.getDueReminders(dt('2024-07-01T09:00:00'))
        expect(due.map((r) => r.id)).toEqual([early, late])
      })

      it('lists a user’s active reminders unless asked for all', async () => {
        const active = await store.createReminder(newReminder())
        const done = await store.createReminder(newReminder({ remindAt: dt('2024-07-01T12:00:00') }))
        await store.createReminder(newReminder({ userId: 'user-2' }))
        await store.deactivateReminder(done)

        expect((await store.getUserReminders('user-1')).map((r) => r.id)).toEqual([active])
        expect((await store.getUserReminders('user-1', { includeInactive: true })).map((r) => r.id)).toEqual([
          done,
          active,
        ])
      })

      it('lists all active reminders across users', async () => {
        await store.createReminder(newReminder())
        await store.createReminder(newReminder({ userId: 'user-2' }))
        expect(await store.getAllActiveReminders()).toHaveLength(2)
      })
    })

    describe('updates', () => {
      it('deactivates', async () => {
        const id = await store.createReminder(newReminder())
        expect(await store.deactivateReminder(id)).toBe(true)
        expect((await store.getReminder(id))?.isActive).toBe(false)
      })

      it('reports false for a missing reminder', async () => {
        expect(await store.deactivateReminder(42)).toBe(false)
        expect(await store.updateReminderTime(42, dt('2024-07-03T09:00:00'))).toBe(false)
      })

      it('deletes only for the owner', async () => {
        const id = await store.createReminder(newReminder())
        expect(await store.deleteReminder(id, 'user-2')).toBe(false)
        expect(await store.deleteReminder(id, 'user-1')).toBe(true)
        expect(await store.getReminder(id)).toBeNull()
      })

      it('updates the time', async () => {
        const id = await store.createReminder(newReminder())
        await store.updateReminderTime(id, dt('2024-07-09T18:00:00'))
        expect((await store.getReminder(id))?.remindAt).toBe('2024-07-09T18:00:00')
      })

      it('updates time and content only for the owner', async () => {
        const id = await store.createReminder(newReminder())
        expect(await store.updateReminderTimeByUser(id, 'user-2', dt('2024-07-09T18:00:00'))).toBe(false)
        expect(await store.updateReminderContent(id, 'user-2', '眼科')).toBe(false)
        expect(await store.updateReminderTimeByUser(id, 'user-1', dt('2024-07-09T18:00:00'))).toBe(true)
        expect(await store.updateReminderContent(id, 'user-1', '眼科')).toBe(true)

        const r = await store.getReminder(id)
        expect(r?.remindAt).toBe('2024-07-09T18:00:00')
        expect(r?.content).toBe('眼科')
      })

      it('re-activates on snooze', async () => {
        const id = await store.createReminder(newReminder())
        await store.deactivateReminder(id)
        expect(await store.snoozeReminder(id, dt('2024-07-02T18:30:00'))).toBe(true)

        const r = await store.getReminder(id)
        expect(r?.isActive).toBe(true)
        expect(r?.remindAt).toBe('2024-07-02T18:30:00')
      })
    })

    describe('bot state', () => {
      it('returns null for an unset key', async () => {
        expect(await store.getState('pinned_message_id')).toBeNull()
      })

      it('overwrites on set', async () => {
        await store.setState('pinned_message_id', '100')
        await store.setState('pinned_message_id', '200')
        expect(await store.getState('pinned_message_id')).toBe('200')
      })
    })
  })
}
