/**
 * Segment 13: Intake Tests
 *
 * Message → command, rule-table result, or delegate result.
 */
import { describe, it, expect, vi } from 'vitest'
import { createReminderIntake } from '../src/intake'
import type { FallbackDelegate } from '../src/fallback'
import { createConsoleLogger, type LogLevel } from '../src/logger'
import type { LocalDateTime } from '../src/time-date'

const TZ = 'Asia/Tokyo'
// Monday 2024-07-01 09:00 in Tokyo
const clock = () => Date.UTC(2024, 6, 1, 0, 0, 0)

function delegateReturning(value: string | null): FallbackDelegate {
  return { tryExternalResolve: vi.fn(async () => value as LocalDateTime | null) }
}

describe('createReminderIntake', () => {
  it.each(['一覧', 'リスト', '確認', '  一覧  '])('treats %s as the list command', async (message) => {
    const intake = createReminderIntake({ timeZone: TZ, clock })
    expect(await intake.interpret(message)).toEqual({ command: 'list' })
  })

  it('ignores blank messages', async () => {
    const intake = createReminderIntake({ timeZone: TZ, clock })
    expect(await intake.interpret('   ')).toBeNull()
  })

  it('answers from the rule tables first', async () => {
    const fallback = delegateReturning('2030-01-01T00:00:00')
    const intake = createReminderIntake({ timeZone: TZ, clock, fallback })

    expect(await intake.interpret('毎週金曜18時にゴミ出し')).toEqual({
      source: 'rules',
      result: { content: 'ゴミ出し', occurrence: '2024-07-05T18:00:00', rule: { kind: 'weekly', value: '金曜日' } },
    })
    expect(fallback.tryExternalResolve).not.toHaveBeenCalled()
  })

  it('returns null on no match when there is no delegate', async () => {
    const intake = createReminderIntake({ timeZone: TZ, clock })
    expect(await intake.interpret('牛乳を買う')).toBeNull()
  })

  it('asks the delegate when the rules find nothing', async () => {
    const fallback = delegateReturning('2024-07-02T09:00:00')
    const intake = createReminderIntake({ timeZone: TZ, clock, fallback })

    expect(await intake.interpret('牛乳を買う')).toEqual({
      source: 'fallback',
      result: { content: '牛乳を買う', occurrence: '2024-07-02T09:00:00', rule: null },
    })
    expect(fallback.tryExternalResolve).toHaveBeenCalledWith('牛乳を買う', {
      local: '2024-07-01T09:00:00',
      timeZone: TZ,
    })
  })

  it('returns null when the delegate cannot place the phrase', async () => {
    const intake = createReminderIntake({ timeZone: TZ, clock, fallback: delegateReturning(null) })
    expect(await intake.interpret('牛乳を買う')).toBeNull()
  })

  it('logs and absorbs a delegate failure', async () => {
    const lines: { level: LogLevel; line: string }[] = []
    const logger = createConsoleLogger('debug', 'intake', (level, line) => lines.push({ level, line }))
    const fallback: FallbackDelegate = {
      tryExternalResolve: async () => {
        throw new Error('upstream timeout')
      },
    }
    const intake = createReminderIntake({ timeZone: TZ, clock, fallback, logger })

    expect(await intake.interpret('牛乳を買う')).toBeNull()
    const errors = lines.filter((l) => l.level === 'error').map((l) => l.line)
    expect(errors).toHaveLength(1)
    expect(errors[0]?.endsWith("ERROR [intake:fallback] Delegate failed for '牛乳を買う': upstream timeout")).toBe(true)
  })
})
