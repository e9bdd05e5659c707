/**
 * Segment 16: Error System Tests
 */
import { describe, it, expect } from 'vitest'
import {
  ReminderError,
  ReminderErrorCode,
  ParseError,
  ExhaustedError,
  InvalidRuleError,
  InvalidConfigError,
  InvalidDataError,
} from '../src/errors'

describe('Error classes', () => {
  it.each([
    [new ParseError('p'), 'ParseError', ReminderErrorCode.PARSE_ERROR],
    [new ExhaustedError('e'), 'ExhaustedError', ReminderErrorCode.EXHAUSTED],
    [new InvalidRuleError('r'), 'InvalidRuleError', ReminderErrorCode.INVALID_RULE],
    [new InvalidConfigError('c'), 'InvalidConfigError', ReminderErrorCode.INVALID_CONFIG],
    [new InvalidDataError('d'), 'InvalidDataError', ReminderErrorCode.INVALID_DATA],
  ] as const)('%s carries its name and code', (error, name, code) => {
    expect(error).toBeInstanceOf(ReminderError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe(name)
    expect(error.code).toBe(code)
  })

  it('keeps the message', () => {
    expect(new ExhaustedError('no fifth Saturday').message).toBe('no fifth Saturday')
  })

  it('maps every code to itself', () => {
    for (const [key, value] of Object.entries(ReminderErrorCode)) {
      expect(value).toBe(key)
    }
  })
})
