import { describe, it, expect } from 'vitest'
import {
    addDays,
    addMonths,
    dayOf,
    formatLocalTimestamp,
    parseDay,
    parseTimestamp,
    splitMinutes,
    weekStart,
    weekday,
} from '../../../src/core/time.js'
import { fixedClock, today } from '../../../src/core/clock.js'

describe('parseTimestamp', () => {
    it('accepts the canonical form unchanged', () => {
        expect(parseTimestamp('2026-10-19 09:30:15')).toEqual({ ok: true, value: '2026-10-19 09:30:15' })
    })

    it('normalises a T separator and missing seconds', () => {
        expect(parseTimestamp('2026-10-19T09:30')).toEqual({ ok: true, value: '2026-10-19 09:30:00' })
    })

    it('rejects impossible dates', () => {
        expect(parseTimestamp('2026-02-30 10:00').ok).toBe(false)
    })

    it('rejects impossible times', () => {
        expect(parseTimestamp('2026-10-19 24:00').ok).toBe(false)
        expect(parseTimestamp('2026-10-19 12:60').ok).toBe(false)
    })

    it('rejects other formats', () => {
        const result = parseTimestamp('19/10/2026 09:00')
        expect(result).toEqual({ ok: false, error: "'19/10/2026 09:00' is not a YYYY-MM-DD HH:MM[:SS] timestamp" })
    })
})

describe('parseDay', () => {
    it('accepts real dates only', () => {
        expect(parseDay('2024-02-29').ok).toBe(true)
        expect(parseDay('2026-02-29').ok).toBe(false)
    })
})

describe('day arithmetic', () => {
    it('takes the day from a timestamp', () => {
        expect(dayOf('2026-10-19 09:30:00')).toBe('2026-10-19')
    })

    it('adds days across month and year ends', () => {
        expect(addDays('2026-10-31', 1)).toBe('2026-11-01')
        expect(addDays('2026-01-01', -1)).toBe('2025-12-31')
    })

    it('rolls an overflowing day forward when subtracting months', () => {
        expect(addMonths('2024-08-31', -6)).toBe('2024-03-02')
        expect(addMonths('2026-10-19', -6)).toBe('2026-04-19')
    })

    it('numbers weekdays from Monday', () => {
        expect(weekday('2026-10-19')).toBe(0)
        expect(weekday('2026-10-18')).toBe(6)
    })

    it('finds the Monday on or before a day', () => {
        expect(weekStart('2026-10-19')).toBe('2026-10-19')
        expect(weekStart('2026-10-18')).toBe('2026-10-12')
        expect(weekStart('2026-10-14')).toBe('2026-10-12')
    })

    it('splits minutes into hours and minutes', () => {
        expect(splitMinutes(125)).toEqual({ hours: 2, minutes: 5 })
        expect(splitMinutes(0)).toEqual({ hours: 0, minutes: 0 })
    })
})

describe('clocks', () => {
    it('formats local wall-clock time', () => {
        expect(formatLocalTimestamp(new Date(2026, 9, 19, 9, 5, 7))).toBe('2026-10-19 09:05:07')
    })

    it('fixed clocks give a fixed today', () => {
        expect(today(fixedClock('2026-10-19 09:00:00'))).toBe('2026-10-19')
    })
})
