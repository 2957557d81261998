import { describe, it, expect } from 'vitest'
import { dailyTotals, weeklyTotals } from '../../../src/reporting/daily-summary.js'
import { entry } from '../../helpers/fixtures.js'

const entries = [
    entry('2026-10-12 09:00:00', 'Dev', 30),
    entry('2026-10-12 10:00:00', 'Dev', 15),
    entry('2026-10-13 10:00:00', 'Dev', 60),
    entry('2026-10-18 11:00:00', 'Ops', 20),
    entry('2026-10-19 09:00:00', 'Dev', 10),
]

describe('dailyTotals', () => {
    it('sums minutes per week, day and task', () => {
        expect(dailyTotals(entries)).toEqual([
            { weekStart: '2026-10-12', day: '2026-10-12', task: 'Dev', totalMinutes: 45 },
            { weekStart: '2026-10-12', day: '2026-10-13', task: 'Dev', totalMinutes: 60 },
            { weekStart: '2026-10-12', day: '2026-10-18', task: 'Ops', totalMinutes: 20 },
            { weekStart: '2026-10-19', day: '2026-10-19', task: 'Dev', totalMinutes: 10 },
        ])
    })

    it('is empty for no entries', () => {
        expect(dailyTotals([])).toEqual([])
    })
})

describe('weeklyTotals', () => {
    it('matches the sum of daily totals for every week and task', () => {
        const daily = dailyTotals(entries)
        const weekly = weeklyTotals(daily)

        expect(weekly).toEqual([
            { weekStart: '2026-10-12', task: 'Dev', totalMinutes: 105 },
            { weekStart: '2026-10-12', task: 'Ops', totalMinutes: 20 },
            { weekStart: '2026-10-19', task: 'Dev', totalMinutes: 10 },
        ])
        for (const row of weekly) {
            const fromDaily = daily
                .filter((d) => d.weekStart === row.weekStart && d.task === row.task)
                .reduce((sum, d) => sum + d.totalMinutes, 0)
            expect(fromDaily).toBe(row.totalMinutes)
        }
    })
})
