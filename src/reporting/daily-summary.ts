import { compareText } from '../core/sort.js'
import { dayOf, weekStart } from '../core/time.js'
import type { DailyTotal, TimeEntry, WeeklyTotal } from '../core/types.js'

type Keyed<T> = Map<string, T>

function addTo<T extends { totalMinutes: number }>(groups: Keyed<T>, key: string, minutes: number, create: () => T): void {
    const group = groups.get(key)
    if (group) group.totalMinutes += minutes
    else groups.set(key, { ...create(), totalMinutes: minutes })
}

export function compareDailyTotals(a: DailyTotal, b: DailyTotal): number {
    return compareText(a.weekStart, b.weekStart) || compareText(a.day, b.day) || compareText(a.task, b.task)
}

/** Minutes per `(weekStart, day, task)`, ordered by week, day and task. */
export function dailyTotals(entries: readonly TimeEntry[]): DailyTotal[] {
    const groups: Keyed<DailyTotal> = new Map()
    for (const entry of entries) {
        const day = dayOf(entry.timestamp)
        const week = weekStart(day)
        addTo(groups, JSON.stringify([week, day, entry.task]), entry.durationMinutes, () => ({
            weekStart: week,
            day,
            task: entry.task,
            totalMinutes: 0,
        }))
    }
    return [...groups.values()].sort(compareDailyTotals)
}

/** Daily totals rolled up per `(weekStart, task)`. */
export function weeklyTotals(daily: readonly DailyTotal[]): WeeklyTotal[] {
    const groups: Keyed<WeeklyTotal> = new Map()
    for (const row of daily) {
        addTo(groups, JSON.stringify([row.weekStart, row.task]), row.totalMinutes, () => ({
            weekStart: row.weekStart,
            task: row.task,
            totalMinutes: 0,
        }))
    }
    return [...groups.values()].sort((a, b) => compareText(a.weekStart, b.weekStart) || compareText(a.task, b.task))
}
