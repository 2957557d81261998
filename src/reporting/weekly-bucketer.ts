import { compareText } from '../core/sort.js'
import { type DailyTotal, OTHERS_TASK, type WeeklyTotal } from '../core/types.js'
import { compareDailyTotals, weeklyTotals } from './daily-summary.js'

export const TOP_TASKS_PER_WEEK = 7

/**
 * Tasks ranked outside the top `limit` of their week, keyed by week start.
 * Ranking is total descending, then task name ascending.
 */
export function bucketedTasks(weekly: readonly WeeklyTotal[], limit = TOP_TASKS_PER_WEEK): Map<string, Set<string>> {
    const byWeek = new Map<string, WeeklyTotal[]>()
    for (const row of weekly) {
        const rows = byWeek.get(row.weekStart) ?? []
        rows.push(row)
        byWeek.set(row.weekStart, rows)
    }

    const bucketed = new Map<string, Set<string>>()
    for (const [week, rows] of byWeek) {
        const ranked = [...rows].sort((a, b) => b.totalMinutes - a.totalMinutes || compareText(a.task, b.task))
        bucketed.set(week, new Set(ranked.slice(limit).map((row) => row.task)))
    }
    return bucketed
}

/**
 * Relabels every task outside its week's top `limit` as "Others" and
 * re-sums per `(weekStart, day, label)`.
 *
 * The cut is made on weekly totals but applied to daily rows, so a day can
 * carry an "Others" row built from several bucketed tasks.
 */
export function bucketWeekly(daily: readonly DailyTotal[], limit = TOP_TASKS_PER_WEEK): DailyTotal[] {
    const bucketed = bucketedTasks(weeklyTotals(daily), limit)
    const groups = new Map<string, DailyTotal>()

    for (const row of daily) {
        const label = bucketed.get(row.weekStart)?.has(row.task) ? OTHERS_TASK : row.task
        const key = JSON.stringify([row.weekStart, row.day, label])
        const group = groups.get(key)
        if (group) group.totalMinutes += row.totalMinutes
        else groups.set(key, { weekStart: row.weekStart, day: row.day, task: label, totalMinutes: row.totalMinutes })
    }

    return [...groups.values()].sort(compareDailyTotals)
}
