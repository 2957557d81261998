import { compareText } from '../core/sort.js'
import { addDays, dayOf, splitMinutes, weekday } from '../core/time.js'
import { BREAK_TASK, type IsoDay, type RollupRow, type TimeEntry } from '../core/types.js'

export const CHART_MARK = '*'
export const MINUTES_PER_MARK = 15

/** Previous working day: Friday when `today` is a Monday, otherwise the day before. */
export function previousWorkingDay(today: IsoDay): IsoDay {
    return addDays(today, weekday(today) === 0 ? -3 : -1)
}

export function formatDayTotal(total: number): string {
    const { hours, minutes } = splitMinutes(total)
    return `${hours} hours ${minutes} minutes`
}

/** Entries on the previous working day, newest first. */
export function yesterdayEntries(entries: readonly TimeEntry[], today: IsoDay): TimeEntry[] {
    const day = previousWorkingDay(today)
    return entries
        .filter((entry) => dayOf(entry.timestamp) === day)
        .sort((a, b) => compareText(b.timestamp, a.timestamp))
}

function compareRollup(a: RollupRow, b: RollupRow): number {
    if (a.task === null || b.task === null) {
        if (a.task === b.task) return 0
        return a.task === null ? 1 : -1
    }
    return compareText(a.task, b.task) || compareText(a.detail ?? '', b.detail ?? '')
}

/**
 * Yesterday's minutes per `(task, detail)` without breaks, followed by a
 * summary row whose task and detail are `null`.
 */
export function yesterdayRollup(entries: readonly TimeEntry[], today: IsoDay): RollupRow[] {
    const groups = new Map<string, RollupRow>()
    let total = 0

    for (const entry of yesterdayEntries(entries, today)) {
        if (entry.task === BREAK_TASK) continue
        total += entry.durationMinutes
        const key = JSON.stringify([entry.task, entry.detail])
        const group = groups.get(key)
        if (group) group.minutes += entry.durationMinutes
        else groups.set(key, { task: entry.task, detail: entry.detail, minutes: entry.durationMinutes, chart: '' })
    }

    const rows = [...groups.values()].map((row) => ({
        ...row,
        chart: CHART_MARK.repeat(Math.floor(row.minutes / MINUTES_PER_MARK)),
    }))
    rows.push({ task: null, detail: null, minutes: total, chart: formatDayTotal(total) })
    return rows.sort(compareRollup)
}
