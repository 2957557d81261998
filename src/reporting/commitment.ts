import { InvalidConfigurationError } from '../core/errors.js'
import { addDays, addMonths, dayOf, splitMinutes, weekStart } from '../core/time.js'
import { BREAK_TASK, type CommitmentRow, type IsoDay, type TimeEntry } from '../core/types.js'

export const DEFAULT_WEEKLY_COMMITMENT_HOURS = 37
export const LOOKBACK_MONTHS = 6

export function fortnightlyCommitment(weeklyHours: number): number {
    const minutes = weeklyHours * 2 * 60
    if (!(minutes > 0)) {
        throw new InvalidConfigurationError(`weekly commitment must be positive, got ${weeklyHours} hours`)
    }
    return minutes
}

/** The Monday on or before six months before `today`. */
export function axisStart(today: IsoDay): IsoDay {
    return weekStart(addMonths(today, -LOOKBACK_MONTHS))
}

/** Week starts from `from` through the last fully elapsed week, oldest first. */
export function weekAxis(from: IsoDay, today: IsoDay): IsoDay[] {
    const last = weekStart(addDays(today, -7))
    const axis: IsoDay[] = []
    for (let week = from; week <= last; week = addDays(week, 7)) {
        axis.push(week)
    }
    return axis
}

export function formatTimeWorking(total: number): string {
    const { hours, minutes } = splitMinutes(total)
    return `${hours} hours, ${minutes} minutes`
}

export function roundTo(value: number, places: number): number {
    const factor = 10 ** places
    return Math.round(value * factor) / factor
}

/** Each week plus the week before it; the first week stands alone. */
export function fortnightlyTotals(weekly: readonly number[]): number[] {
    let previous = 0
    return weekly.map((total) => {
        const sum = previous + total
        previous = total
        return sum
    })
}

/**
 * Weekly worked time over the trailing six months against a fortnightly
 * commitment, most recent week first. Weeks without entries report zero.
 */
export function commitmentReport(
    entries: readonly TimeEntry[],
    today: IsoDay,
    weeklyHours = DEFAULT_WEEKLY_COMMITMENT_HOURS
): CommitmentRow[] {
    const commitment = fortnightlyCommitment(weeklyHours)
    const from = axisStart(today)

    const totals = new Map<IsoDay, number>()
    for (const entry of entries) {
        if (entry.timestamp <= from || entry.task === BREAK_TASK) continue
        const week = weekStart(dayOf(entry.timestamp))
        totals.set(week, (totals.get(week) ?? 0) + entry.durationMinutes)
    }

    const axis = weekAxis(from, today)
    const weekly = axis.map((week) => totals.get(week) ?? 0)
    const fortnightly = fortnightlyTotals(weekly)

    const rows = axis.map((week, i): CommitmentRow => {
        const total = weekly[i] ?? 0
        const fortnightlyTotal = fortnightly[i] ?? 0
        return {
            weekStart: week,
            totalInterval: total,
            timeWorking: formatTimeWorking(total),
            proportionOfCommitment: roundTo((100 * fortnightlyTotal) / commitment, 2),
            fortnightlyCommitment: commitment,
            fortnightlyTotal,
        }
    })

    return rows.reverse()
}
