import { err, ok, type Result } from './result.js'
import type { IsoDay, Timestamp } from './types.js'

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/
const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const MS_PER_DAY = 86_400_000

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0')
}

function isRealDate(year: number, month: number, day: number): boolean {
    const date = new Date(Date.UTC(year, month - 1, day))
    return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
}

/**
 * Normalises `YYYY-MM-DD HH:MM[:SS]` (space or `T` separated) to the canonical
 * `YYYY-MM-DD HH:MM:SS` form.
 */
export function parseTimestamp(input: string): Result<Timestamp> {
    const match = TIMESTAMP_PATTERN.exec(input.trim())
    if (!match) return err(`'${input}' is not a YYYY-MM-DD HH:MM[:SS] timestamp`)

    const [, year, month, day, hour, minute, second = '00'] = match
    if (!isRealDate(Number(year), Number(month), Number(day))) {
        return err(`'${input}' is not a calendar date`)
    }
    if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
        return err(`'${input}' is not a valid time of day`)
    }
    return ok(`${year}-${month}-${day} ${hour}:${minute}:${second}`)
}

export function parseDay(input: string): Result<IsoDay> {
    const match = DAY_PATTERN.exec(input.trim())
    if (!match || !isRealDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
        return err(`'${input}' is not a YYYY-MM-DD date`)
    }
    return ok(input.trim())
}

export function dayOf(timestamp: Timestamp): IsoDay {
    return timestamp.slice(0, 10)
}

function toUtcDate(day: IsoDay): Date {
    return new Date(`${day}T00:00:00Z`)
}

function fromUtcDate(date: Date): IsoDay {
    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
}

export function addDays(day: IsoDay, days: number): IsoDay {
    return fromUtcDate(new Date(toUtcDate(day).getTime() + days * MS_PER_DAY))
}

/** Calendar month arithmetic; an overflowing day rolls into the next month (31 Aug - 6 months = 2 Mar). */
export function addMonths(day: IsoDay, months: number): IsoDay {
    const date = toUtcDate(day)
    return fromUtcDate(new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + months, date.getUTCDate())))
}

/** Monday = 0 ... Sunday = 6. */
export function weekday(day: IsoDay): number {
    return (toUtcDate(day).getUTCDay() + 6) % 7
}

/** The Monday on or before `day`. */
export function weekStart(day: IsoDay): IsoDay {
    return addDays(day, -weekday(day))
}

export function formatLocalTimestamp(date: Date): Timestamp {
    const day = `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

export function splitMinutes(total: number): { hours: number; minutes: number } {
    return { hours: Math.floor(total / 60), minutes: total % 60 }
}
