/** Canonical local timestamp, `YYYY-MM-DD HH:MM:SS`. */
export type Timestamp = string

/** Calendar day, `YYYY-MM-DD`. */
export type IsoDay = string

export interface TimeEntry {
    timestamp: Timestamp
    task: string
    detail: string
    durationMinutes: number
}

export interface LatestDetail {
    task: string
    detail: string
    lastTimestamp: Timestamp
}

export interface TaskDetailRow extends LatestDetail {
    isDefault: boolean
}

export interface DailyTotal {
    weekStart: IsoDay
    day: IsoDay
    task: string
    totalMinutes: number
}

export interface WeeklyTotal {
    weekStart: IsoDay
    task: string
    totalMinutes: number
}

export interface RollupRow {
    /** `null` on the trailing summary row. */
    task: string | null
    detail: string | null
    minutes: number
    chart: string
}

export interface CommitmentRow {
    weekStart: IsoDay
    totalInterval: number
    timeWorking: string
    proportionOfCommitment: number
    fortnightlyCommitment: number
    fortnightlyTotal: number
}

export interface CorruptEntry {
    timestamp: string
    reason: string
}

export const BREAK_TASK = 'Lunch Break'
export const OTHERS_TASK = 'Others'
/** Stands in for `lastTimestamp` on default tasks with no history. */
export const FAR_FUTURE: Timestamp = '9999-12-31 00:00:00'
