import { type Clock, today } from '../core/clock.js'
import type { TypedEventEmitter } from '../core/events.js'
import { addDays, dayOf } from '../core/time.js'
import type {
    CommitmentRow,
    DailyTotal,
    LatestDetail,
    RollupRow,
    TaskDetailRow,
    TimeEntry,
    Timestamp,
} from '../core/types.js'
import type { ResolvedConfig } from '../config/schema.js'
import type { Ledger } from '../ledger/ledger.js'
import type { Logger } from '../logger/index.js'
import { commitmentReport } from './commitment.js'
import { dailyTotals } from './daily-summary.js'
import { screenEntries } from './screen.js'
import { bucketWeekly } from './weekly-bucketer.js'
import { yesterdayEntries, yesterdayRollup } from './yesterday.js'

export type ReportSettings = Pick<ResolvedConfig, 'defaultTasks' | 'showLastNWeeks' | 'weeklyCommitmentHours'>

export interface ReportServiceOptions {
    ledger: Ledger
    clock: Clock
    settings: ReportSettings
    logger: Logger
    eventBus?: TypedEventEmitter
}

/** `now` moved back by whole weeks, keeping the time of day. */
export function weeksBefore(now: Timestamp, weeks: number): Timestamp {
    return `${addDays(dayOf(now), -weeks * 7)}${now.slice(10)}`
}

/**
 * Read side of the tracker. Every view is recomputed from the ledger's
 * current entries; entries that cannot be aggregated are logged and skipped.
 */
export class ReportService {
    constructor(private options: ReportServiceOptions) {}

    latestDetail(task: string): LatestDetail | undefined {
        return this.options.ledger.latestDetail(task)
    }

    taskDetailWithDefaults(): TaskDetailRow[] {
        return this.options.ledger.taskDetailWithDefaults(this.options.settings.defaultTasks)
    }

    /** Default tasks plus any task written within the lookback window. */
    recentTasks(lookbackWeeks = this.options.settings.showLastNWeeks): TaskDetailRow[] {
        const since = weeksBefore(this.options.clock.now(), lookbackWeeks)
        return this.taskDetailWithDefaults().filter((row) => row.isDefault || row.lastTimestamp >= since)
    }

    detailsForTask(task: string, limit?: number): string[] {
        return this.options.ledger.detailsForTask(task, limit)
    }

    /** The entry in progress at the clock's current time, if any. */
    lastEntry(): TimeEntry | undefined {
        return this.options.ledger.lastEntryAt(this.options.clock.now())
    }

    dailyWeeklySummary(): DailyTotal[] {
        return bucketWeekly(dailyTotals(this.snapshot('summary')))
    }

    yesterday(): TimeEntry[] {
        return yesterdayEntries(this.snapshot('yesterday'), today(this.options.clock))
    }

    yesterdayRollup(): RollupRow[] {
        return yesterdayRollup(this.snapshot('yesterday-rollup'), today(this.options.clock))
    }

    commitmentReport(): CommitmentRow[] {
        return commitmentReport(
            this.snapshot('commitment'),
            today(this.options.clock),
            this.options.settings.weeklyCommitmentHours
        )
    }

    private snapshot(report: string): TimeEntry[] {
        const { valid, corrupt } = screenEntries(this.options.ledger.allEntries())
        for (const diagnostic of corrupt) {
            this.options.logger.warn({ report, ...diagnostic }, 'Excluding corrupt entry from report')
            this.options.eventBus?.emit('entry:corrupt', { diagnostic, source: report })
        }
        return valid
    }
}
