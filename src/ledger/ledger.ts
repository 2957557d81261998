import { DuplicateTimestampError, InvalidEntryError, NotFoundError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { compareText } from '../core/sort.js'
import { parseTimestamp } from '../core/time.js'
import type { LatestDetail, TaskDetailRow, TimeEntry, Timestamp } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import { LatestDetailIndex } from './latest-detail-index.js'
import { type TimeEntryInput, validateEntry } from './validation.js'

export interface EntryChanges {
    task: string
    detail?: string
    durationMinutes: number
}

export interface LedgerOptions {
    logger: Logger
    eventBus?: TypedEventEmitter
}

/**
 * Append/update store of time entries keyed by timestamp.
 *
 * Writes are synchronous: the entry and its latest-detail row are committed
 * together, after validation, with nothing between them that can throw.
 */
export class Ledger {
    private entries = new Map<Timestamp, TimeEntry>()
    private sorted: TimeEntry[] | null = null
    private index = new LatestDetailIndex()
    private logger: Logger
    private eventBus?: TypedEventEmitter

    constructor(options: LedgerOptions) {
        this.logger = options.logger
        this.eventBus = options.eventBus
    }

    get size(): number {
        return this.entries.size
    }

    append(input: TimeEntryInput): TimeEntry {
        const entry = this.validate(input)
        if (this.entries.has(entry.timestamp)) {
            throw new DuplicateTimestampError(entry.timestamp)
        }

        this.commit(entry)
        this.logger.debug({ timestamp: entry.timestamp, task: entry.task }, 'Entry appended')
        this.eventBus?.emit('entry:appended', { entry: { ...entry } })
        return { ...entry }
    }

    update(timestamp: string, changes: EntryChanges): TimeEntry {
        const entry = this.validate({ ...changes, timestamp })
        const previous = this.entries.get(entry.timestamp)
        if (!previous) {
            throw new NotFoundError(entry.timestamp)
        }

        this.commit(entry)
        this.logger.debug({ timestamp: entry.timestamp, task: entry.task }, 'Entry updated')
        this.eventBus?.emit('entry:updated', { entry: { ...entry }, previous: { ...previous } })
        return { ...entry }
    }

    get(timestamp: string): TimeEntry | undefined {
        const parsed = parseTimestamp(timestamp)
        if (!parsed.ok) return undefined
        const entry = this.entries.get(parsed.value)
        return entry ? { ...entry } : undefined
    }

    /** Every entry, timestamp ascending. */
    allEntries(): TimeEntry[] {
        return this.ordered().map((entry) => ({ ...entry }))
    }

    /** Entries with `start <= timestamp < end`, timestamp ascending. */
    entriesInRange(start: Timestamp, end: Timestamp): TimeEntry[] {
        return this.ordered()
            .filter((entry) => entry.timestamp >= start && entry.timestamp < end)
            .map((entry) => ({ ...entry }))
    }

    /** The latest entry at or before `timestamp`. */
    lastEntryAt(timestamp: Timestamp): TimeEntry | undefined {
        const ordered = this.ordered()
        for (let i = ordered.length - 1; i >= 0; i--) {
            const entry = ordered[i]
            if (entry && entry.timestamp <= timestamp) return { ...entry }
        }
        return undefined
    }

    /** Distinct details recorded against `task`, most recently used first. */
    detailsForTask(task: string, limit = 10): string[] {
        const lastUsed = new Map<string, Timestamp>()
        for (const entry of this.ordered()) {
            if (entry.task === task) lastUsed.set(entry.detail, entry.timestamp)
        }
        return [...lastUsed.entries()]
            .sort((a, b) => compareText(b[1], a[1]))
            .slice(0, limit)
            .map(([detail]) => detail)
    }

    latestDetail(task: string): LatestDetail | undefined {
        return this.index.get(task)
    }

    latestDetails(): LatestDetail[] {
        return this.index.all()
    }

    taskDetailWithDefaults(defaultTasks: readonly string[]): TaskDetailRow[] {
        return this.index.withDefaults(defaultTasks)
    }

    /**
     * Replaces the contents with already-validated entries. Without stored
     * latest-detail rows the index is rebuilt by replaying the entries in
     * timestamp order.
     */
    restore(entries: TimeEntry[], latestDetails?: LatestDetail[]): void {
        this.entries = new Map(entries.map((entry) => [entry.timestamp, { ...entry }]))
        this.sorted = null
        if (latestDetails) {
            this.index.restore(latestDetails)
        } else {
            this.index.clear()
            for (const entry of this.ordered()) this.index.record(entry)
        }
    }

    clear(): void {
        this.entries.clear()
        this.sorted = null
        this.index.clear()
        this.logger.info('Ledger truncated')
    }

    private validate(input: unknown): TimeEntry {
        const result = validateEntry(input)
        if (!result.ok) throw new InvalidEntryError(result.error)
        return result.value
    }

    private commit(entry: TimeEntry): void {
        this.entries.set(entry.timestamp, entry)
        this.sorted = null
        this.index.record(entry)
    }

    private ordered(): TimeEntry[] {
        if (!this.sorted) {
            this.sorted = [...this.entries.values()].sort((a, b) => compareText(a.timestamp, b.timestamp))
        }
        return this.sorted
    }
}
