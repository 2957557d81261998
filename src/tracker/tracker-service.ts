import { type Clock, today } from '../core/clock.js'
import { errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { TimeEntry } from '../core/types.js'
import type { ResolvedConfig } from '../config/schema.js'
import { exportCsv } from '../ledger/csv-export.js'
import type { EntryChanges, Ledger } from '../ledger/ledger.js'
import type { LedgerStore, LoadReport } from '../ledger/store.js'
import type { TimeEntryInput } from '../ledger/validation.js'
import type { Logger } from '../logger/index.js'

export type TrackerSettings = Pick<ResolvedConfig, 'csvDir' | 'saveCsvCopy'>

export interface TrackerServiceOptions {
    ledger: Ledger
    store: LedgerStore
    fs: FileSystem
    clock: Clock
    settings: TrackerSettings
    logger: Logger
}

/**
 * Write side of the tracker. Writes run one at a time and each is saved before
 * its promise resolves; a write whose save fails is undone in memory.
 */
export class TrackerService {
    private loading: Promise<LoadReport> | null = null
    private writes: Promise<void> = Promise.resolve()

    constructor(private options: TrackerServiceOptions) {}

    open(): Promise<LoadReport> {
        if (!this.loading) {
            this.loading = this.options.store.load(this.options.ledger).catch((error: unknown) => {
                this.loading = null
                throw error
            })
        }
        return this.loading
    }

    async appendEntry(input: TimeEntryInput): Promise<TimeEntry> {
        const entry = await this.write(async ({ ledger, store }) => {
            const appended = ledger.append(input)
            await store.save(ledger)
            return appended
        })

        if (this.options.settings.saveCsvCopy && entry.timestamp.slice(14, 16) === '00') {
            await this.exportCsv()
        }
        return entry
    }

    updateEntry(timestamp: string, changes: EntryChanges): Promise<TimeEntry> {
        return this.write(async ({ ledger, store }) => {
            const updated = ledger.update(timestamp, changes)
            await store.save(ledger)
            return updated
        })
    }

    truncate(): Promise<void> {
        return this.write(({ ledger, store }) => store.truncate(ledger))
    }

    async exportCsv(options: { dir?: string; previousDays?: number } = {}): Promise<string> {
        await this.open()
        const filePath = await exportCsv(this.options.fs, this.options.ledger.allEntries(), {
            dir: options.dir ?? this.options.settings.csvDir,
            today: today(this.options.clock),
            previousDays: options.previousDays,
        })
        this.options.logger.info({ file: filePath }, 'CSV copy written')
        return filePath
    }

    private write<T>(change: (deps: Pick<TrackerServiceOptions, 'ledger' | 'store'>) => Promise<T>): Promise<T> {
        const run = async (): Promise<T> => {
            await this.open()
            const { ledger, store, logger } = this.options
            const entries = ledger.allEntries()
            const latestDetails = ledger.latestDetails()
            try {
                return await change({ ledger, store })
            } catch (error) {
                ledger.restore(entries, latestDetails)
                logger.debug({ error: errorMessage(error) }, 'Write rolled back')
                throw error
            }
        }

        const next = this.writes.then(run)
        this.writes = next.then(
            () => undefined,
            () => undefined
        )
        return next
    }
}
