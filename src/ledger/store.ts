import path from 'node:path'
import { z } from 'zod'
import { CorruptLedgerError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import { parseTimestamp } from '../core/time.js'
import type { CorruptEntry, LatestDetail, TimeEntry } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { Ledger } from './ledger.js'
import { TimeEntrySchema, formatIssues } from './validation.js'

const LatestDetailSchema = z.object({
    task: z.string().min(1),
    detail: z.string(),
    lastTimestamp: z.string().transform((value, ctx) => {
        const parsed = parseTimestamp(value)
        if (!parsed.ok) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error })
            return z.NEVER
        }
        return parsed.value
    }),
})

const LedgerDocumentSchema = z.object({
    version: z.literal(1),
    entries: z.array(z.unknown()),
    latestDetails: z.array(z.unknown()).optional(),
})

type LedgerDocument = z.infer<typeof LedgerDocumentSchema>

interface SavedDocument {
    version: 1
    entries: TimeEntry[]
    latestDetails: LatestDetail[]
}

export interface LoadReport {
    entries: number
    corrupt: CorruptEntry[]
}

function rawField(raw: unknown, field: string, fallback: string): string {
    if (typeof raw === 'object' && raw !== null && field in raw) {
        const value: unknown = Reflect.get(raw, field)
        if (typeof value === 'string') return value
    }
    return fallback
}

/**
 * JSON file persistence for a {@link Ledger}.
 *
 * The latest-detail rows are stored alongside the entries because they follow
 * write order and cannot be rebuilt exactly from the entries alone.
 */
export class LedgerStore {
    private pending: Promise<void> = Promise.resolve()

    constructor(
        private filePath: string,
        private fs: FileSystem,
        private logger: Logger,
        private eventBus?: TypedEventEmitter
    ) {}

    get path(): string {
        return this.filePath
    }

    async load(ledger: Ledger): Promise<LoadReport> {
        if (!(await this.fs.exists(this.filePath))) {
            this.logger.debug({ file: this.filePath }, 'No ledger file yet, starting empty')
            ledger.restore([])
            return { entries: 0, corrupt: [] }
        }

        const document = await this.readDocument()
        const entries: TimeEntry[] = []
        const seen = new Set<string>()
        const corrupt: CorruptEntry[] = []

        document.entries.forEach((raw, position) => {
            const parsed = TimeEntrySchema.safeParse(raw)
            if (!parsed.success) {
                corrupt.push({
                    timestamp: rawField(raw, 'timestamp', `#${position}`),
                    reason: formatIssues(parsed.error).join('; '),
                })
                return
            }
            if (seen.has(parsed.data.timestamp)) {
                corrupt.push({ timestamp: parsed.data.timestamp, reason: 'duplicate timestamp' })
                return
            }
            seen.add(parsed.data.timestamp)
            entries.push(parsed.data)
        })

        let latestDetails: LatestDetail[] | undefined
        if (document.latestDetails) {
            latestDetails = []
            for (const [position, raw] of document.latestDetails.entries()) {
                const parsed = LatestDetailSchema.safeParse(raw)
                if (parsed.success) {
                    latestDetails.push(parsed.data)
                } else {
                    corrupt.push({
                        timestamp: rawField(raw, 'lastTimestamp', `latestDetails#${position}`),
                        reason: `latest detail: ${formatIssues(parsed.error).join('; ')}`,
                    })
                }
            }
        }

        for (const diagnostic of corrupt) {
            this.logger.warn({ file: this.filePath, ...diagnostic }, 'Skipping corrupt ledger row')
            this.eventBus?.emit('entry:corrupt', { diagnostic, source: this.filePath })
        }

        ledger.restore(entries, latestDetails)
        this.logger.debug({ file: this.filePath, entries: entries.length }, 'Ledger loaded')
        return { entries: entries.length, corrupt }
    }

    /** Saves are chained so overlapping callers never interleave writes. */
    save(ledger: Ledger): Promise<void> {
        const document: SavedDocument = {
            version: 1,
            entries: ledger.allEntries(),
            latestDetails: ledger.latestDetails(),
        }
        const next = this.pending.then(() => this.write(document))
        this.pending = next.catch((error: unknown) => {
            this.logger.error({ file: this.filePath, error: errorMessage(error) }, 'Ledger save failed')
        })
        return next
    }

    async truncate(ledger: Ledger): Promise<void> {
        ledger.clear()
        await this.save(ledger)
    }

    private async write(document: SavedDocument): Promise<void> {
        await this.fs.mkdir(path.dirname(this.filePath))
        await this.fs.writeJSON(this.filePath, document)
        this.logger.debug({ file: this.filePath, entries: document.entries.length }, 'Ledger saved')
    }

    private async readDocument(): Promise<LedgerDocument> {
        let raw: unknown
        try {
            raw = await this.fs.readJSON<unknown>(this.filePath)
        } catch (error) {
            throw new CorruptLedgerError(`${this.filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error })
        }

        const parsed = LedgerDocumentSchema.safeParse(raw)
        if (!parsed.success) {
            throw new CorruptLedgerError(`${this.filePath} is not a ledger file: ${formatIssues(parsed.error).join('; ')}`)
        }
        return parsed.data
    }
}
