import type { ResolvedConfig } from '../config/schema.js'
import { Ledger } from '../ledger/ledger.js'
import { LedgerStore } from '../ledger/store.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { ReportService } from '../reporting/report-service.js'
import { TrackerService } from '../tracker/tracker-service.js'
import { type Clock, systemClock } from './clock.js'
import { errorMessage } from './errors.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    clock: Clock
    ledger: Ledger
    store: LedgerStore
    tracker: TrackerService
    reports: ReportService
    shutdown(): void
}

export interface ContainerOverrides {
    fs?: FileSystem
    clock?: Clock
    logger?: Logger
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter((event, error) => {
        logger.warn({ event, error: errorMessage(error) }, 'Event listener failed')
    })
    const fs = overrides.fs ?? new NodeFileSystem()
    const clock = overrides.clock ?? systemClock
    const ledger = new Ledger({ logger, eventBus })
    const store = new LedgerStore(config.ledgerFile, fs, logger, eventBus)
    const tracker = new TrackerService({ ledger, store, fs, clock, settings: config, logger })
    const reports = new ReportService({ ledger, clock, settings: config, logger, eventBus })

    eventBus.on('entry:appended', ({ entry }) => {
        logger.info({ timestamp: entry.timestamp, task: entry.task, minutes: entry.durationMinutes }, 'Logged entry')
    })
    eventBus.on('entry:updated', ({ entry, previous }) => {
        logger.info({ timestamp: entry.timestamp, task: entry.task, previousTask: previous.task }, 'Edited entry')
    })

    return {
        config,
        logger,
        eventBus,
        fs,
        clock,
        ledger,
        store,
        tracker,
        reports,

        shutdown() {
            eventBus.removeAll()
            logger.flush()
        },
    }
}
