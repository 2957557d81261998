import pino from 'pino'
import type { TimeEntry } from '../../src/core/types.js'
import { Ledger } from '../../src/ledger/ledger.js'
import type { TypedEventEmitter } from '../../src/core/events.js'

export const silentLogger = pino({ level: 'silent' })

export function entry(timestamp: string, task: string, durationMinutes: number, detail = ''): TimeEntry {
    return { timestamp, task, detail, durationMinutes }
}

export function ledgerWith(entries: TimeEntry[], eventBus?: TypedEventEmitter): Ledger {
    const ledger = new Ledger({ logger: silentLogger, eventBus })
    for (const e of entries) ledger.append(e)
    return ledger
}
