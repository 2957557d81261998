import type { CorruptEntry, TimeEntry } from '../core/types.js'
import { corruptionReason } from '../ledger/validation.js'

export interface ScreenedEntries {
    valid: TimeEntry[]
    corrupt: CorruptEntry[]
}

/** Splits out entries that cannot be aggregated; order of `valid` is preserved. */
export function screenEntries(entries: readonly TimeEntry[]): ScreenedEntries {
    const valid: TimeEntry[] = []
    const corrupt: CorruptEntry[] = []
    for (const entry of entries) {
        const reason = corruptionReason(entry)
        if (reason === null) valid.push(entry)
        else corrupt.push({ timestamp: String(entry.timestamp), reason })
    }
    return { valid, corrupt }
}
