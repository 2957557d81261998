import { compareText } from '../core/sort.js'
import { FAR_FUTURE, type LatestDetail, type TaskDetailRow, type TimeEntry } from '../core/types.js'

/**
 * Most recent detail per task, maintained from the ledger's write path.
 *
 * Every write overwrites the row for its task, so the index follows write
 * order rather than timestamp order: editing an old entry replaces a newer
 * detail. Callers that want max-timestamp semantics must not rely on this.
 */
export class LatestDetailIndex {
    private rows = new Map<string, LatestDetail>()

    record(entry: Pick<TimeEntry, 'task' | 'detail' | 'timestamp'>): void {
        this.rows.set(entry.task, { task: entry.task, detail: entry.detail, lastTimestamp: entry.timestamp })
    }

    get(task: string): LatestDetail | undefined {
        const row = this.rows.get(task)
        return row ? { ...row } : undefined
    }

    all(): LatestDetail[] {
        return [...this.rows.values()].map((row) => ({ ...row }))
    }

    restore(rows: LatestDetail[]): void {
        this.rows = new Map(rows.map((row) => [row.task, { ...row }]))
    }

    clear(): void {
        this.rows.clear()
    }

    /**
     * Default tasks first in the order given, each resolved against the index,
     * then every other indexed task ordered by task and detail.
     */
    withDefaults(defaultTasks: readonly string[]): TaskDetailRow[] {
        const defaults = [...new Set(defaultTasks)]
        const defaultSet = new Set(defaults)

        const head = defaults.map((task): TaskDetailRow => {
            const row = this.rows.get(task)
            return {
                task,
                detail: row?.detail ?? '',
                lastTimestamp: row?.lastTimestamp || FAR_FUTURE,
                isDefault: true,
            }
        })

        const tail = [...this.rows.values()]
            .filter((row) => !defaultSet.has(row.task))
            .sort((a, b) => compareText(a.task, b.task) || compareText(a.detail, b.detail))
            .map((row): TaskDetailRow => ({ ...row, isDefault: false }))

        return [...head, ...tail]
    }
}
