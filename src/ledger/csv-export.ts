import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { addDays } from '../core/time.js'
import type { IsoDay, TimeEntry } from '../core/types.js'

const HEADER = ['date_time', 'task', 'detail', 'interval']

function csvField(value: string | number): string {
    const text = String(value)
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export function toCsv(entries: TimeEntry[]): string {
    const rows = entries.map((entry) => [entry.timestamp, entry.task, entry.detail, entry.durationMinutes])
    return [HEADER, ...rows].map((row) => row.map(csvField).join(',')).join('\r\n') + '\r\n'
}

export interface CsvExportOptions {
    dir: string
    today: IsoDay
    /** Only entries on or after `today - previousDays`; everything when omitted. */
    previousDays?: number
}

export function csvFileName(today: IsoDay): string {
    return `daily-tracker-${today}.csv`
}

export async function exportCsv(fs: FileSystem, entries: TimeEntry[], options: CsvExportOptions): Promise<string> {
    const { dir, today, previousDays } = options
    const since = previousDays === undefined ? undefined : addDays(today, -previousDays)
    const selected = since === undefined ? entries : entries.filter((entry) => entry.timestamp >= since)

    const filePath = path.join(dir, csvFileName(today))
    await fs.mkdir(dir)
    await fs.writeText(filePath, toCsv(selected))
    return filePath
}
