import type { Container } from '../../core/container.js'
import { InvalidEntryError } from '../../core/errors.js'
import { parseTimestamp } from '../../core/time.js'
import type { Timestamp } from '../../core/types.js'
import { askDetail, askTask, showIntro, showOutro } from '../prompts.js'
import { colors } from '../ui.js'

export interface LogOptions {
    detail?: string
    minutes?: string
    at?: string
}

export function resolveTimestamp(at: string | undefined, now: Timestamp): Timestamp {
    if (at === undefined) return `${now.slice(0, 17)}00`
    const parsed = parseTimestamp(at)
    if (!parsed.ok) throw new InvalidEntryError([parsed.error])
    return parsed.value
}

export function parseMinutes(value: string | undefined, fallback: number): number {
    if (value === undefined) return fallback
    return value.trim() === '' ? Number.NaN : Number(value)
}

export async function logCommand(container: Container, task: string | undefined, options: LogOptions): Promise<void> {
    const { tracker, reports, config, clock } = container
    await tracker.open()

    const timestamp = resolveTimestamp(options.at, clock.now())
    let detail = options.detail
    const interactive = task === undefined

    if (task === undefined) {
        showIntro(`daybook  ${timestamp}`)
        const picked = await askTask(reports.recentTasks(), reports.lastEntry()?.task)
        if (picked === null) {
            showOutro(colors.warn('Nothing logged.'))
            return
        }
        task = picked

        if (detail === undefined) {
            const answer = await askDetail(reports.latestDetail(task)?.detail ?? '', reports.detailsForTask(task))
            if (answer === null) {
                showOutro(colors.warn('Nothing logged.'))
                return
            }
            detail = answer
        }
    }

    const entry = await tracker.appendEntry({
        timestamp,
        task,
        detail: detail ?? reports.latestDetail(task)?.detail ?? '',
        durationMinutes: parseMinutes(options.minutes, config.interval),
    })

    const message = `Logged ${entry.durationMinutes} min of ${colors.task(entry.task)} at ${entry.timestamp}`
    if (interactive) showOutro(colors.success(message))
    else console.log(colors.success(message))
}
