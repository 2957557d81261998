import type { Container } from '../../core/container.js'
import { InvalidEntryError, NotFoundError } from '../../core/errors.js'
import { parseTimestamp } from '../../core/time.js'
import { colors } from '../ui.js'
import { parseMinutes } from './log.js'

export interface EditOptions {
    task?: string
    detail?: string
    minutes?: string
}

export async function editCommand(container: Container, timestamp: string, options: EditOptions): Promise<void> {
    const { tracker, ledger } = container
    await tracker.open()

    const parsed = parseTimestamp(timestamp)
    if (!parsed.ok) throw new InvalidEntryError([parsed.error])

    const current = ledger.get(parsed.value)
    if (!current) throw new NotFoundError(parsed.value)

    const entry = await tracker.updateEntry(parsed.value, {
        task: options.task ?? current.task,
        detail: options.detail ?? current.detail,
        durationMinutes: parseMinutes(options.minutes, current.durationMinutes),
    })

    console.log(colors.success(`Updated ${entry.timestamp}: ${entry.durationMinutes} min of ${colors.task(entry.task)}`))
}
