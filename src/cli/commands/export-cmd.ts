import type { Container } from '../../core/container.js'
import { InvalidConfigurationError } from '../../core/errors.js'
import { colors } from '../ui.js'

export async function exportCommand(container: Container, options: { days?: string; dir?: string }): Promise<void> {
    let previousDays: number | undefined
    if (options.days !== undefined) {
        previousDays = Number(options.days)
        if (!Number.isInteger(previousDays) || previousDays < 0) {
            throw new InvalidConfigurationError(`--days expects a whole number of days, got '${options.days}'`)
        }
    }

    const filePath = await container.tracker.exportCsv({ dir: options.dir, previousDays })
    console.log(colors.success(`Exported to ${filePath}`))
}
