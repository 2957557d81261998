import type { Container } from '../../core/container.js'
import { FAR_FUTURE } from '../../core/types.js'
import { renderTable } from '../ui.js'

export async function tasksCommand(container: Container, options: { all?: boolean }): Promise<void> {
    await container.tracker.open()
    const rows = options.all ? container.reports.taskDetailWithDefaults() : container.reports.recentTasks()

    console.log(
        renderTable(
            ['Task', 'Detail', 'Last used', 'Default'],
            rows.map((row) => [
                row.task,
                row.detail,
                row.lastTimestamp === FAR_FUTURE ? '-' : row.lastTimestamp,
                row.isDefault ? 'yes' : '',
            ])
        )
    )
}
