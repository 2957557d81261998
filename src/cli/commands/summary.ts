import type { Container } from '../../core/container.js'
import { colors, renderTable } from '../ui.js'

export async function summaryCommand(container: Container): Promise<void> {
    await container.tracker.open()
    const rows = container.reports.dailyWeeklySummary()
    if (rows.length === 0) {
        console.log(colors.dim('No entries recorded yet.'))
        return
    }

    console.log(
        renderTable(
            ['Week', 'Day', 'Task', 'Minutes'],
            rows.map((row) => [row.weekStart, row.day, row.task, row.totalMinutes])
        )
    )
}
