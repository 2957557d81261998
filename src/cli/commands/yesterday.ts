import { today } from '../../core/clock.js'
import type { Container } from '../../core/container.js'
import { previousWorkingDay } from '../../reporting/yesterday.js'
import { colors, renderTable } from '../ui.js'

export async function yesterdayCommand(container: Container, options: { rollup?: boolean }): Promise<void> {
    await container.tracker.open()
    console.log(colors.bold(previousWorkingDay(today(container.clock))))

    if (options.rollup) {
        const rows = container.reports.yesterdayRollup()
        console.log(
            renderTable(
                ['Task', 'Detail', 'Minutes', 'Chart'],
                rows.map((row) => [row.task, row.detail, row.minutes, row.chart])
            )
        )
        return
    }

    const entries = container.reports.yesterday()
    if (entries.length === 0) {
        console.log(colors.dim('Nothing recorded.'))
        return
    }
    console.log(
        renderTable(
            ['Time', 'Task', 'Detail', 'Minutes'],
            entries.map((entry) => [entry.timestamp, entry.task, entry.detail, entry.durationMinutes])
        )
    )
}
