import type { Container } from '../../core/container.js'
import { renderTable } from '../ui.js'

export async function reportCommand(container: Container): Promise<void> {
    await container.tracker.open()
    const rows = container.reports.commitmentReport()

    console.log(
        renderTable(
            ['Week', 'Minutes', 'Time working', 'Fortnight', 'Commitment', '%'],
            rows.map((row) => [
                row.weekStart,
                row.totalInterval,
                row.timeWorking,
                row.fortnightlyTotal,
                row.fortnightlyCommitment,
                row.proportionOfCommitment.toFixed(2),
            ])
        )
    )
}
