import type { Container } from '../../core/container.js'
import { confirmAction } from '../prompts.js'
import { colors } from '../ui.js'

export async function resetCommand(container: Container, options: { yes?: boolean }): Promise<void> {
    const confirmed =
        options.yes || (await confirmAction(`Delete every entry in ${container.store.path}? This cannot be undone.`))
    if (!confirmed) {
        console.log(colors.dim('Ledger left unchanged.'))
        return
    }

    await container.tracker.truncate()
    console.log(colors.success('Ledger cleared.'))
}
