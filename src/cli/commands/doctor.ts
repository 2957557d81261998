import path from 'node:path'
import { GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from '../../config/defaults.js'
import { loadJsonConfig } from '../../config/loader.js'
import type { Container } from '../../core/container.js'
import { errorMessage } from '../../core/errors.js'
import { screenEntries } from '../../reporting/screen.js'
import { colors } from '../ui.js'

export interface Check {
    name: string
    status: 'ok' | 'warn' | 'error'
    message: string
}

export async function runChecks(container: Container): Promise<Check[]> {
    const { fs, config, store, ledger } = container
    const checks: Check[] = []

    const configFiles: Array<[string, string]> = [
        ['Global config', GLOBAL_CONFIG_FILE],
        ['Local config', path.join(config.projectDir, LOCAL_CONFIG_FILE)],
    ]
    for (const [name, file] of configFiles) {
        if (!(await fs.exists(file))) {
            checks.push({ name, status: 'ok', message: 'Not present (defaults apply)' })
            continue
        }
        try {
            await loadJsonConfig(fs, file)
            checks.push({ name, status: 'ok', message: file })
        } catch (error) {
            checks.push({ name, status: 'error', message: errorMessage(error) })
        }
    }

    if (!(await fs.exists(store.path))) {
        checks.push({ name: 'Ledger', status: 'warn', message: `${store.path} not created yet` })
        return checks
    }

    try {
        const report = await store.load(ledger)
        checks.push({ name: 'Ledger', status: 'ok', message: `${report.entries} entries in ${store.path}` })
        const corrupt = [...report.corrupt, ...screenEntries(ledger.allEntries()).corrupt]
        checks.push(
            corrupt.length === 0
                ? { name: 'Corrupt rows', status: 'ok', message: 'None' }
                : {
                      name: 'Corrupt rows',
                      status: 'warn',
                      message: corrupt.map((row) => `${row.timestamp} (${row.reason})`).join(', '),
                  }
        )
    } catch (error) {
        checks.push({ name: 'Ledger', status: 'error', message: errorMessage(error) })
    }

    return checks
}

export async function doctorCommand(container: Container): Promise<void> {
    console.log(colors.brand('daybook doctor\n'))

    const checks = await runChecks(container)
    for (const check of checks) {
        const icon =
            check.status === 'ok' ? colors.success('✓') : check.status === 'warn' ? colors.warn('!') : colors.error('✗')
        console.log(`  ${icon} ${check.name.padEnd(15)} ${check.message}`)
    }

    const errors = checks.filter((c) => c.status === 'error')
    console.log('')
    if (errors.length === 0) {
        console.log(colors.success('All good!'))
    } else {
        console.log(colors.warn(`${errors.length} problem(s) found.`))
    }
}
