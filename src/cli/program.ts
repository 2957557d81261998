import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { type Container, type ContainerOverrides, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { configCommand } from './commands/config-cmd.js'
import { doctorCommand } from './commands/doctor.js'
import { type EditOptions, editCommand } from './commands/edit.js'
import { exportCommand } from './commands/export-cmd.js'
import { type LogOptions, logCommand } from './commands/log.js'
import { reportCommand } from './commands/report.js'
import { resetCommand } from './commands/reset.js'
import { summaryCommand } from './commands/summary.js'
import { tasksCommand } from './commands/tasks.js'
import { yesterdayCommand } from './commands/yesterday.js'
import { formatError } from './ui.js'

interface GlobalOptions {
    ledger?: string
    debug?: boolean
}

export function createProgram(overrides: ContainerOverrides = {}): Command {
    const program = new Command()
    const fs = overrides.fs ?? new NodeFileSystem()

    program
        .name('daybook')
        .description('Track what you worked on and report on it')
        .version('0.1.0')
        .option('-l, --ledger <file>', 'Ledger file to use')
        .option('--debug', 'Enable debug logging')

    /** Resolves config, builds the container and reports failures as a non-zero exit. */
    const run =
        <A extends unknown[]>(action: (container: Container, ...args: A) => Promise<void>) =>
        async (...args: A): Promise<void> => {
            const globals = program.opts<GlobalOptions>()
            const cliFlags: Partial<Config> = {
                ledgerFile: globals.ledger,
                logLevel: globals.debug ? 'debug' : undefined,
            }

            let container: Container | undefined
            try {
                const config = await loadConfig({ fs, cliFlags })
                container = createContainer(config, { ...overrides, fs })
                await action(container, ...args)
            } catch (error) {
                container?.logger.debug({ error }, 'Command failed')
                console.error(formatError(errorMessage(error)))
                process.exitCode = 1
            } finally {
                container?.shutdown()
            }
        }

    program
        .command('log [task]')
        .description('Record an entry ending now (prompts when no task is given)')
        .option('-d, --detail <text>', 'Free-text detail')
        .option('-m, --minutes <n>', 'Duration in minutes (defaults to the configured interval)')
        .option('-t, --at <timestamp>', 'Entry timestamp, YYYY-MM-DD HH:MM[:SS]')
        .action(run((container: Container, task: string | undefined, options: LogOptions) => logCommand(container, task, options)))

    program
        .command('edit <timestamp>')
        .description('Change the entry recorded at a timestamp')
        .option('--task <name>', 'New task')
        .option('-d, --detail <text>', 'New detail')
        .option('-m, --minutes <n>', 'New duration in minutes')
        .action(run((container: Container, timestamp: string, options: EditOptions) => editCommand(container, timestamp, options)))

    program
        .command('tasks')
        .description('Default and recently used tasks with their latest detail')
        .option('-a, --all', 'Include every task ever used')
        .action(run((container: Container, options: { all?: boolean }) => tasksCommand(container, options)))

    program
        .command('summary')
        .description('Daily totals per task, top 7 per week with the rest as Others')
        .action(run((container: Container) => summaryCommand(container)))

    program
        .command('yesterday')
        .description('Entries from the previous working day')
        .option('-r, --rollup', 'Roll up by task and detail')
        .action(run((container: Container, options: { rollup?: boolean }) => yesterdayCommand(container, options)))

    program
        .command('report')
        .description('Six-month weekly report against the fortnightly commitment')
        .action(run((container: Container) => reportCommand(container)))

    program
        .command('export')
        .description('Write the ledger to a CSV file')
        .option('--days <n>', 'Only the last n days')
        .option('--dir <path>', 'Output directory (defaults to csvDir)')
        .action(run((container: Container, options: { days?: string; dir?: string }) => exportCommand(container, options)))

    program
        .command('reset')
        .description('Delete every entry')
        .option('-y, --yes', 'Skip the confirmation prompt')
        .action(run((container: Container, options: { yes?: boolean }) => resetCommand(container, options)))

    program
        .command('config [key]')
        .description('Show the resolved configuration')
        .action(run((container: Container, key: string | undefined) => configCommand(container, key)))

    program
        .command('doctor')
        .description('Check configuration and ledger files')
        .action(run((container: Container) => doctorCommand(container)))

    return program
}
