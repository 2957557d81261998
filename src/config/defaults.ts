import os from 'node:os'
import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const DEFAULT_TASKS = [
    'Lunch Break',
    'Meetings',
    'Housekeeping',
    'Adhoc Chat',
    'Adhoc Task',
    'Documentation',
    'Personal Development',
    'Unable to Work',
]

export const CONFIG_DIR = path.join(process.env.HOME ?? os.homedir(), '.config', 'daybook')
export const GLOBAL_CONFIG_FILE = path.join(CONFIG_DIR, 'config.json')
export const LOCAL_CONFIG_DIR = '.daybook'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    interval: 15,
    defaultTasks: DEFAULT_TASKS,
    showLastNWeeks: 2,
    weeklyCommitmentHours: 37,
    ledgerFile: path.join(CONFIG_DIR, 'ledger.json'),
    csvDir: os.homedir(),
    saveCsvCopy: false,
    logLevel: 'info',
}
