import { describe, it, expect } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { InvalidConfigurationError } from '../../../src/core/errors.js'
import { loadConfig } from '../../../src/config/loader.js'
import { DEFAULT_TASKS, GLOBAL_CONFIG_FILE } from '../../../src/config/defaults.js'

const projectDir = '/project'

describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, projectDir, env: {} })
        expect(config.interval).toBe(15)
        expect(config.showLastNWeeks).toBe(2)
        expect(config.weeklyCommitmentHours).toBe(37)
        expect(config.saveCsvCopy).toBe(false)
        expect(config.logLevel).toBe('info')
        expect(config.defaultTasks).toEqual(DEFAULT_TASKS)
        expect(config.projectDir).toBe(projectDir)
    })

    it('loads global config file', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ interval: 30, defaultTasks: ['Meetings'] }))
        const config = await loadConfig({ fs, projectDir, env: {} })
        expect(config.interval).toBe(30)
        expect(config.defaultTasks).toEqual(['Meetings'])
    })

    it('local config overrides global config', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ interval: 30, showLastNWeeks: 4 }))
        fs.setFile('/project/.daybook/config.json', JSON.stringify({ interval: 10 }))
        const config = await loadConfig({ fs, projectDir, env: {} })
        expect(config.interval).toBe(10)
        expect(config.showLastNWeeks).toBe(4)
    })

    it('env vars override config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/project/.daybook/config.json', JSON.stringify({ ledgerFile: '/from-file.json' }))
        const config = await loadConfig({
            fs,
            projectDir,
            env: { DAYBOOK_LEDGER: '/from-env.json', DAYBOOK_LOG_LEVEL: 'warn' },
        })
        expect(config.ledgerFile).toBe('/from-env.json')
        expect(config.logLevel).toBe('warn')
    })

    it('CLI flags override env vars', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({
            fs,
            projectDir,
            env: { DAYBOOK_LEDGER: '/from-env.json' },
            cliFlags: { ledgerFile: '/from-cli.json', logLevel: undefined },
        })
        expect(config.ledgerFile).toBe('/from-cli.json')
        expect(config.logLevel).toBe('info')
    })

    it('rejects a config file that is not JSON', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, '{ interval: ')
        await expect(loadConfig({ fs, projectDir, env: {} })).rejects.toBeInstanceOf(InvalidConfigurationError)
    })

    it('rejects values outside the schema', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/project/.daybook/config.json', JSON.stringify({ interval: -5 }))
        await expect(loadConfig({ fs, projectDir, env: {} })).rejects.toThrow(/interval/)
    })

    it('rejects an unknown log level from the environment', async () => {
        const fs = new MockFileSystem()
        await expect(loadConfig({ fs, projectDir, env: { DAYBOOK_LOG_LEVEL: 'loud' } })).rejects.toThrow(
            "DAYBOOK_LOG_LEVEL 'loud' is not a log level"
        )
    })
})
