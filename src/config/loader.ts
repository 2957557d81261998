import path from 'node:path'
import { InvalidConfigurationError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

export async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new InvalidConfigurationError(`${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error })
    }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        throw new InvalidConfigurationError(`${filePath}: ${issues.join('; ')}`, { cause: parsed.error })
    }
    return parsed.data
}

/** Later configs win; keys left `undefined` do not clear earlier values. */
function mergeConfigs(...configs: Config[]): Config {
    return configs.reduce<Config>(
        (merged, cfg) =>
            Object.assign(merged, Object.fromEntries(Object.entries(cfg).filter(([, value]) => value !== undefined))),
        {}
    )
}

function configFromEnv(env: NodeJS.ProcessEnv): Config {
    const envConfig: Config = {}
    if (env.DAYBOOK_LEDGER) envConfig.ledgerFile = env.DAYBOOK_LEDGER
    if (env.DAYBOOK_LOG_LEVEL) {
        const level = LogLevelSchema.safeParse(env.DAYBOOK_LOG_LEVEL)
        if (!level.success) {
            throw new InvalidConfigurationError(`DAYBOOK_LOG_LEVEL '${env.DAYBOOK_LOG_LEVEL}' is not a log level`)
        }
        envConfig.logLevel = level.data
    }
    return envConfig
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, configFromEnv(env), cliFlags)

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        defaultTasks: [...(merged.defaultTasks ?? DEFAULT_CONFIG.defaultTasks)],
        projectDir,
        configDir: CONFIG_DIR,
    }
}
