import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const ConfigSchema = z.object({
    interval: z.number().int().positive().optional(),
    defaultTasks: z.array(z.string().trim().min(1)).optional(),
    showLastNWeeks: z.number().int().nonnegative().optional(),
    weeklyCommitmentHours: z.number().positive().optional(),
    ledgerFile: z.string().min(1).optional(),
    csvDir: z.string().min(1).optional(),
    saveCsvCopy: z.boolean().optional(),
    logLevel: LogLevelSchema.optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = z.infer<typeof LogLevelSchema>

export interface ResolvedConfig {
    /** Minutes covered by one entry when none is given. */
    interval: number
    defaultTasks: string[]
    /** How far back `recentTasks` looks for non-default tasks. */
    showLastNWeeks: number
    weeklyCommitmentHours: number
    ledgerFile: string
    csvDir: string
    saveCsvCopy: boolean
    logLevel: LogLevel
    projectDir: string
    configDir: string
}
