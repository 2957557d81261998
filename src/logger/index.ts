import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

/** Logs go to stderr; stdout carries command output. */
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    const pretty = config.logLevel === 'debug' || config.logLevel === 'trace'
    if (pretty) {
        return pino({
            name: 'daybook',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    return pino({ name: 'daybook', level: config.logLevel }, pino.destination(2))
}
