export type ErrorCode =
    | 'DUPLICATE_TIMESTAMP'
    | 'NOT_FOUND'
    | 'INVALID_ENTRY'
    | 'INVALID_CONFIGURATION'
    | 'CORRUPT_LEDGER'

export class DaybookError extends Error {
    readonly code: ErrorCode

    constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
        super(message, options)
        this.name = 'DaybookError'
        this.code = code
    }
}

export class DuplicateTimestampError extends DaybookError {
    readonly timestamp: string

    constructor(timestamp: string, options?: ErrorOptions) {
        super(`An entry already exists at ${timestamp}`, 'DUPLICATE_TIMESTAMP', options)
        this.name = 'DuplicateTimestampError'
        this.timestamp = timestamp
    }
}

export class NotFoundError extends DaybookError {
    readonly timestamp: string

    constructor(timestamp: string, options?: ErrorOptions) {
        super(`No entry exists at ${timestamp}`, 'NOT_FOUND', options)
        this.name = 'NotFoundError'
        this.timestamp = timestamp
    }
}

export class InvalidEntryError extends DaybookError {
    readonly issues: string[]

    constructor(issues: string[], options?: ErrorOptions) {
        super(`Invalid entry: ${issues.join('; ')}`, 'INVALID_ENTRY', options)
        this.name = 'InvalidEntryError'
        this.issues = issues
    }
}

export class InvalidConfigurationError extends DaybookError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'INVALID_CONFIGURATION', options)
        this.name = 'InvalidConfigurationError'
    }
}

export class CorruptLedgerError extends DaybookError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'CORRUPT_LEDGER', options)
        this.name = 'CorruptLedgerError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isDaybookError(error: unknown, code?: ErrorCode): error is DaybookError {
    if (!(error instanceof DaybookError)) return false
    return code === undefined || error.code === code
}
