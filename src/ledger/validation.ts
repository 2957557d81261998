import { z } from 'zod'
import { err, ok, type Result } from '../core/result.js'
import { parseTimestamp } from '../core/time.js'
import type { TimeEntry } from '../core/types.js'

export const TimeEntrySchema = z.object({
    timestamp: z.string().transform((value, ctx) => {
        const parsed = parseTimestamp(value)
        if (!parsed.ok) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error })
            return z.NEVER
        }
        return parsed.value
    }),
    task: z.string().refine((task) => task.trim().length > 0, 'task must not be empty'),
    detail: z.string().default(''),
    durationMinutes: z
        .number()
        .int('duration must be a whole number of minutes')
        .nonnegative('duration must not be negative'),
})

export type TimeEntryInput = z.input<typeof TimeEntrySchema>

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
}

export function validateEntry(input: unknown): Result<TimeEntry, string[]> {
    const parsed = TimeEntrySchema.safeParse(input)
    if (!parsed.success) return err(formatIssues(parsed.error))
    return ok(parsed.data)
}

/** Reason an already-stored entry cannot take part in aggregates, or `null` when it can. */
export function corruptionReason(entry: TimeEntry): string | null {
    if (typeof entry.task !== 'string' || entry.task.trim().length === 0) return 'task is empty'
    if (typeof entry.detail !== 'string') return 'detail is not text'
    const duration = entry.durationMinutes
    if (typeof duration !== 'number' || !Number.isInteger(duration) || duration < 0) {
        return `duration ${String(duration)} is not a non-negative whole number`
    }
    return null
}
