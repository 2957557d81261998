import { dayOf, formatLocalTimestamp } from './time.js'
import type { IsoDay, Timestamp } from './types.js'

export interface Clock {
    now(): Timestamp
}

export const systemClock: Clock = {
    now: () => formatLocalTimestamp(new Date()),
}

export function fixedClock(timestamp: Timestamp): Clock {
    return { now: () => timestamp }
}

export function today(clock: Clock): IsoDay {
    return dayOf(clock.now())
}
