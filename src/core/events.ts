import type { CorruptEntry, TimeEntry } from './types.js'

export type EventMap = {
    'entry:appended': { entry: TimeEntry }
    'entry:updated': { entry: TimeEntry; previous: TimeEntry }
    'entry:corrupt': { diagnostic: CorruptEntry; source: string }
}

type EventHandler<T> = (data: T) => void

export type ListenerErrorHandler = (event: keyof EventMap, error: unknown) => void

export class TypedEventEmitter {
    private handlers = new Map<string, Set<EventHandler<unknown>>>()

    constructor(private onListenerError?: ListenerErrorHandler) {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler as EventHandler<unknown>)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler as EventHandler<unknown>)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch (error) {
                this.onListenerError?.(event, error)
            }
        }
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
