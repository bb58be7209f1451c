import type { IsoDate, Task } from './types.js'

export type EventMap = {
    'task:done': { task: Task; previousRemaining: number }
    'task:undone': { task: Task }
    'task:effort': { task: Task; previousRemaining: number }
    'plan:generated': { weekStart: IsoDate; sessions: number; unscheduledMinutes: number }
}

type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerSets = {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: Set<EventHandler<EventMap[K]>> = this.handlers[event] ?? new Set()
        set.add(handler)
        this.handlers[event] = set
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: Set<EventHandler<EventMap[K]>> | undefined = this.handlers[event]
        set?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set: Set<EventHandler<EventMap[K]>> | undefined = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // listeners must not break the mutation that triggered them
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }
}
