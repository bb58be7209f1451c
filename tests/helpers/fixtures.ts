import pino from 'pino'
import type { IsoDate, Priority, Task } from '../../src/core/types.js'

export const silentLogger = pino({ level: 'silent' })

/** Epoch ms of `HH:mm` on `date`, on the UTC clock the planner uses. */
export function at(date: IsoDate, time: string): number {
    return Date.parse(`${date}T${time}:00Z`)
}

export interface TaskFixture {
    minutes?: number
    deadline?: IsoDate
    priority?: Priority
    subjectId?: string
    done?: boolean
}

export function makeTask(id: string, fixture: TaskFixture = {}): Task {
    const minutes = fixture.minutes ?? 60
    return {
        id,
        subjectId: fixture.subjectId ?? 'math',
        title: id,
        totalMinutes: minutes,
        remainingMinutes: fixture.done ? 0 : minutes,
        priority: fixture.priority ?? 'medium',
        done: fixture.done ?? false,
        ...(fixture.deadline !== undefined ? { deadline: fixture.deadline } : {}),
    }
}

/** Deterministic ids: `id-1`, `id-2`, ... */
export function sequentialIds(prefix = 'id'): () => string {
    let n = 0
    return () => `${prefix}-${++n}`
}
