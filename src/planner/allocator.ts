import { addDays, dayStart, MINUTE_MS } from '../core/time.js'
import { PRIORITY_RANK, type Interval, type IsoDate, type Schedule, type Session, type Slot, type Task, type UnscheduledRemainder } from '../core/types.js'
import { effortNeeded, isOverdue } from '../model/task-model.js'

export interface AllocateOptions {
    /**
     * Free pieces shorter than this (or than the effort still needed, if
     * smaller) are skipped for the current task. 0 disables the check.
     */
    minSessionMinutes?: number
    /** Longer placements are emitted as back-to-back sessions of at most this length. */
    maxSessionMinutes?: number
}

interface RankedTask {
    task: Task
    index: number
    overdue: boolean
}

/**
 * Allocation order: overdue first, then earliest deadline (undated last),
 * then higher priority, then input order.
 */
export function compareForAllocation(a: RankedTask, b: RankedTask): number {
    if (a.overdue !== b.overdue) return a.overdue ? -1 : 1
    const ad = a.task.deadline
    const bd = b.task.deadline
    if (ad !== bd) {
        if (ad === undefined) return 1
        if (bd === undefined) return -1
        return ad < bd ? -1 : 1
    }
    const byPriority = PRIORITY_RANK[b.task.priority] - PRIORITY_RANK[a.task.priority]
    if (byPriority !== 0) return byPriority
    return a.index - b.index
}

export function allocationOrder(tasks: readonly Task[], today: IsoDate): Task[] {
    return tasks
        .map((task, index) => ({ task, index, overdue: isOverdue(task, today) }))
        .sort(compareForAllocation)
        .map((r) => r.task)
}

function splitSession(task: Task, start: number, end: number, maxMs: number | undefined): Session[] {
    const out: Session[] = []
    let cursor = start
    while (cursor < end) {
        const stop = maxMs === undefined ? end : Math.min(end, cursor + maxMs)
        out.push({
            taskId: task.id,
            subjectId: task.subjectId,
            start: cursor,
            end: stop,
            minutes: (stop - cursor) / MINUTE_MS,
        })
        cursor = stop
    }
    return out
}

/**
 * Greedy allocation of pending effort into free slots.
 *
 * Tasks are taken in {@link allocationOrder}; each one consumes the earliest
 * free time first. A slot that is only partly used keeps its tail in the pool
 * for later tasks, so no time is handed out twice. Dated tasks only use time
 * up to the end of their deadline day; overdue tasks have no cutoff. Time
 * before `today` is never used.
 *
 * This is a heuristic: it does not search for the placement with the least
 * total risk.
 */
export function allocate(
    slots: readonly Slot[],
    pendingTasks: readonly Task[],
    today: IsoDate,
    options: AllocateOptions = {}
): Schedule {
    const todayStart = dayStart(today)
    const pool: Interval[] = slots
        .filter((s) => s.end > todayStart && s.end > s.start)
        .map((s) => ({ start: Math.max(s.start, todayStart), end: s.end }))
        .sort((a, b) => a.start - b.start)

    const minMs = Math.max(0, options.minSessionMinutes ?? 0) * MINUTE_MS
    const maxMs =
        options.maxSessionMinutes !== undefined && options.maxSessionMinutes > 0
            ? options.maxSessionMinutes * MINUTE_MS
            : undefined

    const sessions: Session[] = []
    const unscheduled: UnscheduledRemainder[] = []

    for (const task of allocationOrder(pendingTasks, today)) {
        const needed = effortNeeded(task)
        if (needed <= 0) continue
        let remainingMs = needed * MINUTE_MS
        const cutoff =
            task.deadline !== undefined && !isOverdue(task, today)
                ? dayStart(addDays(task.deadline, 1))
                : Number.POSITIVE_INFINITY

        for (const piece of pool) {
            if (remainingMs <= 0 || piece.start >= cutoff) break
            const usableEnd = Math.min(piece.end, cutoff)
            const available = usableEnd - piece.start
            if (available <= 0 || available < Math.min(minMs, remainingMs)) continue

            const take = Math.min(available, remainingMs)
            sessions.push(...splitSession(task, piece.start, piece.start + take, maxMs))
            piece.start += take
            remainingMs -= take
        }

        // fully consumed pieces are left behind as empty intervals; drop them
        for (let i = pool.length - 1; i >= 0; i--) {
            const piece = pool[i]
            if (piece && piece.end <= piece.start) pool.splice(i, 1)
        }

        if (remainingMs > 0) {
            unscheduled.push({ taskId: task.id, minutes: remainingMs / MINUTE_MS })
        }
    }

    sessions.sort((a, b) => a.start - b.start)
    return { sessions, unscheduled }
}

export function unscheduledMinutes(schedule: Schedule, taskId: string): number {
    return schedule.unscheduled.find((u) => u.taskId === taskId)?.minutes ?? 0
}

export function hasUnscheduledRemainder(schedule: Schedule, taskId: string): boolean {
    return unscheduledMinutes(schedule, taskId) > 0
}

export function scheduledMinutes(schedule: Schedule, taskId: string): number {
    return schedule.sessions.filter((s) => s.taskId === taskId).reduce((sum, s) => sum + s.minutes, 0)
}
