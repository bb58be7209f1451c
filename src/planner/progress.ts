import { ValidationError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Subject, Task } from '../core/types.js'
import { effortNeeded, type TaskModel } from '../model/task-model.js'

export interface ProgressTrackerOptions {
    /** Epoch ms used for completion stamps. */
    clock?: () => number
    events?: TypedEventEmitter
}

/**
 * The only writer of progress state. Every method validates first and then
 * replaces the task in one step, so a rejected call changes nothing.
 * Nothing is recomputed here; callers classify or allocate again themselves.
 */
export class ProgressTracker {
    private readonly clock: () => number
    private readonly events?: TypedEventEmitter

    constructor(
        private readonly model: TaskModel,
        options: ProgressTrackerOptions = {}
    ) {
        this.clock = options.clock ?? Date.now
        this.events = options.events
    }

    markDone(taskId: string): Task {
        const task = this.model.requireTask(taskId)
        if (task.done) throw new ValidationError(`Task "${task.title}" is already done`)

        const next: Task = {
            ...task,
            done: true,
            remainingBeforeDone: task.remainingMinutes,
            remainingMinutes: 0,
            completedAt: this.clock(),
        }
        this.model.replaceTask(next)
        this.events?.emit('task:done', { task: next, previousRemaining: task.remainingMinutes })
        return next
    }

    markUndone(taskId: string): Task {
        const task = this.model.requireTask(taskId)
        if (!task.done) throw new ValidationError(`Task "${task.title}" is not done`)

        const { completedAt: _completedAt, remainingBeforeDone, ...rest } = task
        const next: Task = {
            ...rest,
            done: false,
            remainingMinutes: remainingBeforeDone ?? task.totalMinutes,
        }
        this.model.replaceTask(next)
        this.events?.emit('task:undone', { task: next })
        return next
    }

    adjustEffort(taskId: string, newRemaining: number): Task {
        const task = this.model.requireTask(taskId)
        if (!Number.isFinite(newRemaining) || newRemaining < 0) {
            throw new ValidationError(`Remaining effort must be zero or more minutes, got ${newRemaining}`)
        }
        if (task.done) {
            throw new ValidationError(`Task "${task.title}" is done; mark it undone before changing its effort`)
        }
        return this.setRemaining(task, newRemaining)
    }

    /** Subtracts worked minutes from the remaining effort, stopping at zero. */
    logWork(taskId: string, minutes: number): Task {
        const task = this.model.requireTask(taskId)
        if (!Number.isFinite(minutes) || minutes <= 0) {
            throw new ValidationError(`Worked time must be more than zero minutes, got ${minutes}`)
        }
        if (task.done) throw new ValidationError(`Task "${task.title}" is already done`)
        return this.setRemaining(task, Math.max(0, task.remainingMinutes - minutes))
    }

    private setRemaining(task: Task, remainingMinutes: number): Task {
        const next: Task = { ...task, remainingMinutes }
        this.model.replaceTask(next)
        this.events?.emit('task:effort', { task: next, previousRemaining: task.remainingMinutes })
        return next
    }
}

export interface ProgressTotals {
    totalMinutes: number
    completedMinutes: number
    remainingMinutes: number
    /** Completed share of the total effort, one decimal; 0 without effort. */
    percent: number
    tasks: number
    doneTasks: number
}

export interface SubjectProgress extends ProgressTotals {
    subjectId: string
    name: string
}

export interface ProgressReport {
    overall: ProgressTotals
    /** Least complete first; ties keep subject order. */
    subjects: SubjectProgress[]
}

function totalsOf(tasks: readonly Task[]): ProgressTotals {
    let totalMinutes = 0
    let completedMinutes = 0
    let remainingMinutes = 0
    let doneTasks = 0
    for (const task of tasks) {
        const remaining = effortNeeded(task)
        totalMinutes += task.totalMinutes
        remainingMinutes += remaining
        // remaining effort may have been raised above the estimate
        completedMinutes += task.done ? task.totalMinutes : Math.max(0, task.totalMinutes - remaining)
        if (task.done) doneTasks++
    }
    const percent = totalMinutes > 0 ? Math.round((completedMinutes / totalMinutes) * 1000) / 10 : 0
    return { totalMinutes, completedMinutes, remainingMinutes, percent, tasks: tasks.length, doneTasks }
}

/** Completed and remaining effort, overall and per subject. Read-only. */
export function progressReport(subjects: readonly Subject[], tasks: readonly Task[]): ProgressReport {
    const perSubject = subjects.map((subject) => ({
        subjectId: subject.id,
        name: subject.name,
        ...totalsOf(tasks.filter((t) => t.subjectId === subject.id)),
    }))
    return {
        overall: totalsOf(tasks),
        subjects: perSubject.sort((a, b) => a.percent - b.percent),
    }
}
