import { randomUUID } from 'node:crypto'
import { ValidationError } from '../core/errors.js'
import { daysBetween, isIsoDate } from '../core/time.js'
import type { IsoDate, Priority, Subject, Task } from '../core/types.js'

export interface SubjectRecord extends Subject {
    tasks: Task[]
}

export interface TaskModelSnapshot {
    subjects: SubjectRecord[]
}

export interface NewSubject {
    name: string
    weeklyTargetMinutes?: number
    id?: string
}

export interface NewTask {
    subjectId: string
    title: string
    effortMinutes: number
    deadline?: IsoDate
    priority?: Priority
    notes?: string
    id?: string
}

export type IdGenerator = () => string

const shortId: IdGenerator = () => randomUUID().slice(0, 8)

export function effortNeeded(task: Task): number {
    return task.done ? 0 : task.remainingMinutes
}

export function isOverdue(task: Task, today: IsoDate): boolean {
    return task.deadline !== undefined && daysBetween(today, task.deadline) < 0 && effortNeeded(task) > 0
}

export function isPending(task: Task): boolean {
    return effortNeeded(task) > 0
}

/**
 * In-memory subjects and tasks of one profile. Subjects keep their tasks in
 * insertion order; tasks refer back to their subject by id only.
 *
 * Progress state (done, remaining effort) is written through
 * {@link TaskModel.replaceTask}, which only the progress tracker calls.
 */
export class TaskModel {
    private readonly subjectById = new Map<string, Subject>()
    private readonly tasksBySubject = new Map<string, Map<string, Task>>()
    private readonly subjectOfTask = new Map<string, string>()

    constructor(private readonly newId: IdGenerator = shortId) {}

    static fromSnapshot(snapshot: TaskModelSnapshot, newId?: IdGenerator): TaskModel {
        const model = new TaskModel(newId)
        for (const record of snapshot.subjects) {
            const { tasks, ...subject } = record
            if (model.subjectById.has(subject.id)) {
                throw new ValidationError(`Duplicate subject id "${subject.id}"`)
            }
            model.subjectById.set(subject.id, subject)
            const ordered = new Map<string, Task>()
            model.tasksBySubject.set(subject.id, ordered)
            for (const task of tasks) {
                if (model.subjectOfTask.has(task.id)) {
                    throw new ValidationError(`Duplicate task id "${task.id}"`)
                }
                if (task.subjectId !== subject.id) {
                    throw new ValidationError(`Task "${task.id}" is stored under subject "${subject.id}" but refers to "${task.subjectId}"`)
                }
                ordered.set(task.id, task)
                model.subjectOfTask.set(task.id, subject.id)
            }
        }
        return model
    }

    toSnapshot(): TaskModelSnapshot {
        return {
            subjects: this.subjects().map((subject) => ({ ...subject, tasks: this.tasksOf(subject.id) })),
        }
    }

    subjects(): Subject[] {
        return [...this.subjectById.values()]
    }

    getSubject(id: string): Subject | undefined {
        return this.subjectById.get(id)
    }

    tasksOf(subjectId: string): Task[] {
        return [...(this.tasksBySubject.get(subjectId)?.values() ?? [])]
    }

    tasks(): Task[] {
        return this.subjects().flatMap((s) => this.tasksOf(s.id))
    }

    getTask(id: string): Task | undefined {
        const subjectId = this.subjectOfTask.get(id)
        if (subjectId === undefined) return undefined
        return this.tasksBySubject.get(subjectId)?.get(id)
    }

    requireTask(id: string): Task {
        const task = this.getTask(id)
        if (!task) throw new ValidationError(`Unknown task "${id}"`)
        return task
    }

    /** Undone tasks with effort left, subject order then task order. */
    pendingTasks(): Task[] {
        return this.tasks().filter(isPending)
    }

    effortNeeded(task: Task): number {
        return effortNeeded(task)
    }

    isOverdue(task: Task, today: IsoDate): boolean {
        return isOverdue(task, today)
    }

    addSubject(input: NewSubject): Subject {
        const name = input.name.trim()
        if (!name) throw new ValidationError('Subject name cannot be empty')
        const target = input.weeklyTargetMinutes ?? 0
        if (!Number.isFinite(target) || target < 0) {
            throw new ValidationError(`Weekly target must be zero or more minutes, got ${target}`)
        }
        const id = input.id ?? this.freshId((candidate) => this.subjectById.has(candidate))
        if (this.subjectById.has(id)) throw new ValidationError(`Subject "${id}" already exists`)

        const subject: Subject = { id, name, weeklyTargetMinutes: target }
        this.subjectById.set(id, subject)
        this.tasksBySubject.set(id, new Map())
        return subject
    }

    removeSubject(id: string): Subject {
        const subject = this.subjectById.get(id)
        if (!subject) throw new ValidationError(`Unknown subject "${id}"`)
        for (const task of this.tasksOf(id)) this.subjectOfTask.delete(task.id)
        this.tasksBySubject.delete(id)
        this.subjectById.delete(id)
        return subject
    }

    addTask(input: NewTask): Task {
        const tasks = this.tasksBySubject.get(input.subjectId)
        if (!tasks) throw new ValidationError(`Unknown subject "${input.subjectId}"`)
        const title = input.title.trim()
        if (!title) throw new ValidationError('Task title cannot be empty')
        if (!Number.isFinite(input.effortMinutes) || input.effortMinutes <= 0) {
            throw new ValidationError(`Task effort must be more than zero minutes, got ${input.effortMinutes}`)
        }
        if (input.deadline !== undefined && !isIsoDate(input.deadline)) {
            throw new ValidationError(`Invalid deadline "${input.deadline}" (expected YYYY-MM-DD)`)
        }
        const id = input.id ?? this.freshId((candidate) => this.subjectOfTask.has(candidate))
        if (this.subjectOfTask.has(id)) throw new ValidationError(`Task "${id}" already exists`)

        const task: Task = {
            id,
            subjectId: input.subjectId,
            title,
            totalMinutes: input.effortMinutes,
            remainingMinutes: input.effortMinutes,
            priority: input.priority ?? 'medium',
            done: false,
            ...(input.deadline !== undefined ? { deadline: input.deadline } : {}),
            ...(input.notes ? { notes: input.notes } : {}),
        }
        tasks.set(id, task)
        this.subjectOfTask.set(id, input.subjectId)
        return task
    }

    removeTask(id: string): Task {
        const task = this.requireTask(id)
        this.tasksBySubject.get(task.subjectId)?.delete(id)
        this.subjectOfTask.delete(id)
        return task
    }

    /**
     * Swaps in a new version of an existing task, keeping its position.
     * @internal
     */
    replaceTask(next: Task): void {
        const current = this.requireTask(next.id)
        if (current.subjectId !== next.subjectId) {
            throw new ValidationError(`Task "${next.id}" cannot move between subjects`)
        }
        this.tasksBySubject.get(current.subjectId)?.set(next.id, next)
    }

    private freshId(taken: (id: string) => boolean): string {
        let id = this.newId()
        while (taken(id)) id = this.newId()
        return id
    }
}
