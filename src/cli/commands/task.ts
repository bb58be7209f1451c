import type { Container } from '../../core/container.js'
import { formatDuration } from '../../core/time.js'
import { dateArg, durationArg, priorityArg } from '../args.js'
import { colors, formatTask } from '../ui.js'

interface TaskAddOptions {
    effort: string
    deadline?: string
    priority?: string
    notes?: string
}

export async function taskAddCommand(container: Container, subjectId: string, title: string, options: TaskAddOptions): Promise<void> {
    const session = await container.openProfile()
    const task = session.model.addTask({
        subjectId,
        title,
        effortMinutes: durationArg(options.effort),
        deadline: options.deadline === undefined ? undefined : dateArg(options.deadline, container.clock()),
        priority: priorityArg(options.priority),
        notes: options.notes,
    })
    await session.save()
    console.log(`${colors.success('Added task')} ${task.title} ${colors.id(task.id)}`)
}

export async function taskListCommand(container: Container): Promise<void> {
    const { model } = await container.openProfile()
    const tasks = model.tasks()
    if (tasks.length === 0) {
        console.log(colors.dim('No tasks yet. Add one with: studyweek task add <subjectId> <title> --effort 2h'))
        return
    }
    for (const task of tasks) console.log(formatTask(task, model.getSubject(task.subjectId)))
}

export async function taskRemoveCommand(container: Container, id: string): Promise<void> {
    const session = await container.openProfile()
    const removed = session.model.removeTask(id)
    await session.save()
    console.log(`${colors.success('Removed task')} ${removed.title}`)
}

export async function taskDoneCommand(container: Container, id: string): Promise<void> {
    const session = await container.openProfile()
    const task = session.tracker.markDone(id)
    await session.save()
    console.log(`${colors.success('Done:')} ${task.title}`)
}

export async function taskUndoneCommand(container: Container, id: string): Promise<void> {
    const session = await container.openProfile()
    const task = session.tracker.markUndone(id)
    await session.save()
    console.log(`${colors.warn('Reopened:')} ${task.title} (${formatDuration(task.remainingMinutes)} left)`)
}

export async function taskEffortCommand(container: Container, id: string, remaining: string): Promise<void> {
    const session = await container.openProfile()
    const task = session.tracker.adjustEffort(id, durationArg(remaining))
    await session.save()
    console.log(`${colors.success('Updated:')} ${task.title} now has ${formatDuration(task.remainingMinutes)} left`)
}

export async function taskLogCommand(container: Container, id: string, worked: string): Promise<void> {
    const session = await container.openProfile()
    const task = session.tracker.logWork(id, durationArg(worked))
    await session.save()
    console.log(`${colors.success('Logged:')} ${task.title} now has ${formatDuration(task.remainingMinutes)} left`)
}
