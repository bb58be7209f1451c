import type { Container } from '../../core/container.js'
import { formatDuration } from '../../core/time.js'
import { effortNeeded } from '../../model/task-model.js'
import { durationArg } from '../args.js'
import { colors } from '../ui.js'

export async function subjectAddCommand(container: Container, name: string, options: { target?: string }): Promise<void> {
    const session = await container.openProfile()
    const subject = session.model.addSubject({
        name,
        weeklyTargetMinutes: options.target === undefined ? 0 : durationArg(options.target),
    })
    await session.save()
    console.log(`${colors.success('Added subject')} ${subject.name} ${colors.id(subject.id)}`)
}

export async function subjectListCommand(container: Container): Promise<void> {
    const { model } = await container.openProfile()
    const subjects = model.subjects()
    if (subjects.length === 0) {
        console.log(colors.dim('No subjects yet. Add one with: studyweek subject add <name>'))
        return
    }
    for (const subject of subjects) {
        const tasks = model.tasksOf(subject.id)
        const remaining = tasks.reduce((sum, t) => sum + effortNeeded(t), 0)
        const target = subject.weeklyTargetMinutes > 0 ? formatDuration(subject.weeklyTargetMinutes) : '-'
        console.log(
            `${colors.id(subject.id)}  ${colors.bold(subject.name)}  target ${target}  remaining ${formatDuration(remaining)}  ${colors.dim(`${tasks.length} task(s)`)}`
        )
    }
}

export async function subjectRemoveCommand(container: Container, id: string): Promise<void> {
    const session = await container.openProfile()
    const removed = session.model.removeSubject(id)
    await session.save()
    console.log(`${colors.success('Removed subject')} ${removed.name}`)
}
