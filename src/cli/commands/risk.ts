import type { Container } from '../../core/container.js'
import { formatDuration } from '../../core/time.js'
import { compareRisk, suggestedTodayMinutes } from '../../planner/risk.js'
import { colors, formatRisk } from '../ui.js'
import { type PlanOptions, runPlan } from './plan.js'

export async function riskCommand(container: Container, options: Pick<PlanOptions, 'today' | 'week'>): Promise<void> {
    const session = await container.openProfile()
    const plan = runPlan(container, session, options)
    const tasks = session.model
        .pendingTasks()
        .map((task) => ({ task, level: plan.risks[task.id] ?? 'none' }))
        .sort((a, b) => compareRisk(b.level, a.level))

    if (tasks.length === 0) {
        console.log(colors.success('Nothing pending.'))
        return
    }

    for (const { task, level } of tasks) {
        const subject = session.model.getSubject(task.subjectId)
        const parts = [formatRisk(level), task.title]
        if (subject) parts.push(colors.dim(`[${subject.name}]`))
        parts.push(`${formatDuration(task.remainingMinutes)} left`)
        if (task.deadline) {
            parts.push(`due ${task.deadline}`)
            parts.push(colors.dim(`~${formatDuration(suggestedTodayMinutes(task, plan.today))}/day`))
        }
        console.log(parts.join('  '))
    }

    const overloaded = plan.subjects.filter((s) => s.overTarget)
    if (overloaded.length > 0) {
        console.log('')
        for (const s of overloaded) {
            console.log(
                colors.warn(`${s.name}: ${formatDuration(s.remainingMinutes)} remaining exceeds weekly target of ${formatDuration(s.targetMinutes)}`)
            )
        }
    }
}
