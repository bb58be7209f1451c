import pc from 'picocolors'
import { addDays, dayStart, formatClock, formatDuration, WEEKDAY_NAMES, weekdayOf } from '../core/time.js'
import type { RiskLevel, Subject, Task } from '../core/types.js'
import type { ProgressTotals } from '../planner/progress.js'
import type { WeeklyPlan } from '../planner/weekly.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    id: (id: string) => pc.cyan(id),
}

const RISK_COLORS: Record<RiskLevel, (text: string) => string> = {
    none: pc.dim,
    low: pc.green,
    medium: pc.yellow,
    high: pc.red,
    overdue: (text) => pc.bold(pc.red(text)),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatRisk(level: RiskLevel): string {
    return RISK_COLORS[level](`[${level.toUpperCase()}]`)
}

/** Uncoloured summary, e.g. `50%  1h/2h done  1h left  1/2 tasks`. */
export function formatProgress(totals: ProgressTotals): string {
    return [
        `${totals.percent}%`,
        `${formatDuration(totals.completedMinutes)}/${formatDuration(totals.totalMinutes)} done`,
        `${formatDuration(totals.remainingMinutes)} left`,
        `${totals.doneTasks}/${totals.tasks} tasks`,
    ].join('  ')
}

export function formatTask(task: Task, subject?: Subject): string {
    const parts = [colors.id(task.id), task.done ? colors.dim(`${task.title} (done)`) : task.title]
    if (subject) parts.push(colors.dim(`[${subject.name}]`))
    parts.push(`${formatDuration(task.remainingMinutes)}/${formatDuration(task.totalMinutes)}`)
    if (task.deadline) parts.push(`due ${task.deadline}`)
    parts.push(task.priority)
    return parts.join('  ')
}

export interface PlanLabels {
    getTask(id: string): Task | undefined
    getSubject(id: string): Subject | undefined
}

export function formatPlan(plan: WeeklyPlan, labels: PlanLabels): string {
    const lines: string[] = [colors.brand(`Week of ${plan.weekStart}`) + colors.dim(` (today ${plan.today})`), '']

    for (const day of plan.days) {
        const name = WEEKDAY_NAMES[weekdayOf(day.date)]
        lines.push(
            `${colors.bold(`${name} ${day.date}`)}  ${colors.dim(`free ${formatDuration(day.freeMinutes)}, planned ${formatDuration(day.plannedMinutes)}`)}`
        )
        const from = dayStart(day.date)
        const to = dayStart(addDays(day.date, 1))
        for (const session of plan.schedule.sessions.filter((s) => s.start >= from && s.start < to)) {
            const task = labels.getTask(session.taskId)
            const subject = labels.getSubject(session.subjectId)
            const title = task ? task.title : session.taskId
            const label = subject ? `${subject.name} - ${title}` : title
            lines.push(`  ${formatClock(session.start)}-${formatClock(session.end)}  ${label} ${colors.dim(`(${formatDuration(session.minutes)})`)}`)
        }
    }

    if (plan.schedule.unscheduled.length > 0) {
        lines.push('', colors.warn('Could not be placed this week:'))
        for (const u of plan.schedule.unscheduled) {
            const task = labels.getTask(u.taskId)
            lines.push(`  ${task ? task.title : u.taskId}: ${formatDuration(u.minutes)}`)
        }
    }
    return lines.join('\n')
}
