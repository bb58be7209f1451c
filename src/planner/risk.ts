import { daysBetween } from '../core/time.js'
import { RISK_ORDER, type IsoDate, type RiskLevel, type Schedule, type Subject, type Task } from '../core/types.js'
import { effortNeeded } from '../model/task-model.js'
import { hasUnscheduledRemainder } from './allocator.js'

export interface RiskOptions {
    /** Deadlines this many days away or closer are at least `medium`. */
    nearTermDays?: number
    /** Minutes of study assumed available per remaining day. */
    dailyCapacityMinutes?: number
}

export const DEFAULT_RISK_OPTIONS: Required<RiskOptions> = {
    nearTermDays: 3,
    dailyCapacityMinutes: 90,
}

export function riskRank(level: RiskLevel): number {
    return RISK_ORDER.indexOf(level)
}

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
    return riskRank(a) - riskRank(b)
}

export function maxRisk(levels: Iterable<RiskLevel>): RiskLevel {
    let worst: RiskLevel = 'none'
    for (const level of levels) {
        if (compareRisk(level, worst) > 0) worst = level
    }
    return worst
}

/**
 * Deadline-driven risk level of a single task. Total: every task maps to
 * exactly one level and nothing is thrown.
 */
export function classify(
    task: Task,
    today: IsoDate,
    hadUnscheduledRemainder: boolean,
    options: RiskOptions = {}
): RiskLevel {
    const nearTermDays = options.nearTermDays ?? DEFAULT_RISK_OPTIONS.nearTermDays
    const dailyCapacityMinutes = options.dailyCapacityMinutes ?? DEFAULT_RISK_OPTIONS.dailyCapacityMinutes
    const remaining = effortNeeded(task)
    if (remaining <= 0 || task.deadline === undefined) return 'none'

    const daysLeft = daysBetween(today, task.deadline)
    if (daysLeft < 0) return 'overdue'
    // the deadline day itself still counts as a study day
    if ((daysLeft + 1) * dailyCapacityMinutes < remaining || hadUnscheduledRemainder) return 'high'
    if (daysLeft <= nearTermDays) return 'medium'
    return 'low'
}

/** Risk level per task id, using the schedule's unscheduled remainders. */
export function classifyAll(
    tasks: readonly Task[],
    today: IsoDate,
    schedule: Schedule,
    options: RiskOptions = {}
): Record<string, RiskLevel> {
    const out: Record<string, RiskLevel> = {}
    for (const task of tasks) {
        out[task.id] = classify(task, today, hasUnscheduledRemainder(schedule, task.id), options)
    }
    return out
}

/** Minutes per day needed to finish by the deadline, counting today. */
export function suggestedTodayMinutes(task: Task, today: IsoDate): number {
    const remaining = effortNeeded(task)
    if (remaining <= 0) return 0
    if (task.deadline === undefined) return 0
    const daysLeft = Math.max(1, daysBetween(today, task.deadline))
    return Math.ceil(remaining / daysLeft)
}

export interface SubjectLoad {
    subjectId: string
    name: string
    targetMinutes: number
    remainingMinutes: number
    /** Remaining effort exceeds the weekly target. Advisory only. */
    overTarget: boolean
    worstRisk: RiskLevel
}

export function subjectLoad(
    subjects: readonly Subject[],
    tasks: readonly Task[],
    risks: Readonly<Record<string, RiskLevel>>
): SubjectLoad[] {
    return subjects.map((subject) => {
        const own = tasks.filter((t) => t.subjectId === subject.id)
        const remainingMinutes = own.reduce((sum, t) => sum + effortNeeded(t), 0)
        return {
            subjectId: subject.id,
            name: subject.name,
            targetMinutes: subject.weeklyTargetMinutes,
            remainingMinutes,
            overTarget: subject.weeklyTargetMinutes > 0 && remainingMinutes > subject.weeklyTargetMinutes,
            worstRisk: maxRisk(own.map((t) => risks[t.id] ?? 'none')),
        }
    })
}
