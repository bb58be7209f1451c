import { addDays, dayStart, MINUTE_MS, startOfWeek } from '../core/time.js'
import type { AvailabilityRule, BusyInterval, IsoDate, RiskLevel, Schedule, Slot } from '../core/types.js'
import { buildSlots, estimateDailyCapacity } from '../grid/time-grid.js'
import type { TaskModel } from '../model/task-model.js'
import { allocate, type AllocateOptions } from './allocator.js'
import { classifyAll, type RiskOptions, type SubjectLoad, subjectLoad } from './risk.js'

export interface WeeklyPlanOptions extends AllocateOptions {
    nearTermDays?: number
    /** Fixed minutes per day, or `'auto'` to average this week's free time. */
    dailyCapacityMinutes?: number | 'auto'
}

export interface WeeklyPlanInput {
    model: TaskModel
    rules: readonly AvailabilityRule[]
    busy: readonly BusyInterval[]
    /** Any date in the target week; the plan starts on its Monday. */
    week: IsoDate
    today: IsoDate
    options?: WeeklyPlanOptions
}

export interface DaySummary {
    date: IsoDate
    freeMinutes: number
    plannedMinutes: number
}

export interface WeeklyPlan {
    weekStart: IsoDate
    today: IsoDate
    slots: Slot[]
    schedule: Schedule
    risks: Record<string, RiskLevel>
    days: DaySummary[]
    subjects: SubjectLoad[]
}

function minutesWithin(intervals: readonly { start: number; end: number }[], from: number, to: number): number {
    return intervals.reduce((sum, i) => {
        const overlap = Math.min(i.end, to) - Math.max(i.start, from)
        return overlap > 0 ? sum + overlap / MINUTE_MS : sum
    }, 0)
}

/**
 * One planning pass: free slots for the week, a fresh schedule for all
 * pending tasks, and a risk level for every task.
 */
export function planWeek(input: WeeklyPlanInput): WeeklyPlan {
    const { model, rules, busy, today, options = {} } = input
    const weekStart = startOfWeek(input.week)
    const slots = buildSlots(rules, busy, weekStart)
    const schedule = allocate(slots, model.pendingTasks(), today, {
        minSessionMinutes: options.minSessionMinutes,
        maxSessionMinutes: options.maxSessionMinutes,
    })

    const riskOptions: RiskOptions = {
        nearTermDays: options.nearTermDays,
        dailyCapacityMinutes:
            options.dailyCapacityMinutes === 'auto' ? estimateDailyCapacity(slots) : options.dailyCapacityMinutes,
    }
    const tasks = model.tasks()
    const risks = classifyAll(tasks, today, schedule, riskOptions)

    const days: DaySummary[] = Array.from({ length: 7 }, (_, offset) => {
        const date = addDays(weekStart, offset)
        const from = dayStart(date)
        const to = dayStart(addDays(date, 1))
        return {
            date,
            freeMinutes: minutesWithin(slots, from, to),
            plannedMinutes: minutesWithin(schedule.sessions, from, to),
        }
    })

    return {
        weekStart,
        today,
        slots,
        schedule,
        risks,
        days,
        subjects: subjectLoad(model.subjects(), tasks, risks),
    }
}
