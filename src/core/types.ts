/** Calendar date, `YYYY-MM-DD`. */
export type IsoDate = string

/** Wall-clock time of day, `HH:mm` (`24:00` allowed as an end). */
export type ClockTime = string

/** 0 = Monday … 6 = Sunday. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6

export type Priority = 'low' | 'medium' | 'high'

export const PRIORITY_RANK: Record<Priority, number> = {
    low: 0,
    medium: 1,
    high: 2,
}

export type RiskLevel = 'none' | 'low' | 'medium' | 'high' | 'overdue'

export const RISK_ORDER: readonly RiskLevel[] = ['none', 'low', 'medium', 'high', 'overdue']

export interface Task {
    readonly id: string
    /** Lookup key of the owning subject. */
    readonly subjectId: string
    readonly title: string
    readonly totalMinutes: number
    readonly remainingMinutes: number
    readonly deadline?: IsoDate
    readonly priority: Priority
    readonly done: boolean
    /** Epoch ms, present only while done. */
    readonly completedAt?: number
    /** Remaining effort at the moment the task was marked done. */
    readonly remainingBeforeDone?: number
    readonly notes?: string
}

export interface Subject {
    readonly id: string
    readonly name: string
    readonly weeklyTargetMinutes: number
}

export interface AvailabilityRule {
    readonly weekday: Weekday
    readonly start: ClockTime
    readonly end: ClockTime
}

export interface BusyInterval {
    readonly start: number
    readonly end: number
    readonly title?: string
}

export interface Interval {
    start: number
    end: number
}

export type Slot = Readonly<Interval>

export interface Session {
    readonly taskId: string
    readonly subjectId: string
    readonly start: number
    readonly end: number
    readonly minutes: number
}

export interface UnscheduledRemainder {
    readonly taskId: string
    readonly minutes: number
}

export interface Schedule {
    /** Sorted by start, pairwise non-overlapping. */
    readonly sessions: readonly Session[]
    readonly unscheduled: readonly UnscheduledRemainder[]
}
