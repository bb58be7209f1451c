export { busyWithinWeek, parseIcs, parseIcsDateTime, parseIcsDuration, sessionsToIcs } from './calendar/ics.js'
export type { IcsExportOptions, IcsImportOptions, IcsLookup } from './calendar/ics.js'
export { ConfigError, StorageError, StudyWeekError, ValidationError, errorMessage } from './core/errors.js'
export { TypedEventEmitter } from './core/events.js'
export type { EventMap } from './core/events.js'
export {
    addDays,
    daysBetween,
    formatDuration,
    isIsoDate,
    parseClock,
    parseDuration,
    parseWeekday,
    startOfWeek,
    weekdayOf,
} from './core/time.js'
export { PRIORITY_RANK, RISK_ORDER } from './core/types.js'
export type {
    AvailabilityRule,
    BusyInterval,
    ClockTime,
    IsoDate,
    Priority,
    RiskLevel,
    Schedule,
    Session,
    Slot,
    Subject,
    Task,
    UnscheduledRemainder,
    Weekday,
} from './core/types.js'
export { addAvailabilityRule, createAvailabilityRule, validateRuleSet } from './grid/rules.js'
export { buildSlots, estimateDailyCapacity, slotMinutes } from './grid/time-grid.js'
export { TaskModel, effortNeeded, isOverdue } from './model/task-model.js'
export type { NewSubject, NewTask, TaskModelSnapshot } from './model/task-model.js'
export { allocate, allocationOrder, hasUnscheduledRemainder, scheduledMinutes, unscheduledMinutes } from './planner/allocator.js'
export type { AllocateOptions } from './planner/allocator.js'
export { ProgressTracker, progressReport } from './planner/progress.js'
export type { ProgressReport, ProgressTotals, ProgressTrackerOptions, SubjectProgress } from './planner/progress.js'
export { DEFAULT_RISK_OPTIONS, classify, classifyAll, compareRisk, maxRisk, subjectLoad, suggestedTodayMinutes } from './planner/risk.js'
export type { RiskOptions, SubjectLoad } from './planner/risk.js'
export { planWeek } from './planner/weekly.js'
export type { DaySummary, WeeklyPlan, WeeklyPlanOptions } from './planner/weekly.js'
export { ProfileStore, sanitizeProfileName } from './storage/profile-store.js'
