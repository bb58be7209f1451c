import { z } from 'zod'
import { isIsoDate, isWeekday } from '../core/time.js'
import type { Weekday } from '../core/types.js'

const IsoDateSchema = z.string().refine(isIsoDate, { message: 'Expected a YYYY-MM-DD date' })

export const TaskSchema = z.object({
    id: z.string().min(1),
    subjectId: z.string().min(1),
    title: z.string(),
    totalMinutes: z.number().positive(),
    remainingMinutes: z.number().min(0),
    deadline: IsoDateSchema.optional(),
    priority: z.enum(['low', 'medium', 'high']),
    done: z.boolean(),
    completedAt: z.number().optional(),
    remainingBeforeDone: z.number().min(0).optional(),
    notes: z.string().optional(),
})

export const SubjectSchema = z.object({
    id: z.string().min(1),
    name: z.string(),
    weeklyTargetMinutes: z.number().min(0),
    tasks: z.array(TaskSchema),
})

export const AvailabilityRuleSchema = z.object({
    weekday: z.custom<Weekday>(isWeekday, { message: 'Weekday must be an integer 0-6' }),
    start: z.string(),
    end: z.string(),
})

export const BusyIntervalSchema = z
    .object({
        start: z.number(),
        end: z.number(),
        title: z.string().optional(),
    })
    .refine((b) => b.end > b.start, { message: 'Busy interval must end after it starts' })

export const PlannerStateSchema = z.object({
    version: z.literal(1),
    subjects: z.array(SubjectSchema),
    rules: z.array(AvailabilityRuleSchema),
    busy: z.array(BusyIntervalSchema),
    lastPlannedAt: z.number().optional(),
})

export type PlannerState = z.infer<typeof PlannerStateSchema>

export const ProfileIndexSchema = z.object({
    profiles: z.array(z.string()),
})

export function emptyState(): PlannerState {
    return { version: 1, subjects: [], rules: [], busy: [] }
}
