import { describe, it, expect } from 'vitest'
import type { AvailabilityRule, BusyInterval } from '../../../src/core/types.js'
import { TaskModel } from '../../../src/model/task-model.js'
import { planWeek } from '../../../src/planner/weekly.js'
import { at } from '../../helpers/fixtures.js'

const MON = '2026-10-19'
const mondayEvening: AvailabilityRule[] = [{ weekday: 0, start: '18:00', end: '20:00' }]

describe('planWeek', () => {
    it('plans a week around busy time and flags work that does not fit', () => {
        const model = new TaskModel()
        model.addSubject({ name: 'Literature', id: 'lit', weeklyTargetMinutes: 60 })
        model.addTask({
            subjectId: 'lit',
            title: 'Essay',
            effortMinutes: 120,
            deadline: '2026-10-21',
            priority: 'high',
            id: 'essay',
        })
        const busy: BusyInterval[] = [{ start: at(MON, '19:00'), end: at(MON, '19:30'), title: 'Call' }]

        const plan = planWeek({ model, rules: mondayEvening, busy, week: '2026-10-21', today: MON })

        expect(plan.weekStart).toBe(MON)
        expect(plan.slots).toEqual([
            { start: at(MON, '18:00'), end: at(MON, '19:00') },
            { start: at(MON, '19:30'), end: at(MON, '20:00') },
        ])
        expect(plan.schedule.sessions.map((s) => s.minutes)).toEqual([60, 30])
        expect(plan.schedule.unscheduled).toEqual([{ taskId: 'essay', minutes: 30 }])
        expect(plan.risks).toEqual({ essay: 'high' })
        expect(plan.days).toHaveLength(7)
        expect(plan.days[0]).toEqual({ date: MON, freeMinutes: 90, plannedMinutes: 90 })
        expect(plan.days[6]).toEqual({ date: '2026-10-25', freeMinutes: 0, plannedMinutes: 0 })
        expect(plan.subjects).toEqual([
            {
                subjectId: 'lit',
                name: 'Literature',
                targetMinutes: 60,
                remainingMinutes: 120,
                overTarget: true,
                worstRisk: 'high',
            },
        ])
    })

    it('can derive daily capacity from the free time of the week', () => {
        const model = new TaskModel()
        model.addSubject({ name: 'Biology', id: 'bio' })
        model.addTask({ subjectId: 'bio', title: 'Reading', effortMinutes: 70, deadline: '2026-10-22', id: 'read' })
        const input = { model, rules: mondayEvening, busy: [], week: MON, today: MON }

        expect(planWeek(input).risks).toEqual({ read: 'medium' })
        expect(planWeek({ ...input, options: { dailyCapacityMinutes: 'auto' } }).risks).toEqual({ read: 'high' })
    })

    it('passes session limits to the allocator', () => {
        const model = new TaskModel()
        model.addSubject({ name: 'Biology', id: 'bio' })
        model.addTask({ subjectId: 'bio', title: 'Reading', effortMinutes: 100, id: 'read' })

        const plan = planWeek({
            model,
            rules: mondayEvening,
            busy: [],
            week: MON,
            today: MON,
            options: { maxSessionMinutes: 45 },
        })
        expect(plan.schedule.sessions.map((s) => s.minutes)).toEqual([45, 45, 10])
    })

    it('keeps done tasks in the risk report but out of the schedule', () => {
        const model = new TaskModel()
        model.addSubject({ name: 'Biology', id: 'bio' })
        const task = model.addTask({ subjectId: 'bio', title: 'Reading', effortMinutes: 60, id: 'read' })
        model.replaceTask({ ...task, done: true, remainingMinutes: 0 })

        const plan = planWeek({ model, rules: mondayEvening, busy: [], week: MON, today: MON })
        expect(plan.schedule.sessions).toEqual([])
        expect(plan.risks).toEqual({ read: 'none' })
    })
})
