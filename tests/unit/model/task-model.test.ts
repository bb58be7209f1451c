import { describe, it, expect } from 'vitest'
import { ValidationError } from '../../../src/core/errors.js'
import { effortNeeded, isOverdue, TaskModel } from '../../../src/model/task-model.js'
import { makeTask, sequentialIds } from '../../helpers/fixtures.js'

function seeded(): TaskModel {
    const model = new TaskModel(sequentialIds())
    model.addSubject({ name: 'Math', weeklyTargetMinutes: 240, id: 'math' })
    model.addSubject({ name: 'History', id: 'hist' })
    return model
}

describe('TaskModel', () => {
    it('creates subjects and tasks with generated ids', () => {
        const model = new TaskModel(sequentialIds())
        const subject = model.addSubject({ name: '  Physics ' })
        const task = model.addTask({ subjectId: subject.id, title: 'Problem set', effortMinutes: 90 })

        expect(subject).toEqual({ id: 'id-1', name: 'Physics', weeklyTargetMinutes: 0 })
        expect(task).toEqual({
            id: 'id-2',
            subjectId: 'id-1',
            title: 'Problem set',
            totalMinutes: 90,
            remainingMinutes: 90,
            priority: 'medium',
            done: false,
        })
    })

    it('keeps subject order then task order', () => {
        const model = seeded()
        model.addTask({ subjectId: 'hist', title: 'Read ch. 3', effortMinutes: 30, id: 'h1' })
        model.addTask({ subjectId: 'math', title: 'Exercises', effortMinutes: 45, id: 'm1' })
        model.addTask({ subjectId: 'math', title: 'Proofs', effortMinutes: 60, id: 'm2' })
        expect(model.tasks().map((t) => t.id)).toEqual(['m1', 'm2', 'h1'])
    })

    it('lists only pending tasks', () => {
        const model = seeded()
        model.addTask({ subjectId: 'math', title: 'Exercises', effortMinutes: 45, id: 'm1' })
        model.addTask({ subjectId: 'math', title: 'Proofs', effortMinutes: 60, id: 'm2' })
        model.replaceTask({ ...model.requireTask('m1'), done: true, remainingMinutes: 0 })
        model.replaceTask({ ...model.requireTask('m2'), remainingMinutes: 0 })
        model.addTask({ subjectId: 'hist', title: 'Essay', effortMinutes: 120, id: 'h1' })
        expect(model.pendingTasks().map((t) => t.id)).toEqual(['h1'])
    })

    it('validates new subjects', () => {
        const model = seeded()
        expect(() => model.addSubject({ name: '   ' })).toThrow('Subject name cannot be empty')
        expect(() => model.addSubject({ name: 'Art', weeklyTargetMinutes: -5 })).toThrow(ValidationError)
        expect(() => model.addSubject({ name: 'Math again', id: 'math' })).toThrow('Subject "math" already exists')
    })

    it('validates new tasks', () => {
        const model = seeded()
        expect(() => model.addTask({ subjectId: 'nope', title: 'X', effortMinutes: 30 })).toThrow(
            'Unknown subject "nope"'
        )
        expect(() => model.addTask({ subjectId: 'math', title: ' ', effortMinutes: 30 })).toThrow(
            'Task title cannot be empty'
        )
        expect(() => model.addTask({ subjectId: 'math', title: 'X', effortMinutes: 0 })).toThrow(
            'Task effort must be more than zero minutes, got 0'
        )
        expect(() =>
            model.addTask({ subjectId: 'math', title: 'X', effortMinutes: 30, deadline: '2026-02-30' })
        ).toThrow('Invalid deadline "2026-02-30" (expected YYYY-MM-DD)')
        expect(model.tasksOf('math')).toEqual([])
    })

    it('removes a subject together with its tasks', () => {
        const model = seeded()
        model.addTask({ subjectId: 'math', title: 'Exercises', effortMinutes: 45, id: 'm1' })
        model.removeSubject('math')
        expect(model.getSubject('math')).toBeUndefined()
        expect(model.getTask('m1')).toBeUndefined()
        expect(() => model.requireTask('m1')).toThrow('Unknown task "m1"')
    })

    it('replaces a task in place', () => {
        const model = seeded()
        model.addTask({ subjectId: 'math', title: 'A', effortMinutes: 45, id: 'a' })
        model.addTask({ subjectId: 'math', title: 'B', effortMinutes: 45, id: 'b' })
        model.replaceTask({ ...model.requireTask('a'), remainingMinutes: 10 })
        expect(model.tasksOf('math').map((t) => [t.id, t.remainingMinutes])).toEqual([
            ['a', 10],
            ['b', 45],
        ])
        expect(() => model.replaceTask({ ...model.requireTask('a'), subjectId: 'hist' })).toThrow(ValidationError)
    })

    it('round-trips through a snapshot', () => {
        const model = seeded()
        model.addTask({ subjectId: 'math', title: 'Exercises', effortMinutes: 45, id: 'm1', deadline: '2026-10-22' })
        const copy = TaskModel.fromSnapshot(model.toSnapshot())
        expect(copy.subjects()).toEqual(model.subjects())
        expect(copy.tasks()).toEqual(model.tasks())
    })

    it('refuses snapshots with duplicate or misplaced tasks', () => {
        const task = makeTask('t1', { subjectId: 'math' })
        expect(() =>
            TaskModel.fromSnapshot({
                subjects: [
                    { id: 'math', name: 'Math', weeklyTargetMinutes: 0, tasks: [task] },
                    { id: 'hist', name: 'History', weeklyTargetMinutes: 0, tasks: [task] },
                ],
            })
        ).toThrow('Duplicate task id "t1"')
        expect(() =>
            TaskModel.fromSnapshot({
                subjects: [{ id: 'hist', name: 'History', weeklyTargetMinutes: 0, tasks: [task] }],
            })
        ).toThrow(ValidationError)
    })
})

describe('task helpers', () => {
    it('needs no effort once done', () => {
        expect(effortNeeded(makeTask('t', { minutes: 30 }))).toBe(30)
        expect(effortNeeded({ ...makeTask('t', { minutes: 30 }), done: true })).toBe(0)
    })

    it('is overdue only after the deadline day and while effort remains', () => {
        const task = makeTask('t', { deadline: '2026-10-19' })
        expect(isOverdue(task, '2026-10-19')).toBe(false)
        expect(isOverdue(task, '2026-10-20')).toBe(true)
        expect(isOverdue({ ...task, done: true, remainingMinutes: 0 }, '2026-10-20')).toBe(false)
        expect(isOverdue(makeTask('u'), '2030-01-01')).toBe(false)
    })
})
