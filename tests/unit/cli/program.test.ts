import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { parseIcs } from '../../../src/calendar/ics.js'
import { createProgram } from '../../../src/cli/program.js'
import { colors, formatError } from '../../../src/cli/ui.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { PlannerStateSchema, type PlannerState } from '../../../src/storage/schema.js'
import { at, silentLogger } from '../../helpers/fixtures.js'

const MON = '2026-10-19'
const NOW = at(MON, '08:00')
const STATE_FILE = '/data/state__default.json'

const CALENDAR = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'BEGIN:VEVENT',
    'SUMMARY:Call',
    'DTSTART:20261019T190000',
    'DTEND:20261019T193000',
    'END:VEVENT',
    'END:VCALENDAR',
].join('\r\n')

describe('studyweek CLI', () => {
    let fs: MockFileSystem
    const originalEnv = process.env

    async function cli(...args: string[]): Promise<void> {
        const program = createProgram({ fs, logger: silentLogger, clock: () => NOW })
        await program.parseAsync(['--data-dir', '/data', ...args], { from: 'user' })
    }

    function state(): PlannerState {
        return PlannerStateSchema.parse(JSON.parse(fs.getFiles().get(STATE_FILE) ?? 'null'))
    }

    beforeEach(() => {
        fs = new MockFileSystem()
        process.env = { ...originalEnv }
        delete process.env.STUDYWEEK_DATA_DIR
        delete process.env.STUDYWEEK_PROFILE
        delete process.env.STUDYWEEK_LOG_LEVEL
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    afterEach(() => {
        process.env = originalEnv
        process.exitCode = undefined
        vi.restoreAllMocks()
    })

    it('plans a week from subjects, tasks, availability and busy time', async () => {
        await cli('subject', 'add', 'Literature', '--target', '1h')
        const subjectId = state().subjects[0]?.id ?? ''
        await cli('task', 'add', subjectId, 'Essay', '--effort', '2h', '--deadline', '2026-10-21', '--priority', 'high')
        await cli('rule', 'add', 'mon', '18:00', '20:00')
        fs.setFile('/calendar.ics', CALENDAR)
        await cli('busy', 'import', '/calendar.ics')
        await cli('plan', '--ics', '/plan.ics')

        const saved = state()
        expect(saved.subjects[0]?.weeklyTargetMinutes).toBe(60)
        expect(saved.subjects[0]?.tasks[0]).toMatchObject({ title: 'Essay', totalMinutes: 120, priority: 'high' })
        expect(saved.rules).toEqual([{ weekday: 0, start: '18:00', end: '20:00' }])
        expect(saved.busy).toEqual([{ start: at(MON, '19:00'), end: at(MON, '19:30'), title: 'Call' }])
        expect(saved.lastPlannedAt).toBe(NOW)

        expect(parseIcs(fs.getFiles().get('/plan.ics') ?? '')).toEqual([
            { start: at(MON, '18:00'), end: at(MON, '19:00'), title: 'Study: Literature - Essay' },
            { start: at(MON, '19:30'), end: at(MON, '20:00'), title: 'Study: Literature - Essay' },
            { start: at('2026-10-25', '00:00'), end: at('2026-10-26', '00:00'), title: 'Unscheduled study (30 minutes)' },
        ])
        expect(vi.mocked(console.error)).not.toHaveBeenCalled()
    })

    it('marks tasks done and reopens them', async () => {
        await cli('subject', 'add', 'Math')
        const subjectId = state().subjects[0]?.id ?? ''
        await cli('task', 'add', subjectId, 'Exercises', '--effort', '90')
        const taskId = state().subjects[0]?.tasks[0]?.id ?? ''

        await cli('task', 'log', taskId, '30m')
        await cli('task', 'done', taskId)
        expect(state().subjects[0]?.tasks[0]).toMatchObject({ done: true, remainingMinutes: 0 })

        await cli('task', 'undone', taskId)
        expect(state().subjects[0]?.tasks[0]).toMatchObject({ done: false, remainingMinutes: 60 })
    })

    it('reports progress per subject', async () => {
        await cli('subject', 'add', 'Math')
        await cli('subject', 'add', 'History')
        const [math, history] = state().subjects
        await cli('task', 'add', math?.id ?? '', 'Exercises', '--effort', '90')
        await cli('task', 'add', history?.id ?? '', 'Reading', '--effort', '1h')
        const taskId = state().subjects[0]?.tasks[0]?.id ?? ''
        await cli('task', 'log', taskId, '30m')
        vi.mocked(console.log).mockClear()

        await cli('progress')

        expect(vi.mocked(console.log).mock.calls).toEqual([
            [`${colors.bold('Overall')}  20%  30m/2h30m done  2h left  0/2 tasks`],
            ['History  0%  0m/1h done  1h left  0/1 tasks'],
            ['Math  33.3%  30m/1h30m done  1h left  0/1 tasks'],
        ])
    })

    it('reports failures on stderr and sets a non-zero exit code', async () => {
        await cli('task', 'done', 'nope')
        expect(vi.mocked(console.error)).toHaveBeenCalledWith(formatError('Unknown task "nope"'))
        expect(process.exitCode).toBe(1)
    })

    it('rejects overlapping availability without saving it', async () => {
        await cli('rule', 'add', 'tue', '09:00', '11:00')
        await cli('rule', 'add', 'tuesday', '10:00', '12:00')
        expect(vi.mocked(console.error)).toHaveBeenCalledWith(
            formatError('Availability rule Tue 10:00-12:00 overlaps existing rule Tue 09:00-11:00')
        )
        expect(state().rules).toEqual([{ weekday: 1, start: '09:00', end: '11:00' }])
    })

    it('imports UTC events on the wall clock of the given zone', async () => {
        fs.setFile('/utc.ics', CALENDAR.replace('T190000', 'T170000Z').replace('T193000', 'T173000Z'))
        await cli('busy', 'import', '/utc.ics', '--tz', 'Europe/Berlin')
        expect(state().busy).toEqual([{ start: at(MON, '19:00'), end: at(MON, '19:30'), title: 'Call' }])
    })

    it('prints a config value by dotted key', async () => {
        await cli('config', 'planner.nearTermDays')
        expect(vi.mocked(console.log)).toHaveBeenCalledWith('planner.nearTermDays: 3')
    })
})
