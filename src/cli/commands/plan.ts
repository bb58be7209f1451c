import { busyWithinWeek, sessionsToIcs } from '../../calendar/ics.js'
import type { Container } from '../../core/container.js'
import { planWeek, type WeeklyPlan } from '../../planner/weekly.js'
import type { ProfileSession } from '../../storage/profile-session.js'
import { dateArg } from '../args.js'
import { colors, formatPlan } from '../ui.js'

export interface PlanOptions {
    week?: string
    today?: string
    ics?: string
}

export function runPlan(container: Container, session: ProfileSession, options: PlanOptions): WeeklyPlan {
    const now = container.clock()
    const today = dateArg(options.today, now)
    const week = options.week === undefined ? today : dateArg(options.week, now)
    return planWeek({
        model: session.model,
        rules: session.rules,
        busy: session.busy,
        week,
        today,
        options: container.config.planner,
    })
}

export async function planCommand(container: Container, options: PlanOptions): Promise<void> {
    const session = await container.openProfile()
    const plan = runPlan(container, session, options)
    const unscheduledMinutes = plan.schedule.unscheduled.reduce((sum, u) => sum + u.minutes, 0)
    container.eventBus.emit('plan:generated', {
        weekStart: plan.weekStart,
        sessions: plan.schedule.sessions.length,
        unscheduledMinutes,
    })

    console.log(formatPlan(plan, session.model))

    if (options.ics) {
        const ics = sessionsToIcs(plan.schedule, session.model, { weekStart: plan.weekStart, now: container.clock() })
        await container.fs.writeText(options.ics, ics)
        console.log('')
        console.log(`${colors.success('Wrote')} ${plan.schedule.sessions.length} session(s) to ${options.ics}`)
    }

    const ignoredBusy = session.busy.length - busyWithinWeek(session.busy, plan.weekStart).length
    if (ignoredBusy > 0) container.logger.debug({ ignoredBusy }, 'Busy intervals outside the planned week')

    session.lastPlannedAt = container.clock()
    await session.save()
}
