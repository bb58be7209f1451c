import type { Container } from '../../core/container.js'
import { addAvailabilityRule, describeRule } from '../../grid/rules.js'
import { indexArg, weekdayArg } from '../args.js'
import { colors } from '../ui.js'

export async function ruleAddCommand(container: Container, weekday: string, start: string, end: string): Promise<void> {
    const session = await container.openProfile()
    const rule = { weekday: weekdayArg(weekday), start, end }
    session.rules = addAvailabilityRule(session.rules, rule)
    await session.save()
    console.log(`${colors.success('Added availability')} ${describeRule(rule)}`)
}

export async function ruleListCommand(container: Container): Promise<void> {
    const { rules } = await container.openProfile()
    if (rules.length === 0) {
        console.log(colors.dim('No availability yet. Add some with: studyweek rule add mon 18:00 20:00'))
        return
    }
    rules.forEach((rule, i) => console.log(`${colors.dim(`${i + 1}.`)} ${describeRule(rule)}`))
}

export async function ruleRemoveCommand(container: Container, index: string): Promise<void> {
    const session = await container.openProfile()
    const position = indexArg(index, session.rules.length)
    const [removed] = session.rules.splice(position, 1)
    await session.save()
    if (removed) console.log(`${colors.success('Removed availability')} ${describeRule(removed)}`)
}
