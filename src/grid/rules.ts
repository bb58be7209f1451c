import { ConfigError } from '../core/errors.js'
import { isWeekday, parseClock, WEEKDAY_NAMES } from '../core/time.js'
import type { AvailabilityRule, ClockTime } from '../core/types.js'

export interface ResolvedRule {
    rule: AvailabilityRule
    /** Minutes after midnight. */
    startMinute: number
    endMinute: number
}

export interface RuleInput {
    weekday: number
    start: ClockTime
    end: ClockTime
}

export function describeRule(rule: RuleInput): string {
    const day = isWeekday(rule.weekday) ? WEEKDAY_NAMES[rule.weekday] : `day ${rule.weekday}`
    return `${day} ${rule.start}-${rule.end}`
}

export function resolveRule(rule: RuleInput): ResolvedRule {
    const { weekday } = rule
    if (!isWeekday(weekday)) {
        throw new ConfigError(`Invalid weekday ${weekday} in availability rule (expected 0-6, Monday = 0)`)
    }
    const startMinute = parseClock(rule.start)
    const endMinute = parseClock(rule.end)
    if (startMinute === null || startMinute === 24 * 60) {
        throw new ConfigError(`Invalid start time "${rule.start}" in availability rule ${describeRule(rule)}`)
    }
    if (endMinute === null) {
        throw new ConfigError(`Invalid end time "${rule.end}" in availability rule ${describeRule(rule)}`)
    }
    if (endMinute <= startMinute) {
        throw new ConfigError(`Availability rule ${describeRule(rule)} must end after it starts`)
    }
    return { rule: { weekday, start: rule.start, end: rule.end }, startMinute, endMinute }
}

export function createAvailabilityRule(input: RuleInput): AvailabilityRule {
    return resolveRule(input).rule
}

function overlaps(a: ResolvedRule, b: ResolvedRule): boolean {
    return a.rule.weekday === b.rule.weekday && a.startMinute < b.endMinute && b.startMinute < a.endMinute
}

/**
 * Returns a new rule list with `input` appended. Rules on the same weekday
 * may touch but not overlap.
 */
export function addAvailabilityRule(rules: readonly AvailabilityRule[], input: RuleInput): AvailabilityRule[] {
    const candidate = resolveRule(input)
    for (const existing of rules) {
        if (overlaps(resolveRule(existing), candidate)) {
            throw new ConfigError(
                `Availability rule ${describeRule(input)} overlaps existing rule ${describeRule(existing)}`
            )
        }
    }
    return [...rules, candidate.rule]
}

/** Checks every rule and that no two rules overlap on the same weekday. */
export function validateRuleSet(rules: readonly AvailabilityRule[]): void {
    rules.reduce<AvailabilityRule[]>((acc, rule) => addAvailabilityRule(acc, rule), [])
}
