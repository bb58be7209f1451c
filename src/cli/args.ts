import { ValidationError } from '../core/errors.js'
import { isIsoDate, isTimeZone, localTimeZone, parseDuration, parseWeekday, todayIso } from '../core/time.js'
import type { IsoDate, Priority, Weekday } from '../core/types.js'

const PRIORITIES: readonly Priority[] = ['low', 'medium', 'high']

export function durationArg(text: string): number {
    const result = parseDuration(text)
    if (!result.ok) throw new ValidationError(result.error)
    return result.value
}

export function dateArg(text: string | undefined, now: number): IsoDate {
    if (text === undefined) return todayIso(now)
    const value = text.trim()
    if (!isIsoDate(value)) throw new ValidationError(`Invalid date "${text}" (expected YYYY-MM-DD)`)
    return value
}

export function priorityArg(text: string | undefined): Priority | undefined {
    if (text === undefined) return undefined
    const value = text.trim().toLowerCase()
    const match = PRIORITIES.find((p) => p === value)
    if (!match) throw new ValidationError(`Invalid priority "${text}" (expected low, medium or high)`)
    return match
}

export function weekdayArg(text: string): Weekday {
    const weekday = parseWeekday(text)
    if (weekday === null) throw new ValidationError(`Invalid weekday "${text}" (use 0-6 or a day name)`)
    return weekday
}

/** IANA zone name; the host zone when omitted. */
export function timeZoneArg(text: string | undefined): string {
    if (text === undefined) return localTimeZone()
    const value = text.trim()
    if (!isTimeZone(value)) throw new ValidationError(`Unknown time zone "${text}" (expected an IANA name such as Europe/Berlin)`)
    return value
}

/** 1-based position as shown by the list commands. */
export function indexArg(text: string, length: number): number {
    const n = Number(text)
    if (!Number.isInteger(n) || n < 1 || n > length) {
        throw new ValidationError(`Invalid index "${text}" (expected 1-${length})`)
    }
    return n - 1
}
