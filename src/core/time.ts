import dayjs, { type Dayjs } from 'dayjs'
import timezone from 'dayjs/plugin/timezone.js'
import utc from 'dayjs/plugin/utc.js'
import { err, ok, type Result } from './result.js'
import type { IsoDate, Weekday } from './types.js'

dayjs.extend(utc)
dayjs.extend(timezone)

// All wall-clock math runs on the UTC clock so plans do not shift with the host timezone.
// Real instants (calendar `Z` times, zoned times) are converted onto that clock on the way in.

const WALL_CLOCK = 'YYYY-MM-DDTHH:mm:ss'

export const MINUTE_MS = 60_000
export const DAY_MS = 24 * 60 * MINUTE_MS
export const MINUTES_PER_DAY = 24 * 60

export const WEEKDAY_NAMES = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const

const WEEKDAYS: readonly Weekday[] = [0, 1, 2, 3, 4, 5, 6]

const WEEKDAY_ALIASES: Record<string, Weekday> = {
    mon: 0,
    monday: 0,
    tue: 1,
    tues: 1,
    tuesday: 1,
    wed: 2,
    wednesday: 2,
    thu: 3,
    thur: 3,
    thurs: 3,
    thursday: 3,
    fri: 4,
    friday: 4,
    sat: 5,
    saturday: 5,
    sun: 6,
    sunday: 6,
}

export function isWeekday(value: unknown): value is Weekday {
    return typeof value === 'number' && WEEKDAYS.some((d) => d === value)
}

/** Accepts `0`–`6` (Monday-based) or an English day name or abbreviation. */
export function parseWeekday(text: string): Weekday | null {
    const trimmed = text.trim().toLowerCase()
    if (/^\d$/.test(trimmed)) {
        const n = Number(trimmed)
        return isWeekday(n) ? n : null
    }
    return WEEKDAY_ALIASES[trimmed] ?? null
}

export function isIsoDate(value: string): boolean {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false
    const parsed = dayjs.utc(value)
    return parsed.isValid() && parsed.format('YYYY-MM-DD') === value
}

function utcDay(date: IsoDate): Dayjs {
    return dayjs.utc(date).startOf('day')
}

/** Epoch ms of 00:00 on the given date. */
export function dayStart(date: IsoDate): number {
    return utcDay(date).valueOf()
}

export function addDays(date: IsoDate, days: number): IsoDate {
    return utcDay(date).add(days, 'day').format('YYYY-MM-DD')
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: IsoDate, to: IsoDate): number {
    return utcDay(to).diff(utcDay(from), 'day')
}

export function weekdayOf(date: IsoDate): Weekday {
    const index = (utcDay(date).day() + 6) % 7
    return WEEKDAYS[index] ?? 0
}

/** Monday of the week containing `date`. */
export function startOfWeek(date: IsoDate): IsoDate {
    return addDays(date, -weekdayOf(date))
}

export function toIsoDate(ms: number): IsoDate {
    return dayjs.utc(ms).format('YYYY-MM-DD')
}

export function todayIso(now: number = Date.now()): IsoDate {
    return toIsoDate(now)
}

export function formatClock(ms: number): string {
    return dayjs.utc(ms).format('HH:mm')
}

export function formatStamp(ms: number, pattern: string): string {
    return dayjs.utc(ms).format(pattern)
}

/** Minutes after midnight for `HH:mm`; `24:00` maps to 1440. */
export function parseClock(text: string): number | null {
    const match = /^(\d{1,2}):(\d{2})$/.exec(text.trim())
    if (!match) return null
    const hours = Number(match[1])
    const minutes = Number(match[2])
    if (hours === 24 && minutes === 0) return MINUTES_PER_DAY
    if (hours > 23 || minutes > 59) return null
    return hours * 60 + minutes
}

/**
 * Parses `90`, `90m`, `1.5h`, `2h30m` or `2h 30m` into minutes.
 */
export function parseDuration(text: string): Result<number> {
    const trimmed = text.trim().toLowerCase()
    if (/^\d+(\.\d+)?$/.test(trimmed)) return ok(Number(trimmed))

    const match = /^(?:(\d+(?:\.\d+)?)h)?\s*(?:(\d+(?:\.\d+)?)m(?:in)?)?$/.exec(trimmed)
    if (!match || (match[1] === undefined && match[2] === undefined)) {
        return err(`Invalid duration "${text}" (try 90, 90m, 1.5h or 2h30m)`)
    }
    const hours = match[1] === undefined ? 0 : Number(match[1])
    const minutes = match[2] === undefined ? 0 : Number(match[2])
    return ok(Math.round((hours * 60 + minutes) * 100) / 100)
}

export function formatDuration(minutes: number): string {
    const rounded = Math.round(minutes)
    const h = Math.floor(rounded / 60)
    const m = rounded % 60
    if (h === 0) return `${m}m`
    if (m === 0) return `${h}h`
    return `${h}h${m}m`
}

export function localTimeZone(): string {
    return dayjs.tz.guess()
}

export function isTimeZone(name: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone: name })
        return true
    } catch {
        return false
    }
}

/** Wall-clock reading of a real instant in `timeZone`, as a planner timestamp. */
export function instantToWallClock(instant: number, timeZone: string): number {
    return dayjs.utc(dayjs(instant).tz(timeZone).format(WALL_CLOCK)).valueOf()
}

/** Real instant of a `YYYY-MM-DDTHH:mm:ss` wall-clock reading in `timeZone`. */
export function zonedWallClockToInstant(wallClock: string, timeZone: string): number {
    return dayjs.tz(wallClock, timeZone).valueOf()
}

/** Parses `YYYY-MM-DDTHH:mm:ss` on the planner clock; null unless every field is in range. */
export function parseWallClock(text: string): number | null {
    const parsed = dayjs.utc(text)
    return parsed.isValid() && parsed.format(WALL_CLOCK) === text ? parsed.valueOf() : null
}
