import { ValidationError } from '../core/errors.js'
import {
    addDays,
    dayStart,
    formatStamp,
    instantToWallClock,
    isTimeZone,
    localTimeZone,
    MINUTE_MS,
    parseWallClock,
    zonedWallClockToInstant,
} from '../core/time.js'
import type { BusyInterval, IsoDate, Schedule, Subject, Task } from '../core/types.js'

const CRLF = '\r\n'
const MAX_LINE = 75
const PRODID = '-//studyweek//Weekly Study Plan//EN'
const UTC_STAMP = 'YYYYMMDD[T]HHmmss[Z]'
const FLOATING_STAMP = 'YYYYMMDD[T]HHmmss'

interface Property {
    name: string
    params: Record<string, string>
    value: string
}

function unfold(text: string): string[] {
    const lines: string[] = []
    for (const line of text.replace(/\r\n?/g, '\n').split('\n')) {
        const previous = lines[lines.length - 1]
        if ((line.startsWith(' ') || line.startsWith('\t')) && previous !== undefined) {
            lines[lines.length - 1] = previous + line.slice(1)
        } else if (line.length > 0) {
            lines.push(line)
        }
    }
    return lines
}

function parseProperty(line: string): Property | null {
    let inQuotes = false
    let colon = -1
    for (let i = 0; i < line.length; i++) {
        const ch = line[i]
        if (ch === '"') inQuotes = !inQuotes
        else if (ch === ':' && !inQuotes) {
            colon = i
            break
        }
    }
    if (colon < 0) return null

    const [rawName = '', ...rawParams] = line.slice(0, colon).split(';')
    const params: Record<string, string> = {}
    for (const p of rawParams) {
        const eq = p.indexOf('=')
        if (eq > 0) params[p.slice(0, eq).toUpperCase()] = p.slice(eq + 1).replace(/^"|"$/g, '')
    }
    return { name: rawName.toUpperCase(), params, value: line.slice(colon + 1) }
}

export interface IcsImportOptions {
    /** Zone whose wall clock the planner runs on; defaults to the host zone. */
    timeZone?: string
}

/**
 * `YYYYMMDD` (all-day), `YYYYMMDDTHHmmss` (floating) or `…Z` (UTC) to a
 * planner timestamp. UTC times and times qualified with a known `tzid` are
 * real instants and are converted to the wall clock of `timeZone`; floating
 * times and unknown zones are taken as they read.
 */
export function parseIcsDateTime(value: string, tzid?: string, timeZone: string = localTimeZone()): number | null {
    const match = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})?(Z)?)?$/.exec(value.trim())
    if (!match) return null
    const [, y, mo, d, hour, mi = '00', s = '00', zulu] = match
    const wallClock = `${y}-${mo}-${d}T${hour ?? '00'}:${mi}:${s}`
    const floating = parseWallClock(wallClock)
    if (floating === null) return null

    if (zulu) return instantToWallClock(floating, timeZone)
    if (tzid !== undefined && hour !== undefined && isTimeZone(tzid)) {
        return instantToWallClock(zonedWallClockToInstant(wallClock, tzid), timeZone)
    }
    return floating
}

/** ISO 8601 duration as used by `DURATION`, e.g. `PT1H30M` or `P1D`. */
export function parseIcsDuration(value: string): number | null {
    const match = /^([+-])?P(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/.exec(value.trim())
    if (!match) return null
    const [, sign, w = '0', d = '0', h = '0', m = '0', s = '0'] = match
    const ms = (((Number(w) * 7 + Number(d)) * 24 + Number(h)) * 60 + Number(m)) * MINUTE_MS + Number(s) * 1000
    return sign === '-' ? -ms : ms
}

function unescapeText(value: string): string {
    return value.replace(/\\([\\;,nN])/g, (_, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch))
}

function toBusy(props: Property[], timeZone: string): BusyInterval | null {
    const get = (name: string) => props.find((p) => p.name === name)
    const dtstart = get('DTSTART')
    if (!dtstart) return null
    const allDay = dtstart.params.VALUE === 'DATE' || /^\d{8}$/.test(dtstart.value.trim())
    // all-day events cover whole calendar days wherever they are read
    const read = (prop: Property) => parseIcsDateTime(prop.value, allDay ? undefined : prop.params.TZID, timeZone)
    const start = read(dtstart)
    if (start === null) return null

    let end: number | null = null
    const dtend = get('DTEND')
    const duration = get('DURATION')
    if (dtend) {
        end = read(dtend)
    } else if (duration) {
        const length = parseIcsDuration(duration.value)
        end = length === null ? null : start + length
    } else if (allDay) {
        end = start + 24 * 60 * MINUTE_MS
    }
    if (end === null || end <= start) return null

    const summary = get('SUMMARY')
    return { start, end, title: summary ? unescapeText(summary.value) : 'Untitled' }
}

/**
 * Busy intervals from an iCalendar snapshot, one per usable `VEVENT`,
 * sorted by start. Events without a positive span are skipped.
 */
export function parseIcs(text: string, options: IcsImportOptions = {}): BusyInterval[] {
    const timeZone = options.timeZone ?? localTimeZone()
    const lines = unfold(text)
    if (!lines.some((l) => l.trim().toUpperCase() === 'BEGIN:VCALENDAR')) {
        throw new ValidationError('Not an iCalendar file (missing BEGIN:VCALENDAR)')
    }

    const out: BusyInterval[] = []
    let current: Property[] | null = null
    let depth = 0
    for (const line of lines) {
        const upper = line.trim().toUpperCase()
        if (upper === 'BEGIN:VEVENT') {
            current = []
            depth = 0
            continue
        }
        if (current === null) continue
        // skip nested components such as VALARM
        if (upper.startsWith('BEGIN:')) {
            depth++
            continue
        }
        if (upper.startsWith('END:') && depth > 0) {
            depth--
            continue
        }
        if (upper === 'END:VEVENT') {
            const busy = toBusy(current, timeZone)
            if (busy) out.push(busy)
            current = null
            continue
        }
        if (depth > 0) continue
        const prop = parseProperty(line)
        if (prop) current.push(prop)
    }
    return out.sort((a, b) => a.start - b.start || a.end - b.end)
}

function escapeText(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/;/g, '\\;').replace(/,/g, '\\,').replace(/\r?\n/g, '\\n')
}

/** Folds at 75 octets of UTF-8, never inside a code point. */
function fold(line: string): string {
    if (Buffer.byteLength(line) <= MAX_LINE) return line
    const parts: string[] = []
    let current = ''
    let size = 0
    let limit = MAX_LINE
    for (const char of line) {
        const bytes = Buffer.byteLength(char)
        if (size + bytes > limit) {
            parts.push(current)
            current = ''
            size = 0
            // continuation lines start with a space
            limit = MAX_LINE - 1
        }
        current += char
        size += bytes
    }
    parts.push(current)
    return parts.join(`${CRLF} `)
}

export interface IcsLookup {
    getTask(id: string): Task | undefined
    getSubject(id: string): Subject | undefined
}

export interface IcsExportOptions {
    /** Monday of the planned week; the unscheduled marker goes on its Sunday. */
    weekStart: IsoDate
    /** Real instant (epoch ms) written as the UTC `DTSTAMP`. */
    now?: number
}

function compactDate(date: IsoDate): string {
    return date.replace(/-/g, '')
}

/**
 * Serializes a schedule as an iCalendar document. Session times are written
 * as floating local times, the clock the planner works on. Session UIDs
 * depend only on task id and start, so re-exporting the same plan replaces
 * the same events.
 */
export function sessionsToIcs(schedule: Schedule, lookup: IcsLookup, options: IcsExportOptions): string {
    const stamp = formatStamp(options.now ?? Date.now(), UTC_STAMP)
    const lines = ['BEGIN:VCALENDAR', 'VERSION:2.0', `PRODID:${PRODID}`, 'CALSCALE:GREGORIAN', 'X-WR-CALNAME:Study Plan']

    for (const session of schedule.sessions) {
        const task = lookup.getTask(session.taskId)
        const subject = lookup.getSubject(session.subjectId)
        const title = task?.title ?? session.taskId
        const summary = subject ? `Study: ${subject.name} - ${title}` : `Study: ${title}`
        lines.push(
            'BEGIN:VEVENT',
            `UID:${session.taskId}-${formatStamp(session.start, 'YYYYMMDD[T]HHmm')}@studyweek`,
            `DTSTAMP:${stamp}`,
            `DTSTART:${formatStamp(session.start, FLOATING_STAMP)}`,
            `DTEND:${formatStamp(session.end, FLOATING_STAMP)}`,
            `SUMMARY:${escapeText(summary)}`,
            `DESCRIPTION:${escapeText(`${Math.round(session.minutes)} minutes planned.`)}`,
            'END:VEVENT'
        )
    }

    const unscheduled = schedule.unscheduled.reduce((sum, u) => sum + u.minutes, 0)
    if (unscheduled > 0) {
        const lastDay = addDays(options.weekStart, 6)
        lines.push(
            'BEGIN:VEVENT',
            `UID:unscheduled-${compactDate(options.weekStart)}@studyweek`,
            `DTSTAMP:${stamp}`,
            `DTSTART;VALUE=DATE:${compactDate(lastDay)}`,
            `DTEND;VALUE=DATE:${compactDate(addDays(lastDay, 1))}`,
            `SUMMARY:${escapeText(`Unscheduled study (${Math.round(unscheduled)} minutes)`)}`,
            `DESCRIPTION:${escapeText('No capacity remained this week; please reschedule.')}`,
            'END:VEVENT'
        )
    }

    lines.push('END:VCALENDAR')
    return lines.map(fold).join(CRLF) + CRLF
}

/** Busy intervals that touch the 7 days starting at `weekStart`. */
export function busyWithinWeek(busy: readonly BusyInterval[], weekStart: IsoDate): BusyInterval[] {
    const from = dayStart(weekStart)
    const to = dayStart(addDays(weekStart, 7))
    return busy.filter((b) => b.end > from && b.start < to)
}
