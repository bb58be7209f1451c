import { ConfigError } from '../core/errors.js'
import { addDays, dayStart, isIsoDate, MINUTE_MS, weekdayOf } from '../core/time.js'
import type { BusyInterval, Interval, IsoDate, Slot } from '../core/types.js'
import { resolveRule, type RuleInput } from './rules.js'

const DAYS_PER_WEEK = 7

function subtract(piece: Interval, busy: BusyInterval): Interval[] {
    if (busy.end <= piece.start || busy.start >= piece.end) return [piece]
    const out: Interval[] = []
    if (busy.start > piece.start) out.push({ start: piece.start, end: busy.start })
    if (busy.end < piece.end) out.push({ start: busy.end, end: piece.end })
    return out
}

function mergeSorted(pieces: Interval[]): Interval[] {
    const sorted = [...pieces].sort((a, b) => a.start - b.start || a.end - b.end)
    const merged: Interval[] = []
    for (const piece of sorted) {
        const last = merged[merged.length - 1]
        if (last && piece.start <= last.end) {
            last.end = Math.max(last.end, piece.end)
        } else {
            merged.push({ ...piece })
        }
    }
    return merged
}

/**
 * Free time of one concrete week: every availability rule placed on its date
 * within `[weekStart, weekStart + 7d)`, minus the busy intervals. Slots are
 * merged per day and returned sorted by start. Rules are checked as they are
 * placed; overlapping rules are allowed here and merge into one slot.
 */
export function buildSlots(
    rules: readonly RuleInput[],
    busyIntervals: readonly BusyInterval[],
    weekStart: IsoDate
): Slot[] {
    if (!isIsoDate(weekStart)) {
        throw new ConfigError(`Invalid week start "${weekStart}" (expected YYYY-MM-DD)`)
    }
    const busy = busyIntervals.filter((b) => b.end > b.start)
    const firstWeekday = weekdayOf(weekStart)
    const byDay: Interval[][] = Array.from({ length: DAYS_PER_WEEK }, () => [])

    for (const rule of rules) {
        const { rule: resolved, startMinute, endMinute } = resolveRule(rule)
        const offset = (resolved.weekday - firstWeekday + DAYS_PER_WEEK) % DAYS_PER_WEEK
        const midnight = dayStart(addDays(weekStart, offset))
        let pieces: Interval[] = [
            { start: midnight + startMinute * MINUTE_MS, end: midnight + endMinute * MINUTE_MS },
        ]
        for (const b of busy) {
            pieces = pieces.flatMap((p) => subtract(p, b))
            if (pieces.length === 0) break
        }
        byDay[offset]?.push(...pieces)
    }

    return byDay.flatMap((pieces) => mergeSorted(pieces)).sort((a, b) => a.start - b.start)
}

export function slotMinutes(slots: readonly Slot[]): number {
    return slots.reduce((sum, s) => sum + (s.end - s.start) / MINUTE_MS, 0)
}

/** Average free minutes per day over the week, rounded down. */
export function estimateDailyCapacity(slots: readonly Slot[]): number {
    return Math.floor(slotMinutes(slots) / DAYS_PER_WEEK)
}
