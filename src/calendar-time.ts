// Time helpers for the reconciliation engine.
// EventTime comparison (instants vs all-day dates), window construction for
// store queries, ICS duration arithmetic and interval parsing for --interval.

import type { EventTime, TimeWindow } from './types.js'

// ---------------------------------------------------------------------------
// Window bounds
// ---------------------------------------------------------------------------

/** Lower bound of the "effectively unbounded" lookup window. */
export const FAR_PAST = new Date('1970-01-01T00:00:00Z')

/** Upper bound of the "effectively unbounded" lookup window. */
export const FAR_FUTURE = new Date('3000-01-01T00:00:00Z')

export const UNBOUNDED_WINDOW: TimeWindow = { start: FAR_PAST, end: FAR_FUTURE }

const DAY_MS = 24 * 60 * 60 * 1000

// ---------------------------------------------------------------------------
// Date-only values
// ---------------------------------------------------------------------------

/** Check if a string looks like a date-only value (YYYY-MM-DD) */
export function isDateOnly(input: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(input)
}

/** YYYY-MM-DD of a Date in UTC */
export function toDateString(date: Date): string {
  return date.toISOString().split('T')[0]!
}

// ---------------------------------------------------------------------------
// EventTime
// ---------------------------------------------------------------------------

export function dateTimeOf(date: Date, timeZone?: string): EventTime {
  return timeZone ? { type: 'dateTime', dateTime: date.toISOString(), timeZone } : { type: 'dateTime', dateTime: date.toISOString() }
}

/** All-day dates resolve to midnight UTC. */
export function eventTimeToDate(time: EventTime): Date {
  return time.type === 'date' ? new Date(`${time.date}T00:00:00Z`) : new Date(time.dateTime)
}

/** Two times are equal when both are the same all-day date, or both denote
 *  the same instant regardless of offset or time zone label. */
export function eventTimesEqual(a: EventTime | undefined, b: EventTime | undefined): boolean {
  if (!a || !b) return !a && !b
  if (a.type === 'date' || b.type === 'date') {
    return a.type === 'date' && b.type === 'date' && a.date === b.date
  }
  const ta = Date.parse(a.dateTime)
  const tb = Date.parse(b.dateTime)
  if (Number.isNaN(ta) || Number.isNaN(tb)) return a.dateTime === b.dateTime
  return ta === tb
}

/** Stable text form: the date, or the UTC instant. */
export function eventTimeKey(time: EventTime): string {
  if (time.type === 'date') return time.date
  const ms = Date.parse(time.dateTime)
  return Number.isNaN(ms) ? time.dateTime : new Date(ms).toISOString()
}

export function formatEventTime(time: EventTime | undefined): string {
  if (!time) return '(none)'
  if (time.type === 'date') return time.date
  return time.timeZone ? `${time.dateTime} (${time.timeZone})` : time.dateTime
}

/** Default end for an event without DTEND or DURATION (RFC 5545 3.6.1):
 *  the next day for all-day starts, the start itself otherwise. */
export function defaultEnd(start: EventTime): EventTime {
  if (start.type === 'date') {
    return { type: 'date', date: toDateString(new Date(eventTimeToDate(start).getTime() + DAY_MS)) }
  }
  return start
}

// ---------------------------------------------------------------------------
// ICS durations
// ---------------------------------------------------------------------------

export interface DurationParts {
  before?: boolean
  weeks?: number
  days?: number
  hours?: number
  minutes?: number
  seconds?: number
}

export function durationToMs(d: DurationParts): number {
  const ms =
    (d.weeks ?? 0) * 7 * DAY_MS +
    (d.days ?? 0) * DAY_MS +
    (d.hours ?? 0) * 60 * 60 * 1000 +
    (d.minutes ?? 0) * 60 * 1000 +
    (d.seconds ?? 0) * 1000
  return d.before ? -ms : ms
}

/** Shift an EventTime by a duration, keeping its kind and time zone label. */
export function addDuration(start: EventTime, d: DurationParts): EventTime {
  const shifted = new Date(eventTimeToDate(start).getTime() + durationToMs(d))
  if (start.type === 'date') return { type: 'date', date: toDateString(shifted) }
  return dateTimeOf(shifted, start.timeZone)
}

// ---------------------------------------------------------------------------
// Interval parsing (--interval / INTERVAL)
// ---------------------------------------------------------------------------

const INTERVAL_RE = /^(\d+)\s*([smhdw]?)$/

/** Parse "90", "90s", "30m", "2h", "1d", "1w" into milliseconds.
 *  A bare number is seconds. Returns null for anything else or zero. */
export function parseInterval(input: string): number | null {
  const match = INTERVAL_RE.exec(input.trim().toLowerCase())
  if (!match) return null

  const value = Number(match[1])
  if (value <= 0) return null
  switch (match[2]) {
    case '':
    case 's': return value * 1000
    case 'm': return value * 60 * 1000
    case 'h': return value * 60 * 60 * 1000
    case 'd': return value * DAY_MS
    case 'w': return value * 7 * DAY_MS
    default: return null
  }
}
