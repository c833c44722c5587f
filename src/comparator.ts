// Comparator: field-level equality between a desired and a remote event.
// The tolerances here keep repeated runs from looping on updates:
// - empty text and absent text are the same value
// - transparency: absent / '' / 'opaque' are the same (store default)
// - status: absent / '' / 'confirmed' are the same (store default)
// - recurrence: a set of rules, each rule a set of ';'-separated parts
// No side effects, no store calls.

import { eventTimesEqual, formatEventTime } from './calendar-time.js'
import type { DesiredEvent, RemoteEvent } from './types.js'

export type ComparedField =
  | 'summary'
  | 'description'
  | 'location'
  | 'start'
  | 'end'
  | 'recurrence'
  | 'transparency'
  | 'status'
  | 'revision'

export interface FieldDifference {
  field: ComparedField
  desired: string
  remote: string
}

export interface Comparison {
  equal: boolean
  differences: FieldDifference[]
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

function text(value: string | null | undefined): string {
  return value ?? ''
}

function withDefault(value: string | null | undefined, fallback: string): string {
  const v = (value ?? '').toLowerCase()
  return v === '' ? fallback : v
}

/** "RRULE:FREQ=weekly;BYDAY=TU,MO" → "RRULE:BYDAY=MO,TU;FREQ=WEEKLY".
 *  Parts and list values are sorted; the property name is kept so RRULE and
 *  EXRULE lines never collide. */
export function normalizeRule(rule: string): string {
  const trimmed = rule.trim()
  const colon = trimmed.indexOf(':')
  const hasName = colon > 0 && !trimmed.slice(0, colon).includes('=')
  const name = hasName ? trimmed.slice(0, colon).toUpperCase() : 'RRULE'
  const body = hasName ? trimmed.slice(colon + 1) : trimmed

  const parts = body
    .split(';')
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map((p) => {
      const eq = p.indexOf('=')
      if (eq === -1) return p.toUpperCase()
      const values = p.slice(eq + 1).split(',').map((v) => v.trim().toUpperCase()).sort()
      return `${p.slice(0, eq).toUpperCase()}=${values.join(',')}`
    })
  return `${name}:${[...new Set(parts)].sort().join(';')}`
}

/** Sets of rules, each rule a set of parts. Differing rule counts are unequal. */
export function recurrenceEqual(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false
  const left = new Set(a.map(normalizeRule))
  const right = new Set(b.map(normalizeRule))
  if (left.size !== right.size) return false
  for (const rule of left) {
    if (!right.has(rule)) return false
  }
  return true
}

// ---------------------------------------------------------------------------
// Comparison
// ---------------------------------------------------------------------------

export function compareEvents(
  desired: DesiredEvent,
  remote: RemoteEvent,
  { ignoreRevision = false }: { ignoreRevision?: boolean } = {},
): Comparison {
  const differences: FieldDifference[] = []
  const diff = (field: ComparedField, d: string, r: string) => differences.push({ field, desired: d, remote: r })

  for (const field of ['summary', 'description', 'location'] as const) {
    if (text(desired[field]) !== text(remote[field])) diff(field, text(desired[field]), text(remote[field]))
  }

  if (!eventTimesEqual(desired.start, remote.start)) diff('start', formatEventTime(desired.start), formatEventTime(remote.start))
  if (!eventTimesEqual(desired.end, remote.end)) diff('end', formatEventTime(desired.end), formatEventTime(remote.end))

  if (!recurrenceEqual(desired.recurrence, remote.recurrence)) {
    diff('recurrence', desired.recurrence.join(' | '), remote.recurrence.join(' | '))
  }

  const transparency = [withDefault(desired.transparency, 'opaque'), withDefault(remote.transparency, 'opaque')] as const
  if (transparency[0] !== transparency[1]) diff('transparency', ...transparency)

  const status = [withDefault(desired.status, 'confirmed'), withDefault(remote.status, 'confirmed')] as const
  if (status[0] !== status[1]) diff('status', ...status)

  // Absent on either side means no revision tracking for this identity
  if (!ignoreRevision && desired.revision !== undefined && remote.revision !== undefined && desired.revision !== remote.revision) {
    diff('revision', String(desired.revision), String(remote.revision))
  }

  return { equal: differences.length === 0, differences }
}

/** Boolean shorthand for compareEvents. */
export function eventsEqual(
  desired: DesiredEvent,
  remote: RemoteEvent,
  opts: { ignoreRevision?: boolean } = {},
): boolean {
  return compareEvents(desired, remote, opts).equal
}

export function formatDifferences(differences: FieldDifference[]): string {
  return differences.map((d) => `${d.field}: ${JSON.stringify(d.desired)} != ${JSON.stringify(d.remote)}`).join('; ')
}
