// Domain types shared by the feed reader, the reconciliation engine and the
// calendar store. Records have a fixed field set; optional values are explicit.

export type EventStatus = 'confirmed' | 'tentative' | 'cancelled'

export type EventTransparency = 'opaque' | 'transparent'

/** An all-day date (YYYY-MM-DD) or a precise instant (RFC3339). */
export type EventTime =
  | { type: 'date'; date: string }
  | { type: 'dateTime'; dateTime: string; timeZone?: string }

/** Half-open interval [start, end). */
export interface TimeWindow {
  start: Date
  end: Date
}

export interface CalendarItemFields {
  summary?: string
  description?: string
  location?: string
  status?: EventStatus
  transparency?: EventTransparency
  start?: EventTime
  end?: EventTime
  /** Single rule line, e.g. "RRULE:FREQ=WEEKLY;BYDAY=MO" */
  recurrenceRule?: string
}

/** Set on items that override one occurrence of a recurring series.
 *  The series itself carries the same identity. */
export interface RecurrenceInstanceRef {
  recurrenceId: EventTime
}

/** A parsed feed event, before normalization. */
export interface CalendarItem {
  identity: string
  revision?: number
  recurrenceInstanceOf?: RecurrenceInstanceRef
  fields: CalendarItemFields
}

/** Target state for one feed item. */
export type DesiredEvent = Readonly<{
  identity: string
  revision?: number
  summary: string
  description: string
  location: string
  status: EventStatus
  transparency: EventTransparency
  start: EventTime
  end: EventTime
  recurrence: readonly string[]
  instanceOf?: RecurrenceInstanceRef
}>

/** An event as the calendar store reports it. Text fields are whatever the
 *  store returned; the comparator applies the default-value rules. */
export interface RemoteEvent {
  handle: string
  identity: string
  revision?: number
  summary: string
  description: string
  location: string
  status?: string
  transparency?: string
  start?: EventTime
  end?: EventTime
  recurrence: string[]
  /** Handle of the series this event is an occurrence of. */
  recurringEventHandle?: string
  /** Start of the occurrence this instance replaces. */
  originalStart?: EventTime
}
