// Feed Reader: ICS source → ordered CalendarItem list.
// Uses ts-ics for typed iCalendar parsing. Only VEVENT components reach the
// output (todos, journals and free/busy blocks never make it into
// IcsCalendar.events). Series-defining items come first, recurrence
// instances after them, each group in document order, so a series always
// exists in the store before its overrides are reconciled.

import {
  convertIcsCalendar,
  generateIcsCalendar,
  type IcsCalendar,
  type IcsDateObject,
  type IcsEvent,
} from 'ts-ics'
import * as errore from 'errore'
import { ParseError, SourceUnavailableError } from './api-utils.js'
import { readSource, redactUrl, type FetchOptions } from './http-fetch.js'
import { addDuration, dateTimeOf, defaultEnd, toDateString } from './calendar-time.js'
import type { Logger } from './logger.js'
import type { CalendarItem, EventStatus, EventTime, EventTransparency } from './types.js'

// ---------------------------------------------------------------------------
// ts-ics conversion helpers
// ---------------------------------------------------------------------------

/** IcsDateObject → EventTime. TZID-qualified times keep their zone label. */
export function icsDateToEventTime(d: IcsDateObject): EventTime {
  if (d.type === 'DATE') {
    return { type: 'date', date: toDateString(d.date) }
  }
  return dateTimeOf(d.date, d.local?.timezone)
}

function mapStatus(status: string | undefined): EventStatus | undefined {
  switch (status?.toUpperCase()) {
    case 'CONFIRMED': return 'confirmed'
    case 'TENTATIVE': return 'tentative'
    case 'CANCELLED': return 'cancelled'
    default: return undefined
  }
}

function mapTransparency(value: string | undefined): EventTransparency | undefined {
  switch (value?.toUpperCase()) {
    case 'OPAQUE': return 'opaque'
    case 'TRANSPARENT': return 'transparent'
    default: return undefined
  }
}

function unfold(ics: string): string {
  return ics.replace(/\r?\n[ \t]/g, '')
}

/** ts-ics keeps RRULE as a parsed object; re-emit it through the ts-ics
 *  generator so the rule text is exactly what the library would write. */
function recurrenceRuleText(event: IcsEvent): string | undefined {
  if (!event.recurrenceRule) return undefined

  const probe: IcsCalendar = {
    version: '2.0',
    prodId: '-//calmirror//rrule//EN',
    events: [{
      uid: event.uid,
      stamp: event.stamp,
      start: event.start,
      end: event.start,
      recurrenceRule: event.recurrenceRule,
    }],
  }
  const generated = errore.tryFn(() => generateIcsCalendar(probe))
  if (generated instanceof Error) return undefined

  const line = unfold(generated)
    .split(/\r?\n/)
    .find((l) => l.toUpperCase().startsWith('RRULE:'))
  return line?.trim()
}

/** Convert one parsed VEVENT into a CalendarItem. */
export function icsEventToCalendarItem(event: IcsEvent): CalendarItem {
  const start = event.start ? icsDateToEventTime(event.start) : undefined

  // ts-ics events carry either `end` or `duration`
  let end: EventTime | undefined
  if (event.end) {
    end = icsDateToEventTime(event.end)
  } else if (start && event.duration) {
    end = addDuration(start, event.duration)
  } else if (start) {
    end = defaultEnd(start)
  }

  const item: CalendarItem = {
    identity: event.uid ?? '',
    fields: {
      summary: event.summary,
      description: event.description,
      location: event.location,
      status: mapStatus(event.status),
      transparency: mapTransparency(event.timeTransparent),
      start,
      end,
      recurrenceRule: recurrenceRuleText(event),
    },
  }
  if (typeof event.sequence === 'number' && event.sequence >= 0) item.revision = event.sequence
  if (event.recurrenceId) {
    item.recurrenceInstanceOf = { recurrenceId: icsDateToEventTime(event.recurrenceId.value) }
  }
  return item
}

/** Series first, then recurrence instances; stable within each group. */
export function orderSeriesFirst(items: CalendarItem[]): CalendarItem[] {
  return [
    ...items.filter((i) => !i.recurrenceInstanceOf),
    ...items.filter((i) => i.recurrenceInstanceOf),
  ]
}

/** Parse an ICS document into ordered CalendarItems.
 *  Boundary: convertIcsCalendar may throw on malformed input. */
export function parseFeed(ics: string): CalendarItem[] | ParseError {
  const calendar = errore.tryFn(() => convertIcsCalendar(undefined, ics))
  if (calendar instanceof Error) return new ParseError({ what: 'iCal feed', reason: calendar.message, cause: calendar })
  return orderSeriesFirst((calendar.events ?? []).map(icsEventToCalendarItem))
}

// ---------------------------------------------------------------------------
// Public entry point
// ---------------------------------------------------------------------------

export async function readFeed(
  source: string,
  opts: FetchOptions & { logger?: Logger } = {},
): Promise<CalendarItem[] | SourceUnavailableError | ParseError> {
  opts.logger?.info(`Fetching ICS feed from ${redactUrl(source)}${opts.proxy ? ` (proxy: ${opts.proxy})` : ''}`)

  const text = await readSource(source, opts)
  if (text instanceof Error) return text

  const items = parseFeed(text)
  if (items instanceof Error) return items

  const instances = items.filter((i) => i.recurrenceInstanceOf).length
  opts.logger?.debug(`Feed has ${items.length} events (${instances} recurrence instances)`)
  return items
}
