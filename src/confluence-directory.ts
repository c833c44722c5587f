// Confluence Team Calendars as a source of feeds.
// The directory lists sub-calendars (parents and their children) with their
// time zone; every sub-calendar exports an ICS feed. Listing and feeds use the
// same basic credentials and proxy.

import * as errore from 'errore'
import { z } from 'zod'
import { ParseError, SourceUnavailableError } from './api-utils.js'
import { fetchText, type FetchOptions } from './http-fetch.js'

const API_PATH = '/rest/calendar-services/1.0/calendar'

export interface DirectoryCalendar {
  id: string
  name: string
  timezone: string
  feedUrl: string
}

export interface CalendarDirectory {
  list(): Promise<DirectoryCalendar[] | SourceUnavailableError | ParseError>
  /** Options to read the feed of a listed calendar with */
  feedOptions(): FetchOptions
}

// ---------------------------------------------------------------------------
// Listing payload
// ---------------------------------------------------------------------------

const SubCalendarSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  timeZoneId: z.string().optional(),
})

const SubCalendarsResponseSchema = z.object({
  payload: z.array(z.object({
    subCalendar: SubCalendarSchema,
    childSubCalendars: z.array(z.object({ subCalendar: SubCalendarSchema })).optional(),
  })),
})

export function feedUrl(baseUrl: string, id: string, authenticated: boolean): string {
  const url = `${baseUrl}${API_PATH}/export/subcalendar/${encodeURIComponent(id)}.ics`
  return authenticated ? `${url}?os_authType=basic&isSubscribe=true` : url
}

/** Flatten parents and children in listing order, first occurrence of an id wins. */
export function parseSubCalendars(
  text: string,
  baseUrl: string,
  authenticated = false,
): DirectoryCalendar[] | ParseError {
  const json = errore.tryFn((): unknown => JSON.parse(text))
  if (json instanceof Error) return new ParseError({ what: 'sub-calendar listing', reason: json.message, cause: json })

  const parsed = SubCalendarsResponseSchema.safeParse(json)
  if (!parsed.success) {
    return new ParseError({ what: 'sub-calendar listing', reason: parsed.error.issues[0]?.message ?? 'unexpected shape' })
  }

  const seen = new Set<string>()
  const result: DirectoryCalendar[] = []
  for (const entry of parsed.data.payload) {
    for (const sub of [entry.subCalendar, ...(entry.childSubCalendars ?? []).map((c) => c.subCalendar)]) {
      if (seen.has(sub.id)) continue
      seen.add(sub.id)
      result.push({
        id: sub.id,
        name: sub.name,
        timezone: sub.timeZoneId ?? 'UTC',
        feedUrl: feedUrl(baseUrl, sub.id, authenticated),
      })
    }
  }
  return result
}

/** Filter by name (case-insensitive) or id. An empty filter selects everything. */
export function selectDirectoryCalendars(
  calendars: DirectoryCalendar[],
  names: string[],
): { selected: DirectoryCalendar[]; missing: string[] } {
  if (names.length === 0) return { selected: calendars, missing: [] }

  const matches = (cal: DirectoryCalendar, name: string) =>
    cal.id === name || cal.name.toLowerCase() === name.toLowerCase()

  return {
    selected: calendars.filter((cal) => names.some((name) => matches(cal, name))),
    missing: names.filter((name) => !calendars.some((cal) => matches(cal, name))),
  }
}

export function targetCalendarName(prefix: string, calendar: DirectoryCalendar): string {
  return `${prefix}${calendar.name}`
}

// ---------------------------------------------------------------------------
// HTTP directory
// ---------------------------------------------------------------------------

export class ConfluenceDirectory implements CalendarDirectory {
  constructor(
    private baseUrl: string,
    private opts: Pick<FetchOptions, 'auth' | 'proxy' | 'timeoutMs'> = {},
  ) {}

  async list(): Promise<DirectoryCalendar[] | SourceUnavailableError | ParseError> {
    const text = await fetchText(`${this.baseUrl}${API_PATH}/subcalendars.json`, {
      ...this.opts,
      accept: 'application/json',
    })
    if (text instanceof Error) return text
    return parseSubCalendars(text, this.baseUrl, this.opts.auth !== undefined)
  }

  feedOptions(): FetchOptions {
    return { ...this.opts, accept: 'text/calendar' }
  }
}
