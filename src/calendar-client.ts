// Google Calendar client for the sync engine.
// Wraps the @googleapis/calendar SDK: calendar list lookups for target
// resolution, and GoogleCalendarStore, the CalendarStore the reconciler
// writes through.
// Every SDK call is retried on 429/5xx (withRetry) and carries a per-call
// timeout; failures come back as error values, never thrown.
// Events are created with events.import so the feed's UID becomes the
// event's iCalUID, and updated with events.patch so fields the feed does not
// manage (reminders, attendees, colors) survive.

import { calendar as calendarApi, type calendar_v3 } from '@googleapis/calendar'
import type { OAuth2Client } from 'google-auth-library'
import * as errore from 'errore'
import { AuthError, NotFoundError, StoreError, isAuthLikeError, isGoneError, withRetry } from './api-utils.js'
import type { CalendarStore, DeleteResult, EventQuery, InstanceQuery } from './calendar-store.js'
import type { DesiredEvent, EventTime, RemoteEvent } from './types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CalendarListItem {
  id: string
  summary: string
  primary: boolean
  role: string
  timezone: string
  backgroundColor: string
}

const DEFAULT_TIMEOUT_MS = 30_000
const PAGE_SIZE = 2500

/** Boundary helper: wrap a googleapis call, converting auth-like errors to AuthError values.
 *  Everything else becomes a StoreError carrying the original error as `cause`. */
function googleBoundary<T>(account: string, operation: string, fn: () => Promise<T>) {
  return errore.tryAsync({
    try: () => withRetry(fn),
    catch: (err) => isAuthLikeError(err)
      ? new AuthError({ account, reason: String(err) })
      : new StoreError({ operation, reason: String(err), cause: err }),
  })
}

// ---------------------------------------------------------------------------
// Event mapping
// ---------------------------------------------------------------------------

function isValidTimeZone(tz: string): boolean {
  const fmt = errore.tryFn(() => new Intl.DateTimeFormat('en-US', { timeZone: tz }))
  return !(fmt instanceof Error)
}

function fromGoogleTime(t: calendar_v3.Schema$EventDateTime | undefined): EventTime | undefined {
  if (!t) return undefined
  if (t.date) return { type: 'date', date: t.date }
  if (t.dateTime) {
    return t.timeZone ? { type: 'dateTime', dateTime: t.dateTime, timeZone: t.timeZone } : { type: 'dateTime', dateTime: t.dateTime }
  }
  return undefined
}

/** Recurring events need an IANA zone on start/end. Zone labels the API
 *  would reject (Windows names from Outlook feeds) fall back to the calendar's. */
function toGoogleTime(t: EventTime, fallbackZone: string): calendar_v3.Schema$EventDateTime {
  if (t.type === 'date') return { date: t.date }
  const zone = t.timeZone && isValidTimeZone(t.timeZone) ? t.timeZone : fallbackZone
  return { dateTime: t.dateTime, timeZone: zone }
}

/** Map an API event to the store's view. Events without an id are not addressable. */
export function toRemoteEvent(ev: calendar_v3.Schema$Event): RemoteEvent | null {
  if (!ev.id) return null

  const remote: RemoteEvent = {
    handle: ev.id,
    identity: ev.iCalUID ?? ev.id,
    summary: ev.summary ?? '',
    description: ev.description ?? '',
    location: ev.location ?? '',
    recurrence: ev.recurrence ?? [],
  }
  if (typeof ev.sequence === 'number') remote.revision = ev.sequence
  if (ev.status) remote.status = ev.status
  if (ev.transparency) remote.transparency = ev.transparency
  const start = fromGoogleTime(ev.start)
  if (start) remote.start = start
  const end = fromGoogleTime(ev.end)
  if (end) remote.end = end
  if (ev.recurringEventId) remote.recurringEventHandle = ev.recurringEventId
  const originalStart = fromGoogleTime(ev.originalStartTime)
  if (originalStart) remote.originalStart = originalStart
  return remote
}

/** Request body for import/patch. Instances never carry a recurrence. */
export function toGoogleEvent(desired: DesiredEvent, fallbackZone: string): calendar_v3.Schema$Event {
  const body: calendar_v3.Schema$Event = {
    iCalUID: desired.identity,
    summary: desired.summary,
    description: desired.description,
    location: desired.location,
    status: desired.status,
    transparency: desired.transparency,
    start: toGoogleTime(desired.start, fallbackZone),
    end: toGoogleTime(desired.end, fallbackZone),
  }
  if (desired.revision !== undefined) body.sequence = desired.revision
  if (!desired.instanceOf) body.recurrence = [...desired.recurrence]
  return body
}

function mapEvents(items: calendar_v3.Schema$Event[] | undefined): RemoteEvent[] {
  return (items ?? []).flatMap((ev) => {
    const remote = toRemoteEvent(ev)
    return remote ? [remote] : []
  })
}

// ---------------------------------------------------------------------------
// GoogleCalendarStore
// ---------------------------------------------------------------------------

export interface GoogleStoreOptions {
  calendarId: string
  account: string
  /** Zone for date-times without a usable one; the calendar's own zone */
  timeZone: string
  timeoutMs?: number
}

export class GoogleCalendarStore implements CalendarStore {
  private calendarId: string
  private account: string
  private timeZone: string
  private timeoutMs: number

  constructor(private api: calendar_v3.Calendar, opts: GoogleStoreOptions) {
    this.calendarId = opts.calendarId
    this.account = opts.account
    this.timeZone = opts.timeZone
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T | StoreError> {
    return googleBoundary(this.account, operation, fn).then((result) =>
      result instanceof AuthError ? new StoreError({ operation, reason: result.message, cause: result }) : result,
    )
  }

  async query({ identity, window, expandRecurrence }: EventQuery): Promise<RemoteEvent[] | StoreError> {
    const events: RemoteEvent[] = []
    let pageToken: string | undefined

    do {
      const res = await this.call('query', () =>
        this.api.events.list({
          calendarId: this.calendarId,
          iCalUID: identity,
          timeMin: window.start.toISOString(),
          timeMax: window.end.toISOString(),
          singleEvents: expandRecurrence,
          // Identity lookups must see cancelled events too, or a feed event with
          // STATUS:CANCELLED would be re-created on every run.
          showDeleted: identity !== undefined,
          maxResults: PAGE_SIZE,
          pageToken,
        }, { timeout: this.timeoutMs }),
      )
      if (res instanceof Error) return res

      events.push(...mapEvents(res.data.items))
      pageToken = res.data.nextPageToken ?? undefined
    } while (pageToken)

    return events
  }

  async queryInstances({ parentHandle, window, limit }: InstanceQuery): Promise<RemoteEvent[] | StoreError> {
    const res = await this.call('queryInstances', () =>
      this.api.events.instances({
        calendarId: this.calendarId,
        eventId: parentHandle,
        timeMin: window.start.toISOString(),
        timeMax: window.end.toISOString(),
        maxResults: limit,
        showDeleted: true,
      }, { timeout: this.timeoutMs }),
    )
    if (res instanceof Error) return res
    return mapEvents(res.data.items).slice(0, limit)
  }

  async create(event: DesiredEvent): Promise<RemoteEvent | StoreError> {
    const res = await this.call('create', () =>
      this.api.events.import({
        calendarId: this.calendarId,
        requestBody: toGoogleEvent(event, this.timeZone),
      }, { timeout: this.timeoutMs }),
    )
    if (res instanceof Error) return res
    return toRemoteEvent(res.data) ?? new StoreError({ operation: 'create', reason: `no event id returned for ${event.identity}` })
  }

  async update(handle: string, event: DesiredEvent): Promise<RemoteEvent | StoreError> {
    const res = await this.call('update', () =>
      this.api.events.patch({
        calendarId: this.calendarId,
        eventId: handle,
        requestBody: toGoogleEvent(event, this.timeZone),
      }, { timeout: this.timeoutMs }),
    )
    if (res instanceof Error) return res
    return toRemoteEvent(res.data) ?? new StoreError({ operation: 'update', reason: `no event id returned for ${handle}` })
  }

  async delete(handle: string): Promise<DeleteResult | StoreError> {
    const res = await errore.tryAsync({
      try: () =>
        withRetry(() =>
          this.api.events.delete({ calendarId: this.calendarId, eventId: handle }, { timeout: this.timeoutMs }),
        ),
      catch: (err) => new StoreError({ operation: 'delete', reason: String(err), cause: err }),
    })
    if (!(res instanceof Error)) return 'deleted'
    // 410 Gone / 404: resource has been deleted already
    if (isGoneError(res.cause)) return 'gone'
    return res
  }
}

// ---------------------------------------------------------------------------
// CalendarClient
// ---------------------------------------------------------------------------

export class CalendarClient {
  private api: calendar_v3.Calendar
  private account: string
  private timeoutMs: number
  private calendarCache: CalendarListItem[] | null = null

  constructor({ auth, account, timeoutMs }: { auth: OAuth2Client; account: string; timeoutMs?: number }) {
    this.api = calendarApi({ version: 'v3', auth })
    this.account = account
    this.timeoutMs = timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  // =========================================================================
  // Calendar list
  // =========================================================================

  async listCalendars(): Promise<CalendarListItem[] | AuthError | StoreError> {
    if (this.calendarCache) return this.calendarCache

    const result: CalendarListItem[] = []
    let pageToken: string | undefined
    do {
      const res = await googleBoundary(this.account, 'calendarList', () =>
        this.api.calendarList.list({ maxResults: 250, pageToken }, { timeout: this.timeoutMs }),
      )
      if (res instanceof Error) return res

      for (const cal of res.data.items ?? []) {
        if (!cal.id) continue
        result.push({
          id: cal.id,
          summary: cal.summaryOverride ?? cal.summary ?? cal.id,
          primary: cal.primary ?? false,
          role: cal.accessRole ?? 'reader',
          timezone: cal.timeZone ?? 'UTC',
          backgroundColor: cal.backgroundColor ?? '',
        })
      }
      pageToken = res.data.nextPageToken ?? undefined
    } while (pageToken)

    this.calendarCache = result
    return result
  }

  /** Resolve a calendar id or name. 'primary' maps to the account's own calendar. */
  async resolveCalendar(idOrName: string): Promise<CalendarListItem | AuthError | StoreError | NotFoundError> {
    const calendars = await this.listCalendars()
    if (calendars instanceof Error) return calendars

    const match =
      calendars.find((c) => c.id === idOrName) ??
      (idOrName === 'primary' ? calendars.find((c) => c.primary) : undefined) ??
      calendars.find((c) => c.summary === idOrName) ??
      calendars.find((c) => c.summary.toLowerCase() === idOrName.toLowerCase())

    if (!match) {
      return new NotFoundError({ resource: `calendar "${idOrName}". Available: ${calendars.map((c) => c.summary).join(', ')}` })
    }
    return match
  }

  async createCalendar({ summary, timezone }: { summary: string; timezone: string }): Promise<CalendarListItem | AuthError | StoreError> {
    const res = await googleBoundary(this.account, 'createCalendar', () =>
      this.api.calendars.insert({ requestBody: { summary, timeZone: timezone } }, { timeout: this.timeoutMs }),
    )
    if (res instanceof Error) return res
    if (!res.data.id) return new StoreError({ operation: 'createCalendar', reason: `no calendar id returned for ${summary}` })

    this.calendarCache = null
    return {
      id: res.data.id,
      summary: res.data.summary ?? summary,
      primary: false,
      role: 'owner',
      timezone: res.data.timeZone ?? timezone,
      backgroundColor: '',
    }
  }

  /** Resolve by name, creating the calendar when it does not exist yet. */
  async ensureCalendar({ summary, timezone }: { summary: string; timezone: string }): Promise<CalendarListItem | AuthError | StoreError> {
    const existing = await this.resolveCalendar(summary)
    if (!(existing instanceof NotFoundError)) return existing
    return this.createCalendar({ summary, timezone })
  }

  store(calendar: CalendarListItem): GoogleCalendarStore {
    return new GoogleCalendarStore(this.api, {
      calendarId: calendar.id,
      account: this.account,
      timeZone: calendar.timezone,
      timeoutMs: this.timeoutMs,
    })
  }
}
