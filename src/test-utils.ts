// In-process stand-ins used by the tests: a CalendarStore backed by a Map,
// with call recording and fault injection, and a Logger that keeps its lines.

import { StoreError } from './api-utils.js'
import { eventTimeToDate } from './calendar-time.js'
import type { CalendarStore, DeleteResult, EventQuery, InstanceQuery } from './calendar-store.js'
import type { LogLevel, Logger } from './logger.js'
import type { CalendarItem, DesiredEvent, EventTime, RemoteEvent, TimeWindow } from './types.js'

// ---------------------------------------------------------------------------
// MemoryCalendarStore
// ---------------------------------------------------------------------------

export type StoreOperation = 'query' | 'queryInstances' | 'create' | 'update' | 'delete'

export interface StoreCall {
  op: StoreOperation
  /** Identity for query/create, handle for queryInstances/update/delete */
  target?: string
}

interface Fault {
  op: StoreOperation
  target: string
  mode: 'error' | 'throw'
}

function overlaps(event: RemoteEvent, window: TimeWindow): boolean {
  if (!event.start) return true
  const start = eventTimeToDate(event.start).getTime()
  const end = event.end ? eventTimeToDate(event.end).getTime() : start
  return start < window.end.getTime() && Math.max(end, start + 1) > window.start.getTime()
}

function fromDesired(handle: string, desired: DesiredEvent, base?: RemoteEvent): RemoteEvent {
  const remote: RemoteEvent = {
    handle,
    identity: desired.identity,
    summary: desired.summary,
    description: desired.description,
    location: desired.location,
    status: desired.status,
    transparency: desired.transparency,
    start: desired.start,
    end: desired.end,
    recurrence: [...desired.recurrence],
  }
  const revision = desired.revision ?? base?.revision
  if (revision !== undefined) remote.revision = revision
  if (base?.recurringEventHandle) remote.recurringEventHandle = base.recurringEventHandle
  if (base?.originalStart) remote.originalStart = base.originalStart
  return remote
}

export class MemoryCalendarStore implements CalendarStore {
  readonly calls: StoreCall[] = []
  private events = new Map<string, RemoteEvent>()
  private faults: Fault[] = []
  private nextId = 1
  /** Applied to the stored copy of every created event (store quirks) */
  createQuirk: ((event: RemoteEvent) => RemoteEvent) | null = null
  /** Applied to the stored copy of every updated event */
  updateQuirk: ((event: RemoteEvent) => RemoteEvent) | null = null
  /** Occurrences the store expands a created series into */
  occurrencesOf: ((series: RemoteEvent) => Array<{ start: EventTime; end: EventTime }>) | null = null

  /** Put an event in the store without recording a call. */
  seed(event: Partial<RemoteEvent> & { identity: string }): RemoteEvent {
    const handle = event.handle ?? `evt-${this.nextId++}`
    const stored: RemoteEvent = {
      summary: '',
      description: '',
      location: '',
      recurrence: [],
      ...event,
      handle,
    }
    this.events.set(handle, stored)
    return stored
  }

  /** Fail every call of `op` whose identity or handle equals `target`. */
  failOn(op: StoreOperation, target: string, mode: Fault['mode'] = 'error'): void {
    this.faults.push({ op, target, mode })
  }

  list(): RemoteEvent[] {
    return [...this.events.values()]
  }

  get(handle: string): RemoteEvent | undefined {
    return this.events.get(handle)
  }

  findByIdentity(identity: string): RemoteEvent[] {
    return this.list().filter((e) => e.identity === identity)
  }

  /** create/update/delete calls recorded so far */
  mutations(): StoreCall[] {
    return this.calls.filter((c) => c.op === 'create' || c.op === 'update' || c.op === 'delete')
  }

  private enter(op: StoreOperation, target?: string): StoreError | null {
    this.calls.push(target === undefined ? { op } : { op, target })
    const fault = this.faults.find((f) => f.op === op && f.target === target)
    if (!fault) return null
    if (fault.mode === 'throw') throw new Error(`${op} exploded for ${target}`)
    return new StoreError({ operation: op, reason: `injected fault for ${target}` })
  }

  async query({ identity, window }: EventQuery): Promise<RemoteEvent[] | StoreError> {
    const fault = this.enter('query', identity)
    if (fault) return fault
    return this.list().filter((e) => (identity === undefined || e.identity === identity) && overlaps(e, window))
  }

  async queryInstances({ parentHandle, window, limit }: InstanceQuery): Promise<RemoteEvent[] | StoreError> {
    const fault = this.enter('queryInstances', parentHandle)
    if (fault) return fault
    return this.list()
      .filter((e) => e.recurringEventHandle === parentHandle && overlaps(e, window))
      .slice(0, limit)
  }

  async create(event: DesiredEvent): Promise<RemoteEvent | StoreError> {
    const fault = this.enter('create', event.identity)
    if (fault) return fault
    const created = fromDesired(`evt-${this.nextId++}`, event)
    const stored = this.createQuirk ? this.createQuirk(created) : created
    this.events.set(stored.handle, stored)
    this.materialize(stored)
    return stored
  }

  private materialize(series: RemoteEvent): void {
    if (!this.occurrencesOf || series.recurrence.length === 0) return
    for (const { start, end } of this.occurrencesOf(series)) {
      this.seed({
        identity: series.identity,
        summary: series.summary,
        description: series.description,
        location: series.location,
        status: series.status,
        transparency: series.transparency,
        start,
        end,
        recurringEventHandle: series.handle,
        originalStart: start,
      })
    }
  }

  async update(handle: string, event: DesiredEvent): Promise<RemoteEvent | StoreError> {
    const fault = this.enter('update', handle)
    if (fault) return fault
    const existing = this.events.get(handle)
    if (!existing) return new StoreError({ operation: 'update', reason: `no event ${handle}` })
    const updated = fromDesired(handle, event, existing)
    const stored = this.updateQuirk ? this.updateQuirk(updated) : updated
    this.events.set(handle, stored)
    return stored
  }

  async delete(handle: string): Promise<DeleteResult | StoreError> {
    const fault = this.enter('delete', handle)
    if (fault) return fault
    return this.events.delete(handle) ? 'deleted' : 'gone'
  }
}

// ---------------------------------------------------------------------------
// RecordingLogger
// ---------------------------------------------------------------------------

export interface LogLine {
  level: LogLevel
  name: string
  msg: string
}

export class RecordingLogger implements Logger {
  constructor(
    readonly lines: LogLine[] = [],
    private name = 'test',
  ) {}

  private push(level: LogLevel, msg: string): void {
    this.lines.push({ level, name: this.name, msg })
  }

  debug(msg: string): void { this.push('debug', msg) }
  info(msg: string): void { this.push('info', msg) }
  warn(msg: string): void { this.push('warn', msg) }
  error(msg: string): void { this.push('error', msg) }
  critical(msg: string): void { this.push('critical', msg) }

  child(name: string): Logger {
    return new RecordingLogger(this.lines, `${this.name}:${name}`)
  }

  messages(level: LogLevel): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.msg)
  }
}

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

export function dateTime(dateTime: string, timeZone?: string): EventTime {
  return timeZone ? { type: 'dateTime', dateTime, timeZone } : { type: 'dateTime', dateTime }
}

export function allDay(date: string): EventTime {
  return { type: 'date', date }
}

/** A one-hour feed item on 2030-05-06 unless overridden. */
export function feedItem(
  identity: string,
  fields: CalendarItem['fields'] = {},
  extra: Omit<CalendarItem, 'identity' | 'fields'> = {},
): CalendarItem {
  return {
    identity,
    ...extra,
    fields: {
      summary: `Event ${identity}`,
      start: dateTime('2030-05-06T10:00:00Z'),
      end: dateTime('2030-05-06T11:00:00Z'),
      ...fields,
    },
  }
}
