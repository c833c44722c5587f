// Matcher: resolves the remote counterpart of a DesiredEvent.
// Series and single events are looked up by identity across the unbounded
// window without recurrence expansion. Recurrence instances first resolve
// their series, then the series' expanded occurrence around the instance's
// window. Read-only: no store mutation happens here.

import { AmbiguousMatchError, StoreError } from './api-utils.js'
import { UNBOUNDED_WINDOW, eventTimeToDate, eventTimesEqual, eventTimeKey } from './calendar-time.js'
import type { CalendarStore } from './calendar-store.js'
import type { OutcomeLedger } from './ledger.js'
import type { Logger } from './logger.js'
import type { DesiredEvent, RecurrenceInstanceRef, RemoteEvent, TimeWindow } from './types.js'

export type MatchResult =
  | { kind: 'duplicate' }
  | { kind: 'missing' }
  | { kind: 'found'; remote: RemoteEvent }

const DAY_MS = 24 * 60 * 60 * 1000
const INSTANCE_LIMIT = 10

/** Window covering both the occurrence being replaced (RECURRENCE-ID) and the
 *  instance's own start/end, padded by a day for all-day events whose
 *  midnight depends on the calendar's time zone. */
export function instanceWindow(desired: DesiredEvent, ref: RecurrenceInstanceRef): TimeWindow {
  const times = [ref.recurrenceId, desired.start, desired.end].map((t) => eventTimeToDate(t).getTime())
  const allDay = desired.start.type === 'date' || ref.recurrenceId.type === 'date'
  const pad = allDay ? DAY_MS : 0
  const start = Math.min(...times) - pad
  const end = Math.max(Math.max(...times), eventTimeToDate(ref.recurrenceId).getTime() + 60_000) + pad
  return { start: new Date(start), end: new Date(end) }
}

export class Matcher {
  constructor(
    private store: CalendarStore,
    private ledger: OutcomeLedger,
    private logger: Logger,
  ) {}

  async resolve(key: string, desired: DesiredEvent): Promise<MatchResult | AmbiguousMatchError | StoreError> {
    if (this.ledger.has(key)) return { kind: 'duplicate' }

    const series = await this.findSeries(desired.identity)
    if (series instanceof Error) return series

    if (!desired.instanceOf) {
      return series ? { kind: 'found', remote: series } : { kind: 'missing' }
    }

    if (!series) {
      return new AmbiguousMatchError({ what: 'parent series', identity: desired.identity, count: '0' })
    }
    return this.findInstance(series, desired, desired.instanceOf)
  }

  /** Lookup by identity, no expansion. Modified occurrences that the store
   *  reports alongside their series share its identity and are skipped. */
  private async findSeries(identity: string): Promise<RemoteEvent | null | AmbiguousMatchError | StoreError> {
    const results = await this.store.query({ identity, window: UNBOUNDED_WINDOW, expandRecurrence: false })
    if (results instanceof Error) return results

    const candidates = results.filter((r) => r.identity === identity && !r.recurringEventHandle)
    this.logger.debug(`Lookup ${identity}: ${candidates.length} candidate(s)`)
    if (candidates.length > 1) {
      return new AmbiguousMatchError({ what: 'remote event', identity, count: String(candidates.length) })
    }
    return candidates[0] ?? null
  }

  private async findInstance(
    series: RemoteEvent,
    desired: DesiredEvent,
    ref: RecurrenceInstanceRef,
  ): Promise<MatchResult | AmbiguousMatchError | StoreError> {
    const window = instanceWindow(desired, ref)
    const results = await this.store.queryInstances({ parentHandle: series.handle, window, limit: INSTANCE_LIMIT })
    if (results instanceof Error) return results

    // Prefer the occurrence whose original start is the RECURRENCE-ID
    const exact = results.filter((r) => r.originalStart && eventTimesEqual(r.originalStart, ref.recurrenceId))
    const candidates = exact.length > 0 ? exact : results.filter((r) => !r.originalStart)

    const what = `instance ${eventTimeKey(ref.recurrenceId)}`
    if (candidates.length !== 1) {
      return new AmbiguousMatchError({ what, identity: desired.identity, count: String(candidates.length) })
    }
    return { kind: 'found', remote: candidates[0]! }
  }
}
