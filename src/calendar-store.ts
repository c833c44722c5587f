// Calendar Store: the capability the reconciliation engine consumes.
// Implementations return errors as values (StoreError) instead of throwing.
// The Google Calendar implementation lives in calendar-client.ts; tests use
// the in-process MemoryCalendarStore from test-utils.ts.

import type { StoreError } from './api-utils.js'
import type { DesiredEvent, RemoteEvent, TimeWindow } from './types.js'

export interface EventQuery {
  /** Restrict to one identity (iCalendar UID) */
  identity?: string
  window: TimeWindow
  /** Expand recurring series into materialized occurrences */
  expandRecurrence: boolean
}

export interface InstanceQuery {
  parentHandle: string
  window: TimeWindow
  limit: number
}

/** 'gone' means the event was already deleted; callers treat it as success. */
export type DeleteResult = 'deleted' | 'gone'

export interface CalendarStore {
  query(params: EventQuery): Promise<RemoteEvent[] | StoreError>
  queryInstances(params: InstanceQuery): Promise<RemoteEvent[] | StoreError>
  create(event: DesiredEvent): Promise<RemoteEvent | StoreError>
  update(handle: string, event: DesiredEvent): Promise<RemoteEvent | StoreError>
  delete(handle: string): Promise<DeleteResult | StoreError>
}
