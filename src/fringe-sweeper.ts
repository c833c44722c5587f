// Fringe Sweeper: after a reconciliation pass, delete remote events whose
// identity the run did not keep (created ∪ updated ∪ untouched).
// Deletion is best-effort: "already gone" counts as deleted, other failures
// are reported and the sweep continues. Also hosts clearCalendar (--clear).

import * as errore from 'errore'
import { StoreError } from './api-utils.js'
import { FAR_FUTURE, FAR_PAST, UNBOUNDED_WINDOW } from './calendar-time.js'
import type { CalendarStore, DeleteResult } from './calendar-store.js'
import type { OutcomeLedger } from './ledger.js'
import type { Logger } from './logger.js'
import type { RemoteEvent } from './types.js'

export interface SweepOptions {
  /** Sweep from 1970 instead of from now */
  includePast?: boolean
  dryRun?: boolean
  now?: Date
}

export interface DeletionReport {
  /** Deleted, already gone, or (dry-run) would be deleted */
  deleted: RemoteEvent[]
  failed: Array<{ event: RemoteEvent; error: StoreError }>
}

/** A ledger with nothing kept comes from a failed or empty feed read;
 *  sweeping after it would delete every remote event. */
export function shouldSweep(ledger: OutcomeLedger, dryRun = false): boolean {
  return dryRun || ledger.keptIdentities().size > 0
}

async function deleteEvents(
  store: CalendarStore,
  events: RemoteEvent[],
  { dryRun = false, logger }: { dryRun?: boolean; logger: Logger },
): Promise<DeletionReport> {
  const report: DeletionReport = { deleted: [], failed: [] }

  for (const event of events) {
    if (dryRun) {
      logger.info(`[dry-run] Would delete "${event.summary}" (${event.identity})`)
      report.deleted.push(event)
      continue
    }

    const result = await errore.tryAsync({
      try: (): Promise<DeleteResult | StoreError> => store.delete(event.handle),
      catch: (err) => new StoreError({ operation: 'delete', reason: String(err), cause: err }),
    })
    if (result instanceof Error) {
      logger.error(`Failed to delete "${event.summary}" (${event.identity}): ${result.message}`)
      report.failed.push({ event, error: result })
      continue
    }
    if (result === 'gone') logger.debug(`${event.identity} was already deleted`)
    report.deleted.push(event)
  }

  return report
}

export async function sweepFringe(
  ledger: OutcomeLedger,
  store: CalendarStore,
  logger: Logger,
  { includePast = false, dryRun = false, now = new Date() }: SweepOptions = {},
): Promise<DeletionReport | StoreError> {
  const lowerBound = includePast ? FAR_PAST : now
  const remote = await store.query({ window: { start: lowerBound, end: FAR_FUTURE }, expandRecurrence: false })
  if (remote instanceof Error) return remote

  const kept = ledger.keptIdentities()
  const fringe = remote.filter((event) => !kept.has(event.identity))
  for (const event of fringe) {
    logger.warn(`Fringe event found: "${event.summary}" (${event.identity})${dryRun ? '' : ', deleting it'}`)
  }

  return deleteEvents(store, fringe, { dryRun, logger })
}

/** Delete every event in the calendar (--clear). */
export async function clearCalendar(
  store: CalendarStore,
  logger: Logger,
  { dryRun = false }: { dryRun?: boolean } = {},
): Promise<DeletionReport | StoreError> {
  const remote = await store.query({ window: UNBOUNDED_WINDOW, expandRecurrence: false })
  if (remote instanceof Error) return remote

  logger.warn(`Clearing ${remote.length} events from the calendar`)
  return deleteEvents(store, remote, { dryRun, logger })
}
