// Reconciler: drives normalize → match → compare → write → verify for every
// feed item, one item at a time, and records each outcome in the ledger.
//
//   no remote            -> create, verify, one corrective update -> created | failed
//   remote, equal        -> nothing                               -> untouched
//   remote, not equal    -> update, verify                        -> updated | failed
// Equality ignores the revision counter.
//
// Revision gate: when the store's revision is greater than the feed's the feed
// is stale for that item and it stays untouched, unless ignoreRevisionGate.
// Every failure is per item; the run always continues with the next item.

import * as errore from 'errore'
import { StoreError, UnsupportedItemError, VerificationMismatchError } from './api-utils.js'
import { compareEvents, eventsEqual, formatDifferences } from './comparator.js'
import type { CalendarStore } from './calendar-store.js'
import { OutcomeLedger, ledgerKey, type LedgerEntry } from './ledger.js'
import type { Logger } from './logger.js'
import { Matcher } from './matcher.js'
import { toDesiredEvent } from './normalizer.js'
import type { CalendarItem, DesiredEvent, RemoteEvent } from './types.js'

export interface ReconcileOptions {
  /** Log every action, never mutate the store */
  dryRun?: boolean
  /** Compare and update regardless of revision ordering */
  ignoreRevisionGate?: boolean
}

export interface ReconcileDeps {
  store: CalendarStore
  logger: Logger
}

/** Boundary: a store implementation that throws instead of returning an
 *  error value still only fails the current item. */
function guardStore<T>(operation: string, fn: () => Promise<T | StoreError>): Promise<T | StoreError> {
  return errore.tryAsync({
    try: fn,
    catch: (err) => new StoreError({ operation, reason: String(err), cause: err }),
  })
}

/** Desired fields on top of the remote event's revision. The store refuses a
 *  revision lower than its own, so the larger of the two is written. */
export function mergeOntoRemote(desired: DesiredEvent, remote: RemoteEvent): DesiredEvent {
  const revision = desired.revision === undefined
    ? remote.revision
    : Math.max(desired.revision, remote.revision ?? 0)
  return Object.freeze({ ...desired, revision })
}

/** True when the store holds a newer revision than the feed for this identity. */
export function isStale(desired: DesiredEvent, remote: RemoteEvent): boolean {
  return desired.revision !== undefined && remote.revision !== undefined && remote.revision > desired.revision
}

export class Reconciler {
  private ledger = new OutcomeLedger()
  private matcher: Matcher
  private store: CalendarStore
  private logger: Logger

  constructor({ store, logger }: ReconcileDeps, private opts: ReconcileOptions = {}) {
    this.store = store
    this.logger = logger
    this.matcher = new Matcher(store, this.ledger, logger)
  }

  async run(items: CalendarItem[]): Promise<OutcomeLedger> {
    for (const item of items) {
      await this.reconcileItem(item)
    }
    return this.ledger
  }

  private record(entry: Omit<LedgerEntry, 'synthetic'>): LedgerEntry {
    return this.ledger.record({ ...entry, synthetic: this.opts.dryRun ?? false })
  }

  private fail(key: string, identity: string, error: Error, remote?: RemoteEvent): void {
    this.logger.error(`Failed to reconcile ${key}: ${error.message}`)
    this.record({ key, identity, outcome: 'failed', error, remote })
  }

  async reconcileItem(item: CalendarItem): Promise<void> {
    const key = ledgerKey(item)
    const desired = toDesiredEvent(item)

    if (desired instanceof UnsupportedItemError) {
      if (item.identity && this.ledger.has(key)) {
        this.logger.warn(`Duplicate identity ${key}, skipping`)
        this.record({ key, identity: item.identity, outcome: 'duplicate' })
        return
      }
      this.logger.warn(desired.message)
      this.record({ key, identity: item.identity, outcome: 'unsupported', error: desired })
      return
    }

    this.logger.info(`Processing "${desired.summary}" (${key})${desired.recurrence.length ? ` ${desired.recurrence.join(' ')}` : ''}`)

    // The series only exists in the ledger, the store has nothing to match yet
    if (this.opts.dryRun && desired.instanceOf && !this.ledger.has(key)) {
      const series = this.ledger.get(desired.identity)
      if (series?.synthetic && series.outcome === 'created') {
        this.logger.info(`[dry-run] Would create ${key} with its series`)
        this.record({ key, identity: desired.identity, outcome: 'created' })
        return
      }
    }

    const match = await guardStore('lookup', () => this.matcher.resolve(key, desired))
    if (match instanceof Error) {
      this.fail(key, desired.identity, match)
      return
    }

    switch (match.kind) {
      case 'duplicate':
        this.logger.warn(`Duplicate identity ${key} in feed, skipping`)
        this.record({ key, identity: desired.identity, outcome: 'duplicate' })
        return
      case 'missing':
        await this.createEvent(key, desired)
        return
      case 'found':
        await this.updateEvent(key, desired, match.remote)
        return
    }
  }

  private async createEvent(key: string, desired: DesiredEvent): Promise<void> {
    this.logger.info(`No remote event for ${key}, creating`)
    if (this.opts.dryRun) {
      this.logger.info(`[dry-run] Would create ${key}`)
      this.record({ key, identity: desired.identity, outcome: 'created' })
      return
    }

    const created = await guardStore('create', () => this.store.create(desired))
    if (created instanceof Error) {
      this.fail(key, desired.identity, created)
      return
    }

    const check = compareEvents(desired, created, { ignoreRevision: true })
    if (check.equal) {
      this.logger.info(`Created ${key}`)
      this.record({ key, identity: desired.identity, outcome: 'created', remote: created })
      return
    }

    // Known store quirk: an event is sometimes created in a different state
    // (often cancelled) than requested. One corrective update, then give up.
    this.logger.warn(`Created ${key} differs from the request (${formatDifferences(check.differences)}), updating it`)
    const fixed = await guardStore('update', () => this.store.update(created.handle, mergeOntoRemote(desired, created)))
    if (fixed instanceof Error) {
      this.fail(key, desired.identity, fixed, created)
      return
    }

    const recheck = compareEvents(desired, fixed, { ignoreRevision: true })
    if (!recheck.equal) {
      this.logger.critical(`Corrective update did not help for ${key}`)
      this.fail(key, desired.identity, new VerificationMismatchError({
        identity: key,
        operation: 'create',
        diff: formatDifferences(recheck.differences),
      }), fixed)
      return
    }

    this.logger.info(`Created ${key}`)
    this.record({ key, identity: desired.identity, outcome: 'created', remote: fixed })
  }

  private async updateEvent(key: string, desired: DesiredEvent, remote: RemoteEvent): Promise<void> {
    this.logger.debug(`Found remote event for ${key}: revision feed=${desired.revision ?? '-'} store=${remote.revision ?? '-'}`)

    if (!this.opts.ignoreRevisionGate && isStale(desired, remote)) {
      this.logger.info(`Store has a higher revision for ${key}, skipping`)
      this.record({ key, identity: desired.identity, outcome: 'untouched', remote })
      return
    }

    if (eventsEqual(desired, remote, { ignoreRevision: true })) {
      this.logger.info(`${key} is up to date`)
      this.record({ key, identity: desired.identity, outcome: 'untouched', remote })
      return
    }

    const { differences } = compareEvents(desired, remote, { ignoreRevision: true })
    this.logger.info(`${key} changed (${formatDifferences(differences)}), updating`)
    if (this.opts.dryRun) {
      this.logger.info(`[dry-run] Would update ${key}`)
      this.record({ key, identity: desired.identity, outcome: 'updated', remote })
      return
    }

    const updated = await guardStore('update', () => this.store.update(remote.handle, mergeOntoRemote(desired, remote)))
    if (updated instanceof Error) {
      this.fail(key, desired.identity, updated, remote)
      return
    }

    const recheck = compareEvents(desired, updated, { ignoreRevision: true })
    if (!recheck.equal) {
      this.fail(key, desired.identity, new VerificationMismatchError({
        identity: key,
        operation: 'update',
        diff: formatDifferences(recheck.differences),
      }), updated)
      return
    }

    this.logger.info(`Updated ${key}`)
    this.record({ key, identity: desired.identity, outcome: 'updated', remote: updated })
  }
}

export async function reconcile(
  items: CalendarItem[],
  deps: ReconcileDeps,
  opts: ReconcileOptions = {},
): Promise<OutcomeLedger> {
  return new Reconciler(deps, opts).run(items)
}
