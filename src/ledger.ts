// Outcome ledger for one reconciliation run.
// One entry per distinct ledger key, first occurrence wins. Built by the
// reconciler, read once by the fringe sweeper and the run summary, then dropped.

import { eventTimeKey } from './calendar-time.js'
import type { CalendarItem, RemoteEvent } from './types.js'

export type Outcome = 'created' | 'updated' | 'untouched' | 'duplicate' | 'unsupported' | 'failed'

/** Outcomes whose identities the fringe sweeper must keep. */
const KEPT_OUTCOMES: ReadonlySet<Outcome> = new Set<Outcome>(['created', 'updated', 'untouched'])

export interface LedgerEntry {
  key: string
  identity: string
  outcome: Outcome
  remote?: RemoteEvent
  error?: Error
  /** Dry-run entry: the action was only logged, no store write happened */
  synthetic: boolean
}

/** Identity for a series or single event; identity plus RECURRENCE-ID for an
 *  instance, since instances share their series' UID. */
export function ledgerKey(item: Pick<CalendarItem, 'identity' | 'recurrenceInstanceOf'>): string {
  if (!item.recurrenceInstanceOf) return item.identity
  return `${item.identity}#${eventTimeKey(item.recurrenceInstanceOf.recurrenceId)}`
}

export class OutcomeLedger {
  private entries = new Map<string, LedgerEntry>()
  private duplicates: LedgerEntry[] = []
  /** Items without a UID share the empty key, so they are kept apart */
  private unidentified: LedgerEntry[] = []

  /** True once a key has been finalized in this run */
  has(key: string): boolean {
    return this.entries.has(key)
  }

  get(key: string): LedgerEntry | undefined {
    return this.entries.get(key)
  }

  /** Record the outcome for a key. A key that is already present is
   *  recorded as a duplicate instead and the first entry stays. */
  record(entry: Omit<LedgerEntry, 'synthetic'> & { synthetic?: boolean }): LedgerEntry {
    const full: LedgerEntry = { ...entry, synthetic: entry.synthetic ?? false }
    if (full.identity === '') {
      this.unidentified.push(full)
      return full
    }
    if (this.entries.has(full.key) || full.outcome === 'duplicate') {
      const dup: LedgerEntry = { key: full.key, identity: full.identity, outcome: 'duplicate', synthetic: full.synthetic }
      this.duplicates.push(dup)
      return dup
    }
    this.entries.set(full.key, full)
    return full
  }

  /** Entries in recording order, items without a UID next, duplicates last */
  all(): LedgerEntry[] {
    return [...this.entries.values(), ...this.unidentified, ...this.duplicates]
  }

  byOutcome(outcome: Outcome): LedgerEntry[] {
    return this.all().filter((e) => e.outcome === outcome)
  }

  get size(): number {
    return this.entries.size + this.unidentified.length + this.duplicates.length
  }

  /** Identities of created ∪ updated ∪ untouched entries */
  keptIdentities(): Set<string> {
    const kept = new Set<string>()
    for (const entry of this.entries.values()) {
      if (KEPT_OUTCOMES.has(entry.outcome)) kept.add(entry.identity)
    }
    return kept
  }

  counts(): Record<Outcome, number> {
    const counts: Record<Outcome, number> = { created: 0, updated: 0, untouched: 0, duplicate: 0, unsupported: 0, failed: 0 }
    for (const entry of this.all()) counts[entry.outcome]++
    return counts
  }
}

// ---------------------------------------------------------------------------
// Run summary
// ---------------------------------------------------------------------------

export interface LedgerSummary {
  total: number
  counts: Record<Outcome, number>
  failed: Array<{ key: string; reason: string }>
  unsupported: Array<{ key: string; reason: string }>
}

export function summarizeLedger(ledger: OutcomeLedger): LedgerSummary {
  const reasons = (outcome: Outcome) =>
    ledger.byOutcome(outcome).map((e) => ({ key: e.key, reason: e.error?.message ?? 'unknown' }))
  return {
    total: ledger.size,
    counts: ledger.counts(),
    failed: reasons('failed'),
    unsupported: reasons('unsupported'),
  }
}
