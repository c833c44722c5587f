// One mirror run and the loops around it.
//   runSync:      clear? → read feed → reconcile → sweep fringe? → report
//   runDirectory: runSync for every selected sub-calendar of a directory
//   runEvery:     repeat a run every interval until aborted
// A feed that cannot be read ends the run with an empty ledger; the caller
// turns that into exit status 1.

import { setTimeout as sleep } from 'node:timers/promises'
import * as errore from 'errore'
import type { CalendarStore } from './calendar-store.js'
import { selectDirectoryCalendars, targetCalendarName, type CalendarDirectory } from './confluence-directory.js'
import { readFeed } from './feed-reader.js'
import { clearCalendar, shouldSweep, sweepFringe } from './fringe-sweeper.js'
import { redactUrl, type FetchOptions } from './http-fetch.js'
import { summarizeLedger, type LedgerSummary } from './ledger.js'
import type { Logger } from './logger.js'
import { reconcile } from './reconciler.js'
import type { CalendarItem } from './types.js'

export type ReadItems = (source: string, opts: FetchOptions & { logger?: Logger }) => Promise<CalendarItem[] | Error>

export interface RunDeps {
  store: CalendarStore
  logger: Logger
  /** Feed reader, readFeed unless replaced */
  readItems?: ReadItems
}

export interface RunOptions {
  clear?: boolean
  deleteFringe?: boolean
  ignoreRevision?: boolean
  dryRun?: boolean
  includePast?: boolean
  now?: () => Date
}

export interface SyncJob {
  source: string
  fetch?: FetchOptions
}

export interface RunReport {
  source: string
  /** False when the run produced no ledger entries */
  ok: boolean
  error?: string
  summary: LedgerSummary
  cleared?: { deleted: number; failed: number }
  fringe?: { deleted: number; failed: number }
}

function emptySummary(): LedgerSummary {
  return {
    total: 0,
    counts: { created: 0, updated: 0, untouched: 0, duplicate: 0, unsupported: 0, failed: 0 },
    failed: [],
    unsupported: [],
  }
}

export async function runSync(job: SyncJob, deps: RunDeps, opts: RunOptions = {}): Promise<RunReport> {
  const { store, logger, readItems = readFeed } = deps
  const dryRun = opts.dryRun ?? false
  const report: RunReport = { source: redactUrl(job.source), ok: false, summary: emptySummary() }

  if (opts.clear) {
    const cleared = await clearCalendar(store, logger, { dryRun })
    if (cleared instanceof Error) {
      logger.error(`Could not clear the calendar: ${cleared.message}`)
    } else {
      report.cleared = { deleted: cleared.deleted.length, failed: cleared.failed.length }
    }
  }

  const items = await readItems(job.source, { ...job.fetch, logger })
  if (items instanceof Error) {
    logger.critical(items.message)
    report.error = items.message
    return report
  }
  logger.info(`Read ${items.length} events from ${report.source}`)

  const ledger = await reconcile(items, { store, logger }, { dryRun, ignoreRevisionGate: opts.ignoreRevision })
  report.summary = summarizeLedger(ledger)
  report.ok = ledger.size > 0

  if (opts.deleteFringe) {
    if (shouldSweep(ledger, dryRun)) {
      const now = opts.now?.() ?? new Date()
      const swept = await sweepFringe(ledger, store, logger, { includePast: opts.includePast, dryRun, now })
      if (swept instanceof Error) {
        logger.error(`Fringe sweep failed: ${swept.message}`)
      } else {
        report.fringe = { deleted: swept.deleted.length, failed: swept.failed.length }
      }
    } else {
      logger.warn('No event was kept in this run, skipping fringe deletion')
    }
  }

  const { counts } = report.summary
  logger.info(
    `Done: ${counts.created} created, ${counts.updated} updated, ${counts.untouched} untouched, ` +
    `${counts.failed} failed, ${counts.unsupported} unsupported, ${counts.duplicate} duplicate`,
  )
  return report
}

// ---------------------------------------------------------------------------
// Directory mode
// ---------------------------------------------------------------------------

/** Open the store for a target calendar, creating the calendar if needed. */
export type TargetResolver = (name: string, timezone: string) => Promise<CalendarStore | Error>

export interface DirectoryRunOptions extends RunOptions {
  prefix: string
  calendars: string[]
}

export interface DirectoryReport {
  ok: boolean
  error?: string
  calendars: Array<RunReport & { calendar: string; target: string }>
}

export async function runDirectory(
  directory: CalendarDirectory,
  resolveTarget: TargetResolver,
  deps: Omit<RunDeps, 'store'>,
  opts: DirectoryRunOptions,
): Promise<DirectoryReport> {
  const { logger } = deps
  const listed = await directory.list()
  if (listed instanceof Error) {
    logger.critical(listed.message)
    return { ok: false, error: listed.message, calendars: [] }
  }

  const { selected, missing } = selectDirectoryCalendars(listed, opts.calendars)
  for (const name of missing) logger.warn(`Calendar "${name}" is not in the directory`)
  if (selected.length === 0) {
    logger.error('No directory calendar selected')
    return { ok: false, error: 'no directory calendar selected', calendars: [] }
  }

  const reports: DirectoryReport['calendars'] = []
  for (const calendar of selected) {
    const target = targetCalendarName(opts.prefix, calendar)
    const calLogger = logger.child(calendar.name)

    const store = await resolveTarget(target, calendar.timezone)
    if (store instanceof Error) {
      calLogger.error(`Cannot open target calendar "${target}": ${store.message}`)
      reports.push({ calendar: calendar.name, target, source: calendar.feedUrl, ok: false, error: store.message, summary: emptySummary() })
      continue
    }

    const report = await runSync(
      { source: calendar.feedUrl, fetch: directory.feedOptions() },
      { ...deps, store, logger: calLogger },
      opts,
    )
    reports.push({ calendar: calendar.name, target, ...report })
  }

  return { ok: reports.every((r) => r.ok), calendars: reports }
}

// ---------------------------------------------------------------------------
// Periodic mode
// ---------------------------------------------------------------------------

export interface LoopOptions {
  logger: Logger
  signal?: AbortSignal
  wait?: (ms: number, signal?: AbortSignal) => Promise<unknown>
}

function formatInterval(ms: number): string {
  if (ms % 3_600_000 === 0) return `${ms / 3_600_000}h`
  if (ms % 60_000 === 0) return `${ms / 60_000}m`
  return `${ms / 1000}s`
}

/** Run `fn` now and then every `intervalMs` until the signal aborts.
 *  A run that throws is logged and the loop goes on. */
export async function runEvery(
  intervalMs: number,
  fn: () => Promise<unknown>,
  { logger, signal, wait = (ms, s) => sleep(ms, undefined, { signal: s }) }: LoopOptions,
): Promise<void> {
  while (!signal?.aborted) {
    const result = await errore.tryAsync({
      try: fn,
      catch: (err) => new Error(`Run failed: ${String(err)}`, { cause: err }),
    })
    if (result instanceof Error) logger.error(result.message)
    if (signal?.aborted) break

    logger.info(`Sleeping for ${formatInterval(intervalMs)}`)
    const slept = await errore.tryAsync({
      try: () => wait(intervalMs, signal),
      catch: (err) => new Error(String(err), { cause: err }),
    })
    // Aborted while sleeping
    if (slept instanceof Error && signal?.aborted) break
    if (slept instanceof Error) logger.error(slept.message)
  }
}
