// Sync command: mirror one iCalendar feed (file or URL) into a Google calendar.
// Every flag falls back to its environment variable (see config.ts), so the
// calendar and the feed may also come from CALENDAR and ICS_URL.
// Prints the run report as YAML; exit status 1 when the run produced nothing.

import type { Goke } from 'goke'
import { z } from 'zod'
import { authenticate } from '../auth.js'
import { CalendarClient } from '../calendar-client.js'
import { loadEnvConfig, resolveSyncSettings, type EnvConfig, type SyncFlags, type SyncSettings } from '../config.js'
import { createLogger, parseLogLevel, type Logger } from '../logger.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import { runEvery, runSync, type RunOptions } from '../sync-runner.js'

// ---------------------------------------------------------------------------
// Shared by sync and directory sync
// ---------------------------------------------------------------------------

export interface Session {
  env: EnvConfig
  settings: SyncSettings
  logger: Logger
  client: CalendarClient
}

/** Validate flags and environment, then authenticate against Google. */
export async function openSession(flags: SyncFlags): Promise<Session> {
  const env = loadEnvConfig()
  if (env instanceof Error) handleCommandError(env)

  const settings = resolveSyncSettings(flags, env)
  if (settings instanceof Error) handleCommandError(settings)

  const logger = createLogger({ name: 'calmirror', level: parseLogLevel(settings.debug) })

  const auth = await authenticate(settings, logger)
  if (auth instanceof Error) handleCommandError(auth)

  const client = new CalendarClient({ auth: auth.auth, account: auth.account, timeoutMs: settings.storeTimeoutMs })
  return { env, settings, logger, client }
}

export function runOptions(settings: SyncSettings): RunOptions {
  return {
    clear: settings.clear,
    deleteFringe: settings.deleteFringe,
    ignoreRevision: settings.ignoreRevision,
    dryRun: settings.dryRun,
    includePast: settings.includePast,
  }
}

/** Run once (exit status from the result) or every interval until SIGINT/SIGTERM. */
export async function runOnceOrEvery(
  settings: SyncSettings,
  logger: Logger,
  run: () => Promise<{ ok: boolean }>,
): Promise<void> {
  if (settings.intervalMs === null) {
    const result = await run()
    process.exitCode = result.ok ? 0 : 1
    return
  }

  const controller = new AbortController()
  const stop = () => {
    logger.info('Stopping')
    controller.abort()
  }
  process.once('SIGINT', stop)
  process.once('SIGTERM', stop)
  await runEvery(settings.intervalMs, run, { logger, signal: controller.signal })
}

// ---------------------------------------------------------------------------
// Register commands
// ---------------------------------------------------------------------------

export function registerSyncCommands(cli: Goke) {
  cli
    .command('sync [calendar] [source]', 'Mirror an iCalendar feed (file or URL) into a Google calendar (id, name or "primary")')
    .option('--proxy <proxy>', z.string().describe('Forward proxy for fetching the feed (env: PROXY)'))
    .option('--username <username>', z.string().describe('Basic auth user for the feed (env: ICS_USERNAME)'))
    .option('--password <password>', z.string().describe('Basic auth password for the feed (env: ICS_PASSWORD)'))
    .option('--clear', z.boolean().describe('Delete every event in the calendar before importing (env: CLEAR)'))
    .option('--delete', z.boolean().describe('Delete events that are not in the feed (env: DELETE)'))
    .option('--ignore-revision', z.boolean().describe('Update even when the calendar holds a higher SEQUENCE'))
    .option('--dry-run', z.boolean().describe('Log what would change without writing'))
    .option('--include-past', z.boolean().describe('With --delete, also delete past events'))
    .option('--interval <interval>', z.string().describe('Repeat every interval, e.g. 90, 30m, 2h (env: INTERVAL)'))
    .option('--debug', z.boolean().describe('Debug logging (env: DEBUG)'))
    .option('--credentials <credentials>', z.string().describe('OAuth client JSON (env: CREDENTIALS_PATH)'))
    .option('--token <token>', z.string().describe('Token file written by login (env: TOKEN_PATH)'))
    .option('--store-timeout <seconds>', z.number().describe('Timeout per calendar API call in seconds (env: STORE_TIMEOUT)'))
    .action(async (calendarArg, sourceArg, options) => {
      const { env, settings, logger, client } = await openSession({
        proxy: options.proxy,
        username: options.username,
        password: options.password,
        clear: options.clear,
        delete: options.delete,
        ignoreRevision: options.ignoreRevision,
        dryRun: options.dryRun,
        includePast: options.includePast,
        interval: options.interval,
        debug: options.debug,
        credentials: options.credentials,
        token: options.token,
        storeTimeout: options.storeTimeout,
      })

      const calendarName = calendarArg ?? env.CALENDAR
      const source = sourceArg ?? env.ICS_URL
      if (!calendarName || !source) {
        out.error('Both a calendar and a feed are required: calmirror sync <calendar> <source> (or CALENDAR and ICS_URL)')
        process.exit(1)
      }

      const target = await client.resolveCalendar(calendarName)
      if (target instanceof Error) handleCommandError(target)
      logger.info(`Target calendar: ${target.summary} (${target.id})`)

      const store = client.store(target)
      const fetch = { proxy: settings.proxy, auth: settings.feedAuth }

      await runOnceOrEvery(settings, logger, async () => {
        const report = await runSync({ source, fetch }, { store, logger }, runOptions(settings))
        out.printYaml({ calendar: target.summary, ...report })
        return report
      })
    })
}
