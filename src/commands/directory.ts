// Directory command: mirror the sub-calendars of a Confluence Team Calendars
// instance, each into a Google calendar named <prefix><sub-calendar name>.
// Missing target calendars are created in the sub-calendar's time zone.

import type { Goke } from 'goke'
import { z } from 'zod'
import { resolveDirectorySettings } from '../config.js'
import { ConfluenceDirectory } from '../confluence-directory.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import { runDirectory, type TargetResolver } from '../sync-runner.js'
import { openSession, runOnceOrEvery, runOptions } from './sync.js'

export function registerDirectoryCommands(cli: Goke) {
  cli
    .command('directory sync', 'Mirror every (or each named) Confluence sub-calendar into its own Google calendar')
    .option('--confluence-url <url>', z.string().describe('Confluence base URL (env: CONFLUENCE_URL)'))
    .option('--confluence-username <username>', z.string().describe('Confluence user (env: CONFLUENCE_USERNAME)'))
    .option('--confluence-password <password>', z.string().describe('Confluence password or token (env: CONFLUENCE_PASSWORD)'))
    .option('--prefix <prefix>', z.string().describe('Prefix for target calendar names (env: CONFLUENCE_CALENDAR_PREFIX)'))
    .option('--calendar <calendar>', z.array(z.string()).describe('Sub-calendar name or id to mirror, repeatable (env: CONFLUENCE_CALENDARS, comma-separated)'))
    .option('--proxy <proxy>', z.string().describe('Forward proxy for Confluence (env: PROXY)'))
    .option('--clear', z.boolean().describe('Delete every event in each target before importing (env: CLEAR)'))
    .option('--delete', z.boolean().describe('Delete events that are not in the feed (env: DELETE)'))
    .option('--ignore-revision', z.boolean().describe('Update even when the calendar holds a higher SEQUENCE'))
    .option('--dry-run', z.boolean().describe('Log what would change without writing'))
    .option('--include-past', z.boolean().describe('With --delete, also delete past events'))
    .option('--interval <interval>', z.string().describe('Repeat every interval, e.g. 90, 30m, 2h (env: INTERVAL)'))
    .option('--debug', z.boolean().describe('Debug logging (env: DEBUG)'))
    .option('--credentials <credentials>', z.string().describe('OAuth client JSON (env: CREDENTIALS_PATH)'))
    .option('--token <token>', z.string().describe('Token file written by login (env: TOKEN_PATH)'))
    .option('--store-timeout <seconds>', z.number().describe('Timeout per calendar API call in seconds (env: STORE_TIMEOUT)'))
    .action(async (options) => {
      const { env, settings, logger, client } = await openSession({
        proxy: options.proxy,
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

      const dir = resolveDirectorySettings({
        confluenceUrl: options.confluenceUrl,
        confluenceUsername: options.confluenceUsername,
        confluencePassword: options.confluencePassword,
        prefix: options.prefix,
        calendar: options.calendar,
      }, env)
      if (dir instanceof Error) handleCommandError(dir)

      const directory = new ConfluenceDirectory(dir.baseUrl, {
        auth: dir.auth,
        proxy: settings.proxy,
        timeoutMs: settings.storeTimeoutMs,
      })

      const resolveTarget: TargetResolver = async (name, timezone) => {
        const calendar = await client.ensureCalendar({ summary: name, timezone })
        if (calendar instanceof Error) return calendar
        return client.store(calendar)
      }

      await runOnceOrEvery(settings, logger, async () => {
        const report = await runDirectory(directory, resolveTarget, { logger }, {
          ...runOptions(settings),
          prefix: dir.prefix,
          calendars: dir.calendars,
        })
        out.printYaml(report)
        return report
      })
    })
}
