// Calendar commands: list the calendars the token can see, with the ids and
// names sync accepts as its target.

import type { Goke } from 'goke'
import { z } from 'zod'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'
import { openSession } from './sync.js'

// ---------------------------------------------------------------------------
// Register commands
// ---------------------------------------------------------------------------

export function registerCalendarCommands(cli: Goke) {
  // =========================================================================
  // calendars
  // =========================================================================

  cli
    .command('calendars', 'List calendars (id, name, timezone, role)')
    .option('--writable', z.boolean().describe('Only calendars events can be written to'))
    .option('--credentials <credentials>', z.string().describe('OAuth client JSON (env: CREDENTIALS_PATH)'))
    .option('--token <token>', z.string().describe('Token file written by login (env: TOKEN_PATH)'))
    .action(async (options) => {
      const { client } = await openSession({ credentials: options.credentials, token: options.token })

      const calendars = await client.listCalendars()
      if (calendars instanceof Error) handleCommandError(calendars)

      const shown = options.writable
        ? calendars.filter((c) => c.role === 'owner' || c.role === 'writer')
        : calendars

      if (shown.length === 0) {
        out.hint('No calendars found')
        return
      }

      out.printList(
        shown.map((c) => ({
          id: c.id,
          name: c.summary,
          timezone: c.timezone,
          role: c.role,
          primary: c.primary,
        })),
      )
      out.hint(`${shown.length} calendar(s)`)
    })
}
