#!/usr/bin/env node

// calmirror: mirror iCalendar feeds into Google Calendar, built on goke.
// Entry point: registers all commands, help, and version.
// Uses goke for command parsing with zod schemas for type-safe options.

import { goke } from 'goke'
import { registerAuthCommands } from './commands/auth-cmd.js'
import { registerCalendarCommands } from './commands/calendar.js'
import { registerDirectoryCommands } from './commands/directory.js'
import { registerSyncCommands } from './commands/sync.js'

const cli = goke('calmirror')

// ---------------------------------------------------------------------------
// Register all command modules (auth first so login/whoami appear at top of --help)
// ---------------------------------------------------------------------------

registerAuthCommands(cli)
registerSyncCommands(cli)
registerDirectoryCommands(cli)
registerCalendarCommands(cli)

// ---------------------------------------------------------------------------
// Help & version
// ---------------------------------------------------------------------------

cli.help()
cli.version('0.1.0')

// ---------------------------------------------------------------------------
// Parse & run
// ---------------------------------------------------------------------------

cli.parse()
