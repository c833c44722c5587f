// Auth commands: login, whoami.
// login runs the browser OAuth flow and writes the token file that sync,
// directory sync and calendars read; whoami shows what that file holds.

import type { Goke } from 'goke'
import { z } from 'zod'
import { NotFoundError } from '../api-utils.js'
import { login, loadToken } from '../auth.js'
import { loadEnvConfig, resolveSyncSettings, type SyncSettings } from '../config.js'
import * as out from '../output.js'
import { handleCommandError } from '../output.js'

function resolvePaths(flags: { credentials?: string; token?: string }): SyncSettings {
  const env = loadEnvConfig()
  if (env instanceof Error) handleCommandError(env)
  const settings = resolveSyncSettings(flags, env)
  if (settings instanceof Error) handleCommandError(settings)
  return settings
}

export function registerAuthCommands(cli: Goke) {
  cli
    .command('login', 'Authenticate with Google (opens browser). On a headless machine, open the printed URL elsewhere and paste back the localhost redirect URL containing the auth code.')
    .option('--credentials <credentials>', z.string().describe('OAuth client JSON (env: CREDENTIALS_PATH)'))
    .option('--token <token>', z.string().describe('Token file to write (env: TOKEN_PATH)'))
    .action(async (options) => {
      const settings = resolvePaths(options)
      const result = await login(settings)
      if (result instanceof Error) handleCommandError(result)
      out.success(`Authenticated as ${result.account}`)
      out.hint(`Token written to ${result.tokenPath}`)
      process.exit(0)
    })

  cli
    .command('whoami', 'Show the account of the stored token')
    .option('--token <token>', z.string().describe('Token file (env: TOKEN_PATH)'))
    .action(async (options) => {
      const settings = resolvePaths(options)
      const token = loadToken(settings.tokenPath)
      if (token instanceof NotFoundError) {
        out.hint('Not authenticated. Run: calmirror login')
        return
      }
      if (token instanceof Error) handleCommandError(token)

      out.printYaml({
        account: token.account ?? 'unknown',
        token: settings.tokenPath,
        refreshable: Boolean(token.refresh_token),
        expires: typeof token.expiry_date === 'number' ? new Date(token.expiry_date).toISOString() : 'unknown',
      })
    })
}
