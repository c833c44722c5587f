// Run configuration: CLI flags layered over environment variables.
// The environment names match the container entrypoint (CALENDAR, ICS_URL,
// PROXY, CLEAR, DELETE, DEBUG, INTERVAL, ...). Both layers are validated with
// zod; anything invalid comes back as a ValidationError value.

import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { ValidationError } from './api-utils.js'
import { parseInterval } from './calendar-time.js'
import type { BasicAuth } from './http-fetch.js'

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const CONFIG_DIR = path.join(os.homedir(), '.calmirror')
export const DEFAULT_CREDENTIALS_PATH = path.join(CONFIG_DIR, 'credentials.json')
export const DEFAULT_TOKEN_PATH = path.join(CONFIG_DIR, 'token.json')
export const DEFAULT_STORE_TIMEOUT_MS = 30_000

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/** Any non-empty value enables a switch, except the usual spellings of "off". */
const envSwitch = z
  .string()
  .default('')
  .transform((v) => v !== '' && !['0', 'false', 'no', 'off'].includes(v.trim().toLowerCase()))

const envInterval = z
  .string()
  .optional()
  .refine((v) => v === undefined || parseInterval(v) !== null, { message: 'expected a duration such as 90, 30m, 2h or 1d' })
  .transform((v) => (v === undefined ? undefined : parseInterval(v) ?? undefined))

const EnvSchema = z.object({
  CALENDAR: z.string().optional(),
  ICS_URL: z.string().optional(),
  ICS_USERNAME: z.string().optional(),
  ICS_PASSWORD: z.string().optional(),
  PROXY: z.url().optional(),
  CLEAR: envSwitch,
  DELETE: envSwitch,
  DEBUG: envSwitch,
  INTERVAL: envInterval,
  CREDENTIALS_PATH: z.string().optional(),
  TOKEN_PATH: z.string().optional(),
  STORE_TIMEOUT: z.coerce.number().int().positive().optional(),
  CONFLUENCE_URL: z.url().optional(),
  CONFLUENCE_USERNAME: z.string().optional(),
  CONFLUENCE_PASSWORD: z.string().optional(),
  CONFLUENCE_CALENDAR_PREFIX: z.string().optional(),
  CONFLUENCE_CALENDARS: z
    .string()
    .default('')
    .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s.length > 0)),
})

export type EnvConfig = z.output<typeof EnvSchema>

function toValidationError(err: z.ZodError, prefix = ''): ValidationError {
  const issue = err.issues[0]
  const field = issue ? `${prefix}${issue.path.map(String).join('.')}` : prefix || 'configuration'
  return new ValidationError({ field, reason: issue?.message ?? 'invalid value' })
}

/** Validate the process environment. Empty variables count as unset. */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig | ValidationError {
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''))
  const parsed = EnvSchema.safeParse(cleaned)
  if (!parsed.success) return toValidationError(parsed.error, 'environment variable ')
  return parsed.data
}

// ---------------------------------------------------------------------------
// Sync settings (flags over env)
// ---------------------------------------------------------------------------

export interface SyncFlags {
  proxy?: string
  username?: string
  password?: string
  clear?: boolean
  delete?: boolean
  ignoreRevision?: boolean
  dryRun?: boolean
  includePast?: boolean
  interval?: string
  debug?: boolean
  credentials?: string
  token?: string
  storeTimeout?: number
}

export interface SyncSettings {
  proxy?: string
  feedAuth?: BasicAuth
  clear: boolean
  deleteFringe: boolean
  ignoreRevision: boolean
  dryRun: boolean
  includePast: boolean
  /** null: run once */
  intervalMs: number | null
  debug: boolean
  credentialsPath: string
  tokenPath: string
  storeTimeoutMs: number
}

const UrlSchema = z.url()

export function resolveSyncSettings(flags: SyncFlags, env: EnvConfig): SyncSettings | ValidationError {
  const proxy = flags.proxy ?? env.PROXY
  if (proxy !== undefined && !UrlSchema.safeParse(proxy).success) {
    return new ValidationError({ field: '--proxy', reason: `not a URL: ${proxy}` })
  }

  let intervalMs = env.INTERVAL ?? null
  if (flags.interval !== undefined) {
    intervalMs = parseInterval(flags.interval)
    if (intervalMs === null) {
      return new ValidationError({ field: '--interval', reason: `expected a duration such as 90, 30m, 2h or 1d, got "${flags.interval}"` })
    }
  }

  const username = flags.username ?? env.ICS_USERNAME
  const password = flags.password ?? env.ICS_PASSWORD
  if ((username === undefined) !== (password === undefined)) {
    return new ValidationError({ field: '--username/--password', reason: 'both are required for feed authentication' })
  }

  const settings: SyncSettings = {
    clear: flags.clear ?? env.CLEAR,
    deleteFringe: flags.delete ?? env.DELETE,
    ignoreRevision: flags.ignoreRevision ?? false,
    dryRun: flags.dryRun ?? false,
    includePast: flags.includePast ?? false,
    intervalMs,
    debug: flags.debug ?? env.DEBUG,
    credentialsPath: flags.credentials ?? env.CREDENTIALS_PATH ?? DEFAULT_CREDENTIALS_PATH,
    tokenPath: flags.token ?? env.TOKEN_PATH ?? DEFAULT_TOKEN_PATH,
    storeTimeoutMs: (flags.storeTimeout ?? env.STORE_TIMEOUT ?? DEFAULT_STORE_TIMEOUT_MS / 1000) * 1000,
  }
  if (proxy !== undefined) settings.proxy = proxy
  if (username !== undefined && password !== undefined) settings.feedAuth = { username, password }
  return settings
}

// ---------------------------------------------------------------------------
// Directory settings
// ---------------------------------------------------------------------------

export interface DirectoryFlags {
  confluenceUrl?: string
  confluenceUsername?: string
  confluencePassword?: string
  prefix?: string
  calendar?: string[]
}

export interface DirectorySettings {
  baseUrl: string
  auth?: BasicAuth
  /** Prepended to every sub-calendar name to form the target calendar name */
  prefix: string
  /** Sub-calendar names to mirror; empty mirrors all */
  calendars: string[]
}

export function resolveDirectorySettings(flags: DirectoryFlags, env: EnvConfig): DirectorySettings | ValidationError {
  const baseUrl = flags.confluenceUrl ?? env.CONFLUENCE_URL
  if (baseUrl === undefined) {
    return new ValidationError({ field: '--confluence-url', reason: 'required (or set CONFLUENCE_URL)' })
  }
  if (!UrlSchema.safeParse(baseUrl).success) {
    return new ValidationError({ field: '--confluence-url', reason: `not a URL: ${baseUrl}` })
  }

  const username = flags.confluenceUsername ?? env.CONFLUENCE_USERNAME
  const password = flags.confluencePassword ?? env.CONFLUENCE_PASSWORD

  const settings: DirectorySettings = {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    prefix: flags.prefix ?? env.CONFLUENCE_CALENDAR_PREFIX ?? '',
    calendars: flags.calendar && flags.calendar.length > 0 ? flags.calendar : env.CONFLUENCE_CALENDARS,
  }
  if (username !== undefined && password !== undefined) settings.auth = { username, password }
  return settings
}
