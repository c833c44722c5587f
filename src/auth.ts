// OAuth2 authentication for calmirror.
// Credentials come from two JSON files: the OAuth client downloaded from the
// Google Cloud console ("installed" or "web" app) and the token file written
// by `calmirror login`. Expired tokens are refreshed and written back, merged
// so the refresh_token Google omits from refresh responses is kept.

import http from 'node:http'
import readline from 'node:readline'
import fs from 'node:fs'
import path from 'node:path'
import { OAuth2Client, type Credentials } from 'google-auth-library'
import * as errore from 'errore'
import pc from 'picocolors'
import { z } from 'zod'
import { AuthError, NotFoundError, ParseError } from './api-utils.js'
import type { Logger } from './logger.js'

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

const REDIRECT_PORT = 8089
const SCOPES = [
  'https://www.googleapis.com/auth/calendar',       // Calendar (full)
  'https://www.googleapis.com/auth/userinfo.email', // Email identity
]

// ---------------------------------------------------------------------------
// Credential files
// ---------------------------------------------------------------------------

const ClientSecretSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
})

const ClientFileSchema = z.union([
  z.object({ installed: ClientSecretSchema }),
  z.object({ web: ClientSecretSchema }),
])

const TokenFileSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  scope: z.string().nullish(),
  id_token: z.string().nullish(),
  /** Email of the authorized account, recorded at login */
  account: z.string().optional(),
})

export interface OAuthClientConfig {
  clientId: string
  clientSecret: string
}

export type StoredToken = z.output<typeof TokenFileSchema>

function parseJsonFile<T>(text: string, what: string, schema: z.ZodType<T>): T | ParseError {
  const json = errore.tryFn((): unknown => JSON.parse(text))
  if (json instanceof Error) return new ParseError({ what, reason: json.message, cause: json })
  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return new ParseError({ what, reason: issue ? `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}` : 'invalid content' })
  }
  return parsed.data
}

export function parseClientConfig(text: string, source: string): OAuthClientConfig | ParseError {
  const parsed = parseJsonFile(text, `OAuth client file ${source}`, ClientFileSchema)
  if (parsed instanceof Error) return parsed
  const secret = 'installed' in parsed ? parsed.installed : parsed.web
  return { clientId: secret.client_id, clientSecret: secret.client_secret }
}

export function parseToken(text: string, source: string): StoredToken | ParseError {
  return parseJsonFile(text, `token file ${source}`, TokenFileSchema)
}

/** True when the access token is missing or expires within the next minute. */
export function tokenNeedsRefresh(token: StoredToken, now = Date.now()): boolean {
  if (!token.access_token) return true
  return typeof token.expiry_date === 'number' && token.expiry_date < now + 60_000
}

function readFile(file: string, what: string): string | NotFoundError {
  const text = errore.tryFn(() => fs.readFileSync(file, 'utf-8'))
  if (text instanceof Error) return new NotFoundError({ resource: `${what} ${file}`, cause: text })
  return text
}

export function loadClientConfig(file: string): OAuthClientConfig | NotFoundError | ParseError {
  const text = readFile(file, 'OAuth client file')
  if (text instanceof Error) return text
  return parseClientConfig(text, file)
}

export function loadToken(file: string): StoredToken | NotFoundError | ParseError {
  const text = readFile(file, 'Token file')
  if (text instanceof Error) return text
  return parseToken(text, file)
}

function saveToken(file: string, token: StoredToken): void | Error {
  return errore.tryFn(() => {
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, JSON.stringify(token, null, 2) + '\n', { mode: 0o600 })
  })
}

// ---------------------------------------------------------------------------
// OAuth2 client factory
// ---------------------------------------------------------------------------

export function createOAuth2Client(config: OAuthClientConfig): OAuth2Client {
  return new OAuth2Client({
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    redirectUri: `http://localhost:${REDIRECT_PORT}`,
  })
}

function toCredentials(token: StoredToken): Credentials {
  const { account: _account, ...credentials } = token
  return credentials
}

// ---------------------------------------------------------------------------
// Authenticated client
// ---------------------------------------------------------------------------

export interface AuthPaths {
  credentialsPath: string
  tokenPath: string
}

export interface Authenticated {
  auth: OAuth2Client
  /** Account email, or the token path when login did not record one */
  account: string
}

/**
 * Create an authenticated OAuth2Client from the credential files.
 * Refreshes an expired token up front and writes it back; tokens refreshed
 * later by the client itself are written back through the 'tokens' event.
 */
export async function authenticate(
  { credentialsPath, tokenPath }: AuthPaths,
  logger: Logger,
): Promise<Authenticated | AuthError | NotFoundError | ParseError> {
  const config = loadClientConfig(credentialsPath)
  if (config instanceof Error) return config

  const token = loadToken(tokenPath)
  if (token instanceof NotFoundError) {
    return new AuthError({ account: tokenPath, reason: 'no token file, run the login command first', cause: token })
  }
  if (token instanceof Error) return token

  const account = token.account ?? tokenPath
  if (!token.refresh_token && tokenNeedsRefresh(token)) {
    return new AuthError({ account, reason: 'token expired and has no refresh_token' })
  }

  const oauth2Client = createOAuth2Client(config)
  oauth2Client.setCredentials(toCredentials(token))

  let current: StoredToken = token
  const persist = (credentials: Credentials) => {
    current = { ...current, ...credentials, refresh_token: credentials.refresh_token ?? current.refresh_token }
    const saved = saveToken(tokenPath, current)
    if (saved instanceof Error) logger.warn(`Could not write refreshed token to ${tokenPath}: ${saved.message}`)
  }

  if (tokenNeedsRefresh(token)) {
    logger.debug(`Token expired for ${account}, refreshing`)
    const refreshed = await errore.tryAsync({
      try: () => oauth2Client.refreshAccessToken(),
      catch: (err) => new AuthError({ account, reason: String(err), cause: err }),
    })
    if (refreshed instanceof Error) return refreshed
    // Merge to preserve refresh_token which Google often omits from refresh responses
    persist(refreshed.credentials)
    oauth2Client.setCredentials(toCredentials(current))
  }
  oauth2Client.on('tokens', persist)

  return { auth: oauth2Client, account }
}

// ---------------------------------------------------------------------------
// Browser OAuth flow
// ---------------------------------------------------------------------------

export function extractCodeFromInput(input: string): string | null {
  const trimmed = input.trim()
  if (!trimmed) return null

  const url = errore.tryFn(() => new URL(trimmed))
  if (!(url instanceof Error)) {
    const code = url.searchParams.get('code')
    if (code) return code
  }

  if (trimmed.length > 10 && !trimmed.includes(' ')) {
    return trimmed
  }

  return null
}

async function getAuthCodeFromBrowser(oauth2Client: OAuth2Client): Promise<string> {
  const authUrl = oauth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: SCOPES,
    prompt: 'consent',
  })

  process.stderr.write('\n' + pc.bold('1.') + ' Open this URL to authorize:\n\n')
  process.stderr.write('   ' + pc.cyan(pc.underline(authUrl)) + '\n\n')
  process.stderr.write(pc.bold('2.') + ' If running locally, the browser will redirect automatically.\n')
  process.stderr.write(pc.dim('   If running remotely, the redirect page will not load.') + '\n')
  process.stderr.write(pc.dim('   Copy the URL from the browser\'s address bar and paste it below.') + '\n\n')

  return new Promise((resolve, reject) => {
    let resolved = false
    let server: http.Server | null = null
    let rl: readline.Interface | null = null

    function finish(code: string) {
      if (resolved) return
      resolved = true
      server?.close()
      if (rl) {
        rl.close()
        process.stdin.unref()
      }
      resolve(code)
    }

    function fail(err: Error) {
      if (resolved) return
      resolved = true
      server?.close()
      rl?.close()
      reject(err)
    }

    server = http.createServer((req, res) => {
      const url = new URL(req.url ?? '/', `http://localhost:${REDIRECT_PORT}`)
      const code = url.searchParams.get('code')
      const error = url.searchParams.get('error')

      if (error) {
        res.writeHead(400, { 'Content-Type': 'text/html' })
        res.end(`<h1>Error: ${error}</h1>`)
        fail(new Error(error))
        return
      }

      if (code) {
        res.writeHead(200, { 'Content-Type': 'text/html' })
        res.end('<h1>Success! You can close this window.</h1>')
        finish(code)
        return
      }

      res.writeHead(400, { 'Content-Type': 'text/html' })
      res.end('<h1>No authorization code received</h1>')
    })

    server.on('error', (err) => {
      // Port taken: the pasted redirect URL still works on a TTY
      if (rl) {
        process.stderr.write(pc.yellow(`Redirect listener unavailable (${err.message}), paste the URL instead.`) + '\n')
        server = null
        return
      }
      fail(err)
    })

    if (process.stdin.isTTY) {
      rl = readline.createInterface({ input: process.stdin, output: process.stderr })
      rl.question(pc.dim('Paste redirect URL here (or wait for auto-redirect): '), (answer) => {
        const code = extractCodeFromInput(answer)
        if (code) {
          finish(code)
        } else {
          process.stderr.write(pc.yellow('Could not extract authorization code from input.') + '\n')
          process.stderr.write(pc.dim('Waiting for browser redirect...') + '\n')
        }
      })
    }

    server.listen(REDIRECT_PORT)
  })
}

// ---------------------------------------------------------------------------
// Login: browser OAuth → token file
// ---------------------------------------------------------------------------

/** Run the browser OAuth flow and write the token file. */
export async function login(
  { credentialsPath, tokenPath }: AuthPaths,
): Promise<{ account: string; tokenPath: string } | AuthError | NotFoundError | ParseError> {
  const config = loadClientConfig(credentialsPath)
  if (config instanceof Error) return config

  const oauth2Client = createOAuth2Client(config)

  const exchanged = await errore.tryAsync({
    try: async () => {
      const code = await getAuthCodeFromBrowser(oauth2Client)
      process.stderr.write(pc.dim('Got authorization code, exchanging for tokens...') + '\n')
      const { tokens } = await oauth2Client.getToken(code)
      return tokens
    },
    catch: (err) => new AuthError({ account: tokenPath, reason: String(err), cause: err }),
  })
  if (exchanged instanceof Error) return exchanged

  // Discover email; a token without the email scope still works for sync
  const accessToken = exchanged.access_token
  const info = accessToken
    ? await errore.tryAsync({
      try: () => oauth2Client.getTokenInfo(accessToken),
      catch: (err) => new AuthError({ account: tokenPath, reason: String(err), cause: err }),
    })
    : null
  const account = info && !(info instanceof Error) && info.email ? info.email : tokenPath

  const token: StoredToken = { ...exchanged, account }
  const saved = saveToken(tokenPath, token)
  if (saved instanceof Error) {
    return new AuthError({ account, reason: `could not write ${tokenPath}: ${saved.message}`, cause: saved })
  }

  return { account, tokenPath }
}
