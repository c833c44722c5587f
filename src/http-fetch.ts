// Text fetching for feeds and directory listings.
// URLs go through undici's fetch so an outbound forward proxy can be set per
// request (ProxyAgent dispatcher); basic credentials ride in the
// Authorization header. Local paths are read from disk.
// Failures come back as SourceUnavailableError values.

import fs from 'node:fs/promises'
import { fetch, ProxyAgent } from 'undici'
import * as errore from 'errore'
import { SourceUnavailableError } from './api-utils.js'

export interface BasicAuth {
  username: string
  password: string
}

export interface FetchOptions {
  /** Forward proxy URL, e.g. http://proxy.internal:3128 */
  proxy?: string
  auth?: BasicAuth
  timeoutMs?: number
  accept?: string
}

const DEFAULT_TIMEOUT_MS = 60_000

export function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source)
}

export function basicAuthHeader(auth: BasicAuth): string {
  return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`
}

/** Hide credentials embedded in a URL before it reaches a log line. */
export function redactUrl(source: string): string {
  if (!isUrl(source)) return source
  const url = errore.tryFn(() => new URL(source))
  if (url instanceof Error) return source
  if (url.password) url.password = '***'
  return url.toString()
}

export async function fetchText(url: string, opts: FetchOptions = {}): Promise<string | SourceUnavailableError> {
  const headers: Record<string, string> = {}
  if (opts.auth) headers.Authorization = basicAuthHeader(opts.auth)
  if (opts.accept) headers.Accept = opts.accept

  const dispatcher = opts.proxy ? new ProxyAgent(opts.proxy) : undefined
  const source = redactUrl(url)

  const res = await errore.tryAsync({
    try: () =>
      fetch(url, {
        headers,
        dispatcher,
        signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      }),
    catch: (err) => new SourceUnavailableError({ source, reason: String(err), cause: err }),
  })
  if (res instanceof Error) return res

  if (!res.ok) {
    return new SourceUnavailableError({ source, reason: `HTTP ${res.status} ${res.statusText}` })
  }

  return errore.tryAsync({
    try: () => res.text(),
    catch: (err) => new SourceUnavailableError({ source, reason: String(err), cause: err }),
  })
}

/** Read a local path or fetch an http(s) URL. */
export async function readSource(source: string, opts: FetchOptions = {}): Promise<string | SourceUnavailableError> {
  if (isUrl(source)) return fetchText(source, opts)

  return errore.tryAsync({
    try: () => fs.readFile(source, 'utf-8'),
    catch: (err) => new SourceUnavailableError({ source, reason: String(err), cause: err }),
  })
}
