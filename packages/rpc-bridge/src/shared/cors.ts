/**
 * @module rpc-bridge/shared/cors
 *
 * Cross-origin policy of the bridge.
 *
 * Allowed origins are host names. An entry without `*` matches that host
 * exactly; an entry with `*` is a pattern in which each `*` stands for one
 * label, so `*.example.com` accepts `api.example.com` but neither
 * `example.com` nor `a.b.example.com`. Everything is compiled once, when the
 * policy is made.
 */

import type { HeaderList } from "./response.js"

// ─────────────────────────────────────────────────────────────────────────────
// CORS Options
// ─────────────────────────────────────────────────────────────────────────────

/**
 * CORS configuration options.
 */
export interface CorsOptions {
  /**
   * Allowed origin host names or wildcard patterns.
   * @default []
   */
  readonly allowedOrigins?: Iterable<string>

  /**
   * Request headers a browser may send.
   * @default []
   */
  readonly allowedHeaders?: Iterable<string>
}

/**
 * @since 0.1.0
 */
export interface OriginPolicy {
  readonly hosts: ReadonlySet<string>
  readonly patterns: ReadonlyArray<RegExp>

  /**
   * Whether a browser `Origin` header value is allowed.
   */
  readonly allows: (origin: string) => boolean
}

/**
 * @since 0.1.0
 */
export interface CorsPolicy {
  readonly origins: OriginPolicy

  /**
   * Lower-cased, sorted, without repeats.
   */
  readonly allowedHeaders: ReadonlyArray<string>
}

// ─────────────────────────────────────────────────────────────────────────────
// Policy
// ─────────────────────────────────────────────────────────────────────────────

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")

const compileWildcard = (pattern: string): RegExp =>
  new RegExp("^" + pattern.split("*").map(escapeRegExp).join("[^.]+") + "$")

const hostnameOf = (origin: string): string | undefined => {
  let url: URL
  try {
    url = new URL(origin)
  } catch {
    return undefined
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return undefined
  }
  return url.hostname
}

const normalizeAll = (values: Iterable<string> | undefined): Array<string> =>
  Array.from(values ?? [], (value) => value.trim().toLowerCase()).filter((value) => value !== "")

/**
 * Compile an origin allow-list.
 *
 * @since 0.1.0
 */
export const makeOriginPolicy = (allowedOrigins: Iterable<string>): OriginPolicy => {
  const entries = normalizeAll(allowedOrigins)
  const hosts = new Set(entries.filter((entry) => !entry.includes("*")))
  const patterns = entries.filter((entry) => entry.includes("*")).map(compileWildcard)

  return {
    hosts,
    patterns,
    allows: (origin) => {
      const host = hostnameOf(origin)
      if (host === undefined) return false
      return hosts.has(host) || patterns.some((pattern) => pattern.test(host))
    },
  }
}

/**
 * @since 0.1.0
 */
export const makeCorsPolicy = (options: CorsOptions = {}): CorsPolicy => ({
  origins: makeOriginPolicy(options.allowedOrigins ?? []),
  allowedHeaders: Array.from(new Set(normalizeAll(options.allowedHeaders))).sort(),
})

// ─────────────────────────────────────────────────────────────────────────────
// CORS Header Builder
// ─────────────────────────────────────────────────────────────────────────────

export interface CorsHeaders {
  readonly headers: HeaderList

  /**
   * The request origin, when one was sent and refused.
   */
  readonly rejectedOrigin: string | undefined
}

/**
 * Build the CORS headers of one response.
 *
 * `Vary: Origin` is always present. `Access-Control-Allow-Origin` echoes
 * the request origin only when the policy allows it.
 *
 * @param allowMethods - Value of `Access-Control-Allow-Methods`
 * @param origin - The request's `Origin` header, if any
 */
export const buildCorsHeaders = (
  policy: CorsPolicy,
  allowMethods: string,
  origin: string | undefined,
): CorsHeaders => {
  const headers: Array<readonly [string, string]> = [
    ["Vary", "Origin"],
    ["Access-Control-Allow-Methods", allowMethods],
  ]
  if (policy.allowedHeaders.length > 0) {
    headers.push(["Access-Control-Allow-Headers", policy.allowedHeaders.join(", ")])
  }
  if (origin === undefined) {
    return { headers, rejectedOrigin: undefined }
  }
  if (!policy.origins.allows(origin)) {
    return { headers, rejectedOrigin: origin }
  }
  headers.push(["Access-Control-Allow-Origin", origin])
  return { headers, rejectedOrigin: undefined }
}
