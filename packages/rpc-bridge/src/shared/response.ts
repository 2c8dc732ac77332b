/**
 * @module rpc-bridge/shared/response
 *
 * The transport boundary: what a transport hands to the bridge and what it
 * gets back. Adapters (`fetch`, `node:http`) convert to and from these.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ordered list of response headers. A name may occur more than once.
 */
export type HeaderList = ReadonlyArray<readonly [name: string, value: string]>

/**
 * An incoming request as the bridge sees it.
 *
 * @since 0.1.0
 */
export interface BridgeRequest {
  /**
   * Upper-cased HTTP method.
   */
  readonly method: string

  /**
   * Request path as sent, e.g. `/users/42`. Percent escapes are kept.
   */
  readonly path: string

  /**
   * Raw query string without the leading `?`.
   */
  readonly query: string

  /**
   * Request headers keyed by lower-cased name.
   */
  readonly headers: ReadonlyMap<string, string>

  readonly body: Uint8Array
}

/**
 * @since 0.1.0
 */
export interface BridgeResponse {
  readonly status: number
  readonly headers: HeaderList
  readonly body: Uint8Array
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const encoder = new TextEncoder()
const decoder = new TextDecoder()

export const JSON_HEADERS: HeaderList = [["Content-Type", "application/json"]]

/**
 * Build a request from its parts, lower-casing header names.
 */
export const makeBridgeRequest = (parts: {
  readonly method: string
  readonly path: string
  readonly query?: string
  readonly headers?: Iterable<readonly [string, string]>
  readonly body?: Uint8Array | string
}): BridgeRequest => {
  const headers = new Map<string, string>()
  for (const [name, value] of parts.headers ?? []) {
    headers.set(name.toLowerCase(), value)
  }
  const body = parts.body ?? new Uint8Array()
  return {
    method: parts.method.toUpperCase(),
    path: parts.path,
    query: parts.query ?? "",
    headers,
    body: typeof body === "string" ? encoder.encode(body) : body,
  }
}

export const decodeBody = (body: Uint8Array): string => decoder.decode(body)

/**
 * A JSON response with `Content-Type: application/json`.
 */
export const jsonResponse = (status: number, value: unknown): BridgeResponse => ({
  status,
  headers: JSON_HEADERS,
  body: encoder.encode(JSON.stringify(value)),
})

/**
 * Append headers to a list. A header already present (compared without
 * case) gets the new value joined to its own with `", "`; the others are
 * appended in order.
 */
export const mergeHeaders = (base: HeaderList, extra: HeaderList): HeaderList => {
  const merged: Array<[string, string]> = base.map(([name, value]) => [name, value])
  for (const [name, value] of extra) {
    const existing = merged.find(([current]) => current.toLowerCase() === name.toLowerCase())
    if (existing) {
      existing[1] = `${existing[1]}, ${value}`
    } else {
      merged.push([name, value])
    }
  }
  return merged
}

export const withHeaders = (response: BridgeResponse, headers: HeaderList): BridgeResponse => ({
  ...response,
  headers: mergeHeaders(response.headers, headers),
})

/**
 * First value of a header, by lower-cased or mixed-case name.
 */
export const getHeader = (headers: HeaderList, name: string): string | undefined =>
  headers.find(([current]) => current.toLowerCase() === name.toLowerCase())?.[1]
