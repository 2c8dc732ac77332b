/**
 * @module rpc-bridge/shared/error-response
 *
 * The generic JSON error envelope:
 *
 * ```json
 * { "_type": "error", "_tag": "not_found", "message": "..." }
 * ```
 *
 * `_tag` is the status's reason phrase in lower snake case. Declared
 * procedure errors do not use this envelope; they are sent as their own
 * encoded value.
 */

import type { BridgeError } from "../errors/index.js"
import statusTable from "./http-status.json" with { type: "json" }
import { type BridgeResponse, jsonResponse } from "./response.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @since 0.1.0
 */
export interface ErrorEnvelope {
  readonly _type: "error"
  readonly _tag: string
  readonly message: string | null
}

/**
 * The parts of a request an error message may mention.
 */
export interface RequestLine {
  readonly method: string
  readonly path: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Status Codes
// ─────────────────────────────────────────────────────────────────────────────

const REASON_PHRASES: Readonly<Record<string, string | undefined>> = statusTable

const UNKNOWN_STATUS = "http error"

/**
 * Standard reason phrase of a status code, or `"http error"`.
 */
export const reasonPhrase = (status: number): string => REASON_PHRASES[String(status)] ?? UNKNOWN_STATUS

/**
 * `404` → `"not_found"`, `413` → `"request_entity_too_large"`.
 */
export const errorTag = (status: number): string => reasonPhrase(status).toLowerCase().replace(/[\s-]/g, "_")

// ─────────────────────────────────────────────────────────────────────────────
// Envelope
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build the envelope of a status. 404 and 405 use fixed messages naming the
 * request; 400 uses the given message as is; any other status uses the
 * given message or, without one, the reason phrase.
 *
 * @since 0.1.0
 */
export const makeErrorEnvelope = (
  status: number,
  request: RequestLine,
  message?: string,
): ErrorEnvelope => {
  const _tag = errorTag(status)
  switch (status) {
    case 404:
      return {
        _type: "error",
        _tag,
        message: `The requested URL ${request.path} was not found on this service.`,
      }
    case 405:
      return {
        _type: "error",
        _tag,
        message: `The requested URL ${request.path} was not allowed HTTP method ${request.method}.`,
      }
    case 400:
      return { _type: "error", _tag, message: message ?? null }
    default:
      return { _type: "error", _tag, message: message ?? reasonPhrase(status) }
  }
}

/**
 * @since 0.1.0
 */
export const errorResponse = (status: number, request: RequestLine, message?: string): BridgeResponse =>
  jsonResponse(status, makeErrorEnvelope(status, request, message))

/**
 * Render a dispatch error with its own status and message.
 *
 * @since 0.1.0
 */
export const renderBridgeError = (error: BridgeError, request: RequestLine): BridgeResponse =>
  errorResponse(error.httpStatus, request, error.message)
