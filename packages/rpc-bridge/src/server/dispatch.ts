/**
 * @module rpc-bridge/server/dispatch
 *
 * Dispatch: deciding which procedure a request targets and which CORS
 * headers its response carries.
 *
 * Two protocols share one URL space:
 * - routed: the path (and query) matches a procedure's URI template;
 * - fallback: nothing matched, the request is a POST (or its preflight) and
 *   names the procedure in a `method` query parameter, with every argument
 *   in the JSON body.
 *
 * Any other unmatched request is refused with 405.
 */

import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import type { RouteMatch, RouteTable } from "../core/routes.js"
import type { ServiceDescriptor } from "../core/service.js"
import { BODYLESS_VERBS } from "../core/types.js"
import { type InvalidJsonBodyError, MethodNotAllowedError } from "../errors/index.js"
import { buildCorsHeaders, type CorsPolicy } from "../shared/cors.js"
import type { BridgeRequest, BridgeResponse, HeaderList } from "../shared/response.js"
import { capturedArguments, mergePayload, parseJsonBody, type Payload } from "./arguments.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

const FALLBACK_METHODS = ["POST", "OPTIONS"]
const FALLBACK_ALLOW_METHODS = FALLBACK_METHODS.join(", ")

/**
 * How a request will be dispatched, decided from its method, path and
 * query alone.
 *
 * @since 0.1.0
 */
export interface DispatchPlan {
  /**
   * The selected rule, if the request was routed.
   */
  readonly route: Option.Option<RouteMatch>

  /**
   * False when neither protocol accepts the request (405).
   */
  readonly allowed: boolean

  /**
   * Verbs of every rule whose template matched the request.
   */
  readonly allowedVerbs: ReadonlyArray<string>

  /**
   * Value of `Access-Control-Allow-Methods`, and of `Allow` on a 405.
   */
  readonly allowMethods: string

  readonly corsHeaders: HeaderList

  /**
   * The request's origin, when one was sent and is not allowed.
   */
  readonly rejectedOrigin: string | undefined
}

/**
 * Everything needed to call a procedure, once the request is known to be
 * acceptable and its body has been read.
 *
 * @since 0.1.0
 */
export interface DispatchContext {
  /**
   * Public name of the target procedure; none when a fallback request
   * does not name one.
   */
  readonly procedure: Option.Option<string>

  /**
   * Whether a URI template matched.
   */
  readonly routed: boolean

  readonly payload: Payload
  readonly corsHeaders: HeaderList
}

// ─────────────────────────────────────────────────────────────────────────────
// Planning
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Value of the first `method` query parameter, if it is not empty.
 */
export const fallbackMethodName = (query: string): Option.Option<string> =>
  Option.fromNullable(new URLSearchParams(query).get("method")).pipe(
    Option.filter((name) => name !== ""),
  )

const withOptions = (verbs: ReadonlyArray<string>): string =>
  [...verbs.filter((verb) => verb !== "OPTIONS"), "OPTIONS"].join(", ")

/**
 * Match a request against the route table and build its CORS headers.
 *
 * @since 0.1.0
 */
export const planDispatch = (
  routes: RouteTable,
  cors: CorsPolicy,
  request: BridgeRequest,
): DispatchPlan => {
  const lookup = routes.match(request.method, request.path, request.query)
  const routed = Option.isSome(lookup.match)
  const allowed = routed || FALLBACK_METHODS.includes(request.method)

  const allowMethods =
    routed || (!allowed && lookup.allowedVerbs.length > 0)
      ? withOptions(lookup.allowedVerbs)
      : FALLBACK_ALLOW_METHODS
  const { headers, rejectedOrigin } = buildCorsHeaders(cors, allowMethods, request.headers.get("origin"))

  return {
    route: lookup.match,
    allowed,
    allowedVerbs: lookup.allowedVerbs,
    allowMethods,
    corsHeaders: headers,
    rejectedOrigin,
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolve a plan into a dispatch context: pick the target procedure and
 * collect the raw arguments.
 *
 * Routed requests take arguments from the URI, plus the JSON body unless
 * the rule's verb is GET or DELETE. Fallback requests take them from the
 * body only.
 *
 * @since 0.1.0
 */
export const resolveDispatch = (
  descriptor: ServiceDescriptor,
  request: BridgeRequest,
  plan: DispatchPlan,
): Effect.Effect<DispatchContext, MethodNotAllowedError | InvalidJsonBodyError> => {
  if (!plan.allowed) {
    return Effect.fail(
      new MethodNotAllowedError({
        method: request.method,
        path: request.path,
        allowedVerbs: plan.allowedVerbs,
      }),
    )
  }

  return Option.match(plan.route, {
    onNone: () =>
      Effect.map(parseJsonBody(request.body), (body) => ({
        procedure: fallbackMethodName(request.query),
        routed: false,
        payload: mergePayload(new Map(), body),
        corsHeaders: plan.corsHeaders,
      })),
    onSome: ({ rule, captures }) => {
      const parameters = Option.match(descriptor.lookup(rule.procedure), {
        onNone: () => [],
        onSome: (procedure) => procedure.parameters,
      })
      const captured = capturedArguments(parameters, captures)
      const body: Effect.Effect<Readonly<Record<string, unknown>>, InvalidJsonBodyError> =
        BODYLESS_VERBS.has(rule.verb) ? Effect.succeed({}) : parseJsonBody(request.body)
      return Effect.map(body, (values) => ({
        procedure: Option.some(rule.procedure),
        routed: true,
        payload: mergePayload(captured, values),
        corsHeaders: plan.corsHeaders,
      }))
    },
  })
}

/**
 * Response to a preflight: 200 and no body. The CORS headers are added
 * like on any other response.
 */
export const preflightResponse = (): BridgeResponse => ({
  status: 200,
  headers: [],
  body: new Uint8Array(),
})
