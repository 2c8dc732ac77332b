/**
 * @module rpc-bridge/server/handler
 *
 * The request pipeline, and the bridge that runs it.
 *
 * @example
 * ```ts
 * import { createBridge } from "rpc-bridge"
 *
 * const bridge = createBridge(UsersLive, {
 *   allowedOrigins: ["*.example.com"],
 *   allowedHeaders: ["Content-Type"],
 * })
 *
 * const response = await bridge.fetch(new Request("http://localhost/users/42"))
 * ```
 */

import * as Effect from "effect/Effect"
import type * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import { RouteTable } from "../core/routes.js"
import type { ServiceImplementation } from "../core/service.js"
import { MethodNotFoundError, MissingMethodNameError } from "../errors/index.js"
import { DEFAULT_MAX_BODY_SIZE, type BridgeOptions } from "../shared/config.js"
import { type CorsPolicy, makeCorsPolicy } from "../shared/cors.js"
import { errorResponse, renderBridgeError } from "../shared/error-response.js"
import { BridgeLogger, BridgeLoggerLive } from "../shared/logging.js"
import {
  type BridgeRequest,
  type BridgeResponse,
  makeBridgeRequest,
  withHeaders,
} from "../shared/response.js"
import { bindArguments } from "./arguments.js"
import { planDispatch, preflightResponse, resolveDispatch } from "./dispatch.js"
import { invokeProcedure } from "./result.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What every request of a bridge shares. Built once, never mutated.
 */
export interface BridgeEnvironment {
  readonly implementation: ServiceImplementation
  readonly routes: RouteTable
  readonly cors: CorsPolicy
}

/**
 * @since 0.1.0
 */
export interface Bridge extends BridgeEnvironment {
  readonly maxBodySize: number

  /**
   * Handle a request. Never fails: every error becomes a response.
   */
  readonly handle: (request: BridgeRequest) => Effect.Effect<BridgeResponse>

  /**
   * Handle a web standard Request and return a Response.
   */
  readonly fetch: (request: Request) => Promise<Response>
}

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

const respond = (env: BridgeEnvironment, request: BridgeRequest, requestId: string) =>
  Effect.gen(function* () {
    const logger = yield* BridgeLogger
    const plan = planDispatch(env.routes, env.cors, request)
    if (plan.rejectedOrigin !== undefined) {
      yield* logger.log({ _tag: "OriginRejected", requestId, origin: plan.rejectedOrigin })
    }

    const response = yield* Effect.gen(function* () {
      if (plan.allowed && request.method === "OPTIONS") {
        return preflightResponse()
      }
      const context = yield* resolveDispatch(env.implementation.descriptor, request, plan)
      const name = yield* Option.match(context.procedure, {
        onNone: () => Effect.fail(new MissingMethodNameError({})),
        onSome: (procedure) => Effect.succeed(procedure),
      })
      yield* logger.log({ _tag: "RouteResolved", requestId, procedure: name, routed: context.routed })

      const resolved = yield* Option.match(env.implementation.resolve(name), {
        onNone: () => Effect.fail(new MethodNotFoundError({ method: name, routed: context.routed })),
        onSome: (found) => Effect.succeed(found),
      })
      const args = yield* bindArguments(resolved.procedure, context.payload)
      return yield* invokeProcedure(resolved, args, requestId)
    }).pipe(
      Effect.catchAll((error) => {
        const rendered = renderBridgeError(error, request)
        return Effect.succeed(
          error._tag === "MethodNotAllowedError"
            ? withHeaders(rendered, [["Allow", plan.allowMethods]])
            : rendered,
        )
      }),
    )

    return withHeaders(response, plan.corsHeaders)
  })

/**
 * Run one request through the bridge: route it, check its origin, bind its
 * arguments, call the handler and validate the result. Failures are
 * rendered as error responses; the CORS headers go on every response.
 *
 * @since 0.1.0
 */
export const handleRequest = (
  env: BridgeEnvironment,
  request: BridgeRequest,
): Effect.Effect<BridgeResponse, never, BridgeLogger> =>
  Effect.flatMap(BridgeLogger, (logger) =>
    logger.logRequest(request, (requestId) =>
      respond(env, request, requestId).pipe(
        Effect.catchAllDefect((defect) =>
          Effect.as(
            Effect.logError("Unexpected failure while handling a request", defect),
            errorResponse(500, request),
          ),
        ),
      ),
    ),
  )

// ─────────────────────────────────────────────────────────────────────────────
// Fetch Adapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Convert a web standard Request to a bridge request.
 */
export const fromWebRequest = async (request: Request): Promise<BridgeRequest> => {
  const url = new URL(request.url)
  const body = new Uint8Array(await request.arrayBuffer())
  return makeBridgeRequest({
    method: request.method,
    path: url.pathname,
    query: url.search.slice(1),
    headers: request.headers,
    body,
  })
}

/**
 * Convert a bridge response to a web standard Response.
 */
export const toWebResponse = (response: BridgeResponse): Response => {
  const headers = new Headers()
  for (const [name, value] of response.headers) {
    headers.append(name, value)
  }
  return new Response(response.body, { status: response.status, headers })
}

// ─────────────────────────────────────────────────────────────────────────────
// Bridge Creation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a bridge for a service implementation.
 *
 * The route table and the CORS policy are compiled here; a malformed URI
 * template throws, so a bridge never serves from a half-built table.
 *
 * @throws {TemplateError}
 *
 * @since 0.1.0
 * @category constructors
 */
export function createBridge(implementation: ServiceImplementation, options: BridgeOptions = {}): Bridge {
  const env: BridgeEnvironment = {
    implementation,
    routes: RouteTable.fromDescriptor(implementation.descriptor),
    cors: makeCorsPolicy({
      allowedOrigins: options.allowedOrigins ?? [],
      allowedHeaders: options.allowedHeaders ?? [],
    }),
  }
  const logger: Layer.Layer<BridgeLogger> = options.logger ?? BridgeLoggerLive

  const handle = (request: BridgeRequest): Effect.Effect<BridgeResponse> =>
    handleRequest(env, request).pipe(Effect.provide(logger))

  return {
    ...env,
    maxBodySize: options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE,
    handle,
    fetch: async (request) => toWebResponse(await Effect.runPromise(handle(await fromWebRequest(request)))),
  }
}
