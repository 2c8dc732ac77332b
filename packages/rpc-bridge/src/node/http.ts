/**
 * @module rpc-bridge/node/http
 *
 * Node.js adapter for the bridge.
 *
 * @example
 * ```ts
 * import { createBridge } from "rpc-bridge"
 * import { createNodeListener } from "rpc-bridge/node"
 * import * as http from "node:http"
 *
 * const bridge = createBridge(UsersLive)
 * http.createServer(createNodeListener(bridge)).listen(9322)
 * ```
 */

import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { identity } from "effect/Function"
import type * as Scope from "effect/Scope"
import * as Stream from "effect/Stream"
import * as http from "node:http"
import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http"
import { PayloadTooLargeError, ServerListenError } from "../errors/index.js"
import { planDispatch } from "../server/dispatch.js"
import type { Bridge } from "../server/handler.js"
import { type BridgeConfig, DEFAULT_MAX_BODY_SIZE } from "../shared/config.js"
import { renderBridgeError } from "../shared/error-response.js"
import {
  type BridgeRequest,
  type BridgeResponse,
  makeBridgeRequest,
  withHeaders,
} from "../shared/response.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The parts of an `IncomingMessage` the adapter reads.
 */
export type NodeRequestLike = AsyncIterable<unknown> & {
  readonly method?: string | undefined
  readonly url?: string | undefined
  readonly headers: IncomingHttpHeaders
}

/**
 * The parts of a `ServerResponse` the adapter writes.
 */
export interface NodeResponseLike {
  writeHead(statusCode: number, headers: OutgoingHttpHeaders): unknown
  end(chunk: Uint8Array): unknown
}

/**
 * Options for reading a Node.js request.
 * @since 0.1.0
 * @category Types
 */
export interface NodeToWebRequestOptions {
  /**
   * Maximum request body size in bytes.
   * @default 1048576 (1MB)
   */
  readonly maxBodySize?: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Request Body
// ─────────────────────────────────────────────────────────────────────────────

const encoder = new TextEncoder()

const toBytes = (chunk: unknown): Uint8Array => {
  if (chunk instanceof Uint8Array) return chunk
  return encoder.encode(String(chunk))
}

interface BodyAccumulator {
  readonly chunks: Array<Uint8Array>
  size: number
}

const concat = ({ chunks, size }: BodyAccumulator): Uint8Array => {
  const body = new Uint8Array(size)
  let offset = 0
  for (const chunk of chunks) {
    body.set(chunk, offset)
    offset += chunk.length
  }
  return body
}

/**
 * Read a request body, failing as soon as it grows past `maxBodySize`.
 * Read errors of the underlying stream are defects.
 */
export const readBody = (
  source: AsyncIterable<unknown>,
  maxBodySize: number,
): Effect.Effect<Uint8Array, PayloadTooLargeError> =>
  Effect.suspend(() => {
    const body: BodyAccumulator = { chunks: [], size: 0 }
    return Stream.fromAsyncIterable(source, identity).pipe(
      Stream.orDie,
      Stream.map(toBytes),
      Stream.runForEach((chunk): Effect.Effect<void, PayloadTooLargeError> => {
        body.size += chunk.length
        if (body.size > maxBodySize) {
          return Effect.fail(new PayloadTooLargeError({ maxSize: maxBodySize, receivedSize: body.size }))
        }
        body.chunks.push(chunk)
        return Effect.void
      }),
      Effect.map(() => concat(body)),
    )
  })

// ─────────────────────────────────────────────────────────────────────────────
// Node.js Request/Response Conversion Utilities
// ─────────────────────────────────────────────────────────────────────────────

const flattenHeaders = (headers: IncomingHttpHeaders): Array<[string, string]> => {
  const result: Array<[string, string]> = []
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined) {
      result.push([key, Array.isArray(value) ? value.join(", ") : value])
    }
  }
  return result
}

const splitUrl = (url: string): { readonly path: string; readonly query: string } => {
  const separator = url.indexOf("?")
  return separator === -1
    ? { path: url, query: "" }
    : { path: url.slice(0, separator), query: url.slice(separator + 1) }
}

const hasBody = (method: string): boolean => method !== "GET" && method !== "HEAD"

/**
 * Everything of a Node.js request but its body.
 */
const requestHead = (req: NodeRequestLike): BridgeRequest => {
  const { path, query } = splitUrl(req.url ?? "/")
  return makeBridgeRequest({
    method: (req.method ?? "GET").toUpperCase(),
    path,
    query,
    headers: flattenHeaders(req.headers),
  })
}

/**
 * Convert a Node.js request to a bridge request.
 *
 * @since 0.1.0
 */
export const nodeToBridgeRequest = (
  req: NodeRequestLike,
  options?: NodeToWebRequestOptions,
): Effect.Effect<BridgeRequest, PayloadTooLargeError> => {
  const head = requestHead(req)
  if (!hasBody(head.method)) {
    return Effect.succeed(head)
  }
  return Effect.map(readBody(req, options?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE), (body) => ({
    ...head,
    body,
  }))
}

/**
 * Convert a Node.js request to a web standard Request (Effect version).
 *
 * @since 0.1.0
 */
export const nodeToWebRequestEffect = (
  req: NodeRequestLike,
  options?: NodeToWebRequestOptions,
): Effect.Effect<Request, PayloadTooLargeError> => {
  const method = (req.method ?? "GET").toUpperCase()
  const url = `http://${req.headers.host ?? "localhost"}${req.url ?? "/"}`
  const headers = flattenHeaders(req.headers)
  if (!hasBody(method)) {
    return Effect.sync(() => new Request(url, { method, headers }))
  }
  return Effect.map(
    readBody(req, options?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE),
    (body) => new Request(url, { method, headers, body }),
  )
}

/**
 * Convert a Node.js request to a web standard Request.
 *
 * @throws {PayloadTooLargeError} If the request body exceeds maxBodySize
 *
 * @since 0.1.0
 */
export async function nodeToWebRequest(
  req: NodeRequestLike,
  options?: NodeToWebRequestOptions,
): Promise<Request> {
  const result = await Effect.runPromise(Effect.either(nodeToWebRequestEffect(req, options)))
  if (Either.isLeft(result)) {
    throw result.left
  }
  return result.right
}

/**
 * Write a bridge response to a Node.js response.
 */
export const writeBridgeResponse = (response: BridgeResponse, res: NodeResponseLike): Effect.Effect<void> =>
  Effect.sync(() => {
    const headers: OutgoingHttpHeaders = {}
    for (const [name, value] of response.headers) {
      const existing = headers[name]
      headers[name] = existing === undefined ? value : `${String(existing)}, ${value}`
    }
    res.writeHead(response.status, headers)
    res.end(response.body)
  })

/**
 * Write a web standard Response to a Node.js response (Effect version).
 */
export const webToNodeResponseEffect = (response: Response, res: NodeResponseLike): Effect.Effect<void> =>
  Effect.gen(function* () {
    const body = yield* Effect.promise(() => response.arrayBuffer())
    const headers: Array<[string, string]> = []
    response.headers.forEach((value, key) => {
      headers.push([key, value])
    })
    yield* writeBridgeResponse({ status: response.status, headers, body: new Uint8Array(body) }, res)
  })

/**
 * Write a web standard Response to a Node.js response.
 */
export function webToNodeResponse(response: Response, res: NodeResponseLike): Promise<void> {
  return Effect.runPromise(webToNodeResponseEffect(response, res))
}

// ─────────────────────────────────────────────────────────────────────────────
// Listener
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Handle one Node.js request with a bridge. A body over the bridge's limit
 * is answered with 413 and the error envelope, with the CORS headers the
 * bridge would have sent.
 *
 * @since 0.1.0
 */
export const handleNodeRequest = (
  bridge: Bridge,
  req: NodeRequestLike,
  res: NodeResponseLike,
): Effect.Effect<void> =>
  nodeToBridgeRequest(req, { maxBodySize: bridge.maxBodySize }).pipe(
    Effect.flatMap(bridge.handle),
    Effect.catchTag("PayloadTooLargeError", (error) => {
      const head = requestHead(req)
      const { corsHeaders } = planDispatch(bridge.routes, bridge.cors, head)
      return Effect.succeed(withHeaders(renderBridgeError(error, head), corsHeaders))
    }),
    Effect.flatMap((response) => writeBridgeResponse(response, res)),
  )

/**
 * Create a `node:http` request listener for a bridge.
 *
 * @since 0.1.0
 */
export const createNodeListener =
  (bridge: Bridge) =>
  (req: NodeRequestLike, res: NodeResponseLike): void => {
    Effect.runFork(handleNodeRequest(bridge, req, res))
  }

// ─────────────────────────────────────────────────────────────────────────────
// Server
// ─────────────────────────────────────────────────────────────────────────────

export type NodeListener = (req: NodeRequestLike, res: NodeResponseLike) => void

/**
 * The parts of an `http.Server` the bridge drives.
 */
export interface ServerLike {
  listen(port: number, host: string, onListening: () => void): unknown
  close(onClose: (error?: Error) => void): unknown
  once(event: "error", listener: (error: Error) => void): unknown
  off(event: "error", listener: (error: Error) => void): unknown
}

const defaultServer = (listener: NodeListener): ServerLike => http.createServer(listener)

/**
 * Serve a bridge on the configured host and port for the lifetime of the
 * enclosing scope. Fails with `ServerListenError` when the address cannot
 * be bound.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const config = yield* loadBridgeConfig
 *   const bridge = createBridge(UsersLive, toBridgeOptions(config))
 *   yield* serveBridge(bridge, config)
 *   yield* Effect.never
 * })
 *
 * Effect.runFork(Effect.scoped(program))
 * ```
 *
 * @since 0.1.0
 */
export const serveBridge = (
  bridge: Bridge,
  config: Pick<BridgeConfig, "host" | "port">,
  makeServer: (listener: NodeListener) => ServerLike = defaultServer,
): Effect.Effect<ServerLike, ServerListenError, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.async<ServerLike, ServerListenError>((resume) => {
      const server = makeServer(createNodeListener(bridge))
      const onError = (cause: Error) =>
        resume(Effect.fail(new ServerListenError({ host: config.host, port: config.port, cause })))
      server.once("error", onError)
      server.listen(config.port, config.host, () => {
        server.off("error", onError)
        resume(Effect.succeed(server))
      })
    }),
    (server) =>
      Effect.async<void>((resume) => {
        server.close(() => resume(Effect.void))
      }),
  ).pipe(
    Effect.tap(() => Effect.logInfo(`Bridge listening on http://${config.host}:${config.port}`)),
  )
