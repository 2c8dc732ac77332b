/**
 * @module rpc-bridge
 *
 * Expose Effect procedures over HTTP with JSON payloads.
 *
 * Each procedure can be mapped to a URL template (`GET /users/{id}`); any
 * procedure can also be called through the single-endpoint fallback
 * (`POST /?method=getUser` with the arguments in the JSON body).
 *
 * @example
 * ```ts
 * import { createBridge, procedure, service } from "rpc-bridge"
 * import * as Effect from "effect/Effect"
 * import * as Schema from "effect/Schema"
 *
 * const getUser = procedure
 *   .param("id", Schema.Number)
 *   .returns(User)
 *   .error(UserNotFound)
 *   .route("GET", "/users/{id}")
 *
 * const Users = service("users", { getUser })
 *
 * const UsersLive = Users.implement({
 *   getUser: ({ id }) => id === 1 ? Effect.succeed({ id, name: "Ada" }) : Effect.fail(new UserNotFound({ id })),
 * })
 *
 * const bridge = createBridge(UsersLive, { allowedOrigins: ["*.example.com"] })
 * const response = await bridge.fetch(new Request("http://localhost/users/1"))
 * ```
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core
// ─────────────────────────────────────────────────────────────────────────────

export * from "./core/index.js"

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { BridgeError } from "./errors/index.js"

export {
  TypeId as BridgeErrorTypeId,
  isBridgeError,
  TemplateError,
  ServiceDescriptorError,
  ServerListenError,
  RequiredArgumentMissingError,
  InvalidArgumentValueError,
  InvalidJsonBodyError,
  PayloadTooLargeError,
  MissingMethodNameError,
  MethodNotFoundError,
  MethodNotAllowedError,
  ServerFaultError,
  HandlerDefectError,
} from "./errors/index.js"

// ─────────────────────────────────────────────────────────────────────────────
// Server
// ─────────────────────────────────────────────────────────────────────────────

export * from "./server/index.js"

// ─────────────────────────────────────────────────────────────────────────────
// Shared
// ─────────────────────────────────────────────────────────────────────────────

export * from "./shared/index.js"
