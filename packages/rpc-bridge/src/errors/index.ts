/**
 * @module rpc-bridge/errors
 *
 * Error taxonomy of the bridge.
 *
 * Two families live here:
 * - construction errors (`TemplateError`, `ServiceDescriptorError`), thrown
 *   while a bridge is being built and never caught by the library, and
 *   `ServerListenError` when a bridge cannot be served;
 * - dispatch errors, following the Schema.TaggedError pattern. Each carries
 *   the HTTP status it is rendered with and a message used in the JSON
 *   error envelope.
 */

import * as Data from "effect/Data"
import * as Predicate from "effect/Predicate"
import * as Schema from "effect/Schema"

// ─────────────────────────────────────────────────────────────────────────────
// Type Identification
// ─────────────────────────────────────────────────────────────────────────────

export const TypeId: unique symbol = Symbol.for("rpc-bridge/BridgeError")
export type TypeId = typeof TypeId

export const isBridgeError = (u: unknown): u is BridgeError =>
  Predicate.hasProperty(u, TypeId)

// ─────────────────────────────────────────────────────────────────────────────
// Construction Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Raised when a URI template cannot be compiled or bound: duplicate
 * variables, a template bound to the root resource, or a template that
 * leaves required parameters unsatisfied.
 *
 * @since 0.1.0
 * @category errors
 */
export class TemplateError extends Data.TaggedError("TemplateError")<{
  readonly template: string
  readonly reason: string
}> {
  override get message(): string {
    return `${this.template}: ${this.reason}`
  }
}

/**
 * Raised when a service descriptor or its handler registry is inconsistent.
 *
 * @since 0.1.0
 * @category errors
 */
export class ServiceDescriptorError extends Data.TaggedError("ServiceDescriptorError")<{
  readonly service: string
  readonly reason: string
}> {
  override get message(): string {
    return `[${this.service}] ${this.reason}`
  }
}

/**
 * The server of a bridge could not bind its address.
 *
 * @since 0.1.0
 * @category errors
 */
export class ServerListenError extends Data.TaggedError("ServerListenError")<{
  readonly host: string
  readonly port: number
  readonly cause: Error
}> {
  override get message(): string {
    return `Cannot listen on ${this.host}:${this.port}: ${this.cause.message}`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Argument Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A non-optional parameter is absent from the merged request payload.
 *
 * @since 0.1.0
 * @category errors
 */
export class RequiredArgumentMissingError extends Schema.TaggedError<RequiredArgumentMissingError>()(
  "RequiredArgumentMissingError",
  {
    procedure: Schema.String,
    argument: Schema.String,
  },
) {
  readonly [TypeId]: TypeId = TypeId
  readonly httpStatus = 400

  override get message(): string {
    return `An argument named '${this.argument}' is missing, it is required.`
  }
}

/**
 * A parameter value was rejected by its declared schema.
 *
 * @since 0.1.0
 * @category errors
 */
export class InvalidArgumentValueError extends Schema.TaggedError<InvalidArgumentValueError>()(
  "InvalidArgumentValueError",
  {
    procedure: Schema.String,
    argument: Schema.String,
    received: Schema.String,
    expected: Schema.String,
    description: Schema.optional(Schema.String),
  },
) {
  readonly [TypeId]: TypeId = TypeId
  readonly httpStatus = 400

  override get message(): string {
    return (
      this.description ??
      `Incorrect type '${this.received}' for '${this.argument}'. expected '${this.expected}'.`
    )
  }
}

/**
 * The request body is not a JSON object.
 *
 * @since 0.1.0
 * @category errors
 */
export class InvalidJsonBodyError extends Schema.TaggedError<InvalidJsonBodyError>()(
  "InvalidJsonBodyError",
  {
    payload: Schema.String,
  },
) {
  readonly [TypeId]: TypeId = TypeId
  readonly httpStatus = 400

  override get message(): string {
    return `Invalid JSON payload: '${this.payload}'.`
  }
}

/**
 * The request body exceeded the configured size limit.
 *
 * @since 0.1.0
 * @category errors
 */
export class PayloadTooLargeError extends Schema.TaggedError<PayloadTooLargeError>()(
  "PayloadTooLargeError",
  {
    maxSize: Schema.Number,
    receivedSize: Schema.Number,
  },
) {
  readonly [TypeId]: TypeId = TypeId
  readonly httpStatus = 413

  override get message(): string {
    return `Request body too large: received ${this.receivedSize} bytes, max ${this.maxSize} bytes`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Dispatch Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A fallback request did not name the procedure to call.
 *
 * @since 0.1.0
 * @category errors
 */
export class MissingMethodNameError extends Schema.TaggedError<MissingMethodNameError>()(
  "MissingMethodNameError",
  {},
) {
  readonly [TypeId]: TypeId = TypeId
  readonly httpStatus = 400

  override get message(): string {
    return "`method` is missing."
  }
}

/**
 * The resolved procedure name has no handler behind it.
 *
 * A routed request answers 404 (the URL looked like a route but nothing
 * backs it); a fallback request answers 400 (its `method` parameter was
 * wrong).
 *
 * @since 0.1.0
 * @category errors
 */
export class MethodNotFoundError extends Schema.TaggedError<MethodNotFoundError>()(
  "MethodNotFoundError",
  {
    method: Schema.String,
    routed: Schema.Boolean,
  },
) {
  readonly [TypeId]: TypeId = TypeId

  get httpStatus(): number {
    return this.routed ? 404 : 400
  }

  override get message(): string {
    return `No service method \`${this.method}\` found.`
  }
}

/**
 * No rule accepts the request verb and the fallback protocol does not apply.
 *
 * @since 0.1.0
 * @category errors
 */
export class MethodNotAllowedError extends Schema.TaggedError<MethodNotAllowedError>()(
  "MethodNotAllowedError",
  {
    method: Schema.String,
    path: Schema.String,
    allowedVerbs: Schema.Array(Schema.String),
  },
) {
  readonly [TypeId]: TypeId = TypeId
  readonly httpStatus = 405

  override get message(): string {
    return `The requested URL ${this.path} was not allowed HTTP method ${this.method}.`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Server Errors
// ─────────────────────────────────────────────────────────────────────────────

const hyphenate = (name: string): string => name.replace(/_/g, "-")

/**
 * A handler returned a value its declared return type rejects.
 *
 * @since 0.1.0
 * @category errors
 */
export class ServerFaultError extends Schema.TaggedError<ServerFaultError>()(
  "ServerFaultError",
  {
    procedure: Schema.String,
    returnType: Schema.String,
    returnedNothing: Schema.Boolean,
  },
) {
  readonly [TypeId]: TypeId = TypeId
  readonly httpStatus = 500

  override get message(): string {
    const name = hyphenate(this.procedure)
    if (this.returnedNothing) {
      return (
        `The return type of ${name}() method is not optional, but its server-side ` +
        "implementation has tried to return nothing (i.e., null or undefined). " +
        "It is an internal server error and should be fixed by server-side."
      )
    }
    return (
      `The return type of the ${name}() method is ${this.returnType}, but its server-side ` +
      "implementation has tried to return a value of an invalid type. " +
      "It is an internal server error and should be fixed by server-side."
    )
  }
}

/**
 * A handler failed with an undeclared error or died.
 *
 * @since 0.1.0
 * @category errors
 */
export class HandlerDefectError extends Schema.TaggedError<HandlerDefectError>()(
  "HandlerDefectError",
  {
    procedure: Schema.String,
    cause: Schema.optional(Schema.Defect),
  },
) {
  readonly [TypeId]: TypeId = TypeId
  readonly httpStatus = 500

  override get message(): string {
    return "Internal Server Error"
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Union Type
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Every error the request pipeline turns into a generic error envelope.
 *
 * @since 0.1.0
 * @category errors
 */
export type BridgeError =
  | RequiredArgumentMissingError
  | InvalidArgumentValueError
  | InvalidJsonBodyError
  | PayloadTooLargeError
  | MissingMethodNameError
  | MethodNotFoundError
  | MethodNotAllowedError
  | ServerFaultError
  | HandlerDefectError
