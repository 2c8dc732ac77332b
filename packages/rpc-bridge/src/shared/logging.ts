/**
 * @module rpc-bridge/shared/logging
 *
 * Structured logging for the bridge.
 *
 * Every request is logged from start to response; procedure-level events
 * (declared errors, return type mismatches, handler defects) and CORS
 * decisions are logged in between. Events go through Effect's logger, so
 * the output format is whatever `Logger` layer the application provides.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Logger } from "effect"
 * import { createBridge, BridgeLoggerDev } from "rpc-bridge"
 *
 * const bridge = createBridge(UsersLive, { logger: BridgeLoggerDev })
 * ```
 *
 * ## Configuration
 *
 * ```typescript
 * const CustomLoggerLive = makeBridgeLoggerLayer({
 *   level: LogLevel.Debug,
 *   includePayload: true,
 *   redactFields: ["password", "token"],
 * })
 * ```
 *
 * @since 0.1.0
 */

import * as Clock from "effect/Clock"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as Layer from "effect/Layer"
import * as LogLevel from "effect/LogLevel"

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Log categories that can be individually enabled/disabled.
 *
 * @since 0.1.0
 */
export type LogCategory = "request" | "routing" | "procedure" | "cors"

/**
 * @since 0.1.0
 */
export interface BridgeLoggerConfig {
  /**
   * Minimum log level. Logs below this level are filtered.
   * @default LogLevel.Info
   */
  readonly level: LogLevel.LogLevel

  /**
   * Whether to include decoded procedure arguments in logs.
   * @default true outside production
   */
  readonly includePayload: boolean

  /**
   * Whether to include encoded results in logs.
   * @default false
   */
  readonly includeOutput: boolean

  /**
   * Fields to redact from logged data.
   * Values will be replaced with "[REDACTED]"
   */
  readonly redactFields: ReadonlyArray<string>

  /**
   * Maximum depth for nested object logging.
   * @default 3
   */
  readonly maxDepth: number

  /**
   * Maximum string length before truncation.
   * @default 200
   */
  readonly maxStringLength: number

  /**
   * Categories to enable. Empty means all enabled.
   */
  readonly enabledCategories: ReadonlyArray<LogCategory>

  /**
   * Categories to disable. Takes precedence over enabledCategories.
   */
  readonly disabledCategories: ReadonlyArray<LogCategory>
}

/**
 * @since 0.1.0
 */
export const defaultConfig: BridgeLoggerConfig = {
  level: LogLevel.Info,
  includePayload: process.env["NODE_ENV"] !== "production",
  includeOutput: false,
  redactFields: ["password", "token", "secret", "apiKey", "authorization", "cookie", "sessionId"],
  maxDepth: 3,
  maxStringLength: 200,
  enabledCategories: [],
  disabledCategories: [],
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Event types for structured logging.
 *
 * @since 0.1.0
 */
export type BridgeLogEvent =
  | RequestStartEvent
  | RequestSuccessEvent
  | RequestFailureEvent
  | RouteResolvedEvent
  | ProcedureCallEvent
  | DeclaredErrorEvent
  | ReturnTypeMismatchEvent
  | HandlerDefectEvent
  | OriginRejectedEvent

interface RequestStartEvent {
  readonly _tag: "RequestStart"
  readonly requestId: string
  readonly method: string
  readonly path: string
}

interface RequestSuccessEvent {
  readonly _tag: "RequestSuccess"
  readonly requestId: string
  readonly method: string
  readonly path: string
  readonly status: number
  readonly durationMs: number
}

interface RequestFailureEvent {
  readonly _tag: "RequestFailure"
  readonly requestId: string
  readonly method: string
  readonly path: string
  readonly status: number
  readonly durationMs: number
}

interface RouteResolvedEvent {
  readonly _tag: "RouteResolved"
  readonly requestId: string
  readonly procedure: string
  readonly routed: boolean
}

interface ProcedureCallEvent {
  readonly _tag: "ProcedureCall"
  readonly requestId: string
  readonly procedure: string
  readonly args: unknown
}

interface DeclaredErrorEvent {
  readonly _tag: "DeclaredError"
  readonly requestId: string
  readonly procedure: string
  readonly error: unknown
}

interface ReturnTypeMismatchEvent {
  readonly _tag: "ReturnTypeMismatch"
  readonly requestId: string
  readonly procedure: string
  readonly returnType: string
  readonly output: unknown
}

interface HandlerDefectEvent {
  readonly _tag: "HandlerDefect"
  readonly requestId: string
  readonly procedure: string
  readonly cause: string
}

interface OriginRejectedEvent {
  readonly _tag: "OriginRejected"
  readonly requestId: string
  readonly origin: string
}

/**
 * Request line of a logged request.
 */
export interface RequestInfo {
  readonly method: string
  readonly path: string
}

/**
 * @since 0.1.0
 */
export interface BridgeLoggerService {
  /**
   * Log a structured event.
   */
  readonly log: (event: BridgeLogEvent) => Effect.Effect<void>

  /**
   * Log a request lifecycle (start, then success or failure by status).
   * The request id is handed to `handle` so that inner events share it.
   */
  readonly logRequest: <A extends { readonly status: number }, E, R>(
    request: RequestInfo,
    handle: (requestId: string) => Effect.Effect<A, E, R>,
  ) => Effect.Effect<A, E, R>
}

/**
 * @since 0.1.0
 */
export class BridgeLogger extends Context.Tag("rpc-bridge/BridgeLogger")<BridgeLogger, BridgeLoggerService>() {}

// ─────────────────────────────────────────────────────────────────────────────
// Data Sanitization
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Redact sensitive fields from a value and bound its size.
 *
 * @since 0.1.0
 */
export const redactSensitiveData = (
  data: unknown,
  redactFields: ReadonlyArray<string>,
  maxDepth: number,
  maxStringLength: number,
  currentDepth = 0,
): unknown => {
  if (currentDepth >= maxDepth) {
    return "[MAX_DEPTH]"
  }

  if (data === null || data === undefined) {
    return data
  }

  if (typeof data === "string") {
    if (data.length > maxStringLength) {
      return data.slice(0, maxStringLength) + `... [truncated ${data.length - maxStringLength} chars]`
    }
    return data
  }

  if (typeof data === "number" || typeof data === "boolean") {
    return data
  }

  if (typeof data === "bigint") {
    return data.toString() + "n"
  }

  const next = (item: unknown): unknown =>
    redactSensitiveData(item, redactFields, maxDepth, maxStringLength, currentDepth + 1)

  if (Array.isArray(data)) {
    if (data.length > 100) {
      return [...data.slice(0, 10).map(next), `... [${data.length - 10} more items]`]
    }
    return data.map(next)
  }

  if (typeof data === "object") {
    const result: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase()
      result[key] = redactFields.some((field) => lowerKey.includes(field.toLowerCase()))
        ? "[REDACTED]"
        : next(value)
    }
    return result
  }

  if (typeof data === "symbol") {
    return data.toString()
  }

  if (typeof data === "function") {
    return `[Function: ${data.name || "anonymous"}]`
  }

  return `[${typeof data}]`
}

// ─────────────────────────────────────────────────────────────────────────────
// Request ID Generation
// ─────────────────────────────────────────────────────────────────────────────

let requestCounter = 0

/**
 * Generate a unique request ID for tracing.
 *
 * @since 0.1.0
 */
export const generateRequestId = (): string => {
  const timestamp = Date.now().toString(36)
  const counter = (requestCounter++).toString(36).padStart(4, "0")
  if (requestCounter >= 0x7fffffff) requestCounter = 0
  return `${timestamp}-${counter}`
}

// ─────────────────────────────────────────────────────────────────────────────
// Event Formatting
// ─────────────────────────────────────────────────────────────────────────────

export const categoryFromEvent = (event: BridgeLogEvent): LogCategory => {
  switch (event._tag) {
    case "RequestStart":
    case "RequestSuccess":
    case "RequestFailure":
      return "request"
    case "RouteResolved":
      return "routing"
    case "ProcedureCall":
    case "DeclaredError":
    case "ReturnTypeMismatch":
    case "HandlerDefect":
      return "procedure"
    case "OriginRejected":
      return "cors"
  }
}

export const levelFromEvent = (event: BridgeLogEvent): LogLevel.LogLevel => {
  switch (event._tag) {
    case "ReturnTypeMismatch":
    case "HandlerDefect":
      return LogLevel.Error

    case "RequestFailure":
      return event.status >= 500 ? LogLevel.Error : LogLevel.Warning

    case "RequestSuccess":
    case "DeclaredError":
      return LogLevel.Info

    case "RequestStart":
    case "RouteResolved":
    case "ProcedureCall":
    case "OriginRejected":
      return LogLevel.Debug
  }
}

export const formatEventMessage = (event: BridgeLogEvent): string => {
  switch (event._tag) {
    case "RequestStart":
      return `→ ${event.method} ${event.path}`
    case "RequestSuccess":
      return `← ${event.method} ${event.path} ${event.status} (${event.durationMs}ms)`
    case "RequestFailure":
      return `✗ ${event.method} ${event.path} ${event.status} (${event.durationMs}ms)`
    case "RouteResolved":
      return event.routed
        ? `Routed to ${event.procedure}`
        : `Fallback call of ${event.procedure}`
    case "ProcedureCall":
      return `Calling ${event.procedure}`
    case "DeclaredError":
      return `${event.procedure} failed with a declared error`
    case "ReturnTypeMismatch":
      return `${event.procedure} returned a value that is not a ${event.returnType}`
    case "HandlerDefect":
      return `${event.procedure} failed unexpectedly`
    case "OriginRejected":
      return `Origin not allowed: ${event.origin}`
  }
}

export const eventToAnnotations = (
  event: BridgeLogEvent,
  config: BridgeLoggerConfig,
): Record<string, unknown> => {
  const redact = (data: unknown): unknown =>
    redactSensitiveData(data, config.redactFields, config.maxDepth, config.maxStringLength)
  const base = {
    category: categoryFromEvent(event),
    eventType: event._tag,
    requestId: event.requestId,
  }

  switch (event._tag) {
    case "RequestStart":
      return { ...base, method: event.method, path: event.path }

    case "RequestSuccess":
    case "RequestFailure":
      return {
        ...base,
        method: event.method,
        path: event.path,
        status: event.status,
        durationMs: event.durationMs,
      }

    case "RouteResolved":
      return { ...base, procedure: event.procedure, routed: event.routed }

    case "ProcedureCall":
      return {
        ...base,
        procedure: event.procedure,
        ...(config.includePayload ? { args: redact(event.args) } : {}),
      }

    case "DeclaredError":
      return { ...base, procedure: event.procedure, error: redact(event.error) }

    case "ReturnTypeMismatch":
      return {
        ...base,
        procedure: event.procedure,
        returnType: event.returnType,
        ...(config.includeOutput ? { output: redact(event.output) } : {}),
      }

    case "HandlerDefect":
      return { ...base, procedure: event.procedure, cause: event.cause }

    case "OriginRejected":
      return { ...base, origin: event.origin }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Service Implementation
// ─────────────────────────────────────────────────────────────────────────────

const makeBridgeLoggerService = (config: BridgeLoggerConfig): BridgeLoggerService => {
  const isCategoryEnabled = (category: LogCategory): boolean => {
    if (config.disabledCategories.includes(category)) {
      return false
    }
    if (config.enabledCategories.length === 0) {
      return true
    }
    return config.enabledCategories.includes(category)
  }

  const logEvent = (event: BridgeLogEvent): Effect.Effect<void> => {
    if (!isCategoryEnabled(categoryFromEvent(event))) {
      return Effect.void
    }

    const eventLevel = levelFromEvent(event)
    if (LogLevel.lessThan(eventLevel, config.level)) {
      return Effect.void
    }

    const message = formatEventMessage(event)
    const logEffect =
      eventLevel === LogLevel.Error
        ? Effect.logError(message)
        : eventLevel === LogLevel.Warning
          ? Effect.logWarning(message)
          : eventLevel === LogLevel.Debug
            ? Effect.logDebug(message)
            : Effect.logInfo(message)

    return logEffect.pipe(Effect.annotateLogs(eventToAnnotations(event, config)))
  }

  const logRequest = <A extends { readonly status: number }, E, R>(
    request: RequestInfo,
    handle: (requestId: string) => Effect.Effect<A, E, R>,
  ): Effect.Effect<A, E, R> =>
    Effect.flatMap(Clock.currentTimeMillis, (startTime) => {
      const requestId = generateRequestId()
      const { method, path } = request

      return pipe(
        logEvent({ _tag: "RequestStart", requestId, method, path }),
        Effect.zipRight(handle(requestId)),
        Effect.tap((response) =>
          Effect.flatMap(Clock.currentTimeMillis, (endTime) => {
            const durationMs = Number(endTime - startTime)
            const { status } = response
            return logEvent(
              status >= 400
                ? { _tag: "RequestFailure", requestId, method, path, status, durationMs }
                : { _tag: "RequestSuccess", requestId, method, path, status, durationMs },
            )
          }),
        ),
      )
    })

  return {
    log: logEvent,
    logRequest,
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Layers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a BridgeLogger layer with custom configuration.
 *
 * @since 0.1.0
 */
export const makeBridgeLoggerLayer = (
  config: Partial<BridgeLoggerConfig> = {},
): Layer.Layer<BridgeLogger> =>
  Layer.succeed(BridgeLogger, makeBridgeLoggerService({ ...defaultConfig, ...config }))

/**
 * @since 0.1.0
 */
export const BridgeLoggerLive: Layer.Layer<BridgeLogger> = makeBridgeLoggerLayer()

/**
 * Development logger with verbose output.
 *
 * @since 0.1.0
 */
export const BridgeLoggerDev: Layer.Layer<BridgeLogger> = makeBridgeLoggerLayer({
  level: LogLevel.Debug,
  includePayload: true,
  includeOutput: true,
})

/**
 * Production logger: no payloads, no CORS or routing chatter.
 *
 * @since 0.1.0
 */
export const BridgeLoggerProd: Layer.Layer<BridgeLogger> = makeBridgeLoggerLayer({
  level: LogLevel.Info,
  includePayload: false,
  includeOutput: false,
  disabledCategories: ["routing", "cors"],
})

/**
 * Logger that logs nothing. Useful for testing.
 *
 * @since 0.1.0
 */
export const BridgeLoggerSilent: Layer.Layer<BridgeLogger> = makeBridgeLoggerLayer({
  level: LogLevel.None,
})

// ─────────────────────────────────────────────────────────────────────────────
// Convenience Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Log a raw event using the BridgeLogger service.
 *
 * @since 0.1.0
 */
export const logBridgeEvent = (event: BridgeLogEvent): Effect.Effect<void, never, BridgeLogger> =>
  Effect.flatMap(BridgeLogger, (logger) => logger.log(event))
