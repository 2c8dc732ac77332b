/**
 * @module rpc-bridge/server/arguments
 *
 * Argument binding.
 *
 * A request carries arguments in two places: the URI (template captures)
 * and the JSON body. They are collected separately and merged with body
 * keys winning, then every declared parameter is decoded from the merged
 * payload with its schema.
 */

import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Schema from "effect/Schema"
import type { Parameter } from "../core/procedure.js"
import type { ProcedureDescriptor } from "../core/service.js"
import { type MatchResult, type MatchValue, normalizeVariableName } from "../core/template.js"
import { type AnySchema, describeSchema, describeValue, isJsonObject } from "../core/types.js"
import {
  InvalidArgumentValueError,
  InvalidJsonBodyError,
  RequiredArgumentMissingError,
} from "../errors/index.js"
import { decodeBody } from "../shared/response.js"

// ─────────────────────────────────────────────────────────────────────────────
// Payload
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The raw arguments of a request, keyed by parameter wire name.
 */
export interface Payload {
  readonly values: Readonly<Record<string, unknown>>

  /**
   * Wire names whose value was taken from the URI rather than the body.
   */
  readonly fromUri: ReadonlySet<string>
}

/**
 * Parse a JSON request body. An empty body is an empty object.
 */
export const parseJsonBody = (
  body: Uint8Array,
): Effect.Effect<Readonly<Record<string, unknown>>, InvalidJsonBodyError> => {
  const text = decodeBody(body)
  if (text === "") {
    return Effect.succeed({})
  }
  return Either.try({
    try: (): unknown => JSON.parse(text),
    catch: () => new InvalidJsonBodyError({ payload: text }),
  }).pipe(
    Either.flatMap((json): Either.Either<Readonly<Record<string, unknown>>, InvalidJsonBodyError> =>
      isJsonObject(json) ? Either.right(json) : Either.left(new InvalidJsonBodyError({ payload: text })),
    ),
  )
}

/**
 * Template captures of the declared parameters, keyed by wire name.
 */
export const capturedArguments = (
  parameters: ReadonlyArray<Parameter>,
  captures: MatchResult,
): ReadonlyMap<string, MatchValue> => {
  const captured = new Map<string, MatchValue>()
  for (const parameter of parameters) {
    const value = captures.get(normalizeVariableName(parameter.wireName))
    if (value !== undefined) {
      captured.set(parameter.wireName, value)
    }
  }
  return captured
}

/**
 * Merge URI captures with the body. A body key replaces the capture of the
 * same name.
 */
export const mergePayload = (
  captured: ReadonlyMap<string, MatchValue>,
  body: Readonly<Record<string, unknown>>,
): Payload => {
  const values: Record<string, unknown> = Object.fromEntries(captured)
  const fromUri = new Set(captured.keys())
  for (const [key, value] of Object.entries(body)) {
    values[key] = value
    fromUri.delete(key)
  }
  return { values, fromUri }
}

// ─────────────────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────────────────

type ArgumentError = RequiredArgumentMissingError | InvalidArgumentValueError

const decode = (schema: AnySchema, value: unknown): Either.Either<unknown, unknown> =>
  Schema.decodeUnknownEither(schema)(value)

/**
 * JSON reading of URI text: `"42"` is `42`, `"true"` is `true`. Text that
 * is not JSON stays text.
 */
const readJson = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(readJson)
  if (typeof value !== "string") return value
  return Either.getOrElse(
    Either.try((): unknown => JSON.parse(value)),
    () => value,
  )
}

const hasOwn = (values: Readonly<Record<string, unknown>>, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(values, key)

const bindParameter = (
  procedure: string,
  parameter: Parameter,
  payload: Payload,
): Effect.Effect<unknown, ArgumentError> => {
  const { wireName, schema } = parameter
  const invalid = (received: unknown) =>
    new InvalidArgumentValueError({
      procedure,
      argument: wireName,
      received: describeValue(received),
      expected: describeSchema(schema),
    })

  if (!hasOwn(payload.values, wireName)) {
    if (!parameter.optional) {
      return Effect.fail(new RequiredArgumentMissingError({ procedure, argument: wireName }))
    }
    return decode(schema, null).pipe(
      Either.orElse(() => decode(schema, undefined)),
      Either.mapLeft(() => invalid(null)),
    )
  }

  const raw = payload.values[wireName]
  if (!payload.fromUri.has(wireName)) {
    return decode(schema, raw).pipe(Either.mapLeft(() => invalid(raw)))
  }

  // A repeated query key yields several values; only a list takes them.
  if (Array.isArray(raw) && !parameter.list) {
    return Effect.fail(invalid(raw))
  }
  const value = parameter.list && !Array.isArray(raw) ? [raw] : raw
  return decode(schema, value).pipe(
    Either.orElse(() => decode(schema, readJson(value))),
    Either.mapLeft(() => invalid(raw)),
  )
}

/**
 * Decode every declared parameter of a procedure from a payload, in
 * declaration order. The result is keyed by the parameters' internal names.
 *
 * @since 0.1.0
 */
export const bindArguments = (
  procedure: ProcedureDescriptor,
  payload: Payload,
): Effect.Effect<Readonly<Record<string, unknown>>, ArgumentError> =>
  Effect.gen(function* () {
    const args: Record<string, unknown> = {}
    for (const parameter of procedure.parameters) {
      args[parameter.name] = yield* bindParameter(procedure.wireName, parameter, payload)
    }
    return args
  })
