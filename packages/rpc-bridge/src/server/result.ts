/**
 * @module rpc-bridge/server/result
 *
 * Running a handler and turning its outcome into a response.
 *
 * A declared error is an expected outcome and is answered with 400 and the
 * error's own encoding. A returned value must survive an encode/decode round
 * trip through the declared return type; one that does not is a server
 * fault. Anything else a handler does (an undeclared failure, a defect) is
 * an internal server error.
 */

import * as Cause from "effect/Cause"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Exit from "effect/Exit"
import * as Option from "effect/Option"
import * as Schema from "effect/Schema"
import type { ProcedureDescriptor, ResolvedProcedure } from "../core/service.js"
import { describeSchema, isOptionalSchema } from "../core/types.js"
import { HandlerDefectError, ServerFaultError } from "../errors/index.js"
import { BridgeLogger } from "../shared/logging.js"
import { type BridgeResponse, jsonResponse } from "../shared/response.js"

// ─────────────────────────────────────────────────────────────────────────────
// Return Validation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check a handler result against the declared return type and encode it.
 *
 * `null` and `undefined` are accepted only by a return type that admits
 * `null` (or is `Void`/`Undefined`), and are sent as `null`.
 *
 * @since 0.1.0
 */
export const validateResult = (
  procedure: ProcedureDescriptor,
  result: unknown,
): Either.Either<unknown, ServerFaultError> => {
  const { returnSchema } = procedure
  const fault = (returnedNothing: boolean) =>
    new ServerFaultError({
      procedure: procedure.wireName,
      returnType: describeSchema(returnSchema),
      returnedNothing,
    })

  if (result === null || result === undefined) {
    return isOptionalSchema(returnSchema) ? Either.right(null) : Either.left(fault(true))
  }
  return Schema.encodeUnknownEither(returnSchema)(result).pipe(
    Either.flatMap((encoded) =>
      Either.map(Schema.decodeUnknownEither(returnSchema)(encoded), () => encoded),
    ),
    Either.mapLeft(() => fault(false)),
  )
}

/**
 * Encode a failure if one of the declared error types accepts it.
 */
export const encodeDeclaredError = (
  procedure: ProcedureDescriptor,
  error: unknown,
): Option.Option<unknown> => {
  for (const schema of procedure.errorSchemas) {
    if (!Schema.is(schema)(error)) continue
    const encoded = Schema.encodeUnknownEither(schema)(error)
    if (Either.isRight(encoded)) {
      return Option.some(encoded.right)
    }
  }
  return Option.none()
}

// ─────────────────────────────────────────────────────────────────────────────
// Invocation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run a resolved procedure with bound arguments.
 *
 * @since 0.1.0
 */
export const invokeProcedure = (
  resolved: ResolvedProcedure,
  args: Readonly<Record<string, unknown>>,
  requestId: string,
): Effect.Effect<BridgeResponse, ServerFaultError | HandlerDefectError, BridgeLogger> =>
  Effect.gen(function* () {
    const logger = yield* BridgeLogger
    const { procedure, handler } = resolved

    yield* logger.log({ _tag: "ProcedureCall", requestId, procedure: procedure.wireName, args })
    const exit = yield* Effect.exit(Effect.suspend(() => handler(args)))

    if (Exit.isFailure(exit)) {
      const declared = Option.flatMap(Cause.failureOption(exit.cause), (error) =>
        encodeDeclaredError(procedure, error),
      )
      if (Option.isSome(declared)) {
        yield* logger.log({
          _tag: "DeclaredError",
          requestId,
          procedure: procedure.wireName,
          error: declared.value,
        })
        return jsonResponse(400, declared.value)
      }
      yield* logger.log({
        _tag: "HandlerDefect",
        requestId,
        procedure: procedure.wireName,
        cause: Cause.pretty(exit.cause),
      })
      return yield* Effect.fail(
        new HandlerDefectError({ procedure: procedure.wireName, cause: Cause.squash(exit.cause) }),
      )
    }

    const validated = validateResult(procedure, exit.value)
    if (Either.isLeft(validated)) {
      yield* logger.log({
        _tag: "ReturnTypeMismatch",
        requestId,
        procedure: procedure.wireName,
        returnType: describeSchema(procedure.returnSchema),
        output: exit.value,
      })
      return yield* Effect.fail(validated.left)
    }
    return jsonResponse(200, validated.right)
  })
