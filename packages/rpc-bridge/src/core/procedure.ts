/**
 * @module rpc-bridge/core/procedure
 *
 * Procedure builder API.
 *
 * A procedure declares its ordered parameters, its return type, the error
 * variants it may fail with and, optionally, the URL it is exposed at. Every
 * type is an Effect Schema; the builder tracks them in its type parameters so
 * that handlers are checked against the declaration.
 *
 * @example
 * ```ts
 * const getUser = procedure
 *   .param("id", Schema.Number)
 *   .param("withPosts", Schema.NullOr(Schema.Boolean), { wireName: "with-posts" })
 *   .returns(User)
 *   .error(UserNotFound)
 *   .route("GET", "/users/{id}?with-posts={with-posts}")
 * ```
 */

import type * as Effect from "effect/Effect"
import * as Schema from "effect/Schema"
import { type AnySchema, type HttpVerb, isArraySchema, isOptionalSchema } from "./types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A declared procedure parameter.
 */
export interface Parameter {
  /**
   * Name of the argument handed to the handler.
   */
  readonly name: string

  /**
   * Name of the value in JSON payloads and URI templates.
   */
  readonly wireName: string

  readonly schema: AnySchema

  /**
   * Whether the parameter may be left out (its schema admits `null`).
   */
  readonly optional: boolean

  /**
   * Whether the parameter's wire form is a list.
   */
  readonly list: boolean
}

/**
 * URL-mapping annotation of a procedure.
 */
export interface HttpResource {
  readonly verb: string
  readonly path: string
}

export interface ParamOptions {
  /**
   * Name used on the wire. Defaults to the argument name.
   */
  readonly wireName?: string
}

/**
 * Shape of the argument object a handler receives.
 */
export type ArgumentRecord = Readonly<Record<string, unknown>>

/**
 * A procedure definition (contract only).
 *
 * @typeParam Args - Argument object the handler receives
 * @typeParam A - Return type
 * @typeParam E - Declared error variants
 */
export interface ProcedureDefinition<Args extends ArgumentRecord = {}, A = void, E = never> {
  readonly _tag: "ProcedureDefinition"
  readonly wireName: string | undefined
  readonly description: string | undefined
  readonly parameters: ReadonlyArray<Parameter>
  readonly returnSchema: AnySchema
  readonly errorSchemas: ReadonlyArray<AnySchema>
  readonly http: HttpResource | undefined

  // Phantom types
  readonly _args?: Args
  readonly _success?: A
  readonly _error?: E
}

export type AnyProcedureDefinition = ProcedureDefinition<ArgumentRecord, unknown, unknown>

export type InferArguments<P extends AnyProcedureDefinition> = NonNullable<P["_args"]>
export type InferSuccess<P> = P extends ProcedureDefinition<ArgumentRecord, infer A, unknown> ? A : never
export type InferError<P> = P extends ProcedureDefinition<ArgumentRecord, unknown, infer E> ? E : never

/**
 * Implementation of a procedure: a function from the decoded arguments to
 * an Effect that succeeds with the return type or fails with a declared
 * error.
 */
export type ProcedureHandler<P extends AnyProcedureDefinition> = (
  args: InferArguments<P>,
) => Effect.Effect<InferSuccess<P>, InferError<P>>

// ─────────────────────────────────────────────────────────────────────────────
// Builder
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Immutable procedure builder. Every step returns a new builder, and every
 * builder is itself a usable definition.
 */
export interface ProcedureBuilder<Args extends ArgumentRecord = {}, A = void, E = never>
  extends ProcedureDefinition<Args, A, E> {
  readonly param: <N extends string, PA, PI>(
    name: N,
    schema: Schema.Schema<PA, PI>,
    options?: ParamOptions,
  ) => ProcedureBuilder<Args & { readonly [K in N]: PA }, A, E>

  readonly returns: <A2, AI>(schema: Schema.Schema<A2, AI>) => ProcedureBuilder<Args, A2, E>

  readonly error: <Errors extends ReadonlyArray<AnySchema>>(
    ...errors: Errors
  ) => ProcedureBuilder<Args, A, E | Schema.Schema.Type<Errors[number]>>

  readonly route: (verb: HttpVerb | Lowercase<HttpVerb>, path: string) => ProcedureBuilder<Args, A, E>

  readonly named: (wireName: string) => ProcedureBuilder<Args, A, E>
  readonly describe: (text: string) => ProcedureBuilder<Args, A, E>
}

interface ProcedureState {
  readonly wireName: string | undefined
  readonly description: string | undefined
  readonly parameters: ReadonlyArray<Parameter>
  readonly returnSchema: AnySchema
  readonly errorSchemas: ReadonlyArray<AnySchema>
  readonly http: HttpResource | undefined
}

const createBuilder = <Args extends ArgumentRecord, A, E>(state: ProcedureState): ProcedureBuilder<Args, A, E> => ({
  _tag: "ProcedureDefinition",
  ...state,

  param: <N extends string, PA, PI>(name: N, schema: Schema.Schema<PA, PI>, options?: ParamOptions) =>
    createBuilder<Args & { readonly [K in N]: PA }, A, E>({
      ...state,
      parameters: [
        ...state.parameters,
        {
          name,
          wireName: options?.wireName ?? name,
          schema,
          optional: isOptionalSchema(schema),
          list: isArraySchema(schema),
        },
      ],
    }),

  returns: <A2, AI>(schema: Schema.Schema<A2, AI>) =>
    createBuilder<Args, A2, E>({ ...state, returnSchema: schema }),

  error: <Errors extends ReadonlyArray<AnySchema>>(...errors: Errors) =>
    createBuilder<Args, A, E | Schema.Schema.Type<Errors[number]>>({
      ...state,
      errorSchemas: [...state.errorSchemas, ...errors],
    }),

  route: (verb, path) =>
    createBuilder<Args, A, E>({ ...state, http: { verb: verb.toUpperCase(), path } }),

  named: (wireName) => createBuilder<Args, A, E>({ ...state, wireName }),

  describe: (text) => createBuilder<Args, A, E>({ ...state, description: text }),
})

/**
 * Entry point for building procedures.
 *
 * @since 0.1.0
 */
export const procedure: ProcedureBuilder = createBuilder<{}, void, never>({
  wireName: undefined,
  description: undefined,
  parameters: [],
  returnSchema: Schema.Void,
  errorSchemas: [],
  http: undefined,
})
