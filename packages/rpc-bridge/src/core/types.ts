/**
 * @module rpc-bridge/core/types
 *
 * Shared types and schema inspection helpers.
 */

import * as Schema from "effect/Schema"
import * as AST from "effect/SchemaAST"

/**
 * Any schema the bridge can use as a parameter, return or error type.
 * Schemas must be context-free: the bridge decodes synchronously.
 */
export type AnySchema = Schema.Schema.AnyNoContext

/**
 * HTTP verbs accepted in annotations. Stored upper-cased.
 */
export type HttpVerb = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD"

/**
 * Verbs whose arguments come solely from the URI.
 */
export const BODYLESS_VERBS: ReadonlySet<string> = new Set(["GET", "DELETE"])

const admitsNull = (ast: AST.AST): boolean => {
  switch (ast._tag) {
    case "Literal":
      return ast.literal === null
    case "VoidKeyword":
    case "UndefinedKeyword":
    case "UnknownKeyword":
    case "AnyKeyword":
      return true
    case "Union":
      return ast.types.some(admitsNull)
    case "Suspend":
      return admitsNull(ast.f())
    default:
      return false
  }
}

const admitsArray = (ast: AST.AST): boolean => {
  switch (ast._tag) {
    case "TupleType":
      return true
    case "Union":
      return ast.types.some(admitsArray)
    case "Suspend":
      return admitsArray(ast.f())
    default:
      return false
  }
}

/**
 * Whether the wire form of `schema` accepts `null`, i.e. whether a value of
 * this type may be left out of a request or returned as nothing.
 */
export const isOptionalSchema = (schema: AnySchema): boolean =>
  admitsNull(AST.encodedAST(schema.ast))

/**
 * Whether the wire form of `schema` is a list.
 */
export const isArraySchema = (schema: AnySchema): boolean =>
  admitsArray(AST.encodedAST(schema.ast))

/**
 * Human-readable name of a schema, used in error messages.
 */
export const describeSchema = (schema: AnySchema): string => String(schema.ast)

/**
 * JSON type name of a raw value, used in error messages.
 */
export const describeValue = (value: unknown): string => {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  return typeof value
}

/**
 * Narrow an unknown JSON value to a plain object.
 */
export const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)
