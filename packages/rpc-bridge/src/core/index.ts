/**
 * @module rpc-bridge/core
 *
 * Declaring procedures and services, and compiling their URL mappings.
 */

export {
  procedure,
  type AnyProcedureDefinition,
  type ArgumentRecord,
  type HttpResource,
  type InferArguments,
  type InferError,
  type InferSuccess,
  type Parameter,
  type ParamOptions,
  type ProcedureBuilder,
  type ProcedureDefinition,
  type ProcedureHandler,
} from "./procedure.js"

export {
  bindHandlers,
  service,
  type AnyHandler,
  type Implementation,
  type ProcedureDescriptor,
  type ProcedureRecord,
  type ResolvedProcedure,
  type ServiceDefinition,
  type ServiceDescriptor,
  type ServiceImplementation,
} from "./service.js"

export {
  compileTemplate,
  normalizeVariableName,
  type MatchResult,
  type MatchValue,
  type UriTemplate,
} from "./template.js"

export { compareRules, RouteTable, type RouteLookup, type RouteMatch, type Rule } from "./routes.js"

export {
  describeSchema,
  isArraySchema,
  isOptionalSchema,
  type AnySchema,
  type HttpVerb,
} from "./types.js"
