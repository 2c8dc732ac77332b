/**
 * @module rpc-bridge/core/service
 *
 * Service descriptors and handler registries.
 *
 * A descriptor is the read-only table of a service's procedures with their
 * public and internal names. `implement` binds handlers to it and checks the
 * binding once, so that a request never discovers a missing handler.
 *
 * @example
 * ```ts
 * const Users = service("users", { getUser, createUser })
 *
 * const UsersLive = Users.implement({
 *   getUser: ({ id }) => Effect.succeed({ id, name: "Ada" }),
 *   createUser: ({ name }) => Effect.succeed({ id: 1, name }),
 * })
 * ```
 */

import type * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import { ServiceDescriptorError } from "../errors/index.js"
import type {
  AnyProcedureDefinition,
  HttpResource,
  Parameter,
  ProcedureHandler,
} from "./procedure.js"
import type { AnySchema } from "./types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A record of procedure definitions keyed by internal name.
 */
export type ProcedureRecord = Record<string, AnyProcedureDefinition>

/**
 * A procedure as seen by the dispatcher.
 */
export interface ProcedureDescriptor {
  /**
   * Key of the procedure in its service record.
   */
  readonly name: string

  /**
   * Public name callers use.
   */
  readonly wireName: string

  readonly description: string | undefined
  readonly parameters: ReadonlyArray<Parameter>
  readonly returnSchema: AnySchema
  readonly errorSchemas: ReadonlyArray<AnySchema>
  readonly http: HttpResource | undefined
}

/**
 * Read-only procedure table of a service.
 */
export interface ServiceDescriptor {
  readonly _tag: "ServiceDescriptor"
  readonly name: string

  /**
   * Procedures in declaration order.
   */
  readonly procedures: ReadonlyArray<ProcedureDescriptor>

  readonly wireToInternal: ReadonlyMap<string, string>
  readonly internalToWire: ReadonlyMap<string, string>

  /**
   * Look a procedure up by its public name.
   */
  readonly lookup: (wireName: string) => Option.Option<ProcedureDescriptor>
}

/**
 * Handlers for every procedure of a record, typed from the definitions.
 */
export type Implementation<P extends ProcedureRecord> = {
  readonly [K in keyof P]: ProcedureHandler<P[K]>
}

/**
 * A descriptor that still knows the definitions it was built from, and so
 * can type its implementation.
 */
export interface ServiceDefinition<P extends ProcedureRecord> extends ServiceDescriptor {
  readonly definitions: P
  readonly implement: (handlers: Implementation<P>) => ServiceImplementation
}

/**
 * Handler with its argument and result types erased.
 *
 * Declared through a method signature so that every typed
 * {@link ProcedureHandler} is assignable to it.
 */
export type AnyHandler = {
  handle(args: Readonly<Record<string, unknown>>): Effect.Effect<unknown, unknown>
}["handle"]

/**
 * A procedure resolved together with its handler.
 */
export interface ResolvedProcedure {
  readonly procedure: ProcedureDescriptor
  readonly handler: AnyHandler
}

/**
 * A descriptor bound to its handlers.
 *
 * @since 0.1.0
 */
export interface ServiceImplementation {
  readonly _tag: "ServiceImplementation"
  readonly descriptor: ServiceDescriptor

  /**
   * Internal name to handler.
   */
  readonly handlers: ReadonlyMap<string, AnyHandler>

  /**
   * Resolve a public procedure name to its descriptor and handler.
   */
  readonly resolve: (wireName: string) => Option.Option<ResolvedProcedure>
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

const RESERVED_PREFIX = "_"

const checkParameters = (serviceName: string, procedure: ProcedureDescriptor): void => {
  const wireNames = new Set<string>()
  const names = new Set<string>()
  for (const parameter of procedure.parameters) {
    if (parameter.wireName.startsWith(RESERVED_PREFIX)) {
      throw new ServiceDescriptorError({
        service: serviceName,
        reason:
          `parameter "${parameter.wireName}" of ${procedure.wireName}: ` +
          `wire names starting with "${RESERVED_PREFIX}" are reserved`,
      })
    }
    if (wireNames.has(parameter.wireName)) {
      throw new ServiceDescriptorError({
        service: serviceName,
        reason: `duplicate parameter wire name "${parameter.wireName}" in ${procedure.wireName}`,
      })
    }
    if (names.has(parameter.name)) {
      throw new ServiceDescriptorError({
        service: serviceName,
        reason: `duplicate parameter name "${parameter.name}" in ${procedure.wireName}`,
      })
    }
    wireNames.add(parameter.wireName)
    names.add(parameter.name)
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build a service descriptor.
 *
 * @param name - Service name, used in construction error messages
 * @param definitions - Procedures keyed by internal name
 * @throws {ServiceDescriptorError} when public names collide or parameters
 *   are declared inconsistently
 *
 * @since 0.1.0
 * @category constructors
 */
export function service<const P extends ProcedureRecord>(
  name: string,
  definitions: P,
): ServiceDefinition<P> {
  const procedures: Array<ProcedureDescriptor> = []
  const wireToInternal = new Map<string, string>()
  const internalToWire = new Map<string, string>()
  const byWireName = new Map<string, ProcedureDescriptor>()

  for (const [internalName, definition] of Object.entries(definitions)) {
    const descriptor: ProcedureDescriptor = {
      name: internalName,
      wireName: definition.wireName ?? internalName,
      description: definition.description,
      parameters: definition.parameters,
      returnSchema: definition.returnSchema,
      errorSchemas: definition.errorSchemas,
      http: definition.http,
    }
    const existing = wireToInternal.get(descriptor.wireName)
    if (existing !== undefined) {
      throw new ServiceDescriptorError({
        service: name,
        reason: `procedures "${existing}" and "${internalName}" share the name "${descriptor.wireName}"`,
      })
    }
    checkParameters(name, descriptor)
    procedures.push(descriptor)
    wireToInternal.set(descriptor.wireName, internalName)
    internalToWire.set(internalName, descriptor.wireName)
    byWireName.set(descriptor.wireName, descriptor)
  }

  const descriptor: ServiceDescriptor = {
    _tag: "ServiceDescriptor",
    name,
    procedures,
    wireToInternal,
    internalToWire,
    lookup: (wireName) => Option.fromNullable(byWireName.get(wireName)),
  }

  return {
    ...descriptor,
    definitions,
    implement: (handlers) => bindHandlers(descriptor, handlers),
  }
}

/**
 * Bind a handler table to a descriptor.
 *
 * Every declared procedure needs a function, and no handler may be given
 * for a procedure the descriptor does not declare.
 *
 * @throws {ServiceDescriptorError}
 */
export function bindHandlers(
  descriptor: ServiceDescriptor,
  handlers: Readonly<Record<string, AnyHandler | undefined>>,
): ServiceImplementation {
  const table = new Map<string, AnyHandler>()
  for (const procedure of descriptor.procedures) {
    const handler = handlers[procedure.name]
    if (handler === undefined) {
      throw new ServiceDescriptorError({
        service: descriptor.name,
        reason: `no handler for procedure "${procedure.name}"`,
      })
    }
    // Untyped callers can still pass anything here.
    if (typeof handler !== "function") {
      throw new ServiceDescriptorError({
        service: descriptor.name,
        reason: `handler for procedure "${procedure.name}" is not a function`,
      })
    }
    table.set(procedure.name, handler)
  }
  for (const key of Object.keys(handlers)) {
    if (!descriptor.internalToWire.has(key)) {
      throw new ServiceDescriptorError({
        service: descriptor.name,
        reason: `handler given for undeclared procedure "${key}"`,
      })
    }
  }

  return {
    _tag: "ServiceImplementation",
    descriptor,
    handlers: table,
    resolve: (wireName) =>
      Option.flatMap(descriptor.lookup(wireName), (procedure) =>
        Option.map(Option.fromNullable(table.get(procedure.name)), (handler) => ({
          procedure,
          handler,
        })),
      ),
  }
}
