/**
 * @module rpc-bridge/core/routes
 *
 * The route table: every URL-mapped procedure compiled to a rule, kept in
 * one fixed order.
 *
 * Rules with more variables come first; among rules with as many
 * variables, the greater template text (compared code unit by code unit)
 * comes first. The order is computed once, when the table is built.
 */

import * as Option from "effect/Option"
import { TemplateError } from "../errors/index.js"
import type { ServiceDescriptor } from "./service.js"
import { compileTemplate, type MatchResult, normalizeVariableName, type UriTemplate } from "./template.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A compiled URL mapping of one procedure.
 */
export interface Rule {
  readonly template: UriTemplate
  readonly verb: string

  /**
   * Public name of the target procedure.
   */
  readonly procedure: string
}

/**
 * The rule selected for a request, with its captures.
 */
export interface RouteMatch {
  readonly rule: Rule
  readonly captures: MatchResult
}

export interface RouteLookup {
  readonly match: Option.Option<RouteMatch>

  /**
   * Verbs of every rule whose template matched, in rule order, without
   * repeats. Filled even when no rule was selected.
   */
  readonly allowedVerbs: ReadonlyArray<string>
}

/**
 * @since 0.1.0
 */
export interface RouteTable {
  readonly rules: ReadonlyArray<Rule>
  readonly match: (method: string, path: string, query: string) => RouteLookup
}

// ─────────────────────────────────────────────────────────────────────────────
// Ordering
// ─────────────────────────────────────────────────────────────────────────────

const isRootPath = (path: string): boolean => path === "" || path === "/"

const pathOf = (template: string): string => {
  const separator = template.indexOf("?")
  return separator === -1 ? template : template.slice(0, separator)
}

/**
 * Rule order: more variables first, then greater template text first.
 */
export const compareRules = (a: Rule, b: Rule): number => {
  const byVariables = b.template.names.size - a.template.names.size
  if (byVariables !== 0) return byVariables
  if (a.template.template === b.template.template) return 0
  return a.template.template > b.template.template ? -1 : 1
}

// ─────────────────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────────────────

const makeRouteTable = (rules: ReadonlyArray<Rule>): RouteTable => {
  const ordered = [...rules].sort(compareRules)

  const match = (method: string, path: string, query: string): RouteLookup => {
    if (isRootPath(path)) {
      return { match: Option.none(), allowedVerbs: [] }
    }
    const allowedVerbs: Array<string> = []
    let selected: Option.Option<RouteMatch> = Option.none()
    for (const rule of ordered) {
      const captures = rule.template.match(path, query)
      if (Option.isNone(captures)) continue
      if (!allowedVerbs.includes(rule.verb)) {
        allowedVerbs.push(rule.verb)
      }
      if (Option.isNone(selected) && (method === rule.verb || method === "OPTIONS")) {
        selected = Option.some({ rule, captures: captures.value })
      }
    }
    return { match: selected, allowedVerbs }
  }

  return { rules: ordered, match }
}

/**
 * Compile the route table of a service from its procedures' URL mappings.
 *
 * @throws {TemplateError} when a template binds the root resource, is
 *   malformed, or leaves a required parameter without a variable
 */
const fromDescriptor = (descriptor: ServiceDescriptor): RouteTable => {
  const rules: Array<Rule> = []
  for (const procedure of descriptor.procedures) {
    if (procedure.http === undefined) continue
    const { path, verb } = procedure.http
    if (isRootPath(pathOf(path))) {
      throw new TemplateError({ template: path, reason: "the root resource is reserved" })
    }
    const template = compileTemplate(path)
    const unsatisfied = procedure.parameters
      .filter((parameter) => !parameter.optional)
      .map((parameter) => normalizeVariableName(parameter.wireName))
      .filter((name) => !template.names.has(name))
    if (unsatisfied.length > 0) {
      throw new TemplateError({
        template: path,
        reason:
          `${procedure.wireName} has parameters not satisfied by the template: ` +
          unsatisfied.join(", "),
      })
    }
    rules.push({ template, verb, procedure: procedure.wireName })
  }
  return makeRouteTable(rules)
}

/**
 * @since 0.1.0
 * @category constructors
 */
export const RouteTable = {
  fromDescriptor,
  fromRules: makeRouteTable,
} as const
