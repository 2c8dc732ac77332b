/**
 * @module rpc-bridge/core/template
 *
 * URI template compilation and matching.
 *
 * A template has the form `path[?k1={v1}&k2={v2}...]`. Placeholders in the
 * path become non-greedy captures; each query pair becomes an independent
 * matcher that collects every `key=value` occurrence in the query string.
 *
 * @example
 * ```ts
 * const template = compileTemplate("/users/{user-id}/posts?tag={tag}")
 * template.match("/users/42/posts", "tag=a&tag=b")
 * // Option.some(Map { "user_id" => "42", "tag" => ["a", "b"] })
 * ```
 */

import * as Option from "effect/Option"
import { TemplateError } from "../errors/index.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A captured value: one string, or every value of a repeated query key.
 */
export type MatchValue = string | ReadonlyArray<string>

/**
 * Variable name to captured value(s).
 */
export type MatchResult = ReadonlyMap<string, MatchValue>

type Captures = ReadonlyArray<readonly [name: string, value: string]>

interface QueryMatcher {
  readonly key: string
  readonly name: string
  readonly pattern: RegExp
}

/**
 * A compiled URI template.
 */
export interface UriTemplate {
  readonly template: string

  /**
   * Every variable name (path and query), normalised, in template order.
   */
  readonly names: ReadonlySet<string>

  /**
   * Match a request path. The whole path must match.
   */
  readonly matchPath: (path: string) => Option.Option<Captures>

  /**
   * Match a raw query string (without the leading `?`). Succeeds only if
   * every declared key occurs at least once; always succeeds for a template
   * without a query clause.
   */
  readonly matchQuery: (query: string) => Option.Option<Captures>

  /**
   * Match path and query together.
   */
  readonly match: (path: string, query: string) => Option.Option<MatchResult>
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const VARIABLE_PATTERN = /\{([a-zA-Z0-9_-]+)\}/g
const QUERY_PAIR_PATTERN = /^([\w-]+)=\{([a-zA-Z0-9_-]+)\}$/

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")

/**
 * Template variable names may use hyphens; they are matched as underscores.
 */
export const normalizeVariableName = (name: string): string => name.replace(/-/g, "_")

const decodeComponent = (value: string): string => {
  try {
    return decodeURIComponent(value)
  } catch {
    // Not valid percent-encoding; keep the raw text.
    return value
  }
}

const decodeQueryComponent = (value: string): string => decodeComponent(value.replace(/\+/g, " "))

/**
 * Fold captures into a MatchResult. A name captured more than once maps to
 * the list of all its values.
 */
export const toMatchResult = (captures: Captures): MatchResult => {
  const grouped = new Map<string, Array<string>>()
  for (const [name, value] of captures) {
    const values = grouped.get(name)
    if (values) {
      values.push(value)
    } else {
      grouped.set(name, [value])
    }
  }
  const result = new Map<string, MatchValue>()
  for (const [name, values] of grouped) {
    result.set(name, values.length === 1 && values[0] !== undefined ? values[0] : values)
  }
  return result
}

// ─────────────────────────────────────────────────────────────────────────────
// Compilation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Compile a URI template.
 *
 * @throws {TemplateError} on a duplicate variable or a malformed query clause
 */
export function compileTemplate(template: string): UriTemplate {
  const separator = template.indexOf("?")
  const pathTemplate = separator === -1 ? template : template.slice(0, separator)
  const queryTemplate = separator === -1 ? undefined : template.slice(separator + 1)

  const names = new Set<string>()
  const addVariable = (raw: string): string => {
    const name = normalizeVariableName(raw)
    if (names.has(name)) {
      throw new TemplateError({
        template,
        reason: `every variable must not be duplicated: ${name}`,
      })
    }
    names.add(name)
    return name
  }

  // Path
  const pathNames: Array<string> = []
  let source = "^"
  let lastIndex = 0
  for (const match of pathTemplate.matchAll(VARIABLE_PATTERN)) {
    const [whole, raw] = match
    if (raw === undefined) continue
    const index = match.index ?? 0
    pathNames.push(addVariable(raw))
    source += escapeRegExp(pathTemplate.slice(lastIndex, index)) + "(.+?)"
    lastIndex = index + whole.length
  }
  source += escapeRegExp(pathTemplate.slice(lastIndex)) + "$"
  const pathPattern = new RegExp(source)

  // Query
  const queryMatchers: Array<QueryMatcher> = []
  if (queryTemplate !== undefined) {
    for (const pair of queryTemplate.split("&")) {
      if (pair === "") continue
      const parsed = QUERY_PAIR_PATTERN.exec(pair)
      const key = parsed?.[1]
      const raw = parsed?.[2]
      if (key === undefined || raw === undefined) {
        throw new TemplateError({
          template,
          reason: `malformed query clause "${pair}"; expected key={variable}`,
        })
      }
      queryMatchers.push({
        key,
        name: addVariable(raw),
        pattern: new RegExp(`(?:^|[&;])${escapeRegExp(key)}=([^&;]+)`, "g"),
      })
    }
  }

  const matchPath = (path: string): Option.Option<Captures> => {
    const match = pathPattern.exec(path)
    if (!match) return Option.none()
    const captures: Array<readonly [string, string]> = []
    pathNames.forEach((name, index) => {
      const value = match[index + 1]
      if (value !== undefined) {
        captures.push([name, decodeComponent(value)])
      }
    })
    return Option.some(captures)
  }

  const matchQuery = (query: string): Option.Option<Captures> => {
    const captures: Array<readonly [string, string]> = []
    for (const matcher of queryMatchers) {
      let found = false
      for (const match of query.matchAll(matcher.pattern)) {
        const value = match[1]
        if (value === undefined) continue
        captures.push([matcher.name, decodeQueryComponent(value)])
        found = true
      }
      if (!found) return Option.none()
    }
    return Option.some(captures)
  }

  return {
    template,
    names,
    matchPath,
    matchQuery,
    match: (path, query) =>
      Option.flatMap(matchPath(path), (pathCaptures) =>
        Option.map(matchQuery(query), (queryCaptures) =>
          toMatchResult([...pathCaptures, ...queryCaptures]),
        ),
      ),
  }
}
