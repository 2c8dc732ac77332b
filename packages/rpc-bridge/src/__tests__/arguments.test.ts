import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as Schema from "effect/Schema"
import { describe, expect, it } from "vitest"
import { procedure } from "../core/procedure.js"
import { service } from "../core/service.js"
import { bindArguments, capturedArguments, mergePayload, parseJsonBody, type Payload } from "../server/arguments.js"
import { Library } from "./test-utils/index.js"

const encoder = new TextEncoder()

const Search = service("search", {
  search: procedure
    .param("page", Schema.Number)
    .param("tags", Schema.Array(Schema.Number), { wireName: "tag" })
    .param("note", Schema.NullOr(Schema.String))
    .param("hint", Schema.UndefinedOr(Schema.String))
    .param("label", Schema.String),
})
const search = Option.getOrThrow(Search.lookup("search"))

const fromUri = (values: Record<string, unknown>, uriKeys: ReadonlyArray<string>): Payload => ({
  values,
  fromUri: new Set(uriKeys),
})

describe("parseJsonBody", () => {
  it("parses a JSON object", () => {
    expect(Effect.runSync(parseJsonBody(encoder.encode('{"a":1}')))).toEqual({ a: 1 })
  })

  it("treats an empty body as an empty object", () => {
    expect(Effect.runSync(parseJsonBody(new Uint8Array()))).toEqual({})
  })

  it("rejects malformed JSON", () => {
    const error = Effect.runSync(Effect.flip(parseJsonBody(encoder.encode("{oops"))))
    expect(error._tag).toBe("InvalidJsonBodyError")
    expect(error.payload).toBe("{oops")
  })

  it("rejects JSON that is not an object", () => {
    const error = Effect.runSync(Effect.flip(parseJsonBody(encoder.encode("[1]"))))
    expect(error.message).toBe("Invalid JSON payload: '[1]'.")
  })
})

describe("capturedArguments", () => {
  it("keys captures by wire name", () => {
    const whoAmI = Option.getOrThrow(Library.lookup("whoAmI"))
    const captured = capturedArguments(
      whoAmI.parameters,
      new Map([
        ["user_id", "ada"],
        ["other", "x"],
      ]),
    )
    expect(captured).toEqual(new Map([["user-id", "ada"]]))
  })
})

describe("mergePayload", () => {
  it("lets body keys replace captures", () => {
    const payload = mergePayload(
      new Map([
        ["id", "1"],
        ["title", "a"],
      ]),
      { title: "b", extra: true },
    )
    expect(payload.values).toEqual({ id: "1", title: "b", extra: true })
    expect([...payload.fromUri]).toEqual(["id"])
  })
})

describe("bindArguments", () => {
  it("reads URI text as JSON when the raw text does not decode", () => {
    const args = Effect.runSync(
      bindArguments(search, fromUri({ page: "2", tag: ["1", "2"], label: "42" }, ["page", "tag", "label"])),
    )
    expect(args).toEqual({ page: 2, tags: [1, 2], note: null, hint: undefined, label: "42" })
  })

  it("wraps a single capture bound to a list", () => {
    const args = Effect.runSync(bindArguments(search, fromUri({ page: 1, tag: "3", label: "x" }, ["tag"])))
    expect(args["tags"]).toEqual([3])
  })

  it("keys the result by internal name", () => {
    const args = Effect.runSync(bindArguments(search, fromUri({ page: 1, tag: [], label: "x" }, [])))
    expect(Object.keys(args)).toEqual(["page", "tags", "note", "hint", "label"])
  })

  it("does not coerce body values", () => {
    const error = Effect.runSync(Effect.flip(bindArguments(search, fromUri({ page: "2", tag: [], label: "x" }, []))))
    expect(error).toMatchObject({
      _tag: "InvalidArgumentValueError",
      procedure: "search",
      argument: "page",
      received: "string",
      expected: "number",
    })
  })

  it("refuses a repeated query value for a single-valued parameter", () => {
    const error = Effect.runSync(
      Effect.flip(bindArguments(search, fromUri({ page: 1, tag: [], label: ["a", "b"] }, ["label"]))),
    )
    expect(error.message).toBe("Incorrect type 'array' for 'label'. expected 'string'.")
  })

  it("reports the first missing required argument", () => {
    const error = Effect.runSync(Effect.flip(bindArguments(search, fromUri({ tag: [] }, []))))
    expect(error).toMatchObject({ _tag: "RequiredArgumentMissingError", argument: "page" })
  })

  it("rejects an explicit null for a required parameter", () => {
    const error = Effect.runSync(
      Effect.flip(bindArguments(search, fromUri({ page: null, tag: [], label: "x" }, []))),
    )
    expect(error.message).toBe("Incorrect type 'null' for 'page'. expected 'number'.")
  })
})
