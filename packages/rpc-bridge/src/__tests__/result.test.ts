import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Schema from "effect/Schema"
import { describe, expect, it } from "vitest"
import { procedure } from "../core/procedure.js"
import { service } from "../core/service.js"
import { encodeDeclaredError, invokeProcedure, validateResult } from "../server/result.js"
import { BridgeLoggerSilent } from "../shared/logging.js"
import { decodeBody } from "../shared/response.js"
import { BookNotFound, Faulty, FaultyLive, Library, LibraryLive } from "./test-utils/index.js"

const getBook = Option.getOrThrow(Library.lookup("getBook"))
const deleteBook = Option.getOrThrow(Library.lookup("deleteBook"))

const Dates = service("dates", { today: procedure.returns(Schema.Date) })
const today = Option.getOrThrow(Dates.lookup("today"))

describe("validateResult", () => {
  it("returns the encoded value", () => {
    expect(validateResult(getBook, { id: 1, title: "Dune" })).toEqual(Either.right({ id: 1, title: "Dune" }))
  })

  it("drops properties the return type does not declare", () => {
    expect(validateResult(getBook, { id: 1, title: "Dune", isbn: "0" })).toEqual(
      Either.right({ id: 1, title: "Dune" }),
    )
  })

  it("sends transformed types in their encoded form", () => {
    expect(validateResult(today, new Date("2020-01-02T00:00:00.000Z"))).toEqual(
      Either.right("2020-01-02T00:00:00.000Z"),
    )
  })

  it("faults on a value of the wrong type", () => {
    const result = validateResult(getBook, { id: "1", title: "Dune" })
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left).toMatchObject({ procedure: "getBook", returnedNothing: false })
    }
  })

  it("faults on nothing for a required return type", () => {
    const result = validateResult(getBook, undefined)
    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left.returnedNothing).toBe(true)
    }
  })

  it("sends nothing as null for a void return type", () => {
    expect(validateResult(deleteBook, undefined)).toEqual(Either.right(null))
  })
})

describe("encodeDeclaredError", () => {
  it("encodes a declared error with its tag", () => {
    expect(encodeDeclaredError(getBook, new BookNotFound({ id: 7 }))).toEqual(
      Option.some({ _tag: "BookNotFound", id: 7 }),
    )
  })

  it("ignores undeclared errors", () => {
    expect(Option.isNone(encodeDeclaredError(getBook, new Error("nope")))).toBe(true)
    expect(Option.isNone(encodeDeclaredError(deleteBook, new BookNotFound({ id: 7 })))).toBe(true)
  })
})

describe("invokeProcedure", () => {
  const invoke = (implementation: typeof LibraryLive, name: string, args: Readonly<Record<string, unknown>>) =>
    invokeProcedure(Option.getOrThrow(implementation.resolve(name)), args, "req-1").pipe(
      Effect.provide(BridgeLoggerSilent),
    )

  it("answers a result with 200", async () => {
    const response = await Effect.runPromise(invoke(LibraryLive, "getBook", { id: 1 }))
    expect(response.status).toBe(200)
    expect(decodeBody(response.body)).toBe('{"id":1,"title":"Dune"}')
  })

  it("answers a declared error with 400 and its encoding", async () => {
    const response = await Effect.runPromise(invoke(LibraryLive, "getBook", { id: 7 }))
    expect(response.status).toBe(400)
    expect(JSON.parse(decodeBody(response.body))).toEqual({ _tag: "BookNotFound", id: 7 })
  })

  it("answers null for an optional return type", async () => {
    const response = await Effect.runPromise(invoke(FaultyLive, "maybe", {}))
    expect(decodeBody(response.body)).toBe("null")
  })

  it.each(["dies", "throws", "undeclared"])("turns %s into a handler defect", async (name) => {
    const error = await Effect.runPromise(Effect.flip(invoke(FaultyLive, name, {})))
    expect(error).toMatchObject({ _tag: "HandlerDefectError", procedure: name })
  })

  it("fails with a server fault on an invalid result", async () => {
    const error = await Effect.runPromise(Effect.flip(invoke(FaultyLive, "wrongType", {})))
    expect(error).toMatchObject({ _tag: "ServerFaultError", procedure: "wrongType", returnedNothing: false })
  })

  it("keeps the faulty service's names", () => {
    expect(Faulty.procedures.map((p) => p.name)).toEqual([
      "wrongType",
      "nothing",
      "maybe",
      "dies",
      "throws",
      "undeclared",
    ])
  })
})
