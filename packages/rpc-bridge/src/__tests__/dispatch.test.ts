import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import { describe, expect, it } from "vitest"
import { RouteTable } from "../core/routes.js"
import { fallbackMethodName, planDispatch, resolveDispatch } from "../server/dispatch.js"
import { makeCorsPolicy } from "../shared/cors.js"
import { makeBridgeRequest } from "../shared/response.js"
import { Library } from "./test-utils/index.js"

const routes = RouteTable.fromDescriptor(Library)
const cors = makeCorsPolicy({ allowedOrigins: ["example.com"] })

describe("fallbackMethodName", () => {
  it("reads the first method parameter", () => {
    expect(fallbackMethodName("a=1&method=getBook&method=other")).toEqual(Option.some("getBook"))
  })

  it("treats an empty value as absent", () => {
    expect(Option.isNone(fallbackMethodName("method="))).toBe(true)
    expect(Option.isNone(fallbackMethodName(""))).toBe(true)
  })
})

describe("planDispatch", () => {
  it("plans a routed request", () => {
    const plan = planDispatch(routes, cors, makeBridgeRequest({ method: "GET", path: "/books/1" }))
    expect(plan.allowed).toBe(true)
    expect(plan.allowMethods).toBe("GET, PUT, DELETE, OPTIONS")
    expect(Option.getOrThrow(plan.route).rule.procedure).toBe("getBook")
  })

  it("plans a fallback request", () => {
    const plan = planDispatch(routes, cors, makeBridgeRequest({ method: "POST", path: "/", query: "method=getBook" }))
    expect(plan.allowed).toBe(true)
    expect(Option.isNone(plan.route)).toBe(true)
    expect(plan.allowMethods).toBe("POST, OPTIONS")
  })

  it("refuses a request neither protocol takes", () => {
    const plan = planDispatch(routes, cors, makeBridgeRequest({ method: "PATCH", path: "/books/1" }))
    expect(plan.allowed).toBe(false)
    expect(plan.allowedVerbs).toEqual(["GET", "PUT", "DELETE"])
  })

  it("reports a refused origin", () => {
    const plan = planDispatch(
      routes,
      cors,
      makeBridgeRequest({ method: "GET", path: "/books/1", headers: [["Origin", "https://evil.test"]] }),
    )
    expect(plan.rejectedOrigin).toBe("https://evil.test")
  })
})

describe("resolveDispatch", () => {
  const resolve = (request: ReturnType<typeof makeBridgeRequest>) =>
    Effect.runSync(Effect.either(resolveDispatch(Library, request, planDispatch(routes, cors, request))))

  it("takes routed arguments from the URI and the body", () => {
    const result = resolve(makeBridgeRequest({ method: "PUT", path: "/books/2", body: '{"title":"Ubik"}' }))
    expect(result._tag).toBe("Right")
    if (result._tag === "Right") {
      expect(result.right.procedure).toEqual(Option.some("updateBook"))
      expect(result.right.routed).toBe(true)
      expect(result.right.payload.values).toEqual({ id: "2", title: "Ubik" })
      expect([...result.right.payload.fromUri]).toEqual(["id"])
    }
  })

  it("lets a body key replace the capture of the same name", () => {
    const result = resolve(makeBridgeRequest({ method: "PUT", path: "/books/2", body: '{"id":5}' }))
    expect(result._tag).toBe("Right")
    if (result._tag === "Right") {
      expect(result.right.payload.values).toEqual({ id: 5 })
      expect([...result.right.payload.fromUri]).toEqual([])
    }
  })

  it("takes query captures of a routed POST", () => {
    const result = resolve(makeBridgeRequest({ method: "POST", path: "/books", query: "title=Dune" }))
    expect(result._tag).toBe("Right")
    if (result._tag === "Right") {
      expect(result.right.procedure).toEqual(Option.some("addBook"))
      expect(result.right.payload.values).toEqual({ title: "Dune" })
      expect([...result.right.payload.fromUri]).toEqual(["title"])
    }
  })

  it("takes fallback arguments from the body only", () => {
    const result = resolve(
      makeBridgeRequest({ method: "POST", path: "/", query: "method=getBook&id=3", body: '{"id":1}' }),
    )
    expect(result._tag).toBe("Right")
    if (result._tag === "Right") {
      expect(result.right.routed).toBe(false)
      expect(result.right.payload.values).toEqual({ id: 1 })
    }
  })

  it("fails with 405 when the plan refuses the request", () => {
    const result = resolve(makeBridgeRequest({ method: "PATCH", path: "/books/2" }))
    expect(result._tag).toBe("Left")
    if (result._tag === "Left") {
      expect(result.left).toMatchObject({ _tag: "MethodNotAllowedError", allowedVerbs: ["GET", "PUT", "DELETE"] })
    }
  })
})
