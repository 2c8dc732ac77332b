import { describe, expect, it } from "vitest"
import { buildCorsHeaders, makeCorsPolicy, makeOriginPolicy } from "../shared/cors.js"

describe("makeOriginPolicy", () => {
  const policy = makeOriginPolicy(["Example.com", "*.example.org", " "])

  it("splits exact hosts from wildcard patterns", () => {
    expect([...policy.hosts]).toEqual(["example.com"])
    expect(policy.patterns).toHaveLength(1)
  })

  it("compares the origin host, ignoring scheme and port", () => {
    expect(policy.allows("https://example.com")).toBe(true)
    expect(policy.allows("http://example.com:8080")).toBe(true)
    expect(policy.allows("https://EXAMPLE.com")).toBe(true)
    expect(policy.allows("https://www.example.com")).toBe(false)
  })

  it("lets a wildcard stand for exactly one label", () => {
    expect(policy.allows("https://api.example.org")).toBe(true)
    expect(policy.allows("https://example.org")).toBe(false)
    expect(policy.allows("https://a.b.example.org")).toBe(false)
  })

  it("refuses origins that are not http(s) URLs", () => {
    expect(policy.allows("null")).toBe(false)
    expect(policy.allows("ftp://example.com")).toBe(false)
  })

  it("refuses everything when empty", () => {
    expect(makeOriginPolicy([]).allows("https://example.com")).toBe(false)
  })
})

describe("buildCorsHeaders", () => {
  const policy = makeCorsPolicy({
    allowedOrigins: ["example.com"],
    allowedHeaders: ["X-Token", "content-type", "x-token"],
  })

  it("normalises allowed headers", () => {
    expect(policy.allowedHeaders).toEqual(["content-type", "x-token"])
  })

  it("echoes an allowed origin", () => {
    expect(buildCorsHeaders(policy, "POST, OPTIONS", "https://example.com")).toEqual({
      headers: [
        ["Vary", "Origin"],
        ["Access-Control-Allow-Methods", "POST, OPTIONS"],
        ["Access-Control-Allow-Headers", "content-type, x-token"],
        ["Access-Control-Allow-Origin", "https://example.com"],
      ],
      rejectedOrigin: undefined,
    })
  })

  it("reports a refused origin without echoing it", () => {
    expect(buildCorsHeaders(policy, "GET, OPTIONS", "https://evil.test")).toEqual({
      headers: [
        ["Vary", "Origin"],
        ["Access-Control-Allow-Methods", "GET, OPTIONS"],
        ["Access-Control-Allow-Headers", "content-type, x-token"],
      ],
      rejectedOrigin: "https://evil.test",
    })
  })

  it("leaves out Allow-Headers when none are configured", () => {
    expect(buildCorsHeaders(makeCorsPolicy(), "POST, OPTIONS", undefined)).toEqual({
      headers: [
        ["Vary", "Origin"],
        ["Access-Control-Allow-Methods", "POST, OPTIONS"],
      ],
      rejectedOrigin: undefined,
    })
  })
})
