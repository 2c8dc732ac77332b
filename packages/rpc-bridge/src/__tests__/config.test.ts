import * as ConfigProvider from "effect/ConfigProvider"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { describe, expect, it } from "vitest"
import { loadBridgeConfig, toBridgeOptions } from "../shared/config.js"
import { BridgeLoggerSilent } from "../shared/logging.js"

const load = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.runSync(
    Effect.either(loadBridgeConfig.pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries))))),
  )

describe("loadBridgeConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(load([])).toEqual(
      Either.right({
        allowedOrigins: [],
        allowedHeaders: [],
        maxBodySize: 1048576,
        host: "0.0.0.0",
        port: 9322,
      }),
    )
  })

  it("splits list variables on commas", () => {
    const result = load([
      ["RPC_BRIDGE_ALLOWED_ORIGINS", "example.com, *.example.org,"],
      ["RPC_BRIDGE_ALLOWED_HEADERS", "Content-Type"],
      ["RPC_BRIDGE_PORT", "8080"],
    ])
    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right.allowedOrigins).toEqual(["example.com", "*.example.org"])
      expect(result.right.allowedHeaders).toEqual(["Content-Type"])
      expect(result.right.port).toBe(8080)
    }
  })

  it.each([
    ["RPC_BRIDGE_PORT", "70000"],
    ["RPC_BRIDGE_PORT", "http"],
    ["RPC_BRIDGE_MAX_BODY_SIZE", "0"],
  ])("rejects %s=%s", (name, value) => {
    expect(Either.isLeft(load([[name, value]]))).toBe(true)
  })
})

describe("toBridgeOptions", () => {
  it("carries the bridge settings over", () => {
    const options = toBridgeOptions(
      { allowedOrigins: ["a.test"], allowedHeaders: [], maxBodySize: 10, host: "127.0.0.1", port: 1 },
      BridgeLoggerSilent,
    )
    expect(options).toEqual({
      allowedOrigins: ["a.test"],
      allowedHeaders: [],
      maxBodySize: 10,
      logger: BridgeLoggerSilent,
    })
  })
})
