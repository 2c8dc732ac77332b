/**
 * @module rpc-bridge/shared/config
 *
 * Bridge options and their environment-driven loading.
 *
 * | Variable                     | Default   |
 * |------------------------------|-----------|
 * | `RPC_BRIDGE_ALLOWED_ORIGINS` | (none)    |
 * | `RPC_BRIDGE_ALLOWED_HEADERS` | (none)    |
 * | `RPC_BRIDGE_MAX_BODY_SIZE`   | `1048576` |
 * | `RPC_BRIDGE_HOST`            | `0.0.0.0` |
 * | `RPC_BRIDGE_PORT`            | `9322`    |
 *
 * List variables are comma-separated.
 */

import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import type * as Effect from "effect/Effect"
import type * as Layer from "effect/Layer"
import type { BridgeLogger } from "./logging.js"

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Default maximum request body size (1MB).
 */
export const DEFAULT_MAX_BODY_SIZE = 1024 * 1024

export const DEFAULT_HOST = "0.0.0.0"
export const DEFAULT_PORT = 9322

/**
 * @since 0.1.0
 * @category Types
 */
export interface BridgeOptions {
  /**
   * Origins allowed to call the bridge from a browser: host names, or
   * patterns in which `*` stands for one label (`*.example.com`).
   * @default []
   */
  readonly allowedOrigins?: Iterable<string>

  /**
   * Request headers a browser may send.
   * @default []
   */
  readonly allowedHeaders?: Iterable<string>

  /**
   * Maximum request body size in bytes, enforced by the Node.js adapter.
   * @default 1048576 (1MB)
   */
  readonly maxBodySize?: number

  /**
   * Logger layer.
   * @default BridgeLoggerLive
   */
  readonly logger?: Layer.Layer<BridgeLogger>
}

// ─────────────────────────────────────────────────────────────────────────────
// Environment
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Everything the environment configures.
 *
 * @since 0.1.0
 */
export interface BridgeConfig {
  readonly allowedOrigins: ReadonlyArray<string>
  readonly allowedHeaders: ReadonlyArray<string>
  readonly maxBodySize: number
  readonly host: string
  readonly port: number
}

const splitList = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "")

const list = (name: string): Config.Config<ReadonlyArray<string>> =>
  Config.string(name).pipe(Config.withDefault(""), Config.map(splitList))

/**
 * @since 0.1.0
 */
export const BridgeConfig: Config.Config<BridgeConfig> = Config.all({
  allowedOrigins: list("RPC_BRIDGE_ALLOWED_ORIGINS"),
  allowedHeaders: list("RPC_BRIDGE_ALLOWED_HEADERS"),
  maxBodySize: Config.integer("RPC_BRIDGE_MAX_BODY_SIZE").pipe(
    Config.withDefault(DEFAULT_MAX_BODY_SIZE),
    Config.validate({
      message: "must be a positive number of bytes",
      validation: (size: number) => size > 0,
    }),
  ),
  host: Config.string("RPC_BRIDGE_HOST").pipe(Config.withDefault(DEFAULT_HOST)),
  port: Config.integer("RPC_BRIDGE_PORT").pipe(
    Config.withDefault(DEFAULT_PORT),
    Config.validate({
      message: "must be a TCP port between 1 and 65535",
      validation: (port: number) => port >= 1 && port <= 65535,
    }),
  ),
})

/**
 * Read the bridge configuration from the current `ConfigProvider`
 * (the process environment by default).
 *
 * @since 0.1.0
 */
export const loadBridgeConfig: Effect.Effect<BridgeConfig, ConfigError.ConfigError> = BridgeConfig

/**
 * Bridge options from a loaded configuration.
 */
export const toBridgeOptions = (
  config: BridgeConfig,
  logger?: Layer.Layer<BridgeLogger>,
): BridgeOptions => ({
  allowedOrigins: config.allowedOrigins,
  allowedHeaders: config.allowedHeaders,
  maxBodySize: config.maxBodySize,
  ...(logger !== undefined ? { logger } : {}),
})
