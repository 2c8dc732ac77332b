/**
 * @module rpc-bridge/shared
 *
 * Transport-level pieces shared by every adapter.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export {
  BridgeLogger,
  BridgeLoggerLive,
  BridgeLoggerDev,
  BridgeLoggerProd,
  BridgeLoggerSilent,
  makeBridgeLoggerLayer,
  logBridgeEvent,
  redactSensitiveData,
  generateRequestId,
  defaultConfig as defaultLoggerConfig,
  type BridgeLogEvent,
  type BridgeLoggerConfig,
  type BridgeLoggerService,
  type LogCategory,
  type RequestInfo,
} from "./logging.js"

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

export {
  BridgeConfig,
  DEFAULT_HOST,
  DEFAULT_MAX_BODY_SIZE,
  DEFAULT_PORT,
  loadBridgeConfig,
  toBridgeOptions,
  type BridgeOptions,
} from "./config.js"

// ─────────────────────────────────────────────────────────────────────────────
// CORS
// ─────────────────────────────────────────────────────────────────────────────

export {
  buildCorsHeaders,
  makeCorsPolicy,
  makeOriginPolicy,
  type CorsHeaders,
  type CorsOptions,
  type CorsPolicy,
  type OriginPolicy,
} from "./cors.js"

// ─────────────────────────────────────────────────────────────────────────────
// Responses
// ─────────────────────────────────────────────────────────────────────────────

export {
  errorResponse,
  errorTag,
  makeErrorEnvelope,
  reasonPhrase,
  renderBridgeError,
  type ErrorEnvelope,
  type RequestLine,
} from "./error-response.js"

export {
  getHeader,
  jsonResponse,
  makeBridgeRequest,
  mergeHeaders,
  withHeaders,
  type BridgeRequest,
  type BridgeResponse,
  type HeaderList,
} from "./response.js"
