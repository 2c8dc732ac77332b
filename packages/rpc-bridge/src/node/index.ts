/**
 * @module rpc-bridge/node
 *
 * Node.js adapter for rpc-bridge.
 *
 * @example HTTP Server
 * ```ts
 * import { createBridge } from "rpc-bridge"
 * import { createNodeListener } from "rpc-bridge/node"
 * import * as http from "node:http"
 *
 * const bridge = createBridge(UsersLive, { allowedOrigins: ["localhost"] })
 * http.createServer(createNodeListener(bridge)).listen(9322)
 * ```
 *
 * @example With web standard objects
 * ```ts
 * const server = http.createServer(async (req, res) => {
 *   const request = await nodeToWebRequest(req)
 *   const response = await bridge.fetch(request)
 *   await webToNodeResponse(response, res)
 * })
 * ```
 */

export {
  // Listener
  createNodeListener,
  handleNodeRequest,
  serveBridge,
  // Request/Response conversion
  nodeToBridgeRequest,
  nodeToWebRequest,
  nodeToWebRequestEffect,
  readBody,
  webToNodeResponse,
  webToNodeResponseEffect,
  writeBridgeResponse,
} from "./http.js"

export type {
  NodeListener,
  NodeRequestLike,
  NodeResponseLike,
  NodeToWebRequestOptions,
  ServerLike,
} from "./http.js"

export { PayloadTooLargeError, ServerListenError } from "../errors/index.js"
export { DEFAULT_MAX_BODY_SIZE } from "../shared/config.js"
