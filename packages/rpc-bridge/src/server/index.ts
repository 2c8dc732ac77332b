/**
 * @module rpc-bridge/server
 */

export {
  createBridge,
  fromWebRequest,
  handleRequest,
  toWebResponse,
  type Bridge,
  type BridgeEnvironment,
} from "./handler.js"

export {
  fallbackMethodName,
  planDispatch,
  resolveDispatch,
  type DispatchContext,
  type DispatchPlan,
} from "./dispatch.js"

export { bindArguments, capturedArguments, mergePayload, parseJsonBody, type Payload } from "./arguments.js"

export { encodeDeclaredError, invokeProcedure, validateResult } from "./result.js"
