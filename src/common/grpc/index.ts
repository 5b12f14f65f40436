/**
 * gRPC client infrastructure for the Tasklane SDK
 *
 * This module builds secured channels to the control plane, pools them
 * for concurrent use, and promisifies unary calls.
 *
 * @module grpc
 */

export {
  callUnary,
  createSubmitterClient,
  loadSubmitterService,
  SUBMITTER_SERVICE_NAME,
} from "./client.js"
export type {
  SubmitterClient,
  SubmitterRpc,
  UnaryCallOptions,
  UnaryMethod,
} from "./client.js"
export {
  buildChannel,
  checkClientPem,
  loadClientIdentity,
  parseEndpoint,
} from "./channel.js"
export type {
  ChannelOptions,
  ClientPem,
  ClientPemFiles,
  ControlPlaneChannel,
  ParsedEndpoint,
} from "./channel.js"
export { ChannelPool } from "./pool.js"
export type { ChannelPoolOptions, WithChannelOptions } from "./pool.js"
export { controlPlaneConnectionPool } from "./connection.js"
export type { ControlPlaneConnectionOptions } from "./connection.js"
export {
  isBrokenTransport,
  isCancellation,
  isServiceError,
  isTransientError,
} from "./status.js"
