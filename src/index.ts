// Session API
export { SessionService } from "./api/session_service.js"
export type {
  CallOptions,
  Session,
  SessionServiceOptions,
  SessionState,
  TaskPayload,
  TaskStatus,
} from "./api/session_service.js"
export {
  defaultTaskOptions,
  EngineType,
  mergeTaskOptions,
} from "./api/task_options.js"
export type { TaskOptions } from "./api/task_options.js"

// gRPC channels and pooling
export * from "./common/grpc/index.js"

// Retry
export { calculateBackoff, withRetries } from "./common/retry.js"
export type { RetryOptions } from "./common/retry.js"

// Logging
export { createChildLogger, createLogger, resolveLogLevel } from "./common/log.js"
export type { LogLevel } from "./common/log.js"

// Common errors
export * from "./common/errors/index.js"

// Connection for library
export type { CallbackFct } from "./connect.js"
export { connect } from "./connect.js"
export type { ConnectOpts } from "./connectOpts.js"
export { connectOptsFromEnv } from "./connectOpts.js"
