import * as grpc from "@grpc/grpc-js"
import * as protoLoader from "@grpc/proto-loader"
import { existsSync } from "fs"
import * as path from "path"
import { fileURLToPath } from "url"

import type {
  CancelSessionRequest,
  CancelSessionResponse,
  CreateSessionRequest,
  CreateSessionResponse,
  GetResultRequest,
  GetResultResponse,
  GetTaskStatusRequest,
  GetTaskStatusResponse,
  SubmitTasksRequest,
  SubmitTasksResponse,
} from "../../grpc/types.js"
import { ConfigurationError } from "../errors/index.js"

export const SUBMITTER_SERVICE_NAME = "tasklane.submitter.Submitter"

/**
 * Callback-style unary method as exposed by proto-loader clients
 */
export type UnaryMethod<TRequest, TResponse> = (
  request: TRequest,
  metadata: grpc.Metadata,
  options: grpc.CallOptions,
  callback: (error: grpc.ServiceError | null, response?: TResponse) => void,
) => grpc.ClientUnaryCall

/**
 * RPCs of the Submitter service
 *
 * Each method corresponds to an RPC defined in submitter.proto.
 */
export interface SubmitterRpc {
  /**
   * Open a session with default task options on a set of partitions
   */
  CreateSession: UnaryMethod<CreateSessionRequest, CreateSessionResponse>

  /**
   * Create a batch of tasks, each with its own dependency list
   */
  SubmitTasks: UnaryMethod<SubmitTasksRequest, SubmitTasksResponse>

  /**
   * Fetch the output of a task, or learn that it failed or is still running
   */
  GetResult: UnaryMethod<GetResultRequest, GetResultResponse>

  /**
   * Query the status of several tasks
   */
  GetTaskStatus: UnaryMethod<GetTaskStatusRequest, GetTaskStatusResponse>

  /**
   * Cancel a session and every task still pending in it
   */
  CancelSession: UnaryMethod<CancelSessionRequest, CancelSessionResponse>
}

/**
 * gRPC client for the Submitter service
 */
export interface SubmitterClient extends grpc.Client, SubmitterRpc {}

const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
}

let submitterService: grpc.ServiceClientConstructor | undefined

/**
 * Locate submitter.proto. Sources run from `src/common/grpc`, compiled
 * output from `dist/src/common/grpc`.
 */
function resolveProtoPath(): string {
  const currentDir = path.dirname(fileURLToPath(import.meta.url))
  const candidates = [
    path.join(currentDir, "../../../proto/submitter.proto"),
    path.join(currentDir, "../../../../proto/submitter.proto"),
  ]
  const found = candidates.find((candidate) => existsSync(candidate))
  if (!found) {
    throw new ConfigurationError(
      `submitter.proto not found (looked in ${candidates.join(", ")})`,
    )
  }
  return found
}

function isGrpcObject(
  value: grpc.GrpcObject[string] | undefined,
): value is grpc.GrpcObject {
  return typeof value === "object" && !("format" in value)
}

/**
 * Load the Submitter service definition once and cache its client
 * constructor.
 */
export function loadSubmitterService(): grpc.ServiceClientConstructor {
  if (submitterService) {
    return submitterService
  }

  const packageDefinition = protoLoader.loadSync(
    resolveProtoPath(),
    LOADER_OPTIONS,
  )
  let current: grpc.GrpcObject[string] | undefined =
    grpc.loadPackageDefinition(packageDefinition)

  const parts = SUBMITTER_SERVICE_NAME.split(".")
  for (const part of parts.slice(0, -1)) {
    if (!isGrpcObject(current)) {
      break
    }
    current = current[part]
  }

  const service = isGrpcObject(current)
    ? current[parts[parts.length - 1]]
    : undefined
  if (typeof service !== "function") {
    throw new ConfigurationError(
      `service ${SUBMITTER_SERVICE_NAME} missing from submitter.proto`,
    )
  }

  submitterService = service
  return service
}

/**
 * Create a Submitter client
 *
 * The connection is established lazily by grpc-js on the first call.
 *
 * @param address - `host:port` of the control plane
 * @param credentials - Insecure, TLS or mutual-TLS channel credentials
 * @param options - Extra channel options
 */
export function createSubmitterClient(
  address: string,
  credentials: grpc.ChannelCredentials,
  options: grpc.ChannelOptions = {},
): SubmitterClient {
  const Submitter = loadSubmitterService()
  const client: grpc.Client = new Submitter(address, credentials, options)

  // proto-loader clients are untyped; SubmitterClient mirrors submitter.proto
  return client as SubmitterClient
}

/**
 * Per-call options for {@link callUnary}
 */
export interface UnaryCallOptions {
  /**
   * Cancels the call when aborted. The promise rejects with the
   * CANCELLED status error.
   */
  signal?: AbortSignal

  /**
   * Relative deadline in milliseconds
   */
  deadlineMs?: number
}

/**
 * Helper to promisify unary gRPC calls
 *
 * Converts callback-based unary gRPC methods to Promise-based API
 * for easier use with async/await.
 *
 * @param method - The gRPC method to call, bound to its client
 * @param request - The request object
 * @param metadata - gRPC metadata
 * @returns Promise that resolves with the response
 */
export function callUnary<TRequest, TResponse>(
  method: UnaryMethod<TRequest, TResponse>,
  request: TRequest,
  metadata: grpc.Metadata = new grpc.Metadata(),
  options: UnaryCallOptions = {},
): Promise<TResponse> {
  const { signal, deadlineMs } = options
  if (signal?.aborted) {
    return Promise.reject(signal.reason)
  }

  const callOptions: grpc.CallOptions = {}
  if (deadlineMs !== undefined) {
    callOptions.deadline = Date.now() + deadlineMs
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => call.cancel()

    const call = method(request, metadata, callOptions, (error, response) => {
      signal?.removeEventListener("abort", onAbort)
      if (error) {
        reject(error)
      } else if (response === undefined) {
        reject(new Error("unary call completed without a response"))
      } else {
        resolve(response)
      }
    })

    signal?.addEventListener("abort", onAbort, { once: true })
  })
}
