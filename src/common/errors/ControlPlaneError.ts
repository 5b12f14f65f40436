import type * as grpc from "@grpc/grpc-js"

import { TasklaneSDKError, TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface ControlPlaneErrorOptions extends TasklaneSDKErrorOptions {
  grpcCode: grpc.status
  grpcDetails: string
}

/**
 * A control-plane RPC failed with a gRPC status the SDK has no dedicated
 * error for.
 */
export class ControlPlaneError extends TasklaneSDKError {
  name = ERROR_NAMES.ControlPlaneError
  code = ERROR_CODES.ControlPlaneError

  /**
   * The original gRPC status code.
   */
  grpcCode: grpc.status

  /**
   * The original gRPC status details.
   */
  grpcDetails: string

  constructor(message: string, options: ControlPlaneErrorOptions) {
    super(message, options)
    this.grpcCode = options.grpcCode
    this.grpcDetails = options.grpcDetails
  }
}
