import { TasklaneSDKError, TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface SessionCreationErrorOptions extends TasklaneSDKErrorOptions {
  partitionIds: string[]
}

/**
 * The CreateSession call failed. It is never retried by the SDK.
 */
export class SessionCreationError extends TasklaneSDKError {
  name = ERROR_NAMES.SessionCreationError
  code = ERROR_CODES.SessionCreationError

  /**
   * The partitions the session was requested on.
   */
  partitionIds: string[]

  constructor(message: string, options: SessionCreationErrorOptions) {
    super(message, options)
    this.partitionIds = options.partitionIds
  }
}
