import { TasklaneSDKError, TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

/**
 * A channel was requested from a pool that has been closed.
 */
export class PoolClosedError extends TasklaneSDKError {
  name = ERROR_NAMES.PoolClosedError
  code = ERROR_CODES.PoolClosedError

  constructor(message: string, options?: TasklaneSDKErrorOptions) {
    super(message, options)
  }
}
