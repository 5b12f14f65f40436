import { TasklaneSDKError, TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface ResultUnavailableErrorOptions extends TasklaneSDKErrorOptions {
  sessionId: string
  taskId: string
  reason: string
}

/**
 * The task reached a failed terminal state, so it has no result.
 */
export class ResultUnavailableError extends TasklaneSDKError {
  name = ERROR_NAMES.ResultUnavailableError
  code = ERROR_CODES.ResultUnavailableError

  sessionId: string
  taskId: string

  /**
   * Failure reason reported by the control plane.
   */
  reason: string

  constructor(message: string, options: ResultUnavailableErrorOptions) {
    super(message, options)
    this.sessionId = options.sessionId
    this.taskId = options.taskId
    this.reason = options.reason
  }
}
