import { TasklaneSDKError, TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface UnknownTaskErrorOptions extends TasklaneSDKErrorOptions {
  sessionId: string
  taskId: string
}

/**
 * The control plane does not know the requested task id.
 */
export class UnknownTaskError extends TasklaneSDKError {
  name = ERROR_NAMES.UnknownTaskError
  code = ERROR_CODES.UnknownTaskError

  sessionId: string
  taskId: string

  constructor(message: string, options: UnknownTaskErrorOptions) {
    super(message, options)
    this.sessionId = options.sessionId
    this.taskId = options.taskId
  }
}
