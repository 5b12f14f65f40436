import { TasklaneSDKError, TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface NotReadyErrorOptions extends TasklaneSDKErrorOptions {
  operation: string
  state: string
}

/**
 * An operation needing a bound session ran before one was created or opened.
 */
export class NotReadyError extends TasklaneSDKError {
  name = ERROR_NAMES.NotReadyError
  code = ERROR_CODES.NotReadyError

  operation: string
  state: string

  constructor(message: string, options: NotReadyErrorOptions) {
    super(message, options)
    this.operation = options.operation
    this.state = options.state
  }
}
