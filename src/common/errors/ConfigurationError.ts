import { TasklaneSDKError, TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

/**
 * Bad or incomplete endpoint or credential input, detected before any I/O.
 */
export class ConfigurationError extends TasklaneSDKError {
  name = ERROR_NAMES.ConfigurationError
  code = ERROR_CODES.ConfigurationError

  constructor(message: string, options?: TasklaneSDKErrorOptions) {
    super(message, options)
  }
}
