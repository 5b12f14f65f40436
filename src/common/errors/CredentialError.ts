import { TasklaneSDKError, TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface CredentialErrorOptions extends TasklaneSDKErrorOptions {
  path?: string
}

/**
 * A client certificate or key could not be read or parsed.
 */
export class CredentialError extends TasklaneSDKError {
  name = ERROR_NAMES.CredentialError
  code = ERROR_CODES.CredentialError

  /**
   * The file that failed to load, when the material came from disk.
   */
  path?: string

  constructor(message: string, options?: CredentialErrorOptions) {
    super(message, options)
    this.path = options?.path
  }
}
