import { ErrorCodes, ErrorNames } from "./errors-codes.js"

export interface TasklaneSDKErrorOptions {
  cause?: unknown
}

/**
 * The base error. Every other error inherits this error.
 */
export abstract class TasklaneSDKError extends Error {
  /**
   * The name of the tasklane error.
   */
  abstract override readonly name: ErrorNames

  /**
   * The tasklane specific error code.
   * Use this to identify tasklane errors programmatically.
   */
  abstract readonly code: ErrorCodes

  /**
   * The original error, which caused the TasklaneSDKError.
   */
  override readonly cause?: unknown

  protected constructor(message: string, options?: TasklaneSDKErrorOptions) {
    super(message)
    this.cause = options?.cause
  }

  /**
   * @hidden
   */
  get [Symbol.toStringTag]() {
    return this.name
  }
}
