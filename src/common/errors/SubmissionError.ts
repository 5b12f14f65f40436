import { TasklaneSDKError, TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
import { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"

interface SubmissionErrorOptions extends TasklaneSDKErrorOptions {
  sessionId: string
  payloadIndex: number
  attempts: number
  submittedTaskIds?: string[]
}

/**
 * A task batch could not be submitted, either because retries ran out or
 * because the failure was not worth retrying.
 */
export class SubmissionError extends TasklaneSDKError {
  name = ERROR_NAMES.SubmissionError
  code = ERROR_CODES.SubmissionError

  /**
   * The session the batch was submitted to.
   */
  sessionId: string

  /**
   * Zero-based index, within the submitted batch, of the first payload of
   * the request that failed.
   */
  payloadIndex: number

  /**
   * How many times the failing request was sent.
   */
  attempts: number

  /**
   * Ids of the tasks created by the requests that succeeded before the
   * failing one, in payload order. These tasks exist on the control plane.
   */
  submittedTaskIds: string[]

  constructor(message: string, options: SubmissionErrorOptions) {
    super(message, options)
    this.sessionId = options.sessionId
    this.payloadIndex = options.payloadIndex
    this.attempts = options.attempts
    this.submittedTaskIds = options.submittedTaskIds ?? []
  }
}
