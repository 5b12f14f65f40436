export { TasklaneSDKError } from "./TasklaneSDKError.js"
export type { TasklaneSDKErrorOptions } from "./TasklaneSDKError.js"
export { ConfigurationError } from "./ConfigurationError.js"
export { CredentialError } from "./CredentialError.js"
export { SessionCreationError } from "./SessionCreationError.js"
export { NotReadyError } from "./NotReadyError.js"
export { SubmissionError } from "./SubmissionError.js"
export { ResultUnavailableError } from "./ResultUnavailableError.js"
export { UnknownTaskError } from "./UnknownTaskError.js"
export { ControlPlaneError } from "./ControlPlaneError.js"
export { PoolClosedError } from "./PoolClosedError.js"
export { ERROR_CODES, ERROR_NAMES } from "./errors-codes.js"
export type { ErrorCodes, ErrorNames } from "./errors-codes.js"
