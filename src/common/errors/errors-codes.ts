export const ERROR_CODES = {
  /**
   * {@link ConfigurationError}
   */
  ConfigurationError: "T100",

  /**
   * {@link CredentialError}
   */
  CredentialError: "T101",

  /**
   * {@link SessionCreationError}
   */
  SessionCreationError: "T102",

  /**
   * {@link NotReadyError}
   */
  NotReadyError: "T103",

  /**
   * {@link SubmissionError}
   */
  SubmissionError: "T104",

  /**
   * {@link ResultUnavailableError}
   */
  ResultUnavailableError: "T105",

  /**
   * {@link UnknownTaskError}
   */
  UnknownTaskError: "T106",

  /**
   * {@link ControlPlaneError}
   */
  ControlPlaneError: "T107",

  /**
   * {@link PoolClosedError}
   */
  PoolClosedError: "T108",
} as const

type ErrorCodesType = typeof ERROR_CODES
export type ErrorNames = keyof ErrorCodesType
export type ErrorCodes = ErrorCodesType[ErrorNames]

type ErrorNamesMap = { readonly [Key in ErrorNames]: Key }
export const ERROR_NAMES: ErrorNamesMap = {
  ConfigurationError: "ConfigurationError",
  CredentialError: "CredentialError",
  SessionCreationError: "SessionCreationError",
  NotReadyError: "NotReadyError",
  SubmissionError: "SubmissionError",
  ResultUnavailableError: "ResultUnavailableError",
  UnknownTaskError: "UnknownTaskError",
  ControlPlaneError: "ControlPlaneError",
  PoolClosedError: "PoolClosedError",
} as const
