import type { SessionServiceOptions } from "./api/session_service.js"
import { ConfigurationError } from "./common/errors/index.js"
import type { ControlPlaneConnectionOptions } from "./common/grpc/connection.js"

/**
 * Options of {@link connect}
 */
export interface ConnectOpts
  extends ControlPlaneConnectionOptions,
    SessionServiceOptions {
  /**
   * Level of the logger created when `logger` is not given. Falls back to
   * `TASKLANE_LOG_LEVEL`, then "info".
   */
  logLevel?: string
}

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true
    case "false":
    case "0":
    case "no":
      return false
    default:
      throw new ConfigurationError(`${name} must be a boolean, got "${raw}"`)
  }
}

function parsePositiveInt(name: string, raw: string): number {
  const parsed = Number(raw)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got "${raw}"`,
    )
  }
  return parsed
}

/**
 * Read connection options from the environment
 *
 * - `TASKLANE_ENDPOINT` (required): control plane URI
 * - `TASKLANE_CLIENT_CERT`, `TASKLANE_CLIENT_KEY`: PEM files for mutual TLS
 * - `TASKLANE_SSL_VALIDATION`: set to "false" to accept any server certificate
 * - `TASKLANE_MAX_CHANNELS`: bound of the channel pool
 * - `TASKLANE_PARTITION`: partition of the session and its tasks
 * - `TASKLANE_LOG_LEVEL`: pino level
 *
 * Empty variables count as unset.
 */
export function connectOptsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ConnectOpts {
  const get = (name: string): string | undefined => env[name] || undefined

  const endpoint = get("TASKLANE_ENDPOINT")
  if (!endpoint) {
    throw new ConfigurationError("TASKLANE_ENDPOINT must be set")
  }

  const opts: ConnectOpts = {
    endpoint,
    clientCertPath: get("TASKLANE_CLIENT_CERT"),
    clientKeyPath: get("TASKLANE_CLIENT_KEY"),
    logLevel: get("TASKLANE_LOG_LEVEL"),
  }

  const sslValidation = get("TASKLANE_SSL_VALIDATION")
  if (sslValidation !== undefined) {
    opts.sslValidation = parseBoolean("TASKLANE_SSL_VALIDATION", sslValidation)
  }

  const maxChannels = get("TASKLANE_MAX_CHANNELS")
  if (maxChannels !== undefined) {
    opts.maxChannels = parsePositiveInt("TASKLANE_MAX_CHANNELS", maxChannels)
  }

  const partition = get("TASKLANE_PARTITION")
  if (partition !== undefined) {
    opts.taskOptions = { partitionId: partition }
    opts.partitionIds = [partition]
  }

  return opts
}
