import type { Logger } from "pino"

import type { ChannelOptions, ClientPem } from "./channel.js"
import { buildChannel, checkClientPem, parseEndpoint } from "./channel.js"
import { ChannelPool } from "./pool.js"

/**
 * Options to connect a channel pool to the control plane
 */
export interface ControlPlaneConnectionOptions {
  /**
   * Control plane URI, e.g. `https://cp.example:5001`
   */
  endpoint: string

  /**
   * PEM file holding the client certificate, for mutual TLS
   */
  clientCertPath?: string

  /**
   * PEM file holding the client private key, for mutual TLS
   */
  clientKeyPath?: string

  /**
   * Client certificate and key already loaded in memory. Takes precedence
   * over the file paths.
   */
  clientPem?: ClientPem

  /**
   * @defaultValue true
   */
  sslValidation?: boolean

  /**
   * Maximum number of channels the pool keeps alive. Unbounded when unset.
   */
  maxChannels?: number

  /**
   * Relative deadline applied to every call, in milliseconds
   */
  deadlineMs?: number

  logger?: Logger
}

/**
 * Create a connection pool to the control plane
 *
 * Depending on the endpoint scheme and on the client identity, channels are
 * plaintext, TLS, or mutual TLS. The endpoint and the certificate/key pairing
 * are checked right away, before any file is read or connection made;
 * channels are built lazily by the pool.
 *
 * @example
 * ```typescript
 * const pool = controlPlaneConnectionPool({
 *   endpoint: "https://cp.example:5001",
 *   clientCertPath: "/etc/tasklane/client.crt",
 *   clientKeyPath: "/etc/tasklane/client.key",
 * })
 * ```
 *
 * @throws ConfigurationError on a bad endpoint or a partial client identity
 */
export function controlPlaneConnectionPool(
  options: ControlPlaneConnectionOptions,
): ChannelPool {
  const logger = options.logger?.child({ module: "connection" })

  const channelOptions: ChannelOptions = {
    endpoint: options.endpoint,
    clientPem: options.clientPem ?? {
      certPath: options.clientCertPath,
      keyPath: options.clientKeyPath,
    },
    sslValidation: options.sslValidation,
    deadlineMs: options.deadlineMs,
    logger,
  }

  parseEndpoint(channelOptions.endpoint)
  checkClientPem(channelOptions.clientPem)

  return new ChannelPool(() => buildChannel(channelOptions), {
    maxChannels: options.maxChannels,
    logger: options.logger,
  })
}
