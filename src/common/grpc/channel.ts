import * as grpc from "@grpc/grpc-js"
import { createPrivateKey, X509Certificate } from "crypto"
import { readFileSync } from "fs"
import type { Logger } from "pino"

import { ConfigurationError, CredentialError } from "../errors/index.js"
import type { SubmitterClient, SubmitterRpc } from "./client.js"
import { createSubmitterClient } from "./client.js"

/**
 * Client certificate and private key, PEM encoded
 */
export interface ClientPem {
  cert: string
  key: string
}

/**
 * Client certificate and private key given as PEM file paths
 */
export interface ClientPemFiles {
  certPath?: string
  keyPath?: string
}

/**
 * Everything needed to build a channel to the control plane
 */
export interface ChannelOptions {
  /**
   * Control plane URI, e.g. `https://cp.example:5001`. The scheme selects
   * TLS (`https`) or plaintext (`http`).
   */
  endpoint: string

  /**
   * Client identity for mutual TLS, either in memory or as files.
   * Certificate and key must be given together.
   */
  clientPem?: ClientPem | ClientPemFiles

  /**
   * Verify the server certificate. Turning this off accepts any server
   * certificate and must only be used against test environments.
   *
   * @defaultValue true
   */
  sslValidation?: boolean

  /**
   * Relative deadline applied to every call made on the channel, in
   * milliseconds. No deadline when unset.
   */
  deadlineMs?: number

  /**
   * Extra grpc-js channel options
   */
  grpcOptions?: grpc.ChannelOptions

  logger?: Logger
}

/**
 * A ready connection to the control plane
 */
export interface ControlPlaneChannel {
  /** Unique per process, useful in logs */
  readonly id: number
  /** `host:port` the channel dials */
  readonly address: string
  /** Whether traffic is encrypted */
  readonly secure: boolean
  /** Whether a client certificate is presented */
  readonly mutualTls: boolean
  /** Relative deadline for calls made on this channel, if any */
  readonly deadlineMs?: number
  /** Submitter RPCs bound to this channel */
  readonly client: SubmitterRpc

  /**
   * Whether the channel has been shut down and cannot carry calls anymore
   */
  isShutdown(): boolean

  close(): void
}

/**
 * Endpoint after validation
 */
export interface ParsedEndpoint {
  address: string
  secure: boolean
}

const DEFAULT_PORTS = { "https:": 443, "http:": 80 } as const

/**
 * Validate an endpoint URI and derive the dial address and transport
 * security from it.
 */
export function parseEndpoint(endpoint: string): ParsedEndpoint {
  let uri: URL
  try {
    uri = new URL(endpoint)
  } catch (e) {
    throw new ConfigurationError(`invalid control plane endpoint "${endpoint}"`, {
      cause: e,
    })
  }

  if (uri.protocol !== "https:" && uri.protocol !== "http:") {
    throw new ConfigurationError(
      `unsupported scheme "${uri.protocol}" in endpoint "${endpoint}", expected http or https`,
    )
  }
  if (!uri.hostname) {
    throw new ConfigurationError(`missing host in endpoint "${endpoint}"`)
  }

  const port = uri.port ? Number(uri.port) : DEFAULT_PORTS[uri.protocol]
  return {
    address: `${uri.hostname}:${port}`,
    secure: uri.protocol === "https:",
  }
}

function isInMemoryPem(pem: ClientPem | ClientPemFiles): pem is ClientPem {
  return "cert" in pem || "key" in pem
}

/**
 * Check that certificate and key come together. Runs before any file is
 * read.
 *
 * @returns The normalized pair, or undefined when no identity is configured
 */
export function checkClientPem(
  pem: ClientPem | ClientPemFiles | undefined,
): ClientPem | Required<ClientPemFiles> | undefined {
  if (!pem) {
    return undefined
  }

  const [cert, key] = isInMemoryPem(pem)
    ? [pem.cert, pem.key]
    : [pem.certPath, pem.keyPath]

  if (!cert && !key) {
    return undefined
  }
  if (!cert || !key) {
    throw new ConfigurationError(
      "missing one of the client certificate or client key, both must be set for mutual TLS",
    )
  }

  return isInMemoryPem(pem) ? { cert, key } : { certPath: cert, keyPath: key }
}

function readPemFile(filePath: string, what: string): string {
  try {
    return readFileSync(filePath, "utf8")
  } catch (e) {
    throw new CredentialError(`failed to read ${what} file ${filePath}`, {
      cause: e,
      path: filePath,
    })
  }
}

/**
 * Parse the client identity and re-export it as PEM buffers for the TLS
 * layer. The identity is unchanged; the round trip normalizes encodings the
 * TLS layer would otherwise reject (PKCS#1 keys, stray text around blocks).
 */
export function loadClientIdentity(pem: ClientPem): {
  certChain: Buffer
  privateKey: Buffer
} {
  let certificate: X509Certificate
  try {
    certificate = new X509Certificate(pem.cert)
  } catch (e) {
    throw new CredentialError("failed to parse client certificate", {
      cause: e,
    })
  }

  let privateKey: string
  try {
    const keyObject = createPrivateKey(pem.key)
    if (!certificate.checkPrivateKey(keyObject)) {
      throw new Error("key does not belong to the certificate")
    }
    privateKey = keyObject
      .export({ format: "pem", type: "pkcs8" })
      .toString()
  } catch (e) {
    throw new CredentialError("failed to parse client key", { cause: e })
  }

  return {
    certChain: Buffer.from(certificate.toString()),
    privateKey: Buffer.from(privateKey),
  }
}

let nextChannelId = 1

class SubmitterChannel implements ControlPlaneChannel {
  readonly id = nextChannelId++

  constructor(
    readonly address: string,
    readonly secure: boolean,
    readonly mutualTls: boolean,
    private readonly submitter: SubmitterClient,
    readonly deadlineMs?: number,
  ) {}

  get client(): SubmitterRpc {
    return this.submitter
  }

  isShutdown(): boolean {
    return (
      this.submitter.getChannel().getConnectivityState(false) ===
      grpc.connectivityState.SHUTDOWN
    )
  }

  close(): void {
    this.submitter.close()
  }
}

/**
 * Build one channel to the control plane: plaintext, TLS, or mutual TLS.
 *
 * Input is validated before any file is read or any connection is made.
 * The connection itself is opened by grpc-js on the first call.
 *
 * @throws ConfigurationError on a bad endpoint, a partial client identity,
 *   or a client identity on a plaintext endpoint
 * @throws CredentialError if the certificate or key cannot be read or parsed
 */
export function buildChannel(options: ChannelOptions): ControlPlaneChannel {
  const { endpoint, sslValidation = true, logger } = options
  const { address, secure } = parseEndpoint(endpoint)
  const pem = checkClientPem(options.clientPem)

  if (pem && !secure) {
    throw new ConfigurationError(
      `mutual TLS needs an https endpoint, got "${endpoint}"`,
    )
  }

  let credentials: grpc.ChannelCredentials
  if (!secure) {
    credentials = grpc.credentials.createInsecure()
  } else {
    const verifyOptions: grpc.VerifyOptions = sslValidation
      ? {}
      : { rejectUnauthorized: false, checkServerIdentity: () => undefined }

    if (pem) {
      const identity = loadClientIdentity(
        "cert" in pem
          ? pem
          : {
              cert: readPemFile(pem.certPath, "client certificate"),
              key: readPemFile(pem.keyPath, "client key"),
            },
      )
      credentials = grpc.credentials.createSsl(
        null,
        identity.privateKey,
        identity.certChain,
        verifyOptions,
      )
    } else {
      credentials = grpc.credentials.createSsl(null, null, null, verifyOptions)
    }

    if (!sslValidation) {
      logger?.warn(
        { address },
        "server certificate validation is disabled, do not use outside test environments",
      )
    }
  }

  logger?.info(
    { address, tls: secure, mtls: pem !== undefined },
    "connecting to control plane",
  )

  const client = createSubmitterClient(address, credentials, options.grpcOptions)
  return new SubmitterChannel(
    address,
    secure,
    pem !== undefined,
    client,
    options.deadlineMs,
  )
}
