import * as grpc from "@grpc/grpc-js"

/**
 * Status codes worth sending the same request again for.
 */
const TRANSIENT_STATUS_CODES = new Set<grpc.status>([
  grpc.status.UNAVAILABLE,
  grpc.status.DEADLINE_EXCEEDED,
  grpc.status.RESOURCE_EXHAUSTED,
  grpc.status.ABORTED,
  grpc.status.INTERNAL,
])

/**
 * Narrow an unknown rejection to a gRPC ServiceError
 */
export function isServiceError(error: unknown): error is grpc.ServiceError {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "number" &&
    "details" in error &&
    typeof error.details === "string" &&
    "metadata" in error
  )
}

/**
 * Whether a failed call may succeed when sent again, possibly on another
 * channel.
 */
export function isTransientError(error: unknown): boolean {
  return isServiceError(error) && TRANSIENT_STATUS_CODES.has(error.code)
}

/**
 * Whether a failed call means the channel itself can no longer reach the
 * control plane. Such channels are dropped from the pool.
 */
export function isBrokenTransport(error: unknown): boolean {
  return isServiceError(error) && error.code === grpc.status.UNAVAILABLE
}

/**
 * Whether a call ended because the caller cancelled it
 */
export function isCancellation(error: unknown): boolean {
  if (isServiceError(error)) {
    return error.code === grpc.status.CANCELLED
  }
  return error instanceof Error && error.name === "AbortError"
}
