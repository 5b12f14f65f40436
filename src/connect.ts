import { SessionService } from "./api/session_service.js"
import { controlPlaneConnectionPool } from "./common/grpc/connection.js"
import { createLogger } from "./common/log.js"
import type { ConnectOpts } from "./connectOpts.js"
import { connectOptsFromEnv } from "./connectOpts.js"

export type CallbackFct<T> = (service: SessionService) => Promise<T>

/**
 * connect runs the callback with a SessionService bound to a new session
 * (or to `opts.session`), then closes every channel it opened, whether the
 * callback succeeded or not.
 *
 * @param cb - Work to do with the session
 * @param opts - Connection options, read from the environment when omitted
 *
 * @example
 * ```typescript
 * const result = await connect(async (service) => {
 *   const taskId = await service.submitTask(Buffer.from("payload"))
 *   return service.getResult(taskId)
 * }, { endpoint: "https://cp.example:5001" })
 * ```
 */
export async function connect<T>(
  cb: CallbackFct<T>,
  opts: ConnectOpts = connectOptsFromEnv(),
): Promise<T> {
  const logger = opts.logger ?? createLogger(opts.logLevel)
  const pool = controlPlaneConnectionPool({ ...opts, logger })

  try {
    const service = await SessionService.create(pool, { ...opts, logger })
    return await cb(service)
  } finally {
    pool.close()
  }
}
