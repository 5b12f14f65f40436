import type { Logger } from "pino"

import { PoolClosedError } from "../errors/index.js"
import type { ControlPlaneChannel } from "./channel.js"
import { isBrokenTransport } from "./status.js"

/**
 * Options of a {@link ChannelPool}
 */
export interface ChannelPoolOptions {
  /**
   * Maximum number of channels alive at once. When reached, callers wait
   * for a channel to be released. Unbounded when unset.
   */
  maxChannels?: number

  logger?: Logger
}

export interface WithChannelOptions {
  /**
   * Stops waiting for a free channel when aborted. Work already running
   * receives the same signal through its own calls.
   */
  signal?: AbortSignal
}

interface Waiter {
  resolve: (channel: ControlPlaneChannel) => void
  reject: (error: unknown) => void
  signal?: AbortSignal
  onAbort?: () => void
}

/**
 * Pool of channels to the control plane
 *
 * Channels are built lazily by the factory and leased to one operation at a
 * time. A channel is either idle in the pool or leased to exactly one
 * caller, never both.
 *
 * @example
 * ```typescript
 * const pool = new ChannelPool(() => buildChannel({ endpoint }))
 * const response = await pool.withChannel((channel) =>
 *   callUnary(channel.client.CreateSession.bind(channel.client), request),
 * )
 * pool.close()
 * ```
 */
export class ChannelPool {
  private readonly idle: ControlPlaneChannel[] = []
  private readonly leased = new Set<ControlPlaneChannel>()
  private readonly waiters: Waiter[] = []
  private readonly maxChannels: number
  private readonly logger?: Logger
  private closed = false

  constructor(
    private readonly factory: () => ControlPlaneChannel,
    options: ChannelPoolOptions = {},
  ) {
    this.maxChannels = options.maxChannels ?? Infinity
    if (!(this.maxChannels >= 1)) {
      throw new RangeError(
        `maxChannels must be at least 1, got ${options.maxChannels}`,
      )
    }
    this.logger = options.logger?.child({ module: "channel-pool" })
  }

  /**
   * Number of channels owned by the pool, idle or leased
   */
  get size(): number {
    return this.idle.length + this.leased.size
  }

  get idleCount(): number {
    return this.idle.length
  }

  get leasedCount(): number {
    return this.leased.size
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Run `work` with exclusive use of a channel
   *
   * The channel goes back to the pool on every exit path, except when the
   * work failed because the transport is broken: the channel is then closed
   * and a later call builds a new one. Errors from `work` are rethrown.
   */
  async withChannel<T>(
    work: (channel: ControlPlaneChannel) => Promise<T>,
    options: WithChannelOptions = {},
  ): Promise<T> {
    const channel = await this.acquire(options.signal)
    let broken = false
    try {
      return await work(channel)
    } catch (e) {
      broken = isBrokenTransport(e) || channel.isShutdown()
      throw e
    } finally {
      this.release(channel, broken)
    }
  }

  /**
   * Close every idle channel and refuse new leases. Leased channels are
   * closed when their holder returns them. Idempotent.
   */
  close(): void {
    if (this.closed) {
      return
    }
    this.closed = true

    for (const waiter of this.waiters.splice(0)) {
      this.detach(waiter)
      waiter.reject(
        new PoolClosedError("channel pool closed while waiting for a channel"),
      )
    }
    for (const channel of this.idle.splice(0)) {
      channel.close()
    }

    this.logger?.debug({ leased: this.leased.size }, "channel pool closed")
  }

  private acquire(signal?: AbortSignal): Promise<ControlPlaneChannel> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError("channel pool is closed"))
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason)
    }

    const idle = this.idle.pop()
    if (idle) {
      this.leased.add(idle)
      return Promise.resolve(idle)
    }

    if (this.size < this.maxChannels) {
      try {
        return Promise.resolve(this.build())
      } catch (e) {
        return Promise.reject(e)
      }
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal }
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter)
          if (index >= 0) {
            this.waiters.splice(index, 1)
          }
          reject(signal.reason)
        }
        signal.addEventListener("abort", waiter.onAbort, { once: true })
      }
      this.waiters.push(waiter)
      this.logger?.debug(
        { waiting: this.waiters.length },
        "channel pool at capacity, waiting for a release",
      )
    })
  }

  private build(): ControlPlaneChannel {
    const channel = this.factory()
    this.leased.add(channel)
    this.logger?.debug(
      { channelId: channel.id, size: this.size },
      "channel created",
    )
    return channel
  }

  private release(channel: ControlPlaneChannel, broken: boolean): void {
    this.leased.delete(channel)

    if (this.closed || broken) {
      channel.close()
      if (broken) {
        this.logger?.warn(
          { channelId: channel.id, address: channel.address },
          "channel discarded after transport failure",
        )
        this.serveWaiterWithNewChannel()
      }
      return
    }

    const waiter = this.waiters.shift()
    if (waiter) {
      this.detach(waiter)
      this.leased.add(channel)
      waiter.resolve(channel)
      return
    }

    this.idle.push(channel)
  }

  /**
   * A discarded channel frees capacity: hand a fresh one to the next waiter.
   */
  private serveWaiterWithNewChannel(): void {
    const waiter = this.waiters.shift()
    if (!waiter) {
      return
    }
    this.detach(waiter)
    try {
      waiter.resolve(this.build())
    } catch (e) {
      waiter.reject(e)
    }
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort)
    }
  }
}
