import * as grpc from "@grpc/grpc-js"
import { setTimeout as delay } from "node:timers/promises"
import type { Logger } from "pino"

import type { SubmitterRpc, UnaryMethod } from "../common/grpc/client.js"
import { callUnary } from "../common/grpc/client.js"
import type { ChannelPool } from "../common/grpc/pool.js"
import { isCancellation, isServiceError } from "../common/grpc/status.js"
import {
  ControlPlaneError,
  NotReadyError,
  ResultUnavailableError,
  SessionCreationError,
  SubmissionError,
  TasklaneSDKError,
  UnknownTaskError,
} from "../common/errors/index.js"
import { createChildLogger, createLogger } from "../common/log.js"
import {
  checkMaxRetries,
  DEFAULT_MAX_RETRY_BACKOFF_MS,
  DEFAULT_RETRY_BACKOFF_MS,
  withRetries,
} from "../common/retry.js"
import type { GetResultResponse, TaskRequest } from "../grpc/types.js"
import type { TaskOptions } from "./task_options.js"
import {
  defaultTaskOptions,
  mergeTaskOptions,
  toTaskOptionsMessage,
} from "./task_options.js"

/**
 * Identifier of a session opened on the control plane
 */
export interface Session {
  id: string
}

/**
 * `Unbound`: no session yet. `Creating`: CreateSession in flight.
 * `Bound`: tasks can be submitted and results fetched.
 */
export type SessionState = "Unbound" | "Creating" | "Bound"

/**
 * One task to submit, with the ids of the tasks it waits for
 */
export interface TaskPayload {
  payload: Uint8Array
  dependencies?: readonly string[]
}

export type TaskStatus =
  | "creating"
  | "submitted"
  | "dispatched"
  | "processing"
  | "completed"
  | "error"
  | "timeout"
  | "cancelling"
  | "cancelled"
  | "unspecified"

const TASK_STATUSES: readonly TaskStatus[] = [
  "creating",
  "submitted",
  "dispatched",
  "processing",
  "completed",
  "error",
  "timeout",
  "cancelling",
  "cancelled",
  "unspecified",
]

function toTaskStatus(value: string): TaskStatus {
  const normalized = value.toLowerCase()
  return TASK_STATUSES.find((status) => status === normalized) ?? "unspecified"
}

export interface SessionServiceOptions {
  /**
   * Default options of every task submitted in the session, layered over
   * {@link defaultTaskOptions}
   */
  taskOptions?: Partial<TaskOptions>

  /**
   * Session created elsewhere. When set, no CreateSession call is made.
   */
  session?: Session

  /**
   * Partitions requested by {@link SessionService.create}. Defaults to the
   * partition of the default task options, if any.
   */
  partitionIds?: string[]

  /**
   * Largest number of tasks sent in one SubmitTasks call
   *
   * @defaultValue 100
   */
  maxTasksPerRequest?: number

  /**
   * Base delay of the submission backoff, in milliseconds
   *
   * @defaultValue 100
   */
  retryBackoffMs?: number

  /**
   * @defaultValue 5000
   */
  maxRetryBackoffMs?: number

  /**
   * Delay between two result polls, in milliseconds
   *
   * @defaultValue 500
   */
  resultPollIntervalMs?: number

  logger?: Logger
}

export interface CallOptions {
  signal?: AbortSignal
}

type ResultOutcome =
  | { kind: "completed"; payload: Buffer }
  | { kind: "failed"; reason: string }
  | { kind: "pending"; status: string }

function readResult(response: GetResultResponse): ResultOutcome {
  const kind =
    response.type ??
    (response.result
      ? "result"
      : response.error
        ? "error"
        : "not_completed")

  switch (kind) {
    case "result":
      return {
        kind: "completed",
        payload: response.result
          ? Buffer.from(response.result)
          : Buffer.alloc(0),
      }
    case "error":
      return { kind: "failed", reason: response.error?.reason ?? "" }
    case "not_completed":
      return {
        kind: "pending",
        status: response.not_completed?.status ?? "unspecified",
      }
  }
}

function describeError(error: unknown): string {
  if (isServiceError(error)) {
    return `${grpc.status[error.code]}: ${error.details}`
  }
  return error instanceof Error ? error.message : String(error)
}

/**
 * The class SessionService is created each time a session is created or
 * opened. It submits tasks to the session and fetches their results.
 *
 * @example
 * ```typescript
 * const pool = controlPlaneConnectionPool({ endpoint: "https://cp.example:5001" })
 * const service = await SessionService.create(pool)
 * const taskId = await service.submitTask(Buffer.from([0x01, 0x02]))
 * const result = await service.getResult(taskId)
 * pool.close()
 * ```
 */
export class SessionService {
  private _session?: Session
  private _state: SessionState = "Unbound"
  private readonly _taskOptions: TaskOptions
  private readonly logger: Logger
  private readonly maxTasksPerRequest: number
  private readonly retryBackoffMs: number
  private readonly maxRetryBackoffMs: number
  private readonly resultPollIntervalMs: number

  /**
   * Create an unbound service, or one bound to `options.session`. Call
   * {@link createSession} or {@link openSession} before submitting, or use
   * {@link SessionService.create}.
   */
  constructor(
    private readonly _channelPool: ChannelPool,
    options: SessionServiceOptions = {},
  ) {
    this._taskOptions = mergeTaskOptions(
      defaultTaskOptions(),
      options.taskOptions,
    )
    this.logger = createChildLogger(
      options.logger ?? createLogger(),
      "session-service",
    )
    const maxTasksPerRequest = options.maxTasksPerRequest ?? 100
    if (!Number.isInteger(maxTasksPerRequest) || maxTasksPerRequest < 1) {
      throw new RangeError(
        `maxTasksPerRequest must be a positive integer, got ${maxTasksPerRequest}`,
      )
    }
    this.maxTasksPerRequest = maxTasksPerRequest
    this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS
    this.maxRetryBackoffMs =
      options.maxRetryBackoffMs ?? DEFAULT_MAX_RETRY_BACKOFF_MS
    this.resultPollIntervalMs = options.resultPollIntervalMs ?? 500

    if (options.session) {
      this.openSession(options.session)
    }
  }

  /**
   * Create a service bound to a new session, or to `options.session` when
   * given.
   *
   * @throws SessionCreationError if the control plane refuses the session
   */
  static async create(
    channelPool: ChannelPool,
    options: SessionServiceOptions = {},
  ): Promise<SessionService> {
    const service = new SessionService(channelPool, options)
    if (service.state !== "Bound") {
      const partitionId = service.taskOptions.partitionId
      await service.createSession(
        options.partitionIds ?? (partitionId ? [partitionId] : []),
      )
    }
    return service
  }

  /**
   * Supply a default TaskOptions
   */
  static defaultTaskOptions(): TaskOptions {
    return defaultTaskOptions()
  }

  get channelPool(): ChannelPool {
    return this._channelPool
  }

  get state(): SessionState {
    return this._state
  }

  get session(): Session | undefined {
    return this._session
  }

  get sessionId(): string | undefined {
    return this._session?.id
  }

  /**
   * Default options of the session. A copy: changing it has no effect.
   */
  get taskOptions(): TaskOptions {
    return mergeTaskOptions(this._taskOptions)
  }

  toString(): string {
    return this._session?.id ?? "Session_Not_ready"
  }

  /**
   * Open a new session on the control plane and bind to it
   *
   * The call is not retried: whether to try again is up to the caller.
   *
   * @throws SessionCreationError if the call fails
   */
  async createSession(partitionIds: string[]): Promise<Session> {
    const previous = this._state
    this._state = "Creating"
    this.logger.debug({ partitionIds }, "creating session")

    try {
      const response = await this.invoke(
        (client) => client.CreateSession,
        {
          default_task_options: toTaskOptionsMessage(this._taskOptions),
          partition_ids: [...partitionIds],
        },
      )
      const session = { id: response.session_id }
      this._session = session
      this._state = "Bound"
      this.logger.info({ sessionId: session.id }, "session created")
      return session
    } catch (e) {
      this._state = previous
      throw new SessionCreationError(
        `failed to create session: ${describeError(e)}`,
        { cause: e, partitionIds: [...partitionIds] },
      )
    }
  }

  /**
   * Bind to a session opened elsewhere. No call is made; calling it again
   * replaces the bound session.
   */
  openSession(session: Session): void {
    if (this._session?.id !== session.id) {
      this.logger.debug({ sessionId: session.id }, "open session")
    }
    this._session = { id: session.id }
    this._state = "Bound"
  }

  /**
   * Submit tasks without dependencies
   *
   * @param maxRetries - Retries of a transient failure before giving up
   * @param taskOptions - Overrides the session task options for this call
   * @returns One task id per payload, in payload order
   */
  submitTasks(
    payloads: readonly Uint8Array[],
    maxRetries = 5,
    taskOptions?: Partial<TaskOptions>,
    options: CallOptions = {},
  ): Promise<string[]> {
    return this.submitTasksWithDependencies(
      payloads.map((payload) => ({ payload })),
      maxRetries,
      taskOptions,
      options,
    )
  }

  /**
   * Submit a single task
   *
   * Waits `waitBeforeNextSubmitMs` before sending, so that tight submission
   * loops do not flood the control plane.
   */
  async submitTask(
    payload: Uint8Array,
    waitBeforeNextSubmitMs = 2,
    maxRetries = 5,
    taskOptions?: Partial<TaskOptions>,
    options: CallOptions = {},
  ): Promise<string> {
    this.requireSession("submitTask")
    if (waitBeforeNextSubmitMs > 0) {
      await delay(waitBeforeNextSubmitMs, undefined, { signal: options.signal })
    }
    const [taskId] = await this.submitTasks(
      [payload],
      maxRetries,
      taskOptions,
      options,
    )
    return taskId
  }

  /**
   * Submit one task that only starts once every task in `dependencies`
   * completed successfully
   *
   * @returns The id of the created task
   */
  async submitTaskWithDependencies(
    payload: Uint8Array,
    dependencies: readonly string[],
    maxRetries = 5,
    taskOptions?: Partial<TaskOptions>,
    options: CallOptions = {},
  ): Promise<string> {
    const [taskId] = await this.submitTasksWithDependencies(
      [{ payload, dependencies }],
      maxRetries,
      taskOptions,
      options,
    )
    return taskId
  }

  /**
   * Submit tasks, each with its own dependency list
   *
   * Tasks are sent in requests of at most `maxTasksPerRequest` tasks, one
   * after the other. A request failing with a transient error is sent again,
   * possibly on another channel, up to `maxRetries` times.
   *
   * @returns One task id per item, in item order
   * @throws SubmissionError when a request fails for good
   */
  async submitTasksWithDependencies(
    tasks: readonly TaskPayload[],
    maxRetries = 5,
    taskOptions?: Partial<TaskOptions>,
    options: CallOptions = {},
  ): Promise<string[]> {
    const session = this.requireSession("submitTasksWithDependencies")
    checkMaxRetries(maxRetries)
    const taskOptionsMessage = toTaskOptionsMessage(
      mergeTaskOptions(this._taskOptions, taskOptions),
    )

    const taskIds: string[] = []
    for (
      let start = 0;
      start < tasks.length;
      start += this.maxTasksPerRequest
    ) {
      const chunk = tasks.slice(start, start + this.maxTasksPerRequest)
      const taskRequests: TaskRequest[] = chunk.map((task) => ({
        payload: task.payload,
        data_dependencies: [...(task.dependencies ?? [])],
      }))

      let attempts = 0
      let taskIdsOfChunk: string[]
      try {
        const response = await withRetries(
          () => {
            attempts++
            return this.invoke(
              (client) => client.SubmitTasks,
              {
                session_id: session.id,
                task_options: taskOptionsMessage,
                task_requests: taskRequests,
              },
              options.signal,
            )
          },
          {
            maxRetries,
            backoffMs: this.retryBackoffMs,
            maxBackoffMs: this.maxRetryBackoffMs,
            signal: options.signal,
            logger: this.logger,
          },
        )
        taskIdsOfChunk = response.task_ids
      } catch (e) {
        if (isCancellation(e) || e instanceof TasklaneSDKError) {
          throw e
        }
        throw new SubmissionError(
          `failed to submit tasks to session ${session.id} after ${attempts} attempt(s): ${describeError(e)}`,
          {
            cause: e,
            sessionId: session.id,
            payloadIndex: start,
            attempts,
            submittedTaskIds: [...taskIds],
          },
        )
      }

      if (taskIdsOfChunk.length !== chunk.length) {
        throw new SubmissionError(
          `control plane returned ${taskIdsOfChunk.length} task id(s) for ${chunk.length} task(s)`,
          {
            sessionId: session.id,
            payloadIndex: start,
            attempts,
            submittedTaskIds: [...taskIds],
          },
        )
      }
      taskIds.push(...taskIdsOfChunk)
    }

    this.logger.debug(
      { sessionId: session.id, count: taskIds.length },
      "tasks submitted",
    )
    return taskIds
  }

  /**
   * Wait for a task to finish and return its output
   *
   * Polls the control plane every `resultPollIntervalMs` until the task
   * reaches a terminal state. Failures are not retried.
   *
   * @throws ResultUnavailableError if the task ended in failure
   * @throws UnknownTaskError if the control plane does not know the task
   * @throws ControlPlaneError on any other call failure
   */
  async getResult(taskId: string, options: CallOptions = {}): Promise<Buffer> {
    const session = this.requireSession("getResult")

    for (;;) {
      let response: GetResultResponse
      try {
        response = await this.invoke(
          (client) => client.GetResult,
          { session_id: session.id, task_id: taskId },
          options.signal,
        )
      } catch (e) {
        throw this.translateTaskError(e, session, taskId)
      }

      const outcome = readResult(response)
      switch (outcome.kind) {
        case "completed":
          return outcome.payload
        case "failed":
          throw new ResultUnavailableError(
            `task ${taskId} of session ${session.id} failed: ${outcome.reason}`,
            { sessionId: session.id, taskId, reason: outcome.reason },
          )
        case "pending":
          this.logger.trace(
            { taskId, status: outcome.status },
            "task not completed yet",
          )
          await delay(this.resultPollIntervalMs, undefined, {
            signal: options.signal,
          })
      }
    }
  }

  /**
   * Wait for several tasks and return their outputs keyed by task id
   *
   * Results are fetched concurrently; the first failure rejects the whole
   * call and stops polling for the other tasks.
   */
  async getResults(
    taskIds: readonly string[],
    options: CallOptions = {},
  ): Promise<Map<string, Buffer>> {
    this.requireSession("getResults")
    const unique = [...new Set(taskIds)]

    const controller = new AbortController()
    const { signal } = options
    const onAbort = () => controller.abort(signal?.reason)
    if (signal?.aborted) {
      onAbort()
    } else {
      signal?.addEventListener("abort", onAbort, { once: true })
    }

    try {
      const results = await Promise.all(
        unique.map((taskId) =>
          this.getResult(taskId, { signal: controller.signal }).catch(
            (e: unknown) => {
              controller.abort(e)
              throw e
            },
          ),
        ),
      )
      return new Map(unique.map((taskId, i) => [taskId, results[i]]))
    } finally {
      signal?.removeEventListener("abort", onAbort)
    }
  }

  /**
   * Current status of several tasks. Statuses the SDK does not know map to
   * "unspecified".
   */
  async getTaskStatuses(
    taskIds: readonly string[],
    options: CallOptions = {},
  ): Promise<Map<string, TaskStatus>> {
    const session = this.requireSession("getTaskStatuses")
    try {
      const response = await this.invoke(
        (client) => client.GetTaskStatus,
        { session_id: session.id, task_ids: [...taskIds] },
        options.signal,
      )
      return new Map(
        response.statuses.map((entry) => [
          entry.task_id,
          toTaskStatus(entry.status),
        ]),
      )
    } catch (e) {
      throw this.translateCallError(e, "GetTaskStatus", session)
    }
  }

  /**
   * Cancel the session and every task still pending in it
   */
  async cancelSession(options: CallOptions = {}): Promise<void> {
    const session = this.requireSession("cancelSession")
    try {
      await this.invoke(
        (client) => client.CancelSession,
        { session_id: session.id },
        options.signal,
      )
    } catch (e) {
      throw this.translateCallError(e, "CancelSession", session)
    }
    this.logger.info({ sessionId: session.id }, "session cancelled")
  }

  private requireSession(operation: string): Session {
    if (this._state !== "Bound" || !this._session) {
      throw new NotReadyError(
        `${operation} needs a bound session, current state is ${this._state}`,
        { operation, state: this._state },
      )
    }
    return this._session
  }

  /**
   * Lease a channel and make one unary call on it
   */
  private invoke<TRequest, TResponse>(
    pick: (client: SubmitterRpc) => UnaryMethod<TRequest, TResponse>,
    request: TRequest,
    signal?: AbortSignal,
  ): Promise<TResponse> {
    return this._channelPool.withChannel(
      (channel) =>
        callUnary(
          pick(channel.client).bind(channel.client),
          request,
          new grpc.Metadata(),
          { signal, deadlineMs: channel.deadlineMs },
        ),
      { signal },
    )
  }

  private translateTaskError(
    error: unknown,
    session: Session,
    taskId: string,
  ): unknown {
    if (isServiceError(error) && error.code === grpc.status.NOT_FOUND) {
      return new UnknownTaskError(
        `task ${taskId} is unknown to session ${session.id}`,
        { cause: error, sessionId: session.id, taskId },
      )
    }
    return this.translateCallError(error, "GetResult", session)
  }

  private translateCallError(
    error: unknown,
    rpc: string,
    session: Session,
  ): unknown {
    if (!isServiceError(error) || isCancellation(error)) {
      return error
    }
    return new ControlPlaneError(
      `${rpc} failed for session ${session.id}: ${describeError(error)}`,
      { cause: error, grpcCode: error.code, grpcDetails: error.details },
    )
  }
}
