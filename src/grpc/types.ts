/**
 * TypeScript types for the gRPC Submitter service
 * Based on proto/submitter.proto
 *
 * Field names keep the proto casing because the service definition is
 * loaded with `keepCase: true`. Request types describe what the client
 * sends, response types what proto-loader decodes (`longs: String`,
 * `defaults: true`, `oneofs: true`).
 */

/**
 * Wall-clock duration on the wire
 */
export interface Duration {
  /** Whole seconds (decoded as a string because of `longs: String`) */
  seconds: number | string
  nanos: number
}

/**
 * Task options as sent to the control plane
 */
export interface TaskOptionsMessage {
  max_duration: Duration
  max_retries: number
  priority: number
  partition_id: string
  application_name: string
  application_version: string
  application_namespace: string
  application_service: string
  engine_type: string
  options: { [key: string]: string }
}

export interface CreateSessionRequest {
  default_task_options: TaskOptionsMessage
  partition_ids: string[]
}

export interface CreateSessionResponse {
  session_id: string
}

/**
 * One task of a submission batch
 */
export interface TaskRequest {
  payload: Uint8Array
  /** Task ids that must complete successfully before this one starts */
  data_dependencies: string[]
}

export interface SubmitTasksRequest {
  session_id: string
  task_options: TaskOptionsMessage
  task_requests: TaskRequest[]
}

export interface SubmitTasksResponse {
  /** One id per task request, in request order */
  task_ids: string[]
}

export interface GetResultRequest {
  session_id: string
  task_id: string
}

/**
 * Failure reported for a task that ended in error
 */
export interface TaskError {
  task_id: string
  reason: string
}

/**
 * Marker for a task that has not reached a terminal state yet
 */
export interface NotCompleted {
  /** Current status name, e.g. "processing" */
  status: string
}

export interface GetResultResponse {
  /** Which member of the `type` oneof is set */
  type?: "result" | "error" | "not_completed"
  result?: Buffer | Uint8Array
  error?: TaskError | null
  not_completed?: NotCompleted | null
}

export interface GetTaskStatusRequest {
  session_id: string
  task_ids: string[]
}

export interface TaskStatusEntry {
  task_id: string
  status: string
}

export interface GetTaskStatusResponse {
  statuses: TaskStatusEntry[]
}

export interface CancelSessionRequest {
  session_id: string
}

export interface CancelSessionResponse {
  // Empty message
}
