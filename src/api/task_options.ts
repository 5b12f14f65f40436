import type { TaskOptionsMessage } from "../grpc/types.js"

/**
 * Execution requirements of submitted tasks
 */
export interface TaskOptions {
  /** Wall-clock budget of one task, in milliseconds */
  maxDuration: number
  /** How many times the control plane retries a failed task */
  maxRetries: number
  /** Scheduling weight */
  priority: number
  /** Resource partition the tasks run on. Empty means the default one */
  partitionId: string
  applicationName: string
  applicationVersion: string
  applicationNamespace: string
  applicationService: string
  /** Execution engine identifier */
  engineType: string
  /** Free-form options forwarded to the worker */
  options: Record<string, string>
}

/**
 * Engine identifiers known to the standard workers
 */
export const EngineType = {
  Unified: "Unified",
  Symphony: "Symphony",
  DataSynapse: "DataSynapse",
} as const

/**
 * Supply a default TaskOptions
 *
 * 40 seconds per task, 2 retries, priority 1, routed to the unified worker.
 */
export function defaultTaskOptions(): TaskOptions {
  return {
    maxDuration: 40_000,
    maxRetries: 2,
    priority: 1,
    partitionId: "",
    applicationName: "Tasklane.Worker.Unified",
    applicationVersion: "1.X.X",
    applicationNamespace: "Tasklane.Worker.Unified",
    applicationService: "FallBackServerAdder",
    engineType: EngineType.Unified,
    options: {},
  }
}

/**
 * Layer a partial override on top of base options. Neither input is
 * modified. Unset or undefined override fields keep the base value; an
 * override `options` map replaces the base map as a whole.
 */
export function mergeTaskOptions(
  base: TaskOptions,
  override: Partial<TaskOptions> = {},
): TaskOptions {
  return {
    maxDuration: override.maxDuration ?? base.maxDuration,
    maxRetries: override.maxRetries ?? base.maxRetries,
    priority: override.priority ?? base.priority,
    partitionId: override.partitionId ?? base.partitionId,
    applicationName: override.applicationName ?? base.applicationName,
    applicationVersion: override.applicationVersion ?? base.applicationVersion,
    applicationNamespace:
      override.applicationNamespace ?? base.applicationNamespace,
    applicationService: override.applicationService ?? base.applicationService,
    engineType: override.engineType ?? base.engineType,
    options: { ...(override.options ?? base.options) },
  }
}

/**
 * Convert task options to their wire form
 */
export function toTaskOptionsMessage(options: TaskOptions): TaskOptionsMessage {
  const totalMs = Math.max(0, Math.round(options.maxDuration))
  return {
    max_duration: {
      seconds: Math.floor(totalMs / 1000),
      nanos: (totalMs % 1000) * 1_000_000,
    },
    max_retries: options.maxRetries,
    priority: options.priority,
    partition_id: options.partitionId,
    application_name: options.applicationName,
    application_version: options.applicationVersion,
    application_namespace: options.applicationNamespace,
    application_service: options.applicationService,
    engine_type: options.engineType,
    options: { ...options.options },
  }
}
