import type { StageName } from "../shared/types.js";

/** Stable machine-readable codes carried by every pipeline error. */
export type PipelineErrorCode = "TASK_NOT_FOUND" | "INVALID_STATE" | "STAGE_FAILED" | "DELIVERY_FAILED";

/** Base class for errors raised by the store, broker and orchestrator. */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An operation referenced a task id the store does not know. */
export class TaskNotFoundError extends PipelineError {
  readonly taskId: string;

  constructor(taskId: string) {
    super("TASK_NOT_FOUND", `Task "${taskId}" not found`);
    this.taskId = taskId;
  }
}

/** A task was asked to do something its current status does not allow (e.g. start twice). */
export class InvalidStateError extends PipelineError {
  readonly taskId: string;
  readonly status: string;

  constructor(taskId: string, status: string, action: string) {
    super("INVALID_STATE", `Cannot ${action} task "${taskId}" in status "${status}"`);
    this.taskId = taskId;
    this.status = status;
  }
}

/** A stage runner failed. Recorded as the task's terminal error, never retried. */
export class StageError extends PipelineError {
  readonly stage: StageName;

  constructor(stage: StageName, cause: unknown) {
    super("STAGE_FAILED", `Stage ${stage} failed: ${errorMessage(cause)}`, { cause });
    this.stage = stage;
  }
}

/** Delivering an event to one subscriber failed. Absorbed by the broker. */
export class DeliveryFailure extends PipelineError {
  readonly taskId: string;
  readonly clientId: string;

  constructor(taskId: string, clientId: string, cause: unknown) {
    super("DELIVERY_FAILED", `Delivery to client "${clientId}" of task "${taskId}" failed: ${errorMessage(cause)}`, {
      cause,
    });
    this.taskId = taskId;
    this.clientId = clientId;
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}
