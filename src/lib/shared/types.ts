/** The fixed analysis pipeline, in execution order. */
export const STAGE_NAMES = ["Architect", "Reviewer", "Optimizer", "Save"] as const;

/** Name of one stage of the pipeline. */
export type StageName = (typeof STAGE_NAMES)[number];

/** Lifecycle status of a review task. */
export type TaskStatus = "pending" | "running" | "completed" | "failed";

/** Lifecycle status of a single stage within a task. */
export type StageStatus = "idle" | "running" | "completed" | "failed";

/** Per-stage record kept on every task, pre-populated as `"idle"` at creation. */
export type StageState = {
  name: StageName;
  status: StageStatus;
  /** Human-readable description of what the stage is doing or how it ended. */
  message: string;
  /** Stage-local progress in `[0, 100]`. */
  progress: number;
};

/** Line-level comparison between the uploaded source and the fixed content. */
export type DiffSummary = {
  linesAdded: number;
  linesRemoved: number;
  linesUnchanged: number;
  originalLines: number;
  fixedLines: number;
};

/** Final artifact assembled once every stage has succeeded. */
export type TaskResult = {
  originalContent: string;
  fixedContent: string;
  /** Report text per stage that produced one. */
  reports: Partial<Record<StageName, string>>;
  metrics: Partial<Record<StageName, Record<string, number>>>;
  summary?: string;
  qualityScore?: number;
  savedFilePath?: string;
  diff: DiffSummary;
};

/** Failure recorded on a task that ended in `"failed"`. */
export type TaskFailure = {
  /** Stage that failed, when the failure is attributable to one. */
  stage?: StageName;
  message: string;
};

/**
 * Authoritative record of one review task.
 *
 * `overallProgress` is derived from `stages` and `stageCursor` only ever moves
 * forward. `result` is present only on `"completed"`, `error` only on `"failed"`.
 */
export type Task = {
  id: string;
  fileName: string;
  filePath: string;
  fileSize: number;
  status: TaskStatus;
  stageCursor: number;
  overallProgress: number;
  stages: StageState[];
  result?: TaskResult;
  error?: TaskFailure;
  /** Epoch timestamps (ms). */
  createdAt: number;
  updatedAt: number;
  startedAt?: number;
  completedAt?: number;
};

/** Kind of notification pushed through the broker. */
export type ProgressEventType = "stage_update" | "completed" | "failed";

/**
 * Notification delivered to every live subscriber of a task.
 *
 * `progress` is the task's overall progress. Stage updates carry the stage-local
 * progress in `payload.stageProgress`; terminal events carry the task snapshot.
 */
export type ProgressEvent = {
  taskId: string;
  type: ProgressEventType;
  stage?: StageName;
  status?: StageStatus | TaskStatus;
  progress?: number;
  message?: string;
  payload?: Record<string, unknown>;
  /** Epoch timestamp (ms) at which the event was produced. */
  timestamp: number;
};

/**
 * Discriminated union of SSE message types sent from server to client.
 *
 * - `"init"` — sent once when a client connects, carrying the full current task record.
 * - `"update"` — sent for every progress event after the initial snapshot.
 */
export type TaskSSEMessage = { type: "init"; task: Task } | { type: "update"; event: ProgressEvent };
