import { STAGE_NAMES, type StageName, type StageState, type TaskStatus } from "./types.js";

const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(["completed", "failed"]);

/** Returns `true` for statuses that accept no further stage transitions. */
export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/** Position of a stage in the pipeline. */
export function stageIndex(stage: StageName): number {
  return STAGE_NAMES.indexOf(stage);
}

/** Fresh stage records for a new task: every stage present, all `"idle"`. */
export function createStageStates(): StageState[] {
  return STAGE_NAMES.map((name): StageState => ({ name, status: "idle", message: "Waiting", progress: 0 }));
}

/**
 * Overall task progress in `[0, 100]`: the share of stages that have completed,
 * rounded to the nearest integer.
 */
export function computeOverallProgress(stages: readonly StageState[]): number {
  if (stages.length === 0) return 0;
  const completed = stages.filter((stage) => stage.status === "completed").length;
  return Math.round((completed / stages.length) * 100);
}
