import { readFile } from "node:fs/promises";
import { STAGE_NAMES } from "../shared/types.js";
import type { ProgressEvent, StageName, StageStatus, Task, TaskResult } from "../shared/types.js";
import type { ProgressBroker } from "./broker.js";
import { summarizeDiff } from "./diff.js";
import { StageError, errorMessage } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import type { TaskOutcome, TaskStore } from "./store.js";

/** Structured output of one stage. */
export type StageResult = {
  /** Report text kept on the final result under the stage's name. */
  report: string;
  metrics: Record<string, number>;
  /** Message shown on the stage record once it completes. */
  message?: string;
  /** Rewritten source. Later stages see the latest content in {@link StageContext.content}. */
  content?: string;
  summary?: string;
  qualityScore?: number;
  /** Where the save stage wrote the fixed file. */
  savedFilePath?: string;
};

/** Input handed to a {@link StageRunner}: the task, its source and everything earlier stages produced. */
export type StageContext = {
  taskId: string;
  stage: StageName;
  fileName: string;
  filePath: string;
  /** The uploaded file as read by the source loader. */
  source: string;
  /** Latest rewritten content, or the source if no stage has rewritten it yet. */
  content: string;
  /** Outputs of the stages that already ran. */
  outputs: Partial<Record<StageName, StageResult>>;
};

/**
 * Performs the work of one stage. Throwing (or rejecting) fails the task; the
 * orchestrator never retries, so retry policy belongs in the runner.
 */
export interface StageRunner {
  run(context: StageContext): Promise<StageResult>;
}

/** One runner per stage, looked up by stage name. */
export type StageRunners = Record<StageName, StageRunner>;

/** Reads the uploaded file a task was created from. */
export type SourceLoader = (task: Task) => Promise<string>;

/** Dependencies for the {@link TaskOrchestrator} constructor. */
export type TaskOrchestratorDeps = {
  store: TaskStore;
  broker: ProgressBroker;
  runners: StageRunners;
  /** @default reads `task.filePath` as UTF-8 */
  loadSource?: SourceLoader;
  /** Clock used for event timestamps. @default Date.now */
  now?: () => number;
  logger?: Logger;
};

const readSource: SourceLoader = (task) => readFile(task.filePath, "utf8");

function assembleResult(
  source: string,
  content: string,
  outputs: Partial<Record<StageName, StageResult>>,
): TaskResult {
  const reports: TaskResult["reports"] = {};
  const metrics: TaskResult["metrics"] = {};
  for (const stage of STAGE_NAMES) {
    const output = outputs[stage];
    if (!output) continue;
    reports[stage] = output.report;
    metrics[stage] = output.metrics;
  }

  const optimizer = outputs.Optimizer;
  const saved = outputs.Save;
  return {
    originalContent: source,
    fixedContent: content,
    reports,
    metrics,
    ...(optimizer?.summary !== undefined && { summary: optimizer.summary }),
    ...(optimizer?.qualityScore !== undefined && { qualityScore: optimizer.qualityScore }),
    ...(saved?.savedFilePath !== undefined && { savedFilePath: saved.savedFilePath }),
    diff: summarizeDiff(source, content),
  };
}

/**
 * Drives review tasks through the fixed stage sequence. It is the only writer of
 * task status: every stage transition goes to the {@link TaskStore} first and is
 * then broadcast through the {@link ProgressBroker}.
 *
 * Stages of one task run strictly in order, each seeing the previous outputs;
 * separate tasks run concurrently. A stage failure ends the task as `"failed"`
 * and is never thrown out of {@link run}. Exactly one terminal event is
 * broadcast per task.
 *
 * @example
 * ```ts
 * const orchestrator = new TaskOrchestrator({ store, broker, runners });
 * const task = await store.create({ fileName: "app.py", filePath, fileSize });
 * await orchestrator.start(task.id); // resolves once the task is claimed
 * ```
 */
export class TaskOrchestrator {
  private store: TaskStore;
  private broker: ProgressBroker;
  private runners: StageRunners;
  private loadSource: SourceLoader;
  private now: () => number;
  private log: Logger;
  private inFlight = new Set<Promise<void>>();

  constructor(deps: TaskOrchestratorDeps) {
    this.store = deps.store;
    this.broker = deps.broker;
    this.runners = deps.runners;
    this.loadSource = deps.loadSource ?? readSource;
    this.now = deps.now ?? Date.now;
    this.log = deps.logger ?? getLogger({ module: "TaskOrchestrator" });
  }

  /**
   * Run a pending task to completion or failure.
   *
   * @returns The task's final record.
   * @throws {TaskNotFoundError} If the id is unknown.
   * @throws {InvalidStateError} If the task was already started.
   */
  async run(taskId: string): Promise<Task> {
    const task = await this.store.claim(taskId);
    return this.execute(task);
  }

  /**
   * Claim a pending task and run its stages in the background. Resolves as soon
   * as the task is marked running.
   *
   * @throws {TaskNotFoundError} If the id is unknown.
   * @throws {InvalidStateError} If the task was already started.
   */
  async start(taskId: string): Promise<void> {
    const task = await this.store.claim(taskId);

    const run = this.execute(task).then(
      () => undefined,
      (error: unknown) => {
        this.log.error({ err: error, taskId }, "Task run aborted");
      },
    );
    this.inFlight.add(run);
    void run.finally(() => this.inFlight.delete(run));
  }

  /** Resolves once every run started with {@link start} has finished. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /** Number of background runs still in progress. */
  getActiveCount(): number {
    return this.inFlight.size;
  }

  private async execute(task: Task): Promise<Task> {
    const taskId = task.id;
    this.log.info({ taskId, fileName: task.fileName }, "Review started");

    let source: string;
    try {
      source = await this.loadSource(task);
    } catch (error) {
      return this.failStage(taskId, STAGE_NAMES[0], error);
    }

    let content = source;
    const outputs: Partial<Record<StageName, StageResult>> = {};

    for (const stage of STAGE_NAMES) {
      try {
        await this.markStage(taskId, stage, "running", `${stage} running`, 0);
        const output = await this.runners[stage].run({
          taskId,
          stage,
          fileName: task.fileName,
          filePath: task.filePath,
          source,
          content,
          outputs: { ...outputs },
        });

        outputs[stage] = output;
        if (output.content !== undefined) content = output.content;
        await this.markStage(taskId, stage, "completed", output.message ?? `${stage} completed`, 100);
      } catch (error) {
        return this.failStage(taskId, stage, error);
      }
    }

    const result = assembleResult(source, content, outputs);
    try {
      return await this.finish(taskId, { status: "completed", result });
    } catch (error) {
      this.log.error({ err: error, taskId }, "Could not record result");
      return this.finish(taskId, {
        status: "failed",
        error: { message: `Could not record result: ${errorMessage(error)}` },
      });
    }
  }

  private async markStage(
    taskId: string,
    stage: StageName,
    status: StageStatus,
    message: string,
    progress: number,
  ): Promise<Task> {
    const task = await this.store.updateStage(taskId, stage, { status, message, progress });
    this.log.debug({ taskId, stage, status }, "Stage update");
    await this.broker.broadcast(taskId, {
      taskId,
      type: "stage_update",
      stage,
      status,
      progress: task.overallProgress,
      message,
      payload: { stageProgress: progress, stageCursor: task.stageCursor },
      timestamp: this.now(),
    });
    return task;
  }

  private async failStage(taskId: string, stage: StageName, cause: unknown): Promise<Task> {
    const error = cause instanceof StageError && cause.stage === stage ? cause : new StageError(stage, cause);
    this.log.error({ err: error, taskId, stage }, "Stage failed");
    try {
      await this.markStage(taskId, stage, "failed", error.message, 0);
    } catch (markError) {
      this.log.error({ err: markError, taskId, stage }, "Could not mark stage failed");
    }
    return this.finish(taskId, { status: "failed", error: { stage, message: error.message } });
  }

  private async finish(taskId: string, outcome: TaskOutcome): Promise<Task> {
    const { task, applied } = await this.store.finalize(taskId, outcome);
    if (!applied) {
      this.log.debug({ taskId, status: task.status }, "Task already finished, skipping terminal event");
      return task;
    }

    const event: ProgressEvent = {
      taskId,
      type: task.status === "completed" ? "completed" : "failed",
      status: task.status,
      progress: task.overallProgress,
      message: task.error?.message ?? "Review completed",
      payload: { task },
      timestamp: this.now(),
    };
    if (task.error?.stage) event.stage = task.error.stage;

    this.log.info({ taskId, status: task.status, progress: task.overallProgress }, "Review finished");
    await this.broker.broadcast(taskId, event);
    return task;
  }
}
