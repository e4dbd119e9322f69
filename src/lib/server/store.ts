import { randomUUID } from "node:crypto";
import { computeOverallProgress, createStageStates, isTerminal, stageIndex } from "../shared/stages.js";
import type { StageName, StageStatus, Task, TaskFailure, TaskResult } from "../shared/types.js";
import { InvalidStateError, TaskNotFoundError } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";

/** Upload metadata a task is created from. */
export type CreateTaskInput = {
  fileName: string;
  filePath: string;
  fileSize: number;
};

/** A write to one stage record. `progress` is clamped to `[0, 100]`. */
export type StageUpdate = {
  status: StageStatus;
  message: string;
  progress: number;
};

/** How a task ended. */
export type TaskOutcome = { status: "completed"; result: TaskResult } | { status: "failed"; error: TaskFailure };

/** Result of {@link TaskStore.finalize}. `applied` is `false` when the task was already terminal. */
export type FinalizeResult = {
  task: Task;
  applied: boolean;
};

/** Paging options for {@link TaskStore.list}. */
export type ListOptions = {
  offset?: number;
  limit?: number;
};

/**
 * Optional write-through collaborator. Every committed mutation is handed to
 * `save` while the record is still locked, so writes arrive in order per task.
 * The in-memory record changes only after `save` resolves; a rejection leaves it
 * as it was and propagates to the caller.
 */
export type TaskPersistence = {
  save: (task: Task) => Promise<void>;
};

/**
 * Authoritative store of task records. All status transitions go through it.
 * Returned tasks are detached copies; mutating them has no effect on the store.
 */
export interface TaskStore {
  create(input: CreateTaskInput): Promise<Task>;
  get(taskId: string): Promise<Task | undefined>;
  /** Tasks newest first. */
  list(options?: ListOptions): Promise<Task[]>;
  count(): Promise<number>;
  /**
   * Atomically move a task from `"pending"` to `"running"`.
   *
   * @throws {TaskNotFoundError} If the id is unknown.
   * @throws {InvalidStateError} If the task is not pending.
   */
  claim(taskId: string): Promise<Task>;
  /**
   * Write one stage record. A no-op on terminal tasks, so late duplicate updates are tolerated.
   *
   * @throws {TaskNotFoundError} If the id is unknown.
   */
  updateStage(taskId: string, stage: StageName, update: StageUpdate): Promise<Task>;
  /**
   * Move a running task to its terminal status. First call wins; later calls are no-ops.
   *
   * @throws {TaskNotFoundError} If the id is unknown.
   * @throws {InvalidStateError} If the task was never started.
   */
  finalize(taskId: string, outcome: TaskOutcome): Promise<FinalizeResult>;
  /** Drop the oldest terminal tasks above the history bound. Returns the number removed. */
  evictHistory(): Promise<number>;
}

/** Options for the {@link MemoryTaskStore} constructor. */
export type MemoryTaskStoreOptions = {
  /**
   * Maximum number of terminal tasks to keep. When exceeded after a task finishes,
   * the oldest terminal tasks (by `completedAt`) are evicted. `undefined` or `0` disables eviction.
   */
  maxHistory?: number;
  persistence?: TaskPersistence;
  /** Clock used for all timestamps. @default Date.now */
  now?: () => number;
  logger?: Logger;
};

/** Serializes work per key; different keys never wait on each other. */
class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }
}

function clampProgress(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

/**
 * In-memory {@link TaskStore}. Mutations on one record are serialized through a
 * per-task lock; unrelated tasks never contend.
 *
 * State is **not** durable across restarts unless a {@link TaskPersistence} is
 * supplied, and even then nothing is reloaded.
 */
export class MemoryTaskStore implements TaskStore {
  private records = new Map<string, Task>();
  private locks = new KeyedLock();
  private maxHistory: number;
  private persistence?: TaskPersistence;
  private now: () => number;
  private log: Logger;

  constructor(options: MemoryTaskStoreOptions = {}) {
    this.maxHistory = options.maxHistory ?? 0;
    this.persistence = options.persistence;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? getLogger({ module: "TaskStore" });
  }

  async create(input: CreateTaskInput): Promise<Task> {
    const timestamp = this.now();
    const task: Task = {
      id: randomUUID(),
      fileName: input.fileName,
      filePath: input.filePath,
      fileSize: input.fileSize,
      status: "pending",
      stageCursor: 0,
      overallProgress: 0,
      stages: createStageStates(),
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    return this.locks.run(task.id, async () => {
      const created = await this.commit(task);
      this.log.info({ taskId: task.id, fileName: task.fileName }, "Task created");
      return created;
    });
  }

  async get(taskId: string): Promise<Task | undefined> {
    const task = this.records.get(taskId);
    return task ? structuredClone(task) : undefined;
  }

  async list(options: ListOptions = {}): Promise<Task[]> {
    const offset = Math.max(0, options.offset ?? 0);
    const limit = Math.max(0, options.limit ?? 20);
    // Reversed first so that, with equal timestamps, the later insert sorts first.
    const tasks = Array.from(this.records.values()).reverse();
    tasks.sort((a, b) => b.createdAt - a.createdAt);
    return tasks.slice(offset, offset + limit).map((task) => structuredClone(task));
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  claim(taskId: string): Promise<Task> {
    return this.locks.run(taskId, async () => {
      const task = this.draft(taskId);
      if (task.status !== "pending") {
        throw new InvalidStateError(taskId, task.status, "start");
      }

      const timestamp = this.now();
      task.status = "running";
      task.startedAt = timestamp;
      task.updatedAt = timestamp;
      const claimed = await this.commit(task);
      this.log.info({ taskId }, "Task running");
      return claimed;
    });
  }

  updateStage(taskId: string, stage: StageName, update: StageUpdate): Promise<Task> {
    return this.locks.run(taskId, async () => {
      const task = this.draft(taskId);
      if (isTerminal(task.status)) {
        this.log.debug({ taskId, stage, status: update.status }, "Ignoring stage update on finished task");
        return task;
      }

      const index = stageIndex(stage);
      const record = task.stages[index];
      if (record.status === "completed" && update.status !== "completed") {
        this.log.debug({ taskId, stage, status: update.status }, "Ignoring regression of completed stage");
        return task;
      }

      record.status = update.status;
      record.message = update.message;
      record.progress = clampProgress(update.progress);
      task.stageCursor = Math.max(task.stageCursor, index);
      task.overallProgress = computeOverallProgress(task.stages);
      task.updatedAt = this.now();
      return this.commit(task);
    });
  }

  async finalize(taskId: string, outcome: TaskOutcome): Promise<FinalizeResult> {
    const result = await this.locks.run(taskId, async (): Promise<FinalizeResult> => {
      const task = this.draft(taskId);
      if (isTerminal(task.status)) {
        this.log.debug({ taskId, status: task.status }, "Task already finalized");
        return { task, applied: false };
      }
      if (task.status === "pending") {
        throw new InvalidStateError(taskId, task.status, "finalize");
      }

      const timestamp = this.now();
      task.status = outcome.status;
      if (outcome.status === "completed") {
        task.result = outcome.result;
      } else {
        task.error = outcome.error;
      }
      task.overallProgress = computeOverallProgress(task.stages);
      task.completedAt = timestamp;
      task.updatedAt = timestamp;
      const finalized = await this.commit(task);
      this.log.info({ taskId, status: task.status }, "Task finalized");
      return { task: finalized, applied: true };
    });

    if (result.applied && this.maxHistory > 0) {
      await this.evictHistory();
    }
    return result;
  }

  async evictHistory(): Promise<number> {
    if (!this.maxHistory) return 0;

    const terminal: Array<{ id: string; completedAt: number }> = [];
    for (const [id, task] of this.records) {
      if (isTerminal(task.status)) {
        terminal.push({ id, completedAt: task.completedAt ?? task.updatedAt });
      }
    }

    if (terminal.length <= this.maxHistory) return 0;

    terminal.sort((a, b) => a.completedAt - b.completedAt);
    const toEvict = terminal.slice(0, terminal.length - this.maxHistory);
    for (const { id } of toEvict) {
      this.records.delete(id);
    }
    this.log.debug({ evicted: toEvict.length }, "Evicted finished tasks");
    return toEvict.length;
  }

  private require(taskId: string): Task {
    const task = this.records.get(taskId);
    if (!task) throw new TaskNotFoundError(taskId);
    return task;
  }

  /** Detached working copy of a record. Changes take effect only through {@link commit}. */
  private draft(taskId: string): Task {
    return structuredClone(this.require(taskId));
  }

  /** Persist the new version, then swap it in. A failed save leaves the stored record untouched. */
  private async commit(task: Task): Promise<Task> {
    if (this.persistence) {
      await this.persistence.save(structuredClone(task));
    }
    this.records.set(task.id, task);
    return structuredClone(task);
  }
}
