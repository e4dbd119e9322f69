import type { Task } from "../shared/types.js";
import { ProgressBroker } from "./broker.js";
import { loadConfig, type PipelineConfig } from "./config.js";
import { createLogger, getLogger, type Logger } from "./logger.js";
import { TaskOrchestrator, type SourceLoader, type StageRunner, type StageRunners } from "./orchestrator.js";
import { createSaveRunner } from "./save-runner.js";
import { createSSEHandler, type TaskSSEHandler } from "./sse.js";
import { MemoryTaskStore, type CreateTaskInput, type TaskPersistence } from "./store.js";

/** Analysis runners the host provides. `Save` defaults to {@link createSaveRunner}. */
export type PipelineRunners = Omit<StageRunners, "Save"> & { Save?: StageRunner };

/** Options for {@link createPipeline}. */
export type PipelineOptions = {
  runners: PipelineRunners;
  /** @default loadConfig() */
  config?: PipelineConfig;
  persistence?: TaskPersistence;
  loadSource?: SourceLoader;
  authorize?: (request: Request) => boolean | Promise<boolean>;
  logger?: Logger;
};

/** A wired pipeline instance. Owns its store, broker and eviction timer; nothing is global. */
export type Pipeline = {
  config: PipelineConfig;
  store: MemoryTaskStore;
  broker: ProgressBroker;
  orchestrator: TaskOrchestrator;
  /** Mount at e.g. `GET /tasks/events`. */
  sseHandler: TaskSSEHandler;
  /** Create a task for an uploaded file and start it in the background. */
  submit: (upload: CreateTaskInput) => Promise<Task>;
  /** Stop the eviction loop and drop all subscribers. Running tasks are left to finish. */
  dispose: () => void;
};

/**
 * Composition root: builds one store, broker and orchestrator from config and
 * starts idle-subscriber eviction.
 *
 * @example
 * ```ts
 * const pipeline = createPipeline({ runners: { Architect, Reviewer, Optimizer } });
 * const task = await pipeline.submit({ fileName: "app.py", filePath: "uploads/app.py", fileSize: 512 });
 * ```
 */
export function createPipeline(options: PipelineOptions): Pipeline {
  const config = options.config ?? loadConfig();
  const root = options.logger ?? createLogger(config.logLevel);
  const logger = (module: string) => getLogger({ module }, root);

  const store = new MemoryTaskStore({
    maxHistory: config.maxHistory,
    persistence: options.persistence,
    logger: logger("TaskStore"),
  });
  const broker = new ProgressBroker({ sendTimeout: config.sendTimeoutMs, logger: logger("ProgressBroker") });
  const orchestrator = new TaskOrchestrator({
    store,
    broker,
    runners: {
      ...options.runners,
      Save: options.runners.Save ?? createSaveRunner({ outputDir: config.outputDir, logger: logger("SaveRunner") }),
    },
    loadSource: options.loadSource,
    logger: logger("TaskOrchestrator"),
  });
  const sseHandler = createSSEHandler({
    store,
    broker,
    authorize: options.authorize,
    heartbeatInterval: config.heartbeatIntervalMs,
    logger: logger("SSE"),
  });

  const stopEviction = broker.startEviction({
    idleTimeout: config.idleTimeoutMs,
    interval: config.evictionIntervalMs,
  });

  return {
    config,
    store,
    broker,
    orchestrator,
    sseHandler,
    submit: async (upload) => {
      const task = await store.create(upload);
      await orchestrator.start(task.id);
      return (await store.get(task.id)) ?? task;
    },
    dispose: () => {
      stopEviction();
      broker.dispose();
    },
  };
}
