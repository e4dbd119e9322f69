export * from "../shared/index.js";
export { ProgressBroker } from "./broker.js";
export type { EvictionOptions, ProgressBrokerOptions, RegisterOptions, SendFn } from "./broker.js";
export { ConfigError, loadConfig } from "./config.js";
export type { PipelineConfig } from "./config.js";
export { summarizeDiff } from "./diff.js";
export {
  DeliveryFailure,
  InvalidStateError,
  PipelineError,
  StageError,
  TaskNotFoundError,
  errorMessage,
} from "./errors.js";
export type { PipelineErrorCode } from "./errors.js";
export { createLogger, getLogger, logger } from "./logger.js";
export type { Logger } from "./logger.js";
export { TaskOrchestrator } from "./orchestrator.js";
export type {
  SourceLoader,
  StageContext,
  StageResult,
  StageRunner,
  StageRunners,
  TaskOrchestratorDeps,
} from "./orchestrator.js";
export { createPipeline } from "./pipeline.js";
export type { Pipeline, PipelineOptions, PipelineRunners } from "./pipeline.js";
export { createSaveRunner, sanitizeFileName } from "./save-runner.js";
export type { SavedFileMetadata, SaveRunnerOptions } from "./save-runner.js";
export { createSSEHandler } from "./sse.js";
export type { TaskSSEHandler, TaskSSEHandlerOptions } from "./sse.js";
export { MemoryTaskStore } from "./store.js";
export type {
  CreateTaskInput,
  FinalizeResult,
  ListOptions,
  MemoryTaskStoreOptions,
  StageUpdate,
  TaskOutcome,
  TaskPersistence,
  TaskStore,
} from "./store.js";
