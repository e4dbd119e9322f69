import * as v from "valibot";

const integerSetting = (fallback: string, min: number) =>
  v.optional(
    v.pipe(
      v.string(),
      v.trim(),
      v.regex(/^\d+$/, "must be a non-negative integer"),
      v.transform(Number),
      v.minValue(min, `must be at least ${min}`),
    ),
    fallback,
  );

const EnvSchema = v.object({
  LOG_LEVEL: v.optional(v.picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]), "info"),
  TASK_MAX_HISTORY: integerSetting("100", 0),
  SUBSCRIBER_IDLE_TIMEOUT_MS: integerSetting("90000", 1),
  SUBSCRIBER_EVICTION_INTERVAL_MS: integerSetting("30000", 1),
  SUBSCRIBER_SEND_TIMEOUT_MS: integerSetting("10000", 1),
  SSE_HEARTBEAT_INTERVAL_MS: integerSetting("30000", 1),
  OUTPUT_DIR: v.optional(v.pipe(v.string(), v.trim(), v.minLength(1, "must not be empty")), "fixed"),
});

/** Runtime settings for a pipeline instance. */
export type PipelineConfig = {
  logLevel: v.InferOutput<typeof EnvSchema>["LOG_LEVEL"];
  /** Terminal tasks kept in memory before the oldest are evicted. `0` keeps all. */
  maxHistory: number;
  /** Subscribers silent for longer than this are dropped. */
  idleTimeoutMs: number;
  evictionIntervalMs: number;
  /** A delivery pending for longer than this drops the subscriber. */
  sendTimeoutMs: number;
  heartbeatIntervalMs: number;
  /** Directory the save stage writes fixed files to. */
  outputDir: string;
};

/** Thrown by {@link loadConfig} when the environment holds invalid settings. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Read pipeline settings from environment variables. Unset variables take their
 * defaults; blank ones are treated as unset.
 *
 * @throws {ConfigError} If any variable is present but invalid.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const input = Object.fromEntries(
    Object.keys(EnvSchema.entries).flatMap((key) => {
      const value = env[key];
      return value === undefined || value.trim() === "" ? [] : [[key, value]];
    }),
  );

  const parsed = v.safeParse(EnvSchema, input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.issues.map((issue) => `${v.getDotPath(issue) ?? "env"}: ${issue.message}`),
    );
  }

  const out = parsed.output;
  return {
    logLevel: out.LOG_LEVEL,
    maxHistory: out.TASK_MAX_HISTORY,
    idleTimeoutMs: out.SUBSCRIBER_IDLE_TIMEOUT_MS,
    evictionIntervalMs: out.SUBSCRIBER_EVICTION_INTERVAL_MS,
    sendTimeoutMs: out.SUBSCRIBER_SEND_TIMEOUT_MS,
    heartbeatIntervalMs: out.SSE_HEARTBEAT_INTERVAL_MS,
    outputDir: out.OUTPUT_DIR,
  };
}
