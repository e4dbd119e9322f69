import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function envLevel(): LevelWithSilent {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return LEVELS.find((level) => level === raw) ?? "info";
}

/** Create a standalone logger, e.g. from a loaded config. */
export function createLogger(level: LevelWithSilent = envLevel()): Logger {
  return pino({ level, base: { service: "review-pipeline" } });
}

// Root logger. Level comes from LOG_LEVEL (default "info").
export const logger: Logger = createLogger();

export function getLogger(bindings?: Record<string, unknown>, parent: Logger = logger): Logger {
  if (bindings && Object.keys(bindings).length > 0) {
    return parent.child(bindings);
  }
  return parent;
}
