import { createHash } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { countLines } from "./diff.js";
import { getLogger, type Logger } from "./logger.js";
import type { StageRunner } from "./orchestrator.js";

/** Options for {@link createSaveRunner}. */
export type SaveRunnerOptions = {
  /** Root directory; each task gets its own subdirectory. */
  outputDir: string;
  /** Clock used for the `savedAt` metadata field. @default Date.now */
  now?: () => number;
  logger?: Logger;
};

/** Metadata written next to every saved file as `<file>.meta.json`. */
export type SavedFileMetadata = {
  taskId: string;
  fileName: string;
  savedFileName: string;
  filePath: string;
  sha256: string;
  size: number;
  lineCount: number;
  /** Copy of the uploaded source, kept under `.original/` in the task directory. */
  originalFilePath: string;
  originalSha256: string;
  savedAt: string;
};

const sha256 = (content: string) => createHash("sha256").update(content).digest("hex");

/** Reduce a file name to `[A-Za-z0-9._-]`, dropping any directory part. */
export function sanitizeFileName(fileName: string): string {
  const base = path.basename(fileName.replaceAll("\\", "/"));
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, "_").replace(/^\.+/, "");
  return cleaned === "" ? "fixed_code" : cleaned;
}

/**
 * Default runner for the `Save` stage: writes the latest content to
 * `<outputDir>/<taskId>/<file name>` plus a metadata file beside it, and keeps
 * the uploaded source at `<outputDir>/<taskId>/.original/<file name>`.
 */
export function createSaveRunner(options: SaveRunnerOptions): StageRunner {
  const now = options.now ?? Date.now;
  const log = options.logger ?? getLogger({ module: "SaveRunner" });

  return {
    async run(context) {
      const taskDir = path.join(options.outputDir, context.taskId);
      const savedFileName = sanitizeFileName(context.fileName);
      const filePath = path.join(taskDir, savedFileName);
      const originalFilePath = path.join(taskDir, ".original", savedFileName);

      await mkdir(path.dirname(originalFilePath), { recursive: true });
      await writeFile(originalFilePath, context.source, "utf8");
      await writeFile(filePath, context.content, "utf8");

      const metadata: SavedFileMetadata = {
        taskId: context.taskId,
        fileName: context.fileName,
        savedFileName,
        filePath,
        sha256: sha256(context.content),
        size: Buffer.byteLength(context.content, "utf8"),
        lineCount: countLines(context.content),
        originalFilePath,
        originalSha256: sha256(context.source),
        savedAt: new Date(now()).toISOString(),
      };
      await writeFile(`${filePath}.meta.json`, `${JSON.stringify(metadata, null, 2)}\n`, "utf8");

      log.info({ taskId: context.taskId, filePath }, "Fixed file saved");
      return {
        report: `Saved ${savedFileName} (${metadata.size} bytes)`,
        metrics: { bytes: metadata.size, lines: metadata.lineCount },
        message: "Result saved",
        savedFilePath: filePath,
      };
    },
  };
}
