import { describe, it, expect } from "vitest";
import { computeOverallProgress, createStageStates, isTerminal, stageIndex } from "./stages.js";
import type { StageState } from "./types.js";

describe("stages", () => {
  it("creates every stage as idle, in pipeline order", () => {
    expect(createStageStates()).toEqual([
      { name: "Architect", status: "idle", message: "Waiting", progress: 0 },
      { name: "Reviewer", status: "idle", message: "Waiting", progress: 0 },
      { name: "Optimizer", status: "idle", message: "Waiting", progress: 0 },
      { name: "Save", status: "idle", message: "Waiting", progress: 0 },
    ]);
  });

  it("returns fresh records on every call", () => {
    const a = createStageStates();
    const b = createStageStates();
    a[0].status = "running";
    expect(b[0].status).toBe("idle");
  });

  it("computes progress from completed stages only", () => {
    const stages: StageState[] = createStageStates();
    expect(computeOverallProgress(stages)).toBe(0);

    stages[0].status = "completed";
    stages[1].status = "running";
    stages[1].progress = 80;
    expect(computeOverallProgress(stages)).toBe(25);

    stages[1].status = "completed";
    stages[2].status = "failed";
    expect(computeOverallProgress(stages)).toBe(50);

    for (const stage of stages) stage.status = "completed";
    expect(computeOverallProgress(stages)).toBe(100);
  });

  it("treats an empty stage list as no progress", () => {
    expect(computeOverallProgress([])).toBe(0);
  });

  it("knows stage positions and terminal statuses", () => {
    expect(stageIndex("Architect")).toBe(0);
    expect(stageIndex("Save")).toBe(3);
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("running")).toBe(false);
    expect(isTerminal("pending")).toBe(false);
  });
});
