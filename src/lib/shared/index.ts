export * from "./types.js";
export * from "./stages.js";
