// src/pipeline/index.ts
export { FramePathTemplate } from "./frame-path.js";
export { Stream } from "./stream.js";
export type { StreamOptions } from "./stream.js";
export { FrameNode } from "./nodes/frame-node.js";
export type { ExecutionContext } from "./nodes/frame-node.js";
export { concatSegmentStarts, deriveRange, locateConcatFrame, requiredInputs, windowOffsets } from "./nodes/frame-mapping.js";
export { buildArgv, expandTemplate, validateTemplate } from "./nodes/operations.js";
export { FrameGraph } from "./graph.js";
export { buildGraph, loadGraphFile } from "./graph-loader.js";
export type { LoadedGraph } from "./graph-loader.js";
export { Scheduler } from "./scheduler.js";
export type { ExecutionPlan, PlannedTask, SchedulerOptions } from "./scheduler.js";
export { FramePool } from "./services/frame-pool.js";
export type { FramePoolConfig, FramePoolMetrics, WorkUnit } from "./services/frame-pool.js";
export { LocalFrameStore } from "./services/frame-store.js";
export type { FrameStore } from "./services/frame-store.js";
export { SpawnCommandRunner } from "./services/command-runner.js";
export type { CommandResult, CommandRunner } from "./services/command-runner.js";
export { loadAppConfig } from "../shared/config.js";
export type { AppConfig, ToolPaths } from "../shared/config.js";
export * from "../shared/types/index.js";
export * from "../shared/utils/errors.js";
