export * from "./frame.types.js";
export * from "./task.types.js";
export * from "./graph-config.types.js";
