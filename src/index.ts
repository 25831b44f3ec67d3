export * from "./lib/document";
export * from "./lib/policy";
export * from "./lib/order";
export * from "./lib/errors";
export { loadConfig, resolveOrderOptions, type PolicyOrderConfig } from "./lib/config";
export { reorder, resolveTarget, type ReorderOptions } from "./commands/reorder";
export { listTargets } from "./commands/list";
