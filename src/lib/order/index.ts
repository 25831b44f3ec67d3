// Types
export type { OrderListOptions } from "./types";
export { DEFAULT_ORDER_OPTIONS } from "./types";

// Parser
export { parseCsvRows, parseOrderList } from "./parser";

// Manager
export { readOrderList } from "./manager";
