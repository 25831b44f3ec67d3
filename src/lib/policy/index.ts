// Types
export type { Target, Rulebase, RulesSection, ReorderReport } from "./types";

// Locator
export { locateRules, listDeviceGroups, getName } from "./locator";

// Reordering
export { reorderEntries } from "./reorder";

// Report
export { describeTarget, describeSection, formatNotices } from "./report";
