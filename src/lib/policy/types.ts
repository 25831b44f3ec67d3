import type { XmlElement } from "../document";

/** Which section of the configuration to reorder */
export type Target = { kind: "shared" } | { kind: "device-group"; name: string };

export type Rulebase = "post-rulebase" | "pre-rulebase";

export interface RulesSection {
  container: XmlElement;
  rulebase: Rulebase;
  target: Target;
}

export interface ReorderReport {
  /** Entry names in document order before reordering */
  before: string[];
  after: string[];
  /** Listed names with no entry in the section */
  missing: string[];
  /** Names listed more than once; only the first position is used */
  repeated: string[];
  /** Entries not in the list, moved to the end in their original order */
  appended: string[];
}
