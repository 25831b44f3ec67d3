import type { ReorderReport, RulesSection, Target } from "./types";

export function describeTarget(target: Target): string {
  return target.kind === "shared" ? "shared" : `device group '${target.name}'`;
}

/**
 * Which rulebase was picked, and whether that was the fallback
 */
export function describeSection(section: RulesSection): string {
  const where = describeTarget(section.target);
  return section.rulebase === "post-rulebase"
    ? `Using post-rulebase rules for ${where}`
    : `Fallback: using pre-rulebase rules for ${where}`;
}

/**
 * Notice lines for a finished reorder, in the order they should be shown
 */
export function formatNotices(report: ReorderReport): string[] {
  const lines: string[] = [];

  for (const name of report.missing) {
    lines.push(`Warning: policy '${name}' not found in the XML.`);
  }

  if (report.repeated.length > 0) {
    lines.push("Note: the following policies are listed more than once; the first position is used:");
    for (const name of report.repeated) {
      lines.push(`    - ${name}`);
    }
  }

  if (report.appended.length > 0) {
    lines.push("Note: the following policies were not in the CSV and will be added at the end:");
    for (const name of report.appended) {
      lines.push(`    - ${name}`);
    }
  }

  return lines;
}
