import { isElement, type NameStrategy, type XmlElement, type XmlNode } from "../document";
import { DuplicateNameError, InvalidDocumentError } from "../errors";
import { getName } from "./locator";
import type { ReorderReport } from "./types";

interface NamedEntry {
  name: string;
  entry: XmlElement;
}

function collectEntries(entries: XmlElement[]): NamedEntry[] {
  const named: NamedEntry[] = [];
  const seen = new Set<string>();
  const duplicates: string[] = [];

  entries.forEach((entry, index) => {
    const name = getName(entry);
    if (name === undefined) {
      throw new InvalidDocumentError(`Rule entry #${index + 1} has no name attribute.`);
    }
    if (seen.has(name)) {
      if (!duplicates.includes(name)) duplicates.push(name);
      return;
    }
    seen.add(name);
    named.push({ name, entry });
  });

  if (duplicates.length > 0) {
    throw new DuplicateNameError(duplicates);
  }
  return named;
}

/**
 * Reorder the <entry> children of a rules container to follow `order`.
 *
 * Listed entries come first in list order, unlisted ones follow in their
 * original order. Non-entry children (whitespace, comments) keep their
 * positions; only the entry slots are refilled. The container is left
 * untouched if any check fails.
 */
export function reorderEntries(
  container: XmlElement,
  order: string[],
  names: NameStrategy
): ReorderReport {
  const entryTag = names.qualify("entry");
  const isEntry = (node: XmlNode): node is XmlElement => isElement(node) && node.name === entryTag;

  const named = collectEntries(container.children.filter(isEntry));
  const byName = new Map(named.map((n) => [n.name, n]));

  const listed = new Set<string>();
  const ordered: NamedEntry[] = [];
  const missing: string[] = [];
  const repeated: string[] = [];

  for (const name of order) {
    if (listed.has(name)) {
      if (!repeated.includes(name)) repeated.push(name);
      continue;
    }
    listed.add(name);

    const found = byName.get(name);
    if (found) {
      ordered.push(found);
    } else {
      missing.push(name);
    }
  }

  const remaining = named.filter((n) => !listed.has(n.name));
  const sequence = [...ordered, ...remaining];

  let slot = 0;
  container.children = container.children.map((node) =>
    isEntry(node) ? sequence[slot++].entry : node
  );

  return {
    before: named.map((n) => n.name),
    after: sequence.map((n) => n.name),
    missing,
    repeated,
    appended: remaining.map((n) => n.name),
  };
}
