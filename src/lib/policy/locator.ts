/**
 * Section locator - finds the <rules> container for a target.
 *
 * Paths mirror the PAN-OS layout:
 *   shared/{post,pre}-rulebase/security/rules
 *   device-group/entry[@name]/{post,pre}-rulebase/security/rules
 * Both are searched anywhere below the root element.
 */

import { decodeEntities, isElement, type ConfigDocument, type NameStrategy, type XmlElement } from "../document";
import { GroupNotFoundError, TargetNotFoundError } from "../errors";
import type { Rulebase, RulesSection, Target } from "./types";

const RULEBASES: Rulebase[] = ["post-rulebase", "pre-rulebase"];
const SECURITY_RULES = ["security", "rules"];

function childElements(element: XmlElement): XmlElement[] {
  return element.children.filter(isElement);
}

/** All descendants of `element` (not itself) in document order */
function* descendants(element: XmlElement): Generator<XmlElement> {
  for (const child of childElements(element)) {
    yield child;
    yield* descendants(child);
  }
}

/** Every element reached by following `path` child by child */
function* followPath(element: XmlElement, path: string[]): Generator<XmlElement> {
  if (path.length === 0) {
    yield element;
    return;
  }
  const [head, ...rest] = path;
  for (const child of childElements(element)) {
    if (child.name === head) {
      yield* followPath(child, rest);
    }
  }
}

/** Equivalent of `.//a/b/c`: matches below `element`, in document order */
function* findAll(element: XmlElement, path: string[]): Generator<XmlElement> {
  const [head, ...rest] = path;
  for (const candidate of descendants(element)) {
    if (candidate.name === head) {
      yield* followPath(candidate, rest);
    }
  }
}

function first<T>(items: Iterable<T>): T | undefined {
  for (const item of items) {
    return item;
  }
  return undefined;
}

function qualifyAll(names: NameStrategy, path: string[]): string[] {
  return path.map((local) => names.qualify(local));
}

/** The element's `name` attribute, entity references decoded */
export function getName(element: XmlElement): string | undefined {
  const raw = element.attributes["name"];
  return raw === undefined ? undefined : decodeEntities(raw);
}

function findDeviceGroup(document: ConfigDocument, name: string): XmlElement | undefined {
  const path = qualifyAll(document.names, ["device-group", "entry"]);
  for (const entry of findAll(document.root, path)) {
    if (getName(entry) === name) {
      return entry;
    }
  }
  return undefined;
}

/**
 * Locate the rules container for a target, preferring post-rulebase
 */
export function locateRules(document: ConfigDocument, target: Target): RulesSection {
  const { names, root } = document;

  if (target.kind === "shared") {
    for (const rulebase of RULEBASES) {
      const path = qualifyAll(names, ["shared", rulebase, ...SECURITY_RULES]);
      const container = first(findAll(root, path));
      if (container) {
        return { container, rulebase, target };
      }
    }
    throw new TargetNotFoundError("Shared security rules not found in pre- or post-rulebase.");
  }

  const group = findDeviceGroup(document, target.name);
  if (!group) {
    throw new GroupNotFoundError(target.name);
  }

  for (const rulebase of RULEBASES) {
    const container = first(followPath(group, qualifyAll(names, [rulebase, ...SECURITY_RULES])));
    if (container) {
      return { container, rulebase, target };
    }
  }
  throw new TargetNotFoundError(
    `Security rules not found in pre- or post-rulebase for device group '${target.name}'.`
  );
}

/**
 * Names of every device group in the document, in document order
 */
export function listDeviceGroups(document: ConfigDocument): string[] {
  const path = qualifyAll(document.names, ["device-group", "entry"]);
  const groups: string[] = [];
  for (const entry of findAll(document.root, path)) {
    const name = getName(entry);
    if (name !== undefined) {
      groups.push(name);
    }
  }
  return groups;
}
