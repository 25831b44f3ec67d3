/**
 * Document parser - turns configuration XML into a typed node tree.
 *
 * Uses fast-xml-parser in preserveOrder mode so that sibling order, whitespace,
 * comments and CDATA survive a parse/serialize round trip.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { InvalidDocumentError } from "../errors";
import type { ConfigDocument, NameStrategy, XmlElement, XmlNode } from "./types";

export const ATTRIBUTE_PREFIX = "@_";
export const TEXT_NODE = "#text";
export const COMMENT_NODE = "#comment";
export const CDATA_NODE = "#cdata";
export const ATTRIBUTES_KEY = ":@";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  commentPropName: COMMENT_NODE,
  cdataPropName: CDATA_NODE,
  ignoreDeclaration: true,
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  processEntities: false,
});

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

/**
 * Decode the predefined XML entities and character references.
 * Text in the tree stays escaped as written; decode only to compare values.
 */
export function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z]+);/g, (match, ref: string) => {
    if (ref.startsWith("#")) {
      const code = ref.startsWith("#x") ? parseInt(ref.slice(2), 16) : parseInt(ref.slice(1), 10);
      return code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[ref] ?? match;
  });
}

/**
 * The `<!DOCTYPE ...>` declaration as written, internal subset included.
 * The tree library drops it, so it is carried beside the tree.
 */
export function extractDoctype(xml: string): string | null {
  const start = xml.indexOf("<!DOCTYPE");
  if (start === -1) {
    return null;
  }

  let inSubset = false;
  for (let i = start + "<!DOCTYPE".length; i < xml.length; i++) {
    const char = xml[i];
    if (char === "[") inSubset = true;
    else if (char === "]") inSubset = false;
    else if (char === ">" && !inSubset) return xml.slice(start, i + 1);
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }

  for (const [key, raw] of Object.entries(value)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      attributes[key.slice(ATTRIBUTE_PREFIX.length)] = String(raw);
    }
  }
  return attributes;
}

/** Concatenate the #text children of a comment or CDATA wrapper */
function innerText(value: unknown): string {
  if (!Array.isArray(value)) {
    return "";
  }
  let text = "";
  for (const item of value) {
    if (isRecord(item) && TEXT_NODE in item) {
      text += String(item[TEXT_NODE]);
    }
  }
  return text;
}

/**
 * Convert fast-xml-parser's preserveOrder structure to XmlNode[].
 */
function convertOrdered(items: unknown): XmlNode[] {
  const nodes: XmlNode[] = [];
  if (!Array.isArray(items)) {
    return nodes;
  }

  for (const item of items) {
    if (!isRecord(item)) continue;

    const tag = Object.keys(item).find((key) => key !== ATTRIBUTES_KEY);
    if (tag === undefined) continue;
    const value = item[tag];

    if (tag === TEXT_NODE) {
      nodes.push({ type: "text", value: String(value) });
    } else if (tag === COMMENT_NODE) {
      nodes.push({ type: "comment", value: innerText(value) });
    } else if (tag === CDATA_NODE) {
      nodes.push({ type: "cdata", value: innerText(value) });
    } else if (tag.startsWith("?")) {
      nodes.push({
        type: "instruction",
        name: tag.slice(1),
        attributes: readAttributes(item[ATTRIBUTES_KEY]),
      });
    } else {
      nodes.push({
        type: "element",
        name: tag,
        attributes: readAttributes(item[ATTRIBUTES_KEY]),
        children: convertOrdered(value),
      });
    }
  }

  return nodes;
}

/**
 * Pick the lookup strategy from the root tag: a prefixed root (`p:config`)
 * qualifies every local name with the same prefix.
 */
export function createNameStrategy(rootName: string): NameStrategy {
  const colon = rootName.indexOf(":");
  const prefix = colon > 0 ? rootName.slice(0, colon) : null;

  return {
    prefix,
    qualify: (local) => (prefix === null ? local : `${prefix}:${local}`),
  };
}

export function isElement(node: XmlNode): node is XmlElement {
  return node.type === "element";
}

/**
 * Parse XML text into a ConfigDocument
 */
export function parseDocument(xml: string): ConfigDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new InvalidDocumentError(`Malformed XML at line ${line}, column ${col}: ${msg}`);
  }

  const nodes = convertOrdered(parser.parse(xml));
  const root = nodes.find(isElement);
  if (!root) {
    throw new InvalidDocumentError("XML document has no root element.");
  }

  return {
    nodes,
    root,
    names: createNameStrategy(root.name),
    doctype: extractDoctype(xml),
  };
}
