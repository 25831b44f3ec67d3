import { XMLBuilder } from "fast-xml-parser";
import {
  ATTRIBUTE_PREFIX,
  ATTRIBUTES_KEY,
  CDATA_NODE,
  COMMENT_NODE,
  TEXT_NODE,
} from "./parser";
import type { ConfigDocument, XmlNode } from "./types";

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

type OrderedItem = Record<string, unknown>;

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  commentPropName: COMMENT_NODE,
  cdataPropName: CDATA_NODE,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  processEntities: false,
  format: false,
});

function prefixAttributes(attributes: Record<string, string>): Record<string, string> {
  const prefixed: Record<string, string> = {};
  for (const [key, value] of Object.entries(attributes)) {
    // values stay escaped as parsed; a single-quoted source value may hold a raw `"`
    prefixed[`${ATTRIBUTE_PREFIX}${key}`] = value.replace(/"/g, "&quot;");
  }
  return prefixed;
}

function withAttributes(item: OrderedItem, attributes: Record<string, string>): OrderedItem {
  if (Object.keys(attributes).length > 0) {
    item[ATTRIBUTES_KEY] = prefixAttributes(attributes);
  }
  return item;
}

/**
 * Convert XmlNode[] back to the preserveOrder structure XMLBuilder expects
 */
function toOrdered(nodes: XmlNode[]): OrderedItem[] {
  return nodes.map((node): OrderedItem => {
    switch (node.type) {
      case "text":
        return { [TEXT_NODE]: node.value };
      case "comment":
        return { [COMMENT_NODE]: [{ [TEXT_NODE]: node.value }] };
      case "cdata":
        return { [CDATA_NODE]: [{ [TEXT_NODE]: node.value }] };
      case "instruction":
        return withAttributes({ [`?${node.name}`]: [{ [TEXT_NODE]: "" }] }, node.attributes);
      case "element":
        return withAttributes({ [node.name]: toOrdered(node.children) }, node.attributes);
    }
  });
}

/**
 * Serialize a document with a fresh UTF-8 declaration.
 * Whitespace outside the root element is dropped; everything inside it,
 * entity and character references included, is written back as parsed.
 */
export function serializeDocument(document: ConfigDocument): string {
  const body: string = builder.build(toOrdered(document.nodes));
  const doctype = document.doctype === null ? "" : `${document.doctype}\n`;
  return `${XML_DECLARATION}\n${doctype}${body.trim()}\n`;
}
