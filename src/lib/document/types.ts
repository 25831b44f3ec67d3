export interface XmlElement {
  type: "element";
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export interface XmlText {
  type: "text";
  value: string;
}

export interface XmlComment {
  type: "comment";
  value: string;
}

export interface XmlCData {
  type: "cdata";
  value: string;
}

export interface XmlInstruction {
  type: "instruction";
  name: string;
  attributes: Record<string, string>;
}

export type XmlNode = XmlElement | XmlText | XmlComment | XmlCData | XmlInstruction;

/**
 * Resolves local element names against the document's namespace prefix.
 * Chosen once when the document is parsed.
 */
export interface NameStrategy {
  prefix: string | null;
  qualify(local: string): string;
}

export interface ConfigDocument {
  /** Top-level nodes, declaration excluded */
  nodes: XmlNode[];
  root: XmlElement;
  names: NameStrategy;
  /** DOCTYPE declaration as written in the source, if any */
  doctype: string | null;
}
