// Types
export type {
  ConfigDocument,
  NameStrategy,
  XmlCData,
  XmlComment,
  XmlElement,
  XmlInstruction,
  XmlNode,
  XmlText,
} from "./types";

// Parser
export { parseDocument, createNameStrategy, isElement, decodeEntities, extractDoctype } from "./parser";

// Serializer
export { serializeDocument, XML_DECLARATION } from "./serializer";

// Manager
export { loadDocument, saveDocument } from "./manager";
