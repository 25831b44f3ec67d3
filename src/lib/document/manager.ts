import { readFile, writeFile } from "fs/promises";
import { FileNotFoundError, InvalidDocumentError, OutputError, getErrorCode } from "../errors";
import { parseDocument } from "./parser";
import { serializeDocument } from "./serializer";
import type { ConfigDocument } from "./types";

/**
 * Load and parse a configuration XML file
 */
export async function loadDocument(path: string): Promise<ConfigDocument> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      throw new FileNotFoundError("XML file", path);
    }
    throw new InvalidDocumentError(`Could not read ${path}`, { cause: error });
  }

  return parseDocument(content);
}

/**
 * Serialize a document and write it to disk
 */
export async function saveDocument(path: string, document: ConfigDocument): Promise<void> {
  const content = serializeDocument(document);
  try {
    await writeFile(path, content, "utf-8");
  } catch (error) {
    throw new OutputError(path, error);
  }
}
