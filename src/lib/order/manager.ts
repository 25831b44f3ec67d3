import { readFile } from "fs/promises";
import { FileNotFoundError, FormatError, getErrorCode } from "../errors";
import { parseOrderList } from "./parser";
import { DEFAULT_ORDER_OPTIONS, type OrderListOptions } from "./types";

/**
 * Read the desired policy order from a CSV file
 */
export async function readOrderList(
  path: string,
  options: OrderListOptions = DEFAULT_ORDER_OPTIONS
): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      throw new FileNotFoundError("CSV file", path);
    }
    throw new FormatError(`Could not read ${path}`, { cause: error });
  }

  return parseOrderList(content, options);
}
