import { join } from "path";
import { access } from "fs/promises";
import { FileNotFoundError } from "./errors";

export const CONFIG_FILE = ".policy-order.json";

export function getConfigPath(base: string = process.cwd()): string {
  return join(base, CONFIG_FILE);
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Throw FileNotFoundError unless `path` exists
 */
export async function requireFile(kind: string, path: string): Promise<void> {
  if (!(await fileExists(path))) {
    throw new FileNotFoundError(kind, path);
  }
}
