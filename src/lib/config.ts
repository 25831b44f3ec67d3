import { readFile } from "fs/promises";
import { ConfigError, UsageError } from "./errors";
import { fileExists, getConfigPath, requireFile } from "./paths";
import { DEFAULT_ORDER_OPTIONS, type OrderListOptions } from "./order";

export interface PolicyOrderConfig {
  delimiter?: string;
  skipHeader?: boolean;
}

/** Order-list flags as given on the command line */
export interface OrderFlags {
  delimiter?: string;
  skipHeader?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateConfig(value: unknown, path: string): PolicyOrderConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${path}: expected a JSON object`);
  }

  const config: PolicyOrderConfig = {};
  const { delimiter, skipHeader } = value;

  if (delimiter !== undefined) {
    if (typeof delimiter !== "string") {
      throw new ConfigError(`${path}: "delimiter" must be a string`);
    }
    config.delimiter = delimiter;
  }

  if (skipHeader !== undefined) {
    if (typeof skipHeader !== "boolean") {
      throw new ConfigError(`${path}: "skipHeader" must be a boolean`);
    }
    config.skipHeader = skipHeader;
  }

  return config;
}

/**
 * Load config from an explicit path, or from .policy-order.json in `base` if
 * it exists. No file means an empty config.
 */
export async function loadConfig(
  explicitPath?: string,
  base: string = process.cwd()
): Promise<PolicyOrderConfig> {
  let path: string;
  if (explicitPath !== undefined) {
    await requireFile("Config file", explicitPath);
    path = explicitPath;
  } else {
    path = getConfigPath(base);
    if (!(await fileExists(path))) {
      return {};
    }
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Could not read config ${path}`, { cause: error });
  }

  return validateConfig(parsed, path);
}

function normalizeDelimiter(raw: string): string {
  const delimiter = raw === "\\t" || raw === "tab" ? "\t" : raw;
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === "\n" || delimiter === "\r") {
    throw new UsageError(`Invalid delimiter '${raw}': expected a single character other than a quote or newline.`);
  }
  return delimiter;
}

/**
 * Merge order-list settings: flag, then config file, then default
 */
export function resolveOrderOptions(
  config: PolicyOrderConfig,
  flags: OrderFlags = {}
): OrderListOptions {
  const delimiter = flags.delimiter ?? config.delimiter ?? DEFAULT_ORDER_OPTIONS.delimiter;
  return {
    delimiter: normalizeDelimiter(delimiter),
    skipHeader: flags.skipHeader ?? config.skipHeader ?? DEFAULT_ORDER_OPTIONS.skipHeader,
  };
}
