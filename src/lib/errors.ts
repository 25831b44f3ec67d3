/**
 * Error taxonomy for policy-order.
 *
 * Every failure the CLI reports is one of these. The CLI prints the message
 * and exits 1; nothing is retried.
 */

export type ErrorCode =
  | "FILE_NOT_FOUND"
  | "GROUP_NOT_FOUND"
  | "TARGET_NOT_FOUND"
  | "FORMAT_ERROR"
  | "INVALID_DOCUMENT"
  | "DUPLICATE_NAME"
  | "OUTPUT_ERROR"
  | "CONFIG_ERROR"
  | "USAGE_ERROR";

export class PolicyOrderError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FileNotFoundError extends PolicyOrderError {
  readonly path: string;

  constructor(kind: string, path: string) {
    super("FILE_NOT_FOUND", `${kind} not found: ${path}`);
    this.path = path;
  }
}

/** Base for section lookup failures */
export class NotFoundError extends PolicyOrderError {}

export class GroupNotFoundError extends NotFoundError {
  readonly group: string;

  constructor(group: string) {
    super("GROUP_NOT_FOUND", `Device group '${group}' not found.`);
    this.group = group;
  }
}

export class TargetNotFoundError extends NotFoundError {
  constructor(message: string) {
    super("TARGET_NOT_FOUND", message);
  }
}

export class FormatError extends PolicyOrderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FORMAT_ERROR", message, options);
  }
}

export class InvalidDocumentError extends PolicyOrderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_DOCUMENT", message, options);
  }
}

export class DuplicateNameError extends PolicyOrderError {
  readonly names: string[];

  constructor(names: string[]) {
    const quoted = names.map((n) => `'${n}'`).join(", ");
    super("DUPLICATE_NAME", `Duplicate rule names in target section: ${quoted}`);
    this.names = names;
  }
}

export class OutputError extends PolicyOrderError {
  constructor(path: string, cause: unknown) {
    const code = getErrorCode(cause);
    super("OUTPUT_ERROR", `Could not write ${path}${code ? ` (${code})` : ""}`, { cause });
  }
}

export class ConfigError extends PolicyOrderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
  }
}

export class UsageError extends PolicyOrderError {
  constructor(message: string) {
    super("USAGE_ERROR", message);
  }
}

/**
 * Get the system error code (ENOENT, EACCES, ...) from an error or its cause.
 */
export function getErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  while (current instanceof Error) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
