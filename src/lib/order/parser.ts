/**
 * Order list parser - reads policy names from CSV text.
 *
 * Only the first field of each row matters. Quoting follows the usual
 * spreadsheet export: a field that starts with `"` runs to the next lone `"`,
 * and `""` inside it is a literal quote.
 */

import { FormatError } from "../errors";
import { DEFAULT_ORDER_OPTIONS, type OrderListOptions } from "./types";

const QUOTE = '"';

/**
 * Split CSV text into rows of fields
 */
export function parseCsvRows(text: string, delimiter: string = ","): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let quoteLine = 0;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === QUOTE) {
        if (text[i + 1] === QUOTE) {
          field += QUOTE;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === "\n") line++;
        field += char;
      }
      continue;
    }

    if (char === QUOTE && field === "") {
      inQuotes = true;
      quoteLine = line;
    } else if (char === delimiter) {
      row.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      line++;
    } else {
      field += char;
    }
  }

  if (inQuotes) {
    throw new FormatError(`Unterminated quoted field starting on line ${quoteLine}.`);
  }

  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

/**
 * Parse CSV text into the desired policy order: the trimmed first field of
 * every row, skipping rows where it is empty.
 */
export function parseOrderList(
  text: string,
  options: OrderListOptions = DEFAULT_ORDER_OPTIONS
): string[] {
  if (text.includes("\u0000")) {
    throw new FormatError("Order list contains NUL bytes; expected a text CSV file.");
  }

  const content = text.startsWith("\uFEFF") ? text.slice(1) : text;
  const names = parseCsvRows(content, options.delimiter)
    .map((row) => row[0].trim())
    .filter((name) => name.length > 0);

  return options.skipHeader ? names.slice(1) : names;
}
