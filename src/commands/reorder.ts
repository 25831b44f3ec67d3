import { loadConfig, resolveOrderOptions } from "../lib/config";
import { loadDocument, saveDocument } from "../lib/document";
import { UsageError } from "../lib/errors";
import { readOrderList } from "../lib/order";
import { requireFile } from "../lib/paths";
import {
  describeSection,
  formatNotices,
  locateRules,
  reorderEntries,
  type ReorderReport,
  type Target,
} from "../lib/policy";

export interface ReorderOptions {
  target?: string;
  useShared?: boolean;
  delimiter?: string;
  skipHeader?: boolean;
  config?: string;
}

/**
 * Fold the two selector flags into one Target
 */
export function resolveTarget(options: Pick<ReorderOptions, "target" | "useShared">): Target {
  if (options.useShared && options.target !== undefined) {
    throw new UsageError("--target and --use-shared cannot be used together.");
  }
  if (options.useShared) {
    return { kind: "shared" };
  }
  if (options.target !== undefined && options.target !== "") {
    return { kind: "device-group", name: options.target };
  }
  throw new UsageError("You must specify a device group with --target, or use --use-shared.");
}

export async function reorder(
  inputPath: string,
  orderPath: string,
  outputPath: string,
  options: ReorderOptions = {}
): Promise<ReorderReport> {
  await requireFile("XML file", inputPath);
  await requireFile("CSV file", orderPath);

  const target = resolveTarget(options);

  const config = await loadConfig(options.config);
  const orderOptions = resolveOrderOptions(config, {
    delimiter: options.delimiter,
    skipHeader: options.skipHeader,
  });

  const document = await loadDocument(inputPath);
  const section = locateRules(document, target);
  console.log(describeSection(section));

  const order = await readOrderList(orderPath, orderOptions);
  const report = reorderEntries(section.container, order, document.names);

  for (const line of formatNotices(report)) {
    console.log(line);
  }

  await saveDocument(outputPath, document);
  console.log(`Reordered XML written to: ${outputPath}`);

  return report;
}
