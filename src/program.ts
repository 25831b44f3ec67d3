import { Command, Option } from "commander";
import { listTargets } from "./commands/list";
import { reorder, type ReorderOptions } from "./commands/reorder";
import { UsageError } from "./lib/errors";

interface CliOptions extends ReorderOptions {
  listTargets?: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("policy-order")
    .description(
      `Reorder Panorama security policies by CSV

Examples:
  policy-order running.xml order.csv out.xml --target branch-offices
  policy-order running.xml order.csv out.xml --use-shared
  policy-order running.xml --list-targets`
    )
    .version("0.1.0")
    .argument("<input-doc>", "Path to input Panorama XML")
    .argument("[order-list]", "CSV file with the desired policy order (first column)")
    .argument("[output-doc]", "Path to write the reordered XML")
    .option("--target <name>", "Device group to reorder")
    .addOption(
      new Option("--use-shared", "Reorder shared policies instead of a device group").conflicts(
        "target"
      )
    )
    .option("--list-targets", "List available device groups and exit")
    .option("--delimiter <char>", "CSV field delimiter (default: \",\")")
    .option("--skip-header", "Ignore the first row of the CSV")
    .option("--config <path>", "Config file (default: ./.policy-order.json)")
    .action(
      async (
        inputPath: string,
        orderPath: string | undefined,
        outputPath: string | undefined,
        options: CliOptions
      ) => {
        if (options.listTargets) {
          await listTargets(inputPath);
          return;
        }

        if (orderPath === undefined || outputPath === undefined) {
          throw new UsageError("<order-list> and <output-doc> are required unless --list-targets is given.");
        }

        await reorder(inputPath, orderPath, outputPath, options);
      }
    );

  return program;
}
