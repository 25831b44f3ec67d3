import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { join } from "path";
import { tmpdir } from "os";
import { mkdir, readFile, rm, writeFile } from "fs/promises";
import { createProgram } from "../program";
import { parseDocument } from "../lib/document";
import { getName, locateRules, type Target } from "../lib/policy";
import { fileExists } from "../lib/paths";
import {
  DuplicateNameError,
  FileNotFoundError,
  GroupNotFoundError,
  TargetNotFoundError,
  UsageError,
} from "../lib/errors";
import { reorder, resolveTarget } from "./reorder";

const RUNNING_CONFIG = `<?xml version="1.0"?>
<config version="10.1.0">
  <devices>
    <entry name="localhost.localdomain">
      <device-group>
        <entry name="branch">
          <post-rulebase>
            <security>
              <rules>
                <entry name="allow-dns"><action>allow</action></entry>
                <entry name="allow-web"><action>allow</action></entry>
                <entry name="allow-mail"><action>allow</action></entry>
                <entry name="deny-all"><action>deny</action></entry>
              </rules>
            </security>
          </post-rulebase>
        </entry>
        <entry name="datacenter">
          <pre-rulebase>
            <security>
              <rules>
                <entry name="dc-ssh"><action>allow</action></entry>
                <entry name="dc-db"><action>allow</action></entry>
              </rules>
            </security>
          </pre-rulebase>
        </entry>
      </device-group>
    </entry>
  </devices>
</config>
`;

function namesIn(xml: string, target: Target): string[] {
  const { container } = locateRules(parseDocument(xml), target);
  return container.children.flatMap((node) => (node.type === "element" ? [getName(node) ?? ""] : []));
}

function run(...args: string[]) {
  return createProgram()
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} })
    .parseAsync(["node", "policy-order", ...args]);
}

describe("policy-order CLI", () => {
  let testDir: string;
  let inputPath: string;
  let orderPath: string;
  let outputPath: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    testDir = join(tmpdir(), `policy-order-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    inputPath = join(testDir, "running.xml");
    orderPath = join(testDir, "order.csv");
    outputPath = join(testDir, "out.xml");
    await writeFile(inputPath, RUNNING_CONFIG);
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    log.mockRestore();
    await rm(testDir, { recursive: true, force: true });
  });

  test("reorders a device group and appends unlisted policies", async () => {
    await writeFile(orderPath, "deny-all,last resort\nallow-mail,mail\n");
    await run(inputPath, orderPath, outputPath, "--target", "branch");

    const output = await readFile(outputPath, "utf-8");
    expect(namesIn(output, { kind: "device-group", name: "branch" })).toEqual([
      "deny-all",
      "allow-mail",
      "allow-dns",
      "allow-web",
    ]);
    expect(log).toHaveBeenCalledWith("Using post-rulebase rules for device group 'branch'");
    expect(log).toHaveBeenCalledWith(
      "Note: the following policies were not in the CSV and will be added at the end:"
    );
    expect(log).toHaveBeenCalledWith("    - allow-dns");
    expect(log).toHaveBeenCalledWith(`Reordered XML written to: ${outputPath}`);
  });

  test("leaves other device groups untouched", async () => {
    await writeFile(orderPath, "deny-all\n");
    await run(inputPath, orderPath, outputPath, "--target", "branch");

    const output = await readFile(outputPath, "utf-8");
    expect(namesIn(output, { kind: "device-group", name: "datacenter" })).toEqual(["dc-ssh", "dc-db"]);
  });

  test("warns about listed policies that do not exist", async () => {
    await writeFile(orderPath, "dc-db\nghost\ndc-ssh\n");
    await run(inputPath, orderPath, outputPath, "--target", "datacenter");

    const output = await readFile(outputPath, "utf-8");
    expect(namesIn(output, { kind: "device-group", name: "datacenter" })).toEqual(["dc-db", "dc-ssh"]);
    expect(output).not.toContain("ghost");
    expect(log).toHaveBeenCalledWith("Fallback: using pre-rulebase rules for device group 'datacenter'");
    expect(log).toHaveBeenCalledWith("Warning: policy 'ghost' not found in the XML.");
  });

  test("produces identical output on repeated runs", async () => {
    await writeFile(orderPath, "allow-web\nallow-dns\n");
    const secondPath = join(testDir, "out-2.xml");
    await run(inputPath, orderPath, outputPath, "--target", "branch");
    await run(inputPath, orderPath, secondPath, "--target", "branch");

    expect(await readFile(secondPath, "utf-8")).toBe(await readFile(outputPath, "utf-8"));
  });

  test("lists device groups without reading the order list or writing output", async () => {
    await run(inputPath, join(testDir, "missing.csv"), outputPath, "--list-targets");

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      "Available device groups in XML:",
      "  - branch",
      "  - datacenter",
    ]);
    expect(await fileExists(outputPath)).toBe(false);
  });

  test("lists device groups with only the input path", async () => {
    await run(inputPath, "--list-targets");
    expect(log).toHaveBeenCalledWith("  - datacenter");
  });

  test("says so when there are no device groups", async () => {
    await writeFile(inputPath, "<config><shared/></config>");
    await run(inputPath, "--list-targets");
    expect(log).toHaveBeenCalledWith("  (no device groups found)");
  });

  test("fails for an unknown device group", async () => {
    await writeFile(orderPath, "a\n");
    await expect(run(inputPath, orderPath, outputPath, "--target", "nowhere")).rejects.toThrow(
      GroupNotFoundError
    );
    expect(await fileExists(outputPath)).toBe(false);
  });

  test("fails in shared mode when shared has no security rules", async () => {
    await writeFile(orderPath, "a\n");
    await expect(run(inputPath, orderPath, outputPath, "--use-shared")).rejects.toThrow(
      TargetNotFoundError
    );
  });

  test("fails when the order list is missing", async () => {
    await expect(run(inputPath, orderPath, outputPath, "--target", "branch")).rejects.toThrow(
      `CSV file not found: ${orderPath}`
    );
  });

  test("fails when the input document is missing", async () => {
    await writeFile(orderPath, "a\n");
    const missing = join(testDir, "nope.xml");
    await expect(run(missing, orderPath, outputPath, "--target", "branch")).rejects.toThrow(
      FileNotFoundError
    );
  });

  test("checks the input file before the target flags", async () => {
    await writeFile(orderPath, "a\n");
    await expect(run(join(testDir, "nope.xml"), orderPath, outputPath)).rejects.toThrow(
      FileNotFoundError
    );
  });

  test("requires the order list and output path outside list mode", async () => {
    await expect(run(inputPath, "--target", "branch")).rejects.toThrow(UsageError);
  });

  test("rejects --target together with --use-shared", async () => {
    await writeFile(orderPath, "a\n");
    await expect(
      run(inputPath, orderPath, outputPath, "--target", "branch", "--use-shared")
    ).rejects.toMatchObject({ code: "commander.conflictingOption" });
  });

  test("reads CSV settings from a config file", async () => {
    const configPath = join(testDir, "settings.json");
    await writeFile(configPath, JSON.stringify({ delimiter: ";", skipHeader: true }));
    await writeFile(orderPath, "policy;note\nallow-mail;x\nallow-dns;y\n");
    await run(inputPath, orderPath, outputPath, "--target", "branch", "--config", configPath);

    const output = await readFile(outputPath, "utf-8");
    expect(namesIn(output, { kind: "device-group", name: "branch" })).toEqual([
      "allow-mail",
      "allow-dns",
      "allow-web",
      "deny-all",
    ]);
  });
});

describe("reorder", () => {
  let testDir: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    testDir = join(tmpdir(), `policy-order-reorder-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    log.mockRestore();
    await rm(testDir, { recursive: true, force: true });
  });

  test("returns the report for the shared section", async () => {
    const inputPath = join(testDir, "in.xml");
    const orderPath = join(testDir, "order.csv");
    await writeFile(
      inputPath,
      '<config><shared><post-rulebase><security><rules><entry name="x"/><entry name="y"/><entry name="z"/></rules></security></post-rulebase></shared></config>'
    );
    await writeFile(orderPath, "z\ny\nx\n");

    const report = await reorder(inputPath, orderPath, join(testDir, "out.xml"), { useShared: true });
    expect(report.before).toEqual(["x", "y", "z"]);
    expect(report.after).toEqual(["z", "y", "x"]);
    expect(await readFile(join(testDir, "out.xml"), "utf-8")).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
        '<config><shared><post-rulebase><security><rules><entry name="z"/><entry name="y"/><entry name="x"/></rules></security></post-rulebase></shared></config>\n'
    );
  });

  test("refuses to write when the section has duplicate names", async () => {
    const inputPath = join(testDir, "in.xml");
    const orderPath = join(testDir, "order.csv");
    const outputPath = join(testDir, "out.xml");
    await writeFile(
      inputPath,
      '<config><shared><post-rulebase><security><rules><entry name="x"/><entry name="x"/></rules></security></post-rulebase></shared></config>'
    );
    await writeFile(orderPath, "x\n");

    await expect(reorder(inputPath, orderPath, outputPath, { useShared: true })).rejects.toThrow(
      DuplicateNameError
    );
    expect(await fileExists(outputPath)).toBe(false);
  });
});

describe("resolveTarget", () => {
  test("builds a shared target", () => {
    expect(resolveTarget({ useShared: true })).toEqual({ kind: "shared" });
  });

  test("builds a device-group target", () => {
    expect(resolveTarget({ target: "branch" })).toEqual({ kind: "device-group", name: "branch" });
  });

  test("rejects both selectors at once", () => {
    expect(() => resolveTarget({ target: "branch", useShared: true })).toThrow(UsageError);
  });

  test("rejects neither selector", () => {
    expect(() => resolveTarget({})).toThrow(
      "You must specify a device group with --target, or use --use-shared."
    );
  });
});
