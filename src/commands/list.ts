import { loadDocument } from "../lib/document";
import { listDeviceGroups } from "../lib/policy";

export async function listTargets(inputPath: string): Promise<string[]> {
  const document = await loadDocument(inputPath);
  const groups = listDeviceGroups(document);

  console.log("Available device groups in XML:");
  if (groups.length === 0) {
    console.log("  (no device groups found)");
  }
  for (const group of groups) {
    console.log(`  - ${group}`);
  }

  return groups;
}
