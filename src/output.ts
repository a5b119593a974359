import type { ActionResult } from "./manager.js";
import { serializeRule } from "./pam/serializer.js";

export function formatJson(result: ActionResult): string {
  return JSON.stringify(result, null, 2);
}

export function formatText(result: ActionResult): string {
  switch (result.action) {
    case "list":
      if (result.services.length === 0) return `No PAM services found in ${result.pamDir}`;
      return [`Available PAM services in ${result.pamDir}:`, ...result.services.map((s) => `  - ${s}`)].join("\n");
    case "show":
      if (result.rules.length === 0) return `Rules for ${result.service}:\n  (no rules)`;
      return [`Rules for ${result.service}:`, ...result.rules.map((r) => `  ${serializeRule(r)}`)].join("\n");
    case "add":
      return `Rule added to ${result.service}: ${serializeRule(result.rule)}\nBackup: ${result.backupPath}`;
    case "remove": {
      const noun = result.removed.length === 1 ? "rule" : "rules";
      return `Removed ${result.removed.length} ${noun} with module ${result.module} from ${result.service}\nBackup: ${result.backupPath}`;
    }
    case "backup":
      return result.created
        ? `Snapshot created at ${result.snapshotDir}`
        : `Snapshot already exists at ${result.snapshotDir}`;
    case "restore":
      return `Configuration restored from ${result.snapshotDir}`;
  }
}
