import type { Rule, ServiceLine } from "../types/rule.js";

export type InsertPosition = "start" | "end";

/**
 * Insert a rule. "end" appends after every existing line; "start" goes in front of
 * the first stack entry (rule or @include) so header comments stay on top.
 * Returns a new line list.
 */
export function insertRule(lines: readonly ServiceLine[], rule: Rule, position: InsertPosition = "end"): ServiceLine[] {
  const added: ServiceLine = { kind: "rule", rule };
  if (position === "end") return [...lines, added];

  const firstEntry = lines.findIndex((line) => line.kind === "rule" || line.kind === "include");
  if (firstEntry === -1) return [...lines, added];
  return [...lines.slice(0, firstEntry), added, ...lines.slice(firstEntry)];
}

export interface RemovalResult {
  lines: ServiceLine[];
  removed: Rule[];
}

/** Drop every rule whose module field is exactly `module`; other lines keep their order. */
export function removeRulesByModule(lines: readonly ServiceLine[], module: string): RemovalResult {
  const kept: ServiceLine[] = [];
  const removed: Rule[] = [];
  for (const line of lines) {
    if (line.kind === "rule" && line.rule.module === module) {
      removed.push(line.rule);
    } else {
      kept.push(line);
    }
  }
  return { lines: kept, removed };
}
