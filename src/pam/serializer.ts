import type { Rule, ServiceLine } from "../types/rule.js";

export function serializeRule(rule: Rule): string {
  const type = rule.silentIfMissing ? `-${rule.type}` : rule.type;
  return [type, rule.control, rule.module, ...rule.args].join(" ");
}

/** One line per rule, each newline-terminated. */
export function serializeRules(rules: readonly Rule[]): string {
  return rules.map((rule) => `${serializeRule(rule)}\n`).join("");
}

/** Write a whole file back; lines read from disk keep their original text. */
export function serializeServiceFile(lines: readonly ServiceLine[]): string {
  return lines
    .map((line) => {
      const text = line.kind === "rule" ? line.raw ?? serializeRule(line.rule) : line.raw;
      return `${text}\n`;
    })
    .join("");
}
