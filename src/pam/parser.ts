// Service-file parser: turns PAM text into ServiceLines plus the rule stack.
// Every input line is kept (raw text included) so a rewrite only touches what changed.
// Malformed lines never abort parsing: they become "invalid" lines and a ParseWarning.
import { RULE_TYPES } from "../types/rule.js";
import type { Rule, RuleType, ServiceLine, ParseWarning } from "../types/rule.js";

export interface ParseResult {
  lines: ServiceLine[];
  rules: Rule[];
  warnings: ParseWarning[];
}

// A token is either a bracketed group (spaces allowed, `\]` escapes) or a run of non-space.
const TOKEN_PATTERN = /\[(?:\\\]|[^\]])*\]?|\S+/g;

/** Split one logical line into PAM fields. */
export function tokenize(text: string): string[] {
  return Array.from(text.matchAll(TOKEN_PATTERN), (m) => m[0]);
}

export function isRuleType(value: string): value is RuleType {
  return (RULE_TYPES as readonly string[]).includes(value);
}

export function parseServiceText(text: string): ParseResult {
  const lines: ServiceLine[] = [];
  const warnings: ParseWarning[] = [];

  for (const { raw, lineNumber } of logicalLines(text)) {
    const line = classifyLine(raw);
    if ("warning" in line) {
      warnings.push({ line: lineNumber, reason: line.warning, text: raw });
      lines.push({ kind: "invalid", raw });
    } else {
      lines.push(line);
    }
  }

  return { lines, rules: rulesOf(lines), warnings };
}

export function rulesOf(lines: readonly ServiceLine[]): Rule[] {
  const rules: Rule[] = [];
  for (const line of lines) {
    if (line.kind === "rule") rules.push(line.rule);
  }
  return rules;
}

/** Join backslash-continued physical lines; `raw` keeps the original newlines. */
function logicalLines(text: string): Array<{ raw: string; lineNumber: number }> {
  const physical = text.split("\n");
  if (physical[physical.length - 1] === "") physical.pop();

  const result: Array<{ raw: string; lineNumber: number }> = [];
  let pending: string[] = [];
  let startLine = 1;

  physical.forEach((line, index) => {
    if (pending.length === 0) startLine = index + 1;
    pending.push(line);
    if (!line.replace(/\r$/, "").endsWith("\\")) {
      result.push({ raw: pending.join("\n"), lineNumber: startLine });
      pending = [];
    }
  });
  // Continuation on the very last line: nothing left to join with.
  if (pending.length > 0) result.push({ raw: pending.join("\n"), lineNumber: startLine });

  return result;
}

function classifyLine(raw: string): ServiceLine | { warning: string } {
  const joined = raw.replace(/\\\r?\n/g, " ").replace(/\\\r?$/, "");
  const commentAt = joined.indexOf("#");
  const content = commentAt === -1 ? joined : joined.slice(0, commentAt);

  if (content.trim() === "") {
    return joined.trim() === "" ? { kind: "blank", raw } : { kind: "comment", raw };
  }

  const fields = tokenize(content);
  const first = fields[0] ?? "";

  if (first.startsWith("@")) {
    if (first === "@include" && fields.length === 2) {
      return { kind: "include", target: fields[1] ?? "", raw };
    }
    return { warning: `unsupported directive ${first}` };
  }

  if (fields.length < 3) {
    return { warning: `expected at least 3 fields (type, control, module), found ${fields.length}` };
  }

  const [typeField = "", control = "", module = "", ...args] = fields;
  const silentIfMissing = typeField.startsWith("-");
  const type = silentIfMissing ? typeField.slice(1) : typeField;

  if (!isRuleType(type)) {
    return { warning: `unknown rule type "${typeField}"` };
  }

  const rule: Rule = { type, control, module, args };
  if (silentIfMissing) rule.silentIfMissing = true;
  return { kind: "rule", rule, raw };
}
