/** PAM management groups, in the order they usually appear in a stack. */
export const RULE_TYPES = ["auth", "account", "password", "session"] as const;
export type RuleType = (typeof RULE_TYPES)[number];

/** Single-word control flags understood by Linux-PAM. */
export const CONTROL_KEYWORDS = ["required", "requisite", "sufficient", "optional", "include", "substack"] as const;
export type ControlKeyword = (typeof CONTROL_KEYWORDS)[number];

/** One rule of a service's stack: `type control module [args...]`. */
export interface Rule {
  type: RuleType;
  /** Keyword or bracketed `[value=action ...]` expression, kept verbatim. */
  control: string;
  module: string;
  args: string[];
  /** Set for `-type` lines: PAM stays quiet when the module cannot be loaded. */
  silentIfMissing?: true;
}

/** A line of a service file as it sits on disk. */
export type ServiceLine =
  | { kind: "rule"; rule: Rule; raw?: string }
  | { kind: "include"; target: string; raw: string }
  | { kind: "comment"; raw: string }
  | { kind: "blank"; raw: string }
  | { kind: "invalid"; raw: string };

/** Non-fatal problem found while parsing; the offending line is kept as-is. */
export interface ParseWarning {
  line: number;
  reason: string;
  text: string;
}

export interface ServiceFile {
  name: string;
  path: string;
  lines: ServiceLine[];
  rules: Rule[];
  warnings: ParseWarning[];
}
