export type { RuleType, ControlKeyword, Rule, ServiceLine, ParseWarning, ServiceFile } from "./rule.js";
export { RULE_TYPES, CONTROL_KEYWORDS } from "./rule.js";
export type { PamManagerConfig } from "./config.js";
