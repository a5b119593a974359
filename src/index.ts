/**
 * pam-manager: parse, inspect and edit Linux PAM service files.
 * The CLI lives in cli.ts; everything it uses is exported here.
 */

export type { RuleType, ControlKeyword, Rule, ServiceLine, ParseWarning, ServiceFile, PamManagerConfig } from "./types/index.js";
export { RULE_TYPES, CONTROL_KEYWORDS } from "./types/index.js";

// Parsing and serialization
export { parseServiceText, tokenize, rulesOf, isRuleType } from "./pam/parser.js";
export type { ParseResult } from "./pam/parser.js";
export { serializeRule, serializeRules, serializeServiceFile } from "./pam/serializer.js";
export { insertRule, removeRulesByModule } from "./pam/document.js";
export type { InsertPosition, RemovalResult } from "./pam/document.js";
export { isValidControl, validateInput, ruleFromInput } from "./pam/validate.js";

// Filesystem
export { resolveDirectories, runningAsRoot } from "./store/directory.js";
export type { ResolvedDirectories, ResolveOptions } from "./store/directory.js";
export { backupFile, backupFileName, writeWithBackup, snapshotDirectory, restoreSnapshot } from "./store/backup.js";
export { ServiceStore } from "./store/service-store.js";

// Actions
export { PamManager, ACTIONS, MUTATING_ACTIONS } from "./manager.js";
export type { Action, ActionResult } from "./manager.js";
export { run, buildProgram } from "./program.js";
export type { CliIO } from "./program.js";
export { loadConfig, DEFAULT_CONFIG } from "./config/loader.js";

// Errors
export { PamError, PamErrorCode, EXIT_CODES, exitCodeFor } from "./shared/errors.js";
