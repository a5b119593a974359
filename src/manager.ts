// PAM manager: one method per CLI action.
// Inputs arrive unvalidated (straight from the CLI) and go through the zod schemas in
// pam/validate.ts first; every mutating method writes via ServiceStore.save(), which
// always backs the file up before touching it.
import type { Rule, ParseWarning, ServiceFile } from "./types/rule.js";
import type { InsertPosition } from "./pam/document.js";
import { insertRule, removeRulesByModule } from "./pam/document.js";
import { AddInputSchema, RemoveInputSchema, ShowInputSchema, ruleFromInput, validateInput } from "./pam/validate.js";
import { snapshotDirectory, restoreSnapshot } from "./store/backup.js";
import type { ServiceStore } from "./store/service-store.js";
import type { ResolvedDirectories } from "./store/directory.js";
import { PamError, PamErrorCode } from "./shared/errors.js";
import { logger } from "./logger.js";

export const ACTIONS = ["list", "show", "add", "remove", "backup", "restore"] as const;
export type Action = (typeof ACTIONS)[number];

/** Actions that write to the PAM directory or next to it. */
export const MUTATING_ACTIONS: ReadonlySet<Action> = new Set<Action>(["add", "remove", "backup", "restore"]);

export interface ListResult {
  action: "list";
  pamDir: string;
  services: string[];
}

export interface ShowResult {
  action: "show";
  service: string;
  rules: Rule[];
  warnings: ParseWarning[];
}

export interface AddResult {
  action: "add";
  service: string;
  rule: Rule;
  position: InsertPosition;
  backupPath: string;
  ruleCount: number;
}

export interface RemoveResult {
  action: "remove";
  service: string;
  module: string;
  removed: Rule[];
  backupPath: string;
  ruleCount: number;
}

export interface BackupResult {
  action: "backup";
  snapshotDir: string;
  created: boolean;
}

export interface RestoreResult {
  action: "restore";
  snapshotDir: string;
  pamDir: string;
}

export type ActionResult = ListResult | ShowResult | AddResult | RemoveResult | BackupResult | RestoreResult;

export class PamManager {
  constructor(
    private readonly store: ServiceStore,
    private readonly dirs: ResolvedDirectories,
  ) {}

  async list(): Promise<ListResult> {
    const services = await this.store.listServices();
    return { action: "list", pamDir: this.dirs.pamDir, services };
  }

  async show(input: unknown): Promise<ShowResult> {
    const { service } = validateInput(ShowInputSchema, input);
    const file = await this.load(service);
    return { action: "show", service, rules: file.rules, warnings: file.warnings };
  }

  async add(input: unknown): Promise<AddResult> {
    const parsed = validateInput(AddInputSchema, input);
    const rule = ruleFromInput(parsed);
    const file = await this.load(parsed.service);

    const saved = await this.store.save(file, insertRule(file.lines, rule, parsed.position));
    logger.info({ service: parsed.service, position: parsed.position, rules: saved.file.rules.length }, "Rule added");
    return {
      action: "add",
      service: parsed.service,
      rule,
      position: parsed.position,
      backupPath: saved.write.backupPath,
      ruleCount: saved.file.rules.length,
    };
  }

  async remove(input: unknown): Promise<RemoveResult> {
    const { service, module } = validateInput(RemoveInputSchema, input);
    const file = await this.load(service);

    const { lines, removed } = removeRulesByModule(file.lines, module);
    if (removed.length === 0) {
      throw new PamError(PamErrorCode.NO_MATCH, `No rules found with module ${module} in ${service}`, { service, module });
    }

    const saved = await this.store.save(file, lines);
    logger.info({ service, module, removed: removed.length }, "Rules removed");
    return {
      action: "remove",
      service,
      module,
      removed,
      backupPath: saved.write.backupPath,
      ruleCount: saved.file.rules.length,
    };
  }

  async backup(): Promise<BackupResult> {
    const { created } = await snapshotDirectory(this.dirs.pamDir, this.dirs.snapshotDir);
    if (created) logger.info({ snapshotDir: this.dirs.snapshotDir }, "Snapshot created");
    else logger.info({ snapshotDir: this.dirs.snapshotDir }, "Snapshot already exists, left unchanged");
    return { action: "backup", snapshotDir: this.dirs.snapshotDir, created };
  }

  async restore(): Promise<RestoreResult> {
    await restoreSnapshot(this.dirs.snapshotDir, this.dirs.pamDir);
    logger.info({ snapshotDir: this.dirs.snapshotDir, pamDir: this.dirs.pamDir }, "Configuration restored from snapshot");
    return { action: "restore", snapshotDir: this.dirs.snapshotDir, pamDir: this.dirs.pamDir };
  }

  async run(action: Action, input: unknown): Promise<ActionResult> {
    switch (action) {
      case "list":
        return this.list();
      case "show":
        return this.show(input);
      case "add":
        return this.add(input);
      case "remove":
        return this.remove(input);
      case "backup":
        return this.backup();
      case "restore":
        return this.restore();
    }
  }

  private async load(service: string): Promise<ServiceFile> {
    const file = await this.store.load(service);
    for (const warning of file.warnings) {
      logger.warn({ service, line: warning.line, reason: warning.reason }, "Skipping malformed line");
    }
    return file;
  }
}
