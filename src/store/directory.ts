// Directory resolver: decides which PAM directory this run reads and writes.
// Root edits the system directory; everyone else gets the sandbox unless --dir says otherwise.
// The privilege check lives here so no caller can write the live directory without root.
import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import type { PamManagerConfig } from "../types/config.js";
import { PamError, PamErrorCode, isNotFound } from "../shared/errors.js";

export interface ResolveOptions {
  isRoot: boolean;
  /** Action will write to the directory (add, remove, backup, restore). */
  mutating: boolean;
  /** Explicit directory from --dir. */
  override?: string;
  cwd?: string;
}

export interface ResolvedDirectories {
  /** Active PAM directory, absolute. */
  pamDir: string;
  /** Where per-file backups go. */
  backupDir: string;
  /** Where whole-directory snapshots go. */
  snapshotDir: string;
  isSystem: boolean;
}

export function resolveDirectories(config: PamManagerConfig, options: ResolveOptions): ResolvedDirectories {
  const cwd = options.cwd ?? process.cwd();
  const systemDir = resolve(cwd, config.directories.system);
  const chosen = options.override ?? (options.isRoot ? config.directories.system : config.directories.sandbox);
  const pamDir = resolve(cwd, chosen);
  const isSystem = canonical(pamDir) === canonical(systemDir);

  if (options.mutating && isSystem && !options.isRoot) {
    throw new PamError(PamErrorCode.PERMISSION_DENIED, `Root privileges are required to modify ${pamDir}`, { pamDir });
  }

  return {
    pamDir,
    backupDir: resolve(cwd, config.backup.directory ?? `${pamDir}.backups`),
    snapshotDir: resolve(cwd, config.backup.snapshot_directory ?? `${pamDir}.backup`),
    isSystem,
  };
}

/** Symlinks followed; a path that does not exist yet is compared as resolved. */
function canonical(p: string): string {
  try {
    return realpathSync(p);
  } catch (err) {
    if (isNotFound(err)) return p;
    throw err;
  }
}

/** Effective UID 0. Platforms without geteuid are never root. */
export function runningAsRoot(): boolean {
  return typeof process.geteuid === "function" && process.geteuid() === 0;
}
