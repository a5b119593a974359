// Backup-and-write: the only code path that overwrites a service file.
// Order is fixed: copy the current bytes to the backup path, write the new content to a
// temp file beside the original, then rename it over the original. A failure before the
// rename leaves the original untouched; nothing is ever rolled back or pruned.
import fs from "node:fs/promises";
import { constants } from "node:fs";
import path from "node:path";
import { PamError, PamErrorCode, isNotFound } from "../shared/errors.js";
import { logger } from "../logger.js";

/** `<service>.<UTC timestamp>.bak`, with `:` and `.` in the timestamp replaced by `-`. */
export function backupFileName(service: string, now: Date): string {
  const ts = now.toISOString().replace(/[:.]/g, "-");
  return `${service}.${ts}.bak`;
}

/** Copy `sourcePath` into `backupDir` without overwriting an earlier backup. */
export async function backupFile(sourcePath: string, backupDir: string, service: string, now: Date): Promise<string> {
  const base = path.join(backupDir, backupFileName(service, now));
  try {
    await fs.mkdir(backupDir, { recursive: true });
  } catch (err) {
    throw new PamError(PamErrorCode.BACKUP_FAILED, `Could not create backup directory ${backupDir}`, { cause: errorMessage(err) });
  }

  for (let attempt = 0; ; attempt++) {
    const target = attempt === 0 ? base : `${base}.${attempt}`;
    try {
      await fs.copyFile(sourcePath, target, constants.COPYFILE_EXCL);
      return target;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") continue;
      throw new PamError(PamErrorCode.BACKUP_FAILED, `Could not back up ${sourcePath}`, { target, cause: errorMessage(err) });
    }
  }
}

export interface WriteResult {
  backupPath: string;
  bytesWritten: number;
}

/** Back up `filePath`, then atomically replace it with `content`, keeping its mode. */
export async function writeWithBackup(
  filePath: string,
  content: string,
  opts: { backupDir: string; service: string; now: Date },
): Promise<WriteResult> {
  const backupPath = await backupFile(filePath, opts.backupDir, opts.service, opts.now);
  logger.info({ filePath, backupPath }, "Backup created");

  const { mode } = await fs.stat(filePath);
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    await fs.writeFile(tmpPath, content, { encoding: "utf-8", mode });
    await fs.chmod(tmpPath, mode & 0o7777);
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw new PamError(PamErrorCode.WRITE_FAILED, `Could not write ${filePath}; original left in place`, {
      backupPath,
      cause: errorMessage(err),
    });
  }

  return { backupPath, bytesWritten: Buffer.byteLength(content, "utf-8") };
}

/**
 * Copy the whole PAM directory to `snapshotDir`. An existing snapshot is never
 * overwritten; `created: false` reports that case.
 */
export async function snapshotDirectory(pamDir: string, snapshotDir: string): Promise<{ created: boolean }> {
  assertOutside(pamDir, snapshotDir);
  if (await pathExists(snapshotDir)) return { created: false };
  if (!(await pathExists(pamDir))) {
    throw new PamError(PamErrorCode.DIRECTORY_NOT_FOUND, `PAM directory ${pamDir} does not exist`, { pamDir });
  }
  await fs.cp(pamDir, snapshotDir, { recursive: true, preserveTimestamps: true });
  return { created: true };
}

/**
 * Replace the PAM directory with the snapshot. The snapshot is copied to a sibling
 * staging directory first and renamed into place, so a failed copy leaves the
 * PAM directory as it was.
 */
export async function restoreSnapshot(snapshotDir: string, pamDir: string): Promise<void> {
  assertOutside(pamDir, snapshotDir);
  if (!(await pathExists(snapshotDir))) {
    throw new PamError(PamErrorCode.SNAPSHOT_NOT_FOUND, `No snapshot found at ${snapshotDir}`, { snapshotDir });
  }

  const staging = `${pamDir}.restore-${process.pid}`;
  const previous = `${pamDir}.previous-${process.pid}`;
  await fs.rm(staging, { recursive: true, force: true });
  try {
    await fs.cp(snapshotDir, staging, { recursive: true, preserveTimestamps: true });
  } catch (err) {
    await fs.rm(staging, { recursive: true, force: true });
    throw err;
  }

  const hadDir = await pathExists(pamDir);
  if (hadDir) await fs.rename(pamDir, previous);
  try {
    await fs.rename(staging, pamDir);
  } catch (err) {
    if (hadDir) await fs.rename(previous, pamDir);
    throw err;
  }
  if (hadDir) await fs.rm(previous, { recursive: true, force: true });
}

/** A snapshot kept inside the directory it copies would be copied into itself or wiped by a restore. */
function assertOutside(pamDir: string, snapshotDir: string): void {
  const rel = path.relative(path.resolve(pamDir), path.resolve(snapshotDir));
  const outside = rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel);
  if (!outside) {
    throw new PamError(PamErrorCode.VALIDATION_FAILED, `Snapshot directory ${snapshotDir} must be outside ${pamDir}`, {
      pamDir,
      snapshotDir,
    });
  }
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
