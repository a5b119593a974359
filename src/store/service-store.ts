import fs from "node:fs/promises";
import path from "node:path";
import type { Dirent } from "node:fs";
import type { ServiceFile, ServiceLine } from "../types/rule.js";
import { PamError, PamErrorCode, isNotFound } from "../shared/errors.js";
import { parseServiceText, rulesOf } from "../pam/parser.js";
import { serializeServiceFile } from "../pam/serializer.js";
import { writeWithBackup } from "./backup.js";
import type { WriteResult } from "./backup.js";
import type { ResolvedDirectories } from "./directory.js";

/** Reads and writes service files inside one resolved PAM directory. */
export class ServiceStore {
  constructor(
    private readonly dirs: ResolvedDirectories,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get pamDir(): string {
    return this.dirs.pamDir;
  }

  /** Regular, non-hidden files in the PAM directory, sorted by name. */
  async listServices(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.dirs.pamDir, { withFileTypes: true });
    } catch (err) {
      if (isNotFound(err)) {
        throw new PamError(PamErrorCode.DIRECTORY_NOT_FOUND, `PAM directory ${this.dirs.pamDir} does not exist`, {
          pamDir: this.dirs.pamDir,
        });
      }
      throw err;
    }
    return entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith("."))
      .map((entry) => entry.name)
      .sort();
  }

  async load(name: string): Promise<ServiceFile> {
    const filePath = this.pathFor(name);
    let text: string;
    try {
      text = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        throw new PamError(PamErrorCode.SERVICE_NOT_FOUND, `Service ${name} not found in ${this.dirs.pamDir}`, {
          service: name,
        });
      }
      throw err;
    }
    const { lines, rules, warnings } = parseServiceText(text);
    return { name, path: filePath, lines, rules, warnings };
  }

  /** Back up the file on disk, then replace it with `lines`. */
  async save(file: ServiceFile, lines: ServiceLine[]): Promise<{ file: ServiceFile; write: WriteResult }> {
    const write = await writeWithBackup(file.path, serializeServiceFile(lines), {
      backupDir: this.dirs.backupDir,
      service: file.name,
      now: this.now(),
    });
    return { file: { ...file, lines, rules: rulesOf(lines) }, write };
  }

  private pathFor(name: string): string {
    return path.join(this.dirs.pamDir, name);
  }
}
