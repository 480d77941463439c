/**
 * Directory-of-archives store: one `<cycle>.tgz` file per backup
 */

import { copyFile, mkdir, readdir, rename, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import type { BackupEntry, IArchiveStore, StagedArchive } from "../types";
import { getErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { isValidCycleName } from "../utils/naming";
import { isNodeError, isNotFoundError } from "../utils/path";
import { ArchiveWriteError } from "./errors";

export const ARCHIVE_FILE_PATTERN = /^(\d{8}_\d{6})\.tgz$/;

export class DirectoryArchiveStore implements IArchiveStore {
  readonly kind = "directory" as const;
  readonly archiveFormat = "tgz" as const;

  constructor(private readonly root: string) {}

  pathFor(name: string): string {
    return path.join(this.root, `${name}.${this.archiveFormat}`);
  }

  async list(): Promise<BackupEntry[]> {
    let files: string[];
    try {
      files = await readdir(this.root);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }

    const entries: BackupEntry[] = [];

    for (const file of files) {
      const name = ARCHIVE_FILE_PATTERN.exec(file)?.[1];
      if (!name) continue;

      try {
        const stats = await stat(path.join(this.root, file));
        if (!stats.isFile()) continue;
        entries.push({ name, createdAt: stats.mtime, sizeBytes: stats.size });
      } catch (error) {
        // Removed between readdir and stat
        if (isNotFoundError(error)) continue;
        throw error;
      }
    }

    return entries.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async add(staged: StagedArchive): Promise<void> {
    if (!isValidCycleName(staged.name)) {
      throw new ArchiveWriteError(`Invalid backup name: ${staged.name}`);
    }

    const destPath = this.pathFor(staged.name);

    try {
      await mkdir(this.root, { recursive: true });
      await this.move(staged.path, destPath);
    } catch (error) {
      throw new ArchiveWriteError(`Failed to store ${staged.name}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    logger.debug(`Stored archive: ${destPath}`);
  }

  async remove(names: ReadonlySet<string>): Promise<void> {
    for (const name of names) {
      if (!isValidCycleName(name)) {
        logger.warn(`Refusing to delete invalid backup name: ${name}`);
        continue;
      }
      await rm(this.pathFor(name), { force: true });
      logger.debug(`Deleted archive file: ${this.pathFor(name)}`);
    }
  }

  private async move(sourcePath: string, destPath: string): Promise<void> {
    try {
      await rename(sourcePath, destPath);
    } catch (error) {
      // Staging may live on another filesystem
      if (!isNodeError(error) || error.code !== "EXDEV") throw error;
      await copyFile(sourcePath, destPath);
      await rm(sourcePath, { force: true });
    }
  }
}
