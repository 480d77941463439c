/**
 * Single-container store: every backup is a `<cycle>.tar` entry inside
 * `backups.zip`, managed with the `zip` and `zipinfo` tools.
 */

import { rm, stat } from "node:fs/promises";
import * as path from "node:path";
import type { BackupEntry, IArchiveStore, StagedArchive } from "../types";
import { CommandError, type CommandResult, type CommandRunner, runCommand } from "../utils/exec";
import { getErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { isValidCycleName } from "../utils/naming";
import { isNotFoundError } from "../utils/path";
import { parseEntryTimestamp } from "./entry-timestamp";
import { ArchiveWriteError } from "./errors";

export const CONTAINER_FILE_NAME = "backups.zip";

export const CONTAINER_ENTRY_PATTERN = /^(\d{8}_\d{6})\.tar$/;

/** `zip -d` exit status when none of the given names matched */
const ZIP_NOTHING_TO_DO = 12;

/**
 * `zip -d` leaves a valid archive with no entries behind once the last
 * one is gone; `zipinfo` refuses to list it.
 */
export function isEmptyContainerListing(result: CommandResult): boolean {
  const output = `${result.stdout}\n${result.stderr}`;
  return /Empty zipfile/i.test(output) || /number of entries:\s*0\b/.test(output);
}

export interface ListedContainerEntry {
  name: string;
  rawTimestamp: string;
  sizeBytes?: number;
}

/**
 * Pick backup entries out of a `zipinfo` listing. Header, trailer and
 * foreign entries are ignored. The timestamp is returned raw for
 * `parseEntryTimestamp`; both the `-T` and the default date columns are
 * recognized.
 */
export function parseZipListing(stdout: string): ListedContainerEntry[] {
  const entries: ListedContainerEntry[] = [];

  for (const line of stdout.split("\n")) {
    const tokens = line.trim().split(/\s+/);
    const name = CONTAINER_ENTRY_PATTERN.exec(tokens.at(-1) ?? "")?.[1];
    if (!name) continue;

    const last = tokens.at(-2) ?? "";
    const rawTimestamp = /^\d{2}:\d{2}$/.test(last) ? `${tokens.at(-3) ?? ""} ${last}` : last;

    const size = Number(tokens[3]);
    entries.push({
      name,
      rawTimestamp,
      sizeBytes: Number.isInteger(size) ? size : undefined,
    });
  }

  return entries;
}

export class ZipContainerStore implements IArchiveStore {
  readonly kind = "container" as const;
  readonly archiveFormat = "tar" as const;

  constructor(
    private readonly root: string,
    private readonly run: CommandRunner = runCommand,
  ) {}

  get containerPath(): string {
    return path.join(this.root, CONTAINER_FILE_NAME);
  }

  entryNameFor(name: string): string {
    return `${name}.${this.archiveFormat}`;
  }

  async list(): Promise<BackupEntry[]> {
    if (!(await this.exists())) return [];

    const result = await this.run("zipinfo", ["-T", this.containerPath]);
    if (!result.success) {
      if (isEmptyContainerListing(result)) return [];
      throw new CommandError("zipinfo", result);
    }

    const entries: BackupEntry[] = [];
    for (const listed of parseZipListing(result.stdout)) {
      try {
        entries.push({
          name: listed.name,
          createdAt: parseEntryTimestamp(listed.rawTimestamp),
          sizeBytes: listed.sizeBytes,
        });
      } catch (error) {
        logger.warn(`Skipping container entry ${this.entryNameFor(listed.name)}: ${getErrorMessage(error)}`);
      }
    }

    return entries.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async add(staged: StagedArchive): Promise<void> {
    const entryName = this.entryNameFor(staged.name);

    if (!isValidCycleName(staged.name)) {
      throw new ArchiveWriteError(`Invalid backup name: ${staged.name}`);
    }
    if (path.basename(staged.path) !== entryName) {
      throw new ArchiveWriteError(`Staged archive must be named ${entryName}: ${staged.path}`);
    }

    // zip creates the container on first use and replaces same-named entries
    const result = await this.run("zip", ["-j", "-q", this.containerPath, staged.path]);
    if (!result.success) {
      throw new ArchiveWriteError(`Failed to add ${entryName} to ${this.containerPath}`, {
        cause: new CommandError("zip", result),
      });
    }

    await rm(staged.path, { force: true });
    logger.debug(`Added ${entryName} to ${this.containerPath}`);
  }

  async remove(names: ReadonlySet<string>): Promise<void> {
    const entryNames = [...names].filter(isValidCycleName).map((name) => this.entryNameFor(name));
    if (entryNames.length === 0) return;
    if (!(await this.exists())) return;

    const result = await this.run("zip", ["-d", "-q", this.containerPath, ...entryNames]);
    if (!result.success && result.exitCode !== ZIP_NOTHING_TO_DO) {
      throw new CommandError("zip", result);
    }

    logger.debug(`Removed ${entryNames.length} entr${entryNames.length === 1 ? "y" : "ies"} from ${this.containerPath}`);
  }

  private async exists(): Promise<boolean> {
    try {
      return (await stat(this.containerPath)).isFile();
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
  }
}
