/**
 * Storage module exports
 */

import type { DaemonConfig, IArchiveStore } from "../types";
import type { CommandRunner } from "../utils/exec";
import { ZipContainerStore } from "./container";
import { DirectoryArchiveStore } from "./directory";

export {
  CONTAINER_ENTRY_PATTERN,
  CONTAINER_FILE_NAME,
  isEmptyContainerListing,
  type ListedContainerEntry,
  parseZipListing,
  ZipContainerStore,
} from "./container";
export { ARCHIVE_FILE_PATTERN, DirectoryArchiveStore } from "./directory";
export { EntryTimestampError, parseEntryTimestamp } from "./entry-timestamp";
export { ArchiveWriteError } from "./errors";

/**
 * Create the archive store selected by config
 */
export function createArchiveStore(
  config: Pick<DaemonConfig, "destination" | "store">,
  run?: CommandRunner,
): IArchiveStore {
  switch (config.store) {
    case "directory":
      return new DirectoryArchiveStore(config.destination);
    case "container":
      return new ZipContainerStore(config.destination, run);
  }
}
