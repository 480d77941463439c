/**
 * Archive store interface definitions
 */

import type { StoreKind } from "./config";

export type ArchiveFormat = "tgz" | "tar";

export interface BackupEntry {
  /** Cycle name, `YYYYMMDD_HHMMSS`, without any extension */
  name: string;
  createdAt: Date;
  sizeBytes?: number;
}

/**
 * A packed archive waiting to be moved into the store
 */
export interface StagedArchive {
  name: string;
  path: string;
}

export interface IArchiveStore {
  readonly kind: StoreKind;

  /** Format the packer must produce for `add` */
  readonly archiveFormat: ArchiveFormat;

  /**
   * Re-scan the store. Never cached between calls.
   */
  list(): Promise<BackupEntry[]>;

  /**
   * Insert an archive under its cycle name, replacing any entry of that name
   */
  add(staged: StagedArchive): Promise<void>;

  /**
   * Delete the named entries; names not in the store are ignored
   */
  remove(names: ReadonlySet<string>): Promise<void>;
}
