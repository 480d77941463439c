/**
 * Storage error types
 */

export class ArchiveWriteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ArchiveWriteError";
  }
}
