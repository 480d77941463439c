/**
 * Destination root handling
 */

import { mkdir } from "node:fs/promises";
import { getErrorMessage } from "../../utils/errors";

/**
 * The destination root could not be created. Fatal at startup.
 */
export class DestinationError extends Error {
  constructor(destination: string, options?: ErrorOptions) {
    super(`Unable to create destination ${destination}: ${getErrorMessage(options?.cause)}`, options);
    this.name = "DestinationError";
  }
}

export async function ensureDestination(destination: string): Promise<void> {
  try {
    await mkdir(destination, { recursive: true });
  } catch (error) {
    throw new DestinationError(destination, { cause: error });
  }
}

/** Append-only run log kept beside the backups */
export const LOG_FILE_NAME = "logs.txt";
