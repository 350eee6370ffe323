/**
 * Deployment Config Preservation
 *
 * `flyctl launch` rewrites the build section of the config file it is
 * pointed at. The file is snapshotted before the call and written back
 * afterwards so the following deploy uses the user's configuration.
 */

import { readFile, writeFile } from "node:fs/promises";
import { logger } from "./logger.js";

async function readIfExists(path: string): Promise<Buffer | undefined> {
  try {
    return await readFile(path);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

/**
 * Run `operation`, then restore `path` to its prior bytes, whether the
 * operation succeeded or not. A file that did not exist beforehand is left
 * as the operation wrote it.
 */
export async function withPreservedFile<T>(path: string, operation: () => Promise<T>): Promise<T> {
  const snapshot = await readIfExists(path);
  if (snapshot === undefined) {
    logger.debug(`${path} does not exist yet; keeping the generated file`);
    return operation();
  }

  try {
    return await operation();
  } finally {
    await writeFile(path, snapshot);
    logger.debug(`Restored ${path} (${snapshot.length} bytes)`);
  }
}
