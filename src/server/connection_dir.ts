/**
 * Connection directory lifecycle.
 *
 * Kernel connection files live in a fresh temp directory for the lifetime
 * of the server and are removed on shutdown.
 */

import { mkdtempSync, rmSync, existsSync } from "fs";
import path from "path";
import { ConfigError } from "../shared/errors.js";

export const CONNECTION_DIR_PREFIX = "nbstage_";

export function createConnectionDir(root: string): string {
  return mkdtempSync(path.join(root, CONNECTION_DIR_PREFIX));
}

/**
 * Remove a connection directory created by createConnectionDir.
 * Refuses any directory whose name does not carry the connection prefix.
 */
export function removeConnectionDir(dir: string): void {
  const resolved = path.resolve(dir);
  if (!path.basename(resolved).startsWith(CONNECTION_DIR_PREFIX)) {
    throw new ConfigError(
      `Safety: refusing to remove "${resolved}": not a connection directory (expected prefix "${CONNECTION_DIR_PREFIX}").`,
      { dir: resolved },
    );
  }
  if (existsSync(resolved)) {
    rmSync(resolved, { recursive: true, force: true });
  }
}
