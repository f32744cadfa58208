/**
 * Multi-directory static file handler.
 *
 * Each directory on the search path gets its own `express.static`; a miss
 * falls through to the next one, so the first directory holding the file
 * wins. Directories that do not exist simply never match. A directory
 * requested without its trailing slash is redirected to it.
 */

import express, { Router } from "express";

export interface MultiStaticOptions {
  /** File served for directory requests. */
  defaultFilename?: string;
}

export function multiStatic(paths: readonly string[], options: MultiStaticOptions = {}): Router {
  const router = Router();
  const index = options.defaultFilename ?? "index.html";

  for (const dir of paths) {
    router.use(express.static(dir, { index, fallthrough: true }));
  }
  return router;
}
