/**
 * Candidate root discovery.
 *
 * Templates are looked up first in the development tree next to the
 * sources, then in every Jupyter data directory under
 * `nbstage/template/`.
 */

import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import type { CandidateRoot } from "./types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Repository root (two levels above src/templates, and above dist/src/templates after a build). */
export const ROOT = findRepoRoot(__dirname);

export const APP_DATA_NAME = "nbstage";

export const DEV_TEMPLATE_ROOT = path.join(ROOT, "share", "jupyter", APP_DATA_NAME, "template");

/** Built-in static assets, always last on the static search path. */
export const BUILTIN_STATIC_ROOT = path.join(ROOT, "static");

export interface DataPathOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  home?: string;
  /** Environment prefixes (e.g. a virtualenv or conda prefix). */
  prefixes?: string[];
}

/**
 * Ordered Jupyter data directories, highest priority first:
 * JUPYTER_PATH entries, the user data dir, each prefix's share/jupyter,
 * then the system-wide directories.
 */
export function jupyterDataPath(options: DataPathOptions = {}): string[] {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const home = options.home ?? os.homedir();
  const join = platform === "win32" ? path.win32.join : path.posix.join;
  const delimiter = platform === "win32" ? ";" : ":";

  const dirs: string[] = [];

  if (env.JUPYTER_PATH) {
    dirs.push(...env.JUPYTER_PATH.split(delimiter).filter(Boolean));
  }

  dirs.push(userDataDir(env, platform, home));

  for (const prefix of options.prefixes ?? defaultPrefixes(env)) {
    dirs.push(join(prefix, "share", "jupyter"));
  }

  if (platform === "win32") {
    if (env.PROGRAMDATA) dirs.push(join(env.PROGRAMDATA, "jupyter"));
  } else {
    dirs.push("/usr/local/share/jupyter", "/usr/share/jupyter");
  }

  return [...new Set(dirs)];
}

export function userDataDir(env: NodeJS.ProcessEnv, platform: NodeJS.Platform, home: string): string {
  if (env.JUPYTER_DATA_DIR) return env.JUPYTER_DATA_DIR;
  if (platform === "darwin") return path.posix.join(home, "Library", "Jupyter");
  if (platform === "win32") {
    return path.win32.join(env.APPDATA ?? path.win32.join(home, "AppData", "Roaming"), "jupyter");
  }
  const xdg = env.XDG_DATA_HOME || path.posix.join(home, ".local", "share");
  return path.posix.join(xdg, "jupyter");
}

/** Active conda or virtualenv prefix, if any. */
function defaultPrefixes(env: NodeJS.ProcessEnv): string[] {
  return [env.CONDA_PREFIX, env.VIRTUAL_ENV].filter((p): p is string => Boolean(p));
}

export interface CandidateRootOptions extends DataPathOptions {
  devRoot?: string;
}

export function candidateTemplateRoots(options: CandidateRootOptions = {}): CandidateRoot[] {
  const platform = options.platform ?? process.platform;
  const join = platform === "win32" ? path.win32.join : path.posix.join;
  const devRoot = options.devRoot ?? DEV_TEMPLATE_ROOT;
  const installed = jupyterDataPath(options).map((dir) => join(dir, APP_DATA_NAME, "template"));
  return [...new Set([devRoot, ...installed])];
}

function findRepoRoot(start: string): string {
  const up2 = path.resolve(start, "..", "..");
  // Compiled output lives in dist/src/templates.
  return path.basename(up2) === "dist" ? path.dirname(up2) : up2;
}
