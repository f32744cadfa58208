/**
 * Conf Loader — Read a template package's conf.json.
 *
 * A missing conf.json is normal. An unreadable, non-JSON or non-conforming
 * one is reported through `error` and treated as absent.
 */

import { readFileSync, existsSync } from "fs";
import path from "path";
import { TemplateConfSchema } from "./template_schema.js";
import type { TemplateConf } from "./template_schema.js";
import { CONF_FILENAME } from "./types.js";

export interface ConfLoadResult {
  conf: TemplateConf;
  /** null when the package has no conf.json. */
  path: string | null;
  error?: string;
}

export function loadTemplateConf(dir: string): ConfLoadResult {
  const confPath = path.join(dir, CONF_FILENAME);
  if (!existsSync(confPath)) {
    return { conf: {}, path: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(confPath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { conf: {}, path: confPath, error: reason };
  }

  const parsed = TemplateConfSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return { conf: {}, path: confPath, error: reason };
  }

  return { conf: parsed.data, path: confPath };
}
