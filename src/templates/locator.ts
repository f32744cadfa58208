/**
 * Template Locator — find a template package under the candidate roots.
 *
 * Roots are scanned in priority order and the first `<root>/<name>`
 * directory wins; later roots are never consulted for that name.
 */

import { readdirSync, statSync } from "fs";
import path from "path";
import type { CandidateRoot, TemplateListing, TemplateLocation, TemplateName } from "./types.js";

/** Names that would escape the root or address a nested path. */
export function isValidTemplateName(name: TemplateName): boolean {
  if (!name || name === "." || name === "..") return false;
  return !name.includes("/") && !name.includes("\\");
}

export function locateTemplate(
  name: TemplateName,
  roots: readonly CandidateRoot[],
): TemplateLocation | null {
  if (!isValidTemplateName(name)) return null;
  for (const root of roots) {
    const dir = path.join(root, name);
    if (isDirectory(dir)) {
      return { root, dir };
    }
  }
  return null;
}

/** Every template package visible across the roots, sorted by name. */
export function listTemplates(roots: readonly CandidateRoot[]): TemplateListing[] {
  const byName = new Map<TemplateName, TemplateListing>();

  for (const root of roots) {
    for (const name of safeDirs(root)) {
      const existing = byName.get(name);
      if (existing) {
        existing.shadowed.push(root);
      } else {
        byName.set(name, { name, root, dir: path.join(root, name), shadowed: [] });
      }
    }
  }

  return [...byName.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export function isDirectory(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

function safeDirs(dir: string): string[] {
  if (!isDirectory(dir)) return [];
  return readdirSync(dir).filter((entry) => isDirectory(path.join(dir, entry)));
}
