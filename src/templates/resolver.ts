/**
 * Template Resolver — expand a template name into its three search paths.
 *
 * The chain is planned first (most derived layer first), then materialised
 * base-first with each derived layer prepended, so earlier entries always
 * override later ones. Missing subdirectories are warned about but still
 * listed, to keep every layer's position in the search order.
 */

import { existsSync } from "fs";
import path from "path";
import { planTemplateChain } from "./chain.js";
import { loadTemplateConf } from "./conf_loader.js";
import { locateTemplate } from "./locator.js";
import { SUBDIR_PROBE_ORDER, SUBDIR_ROLES } from "./types.js";
import type {
  CandidateRoot,
  ResolutionResult,
  SubdirRole,
  TemplateLayer,
  TemplateLookup,
  TemplateName,
  TemplateWarning,
} from "./types.js";

/** Disk-backed lookup: first matching root plus its conf.json. */
export function createFsLookup(roots: readonly CandidateRoot[]) {
  return (name: TemplateName): TemplateLookup | null => {
    const location = locateTemplate(name, roots);
    if (!location) return null;
    const loaded = loadTemplateConf(location.dir);
    return {
      ...location,
      conf: loaded.conf,
      confPath: loaded.path,
      ...(loaded.error !== undefined ? { confError: loaded.error } : {}),
    };
  };
}

/**
 * Resolve `name` against `candidateRoots` (highest priority first).
 * A null or empty name disables templates: only the built-in static
 * directory is returned.
 *
 * Throws TemplateChainError if base_template declarations form a cycle.
 */
export function resolveTemplatePaths(
  name: TemplateName | null,
  candidateRoots: readonly CandidateRoot[],
  builtinStaticFallback: string,
): ResolutionResult {
  const warnings: TemplateWarning[] = [];
  const byRole: Record<SubdirRole, string[]> = { conversion: [], static: [], templates: [] };
  let layers: TemplateLayer[] = [];

  if (name) {
    const chain = planTemplateChain(name, createFsLookup(candidateRoots));
    layers = chain.layers;

    for (const layer of layers) {
      if (layer.confError !== undefined && layer.confPath !== null) {
        warnings.push({
          kind: "invalid_conf",
          template: layer.name,
          path: layer.confPath,
          reason: layer.confError,
          message: `template named ${layer.name} has an unusable ${layer.confPath} (${layer.confError}); ignoring it`,
        });
      }
    }

    if (chain.missing !== null) {
      warnings.push({
        kind: "template_not_found",
        template: chain.missing,
        searched: [...candidateRoots],
        message: `template named ${chain.missing} not found in any of: ${candidateRoots.join(", ")}`,
      });
    }

    // Base first, derived layers prepended.
    for (const layer of [...layers].reverse()) {
      for (const role of SUBDIR_PROBE_ORDER) {
        const subdir = path.join(layer.dir, SUBDIR_ROLES[role]);
        if (!existsSync(subdir)) {
          warnings.push({
            kind: "missing_subdir",
            template: layer.name,
            dir: layer.dir,
            role,
            path: subdir,
            message: `template named ${layer.name} found at path ${layer.dir}, but ${subdir} does not exist`,
          });
        }
        byRole[role].unshift(subdir);
      }
    }
  }

  // The fallback is always last, even when a layer already contributed it.
  const staticPaths = [...dedupe(byRole.static), builtinStaticFallback];

  return deepFreeze({
    template: name || null,
    templatePaths: dedupe(byRole.templates),
    staticPaths,
    conversionTemplatePaths: dedupe(byRole.conversion),
    layers,
    warnings,
  });
}

/** Keep the first occurrence of each path. */
function dedupe(paths: string[]): string[] {
  return [...new Set(paths)];
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
