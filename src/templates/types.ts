/**
 * Template System Types
 *
 * A template package is a directory named after the template, found under
 * one of several candidate roots. It bundles page templates, static assets
 * and notebook-conversion templates, and may inherit from a base template
 * declared in its conf.json.
 */

import type { TemplateConf } from "./template_schema.js";

// ── Names and roots ─────────────────────────────────────────────────

export type TemplateName = string;

/** Absolute directory searched for template packages. */
export type CandidateRoot = string;

export const DEFAULT_TEMPLATE: TemplateName = "default";

export const CONF_FILENAME = "conf.json";

// ── Subdirectory roles ──────────────────────────────────────────────

export type SubdirRole = "conversion" | "static" | "templates";

/** Fixed role → subdirectory name mapping inside a template package. */
export const SUBDIR_ROLES: Readonly<Record<SubdirRole, string>> = Object.freeze({
  conversion: "nbconvert_templates",
  static: "static",
  templates: "templates",
});

/** Order in which a layer's subdirectories are probed. */
export const SUBDIR_PROBE_ORDER: readonly SubdirRole[] = ["conversion", "static", "templates"];

// ── Layers ──────────────────────────────────────────────────────────

export interface TemplateLocation {
  /** Candidate root the package was found under. */
  root: CandidateRoot;
  /** `<root>/<name>` */
  dir: string;
}

/** Location plus the conf read from it. */
export interface TemplateLookup extends TemplateLocation {
  conf: TemplateConf;
  /** null when the package has no conf.json. */
  confPath: string | null;
  /** Set when conf.json exists but could not be used. */
  confError?: string;
}

export type TemplateLookupFn = (name: TemplateName) => TemplateLookup | null;

export interface TemplateLayer extends TemplateLookup {
  name: TemplateName;
}

export interface TemplateChain {
  /** Most derived first. */
  layers: TemplateLayer[];
  /** First name in the chain that no candidate root contains. */
  missing: TemplateName | null;
}

// ── Diagnostics ─────────────────────────────────────────────────────

export type TemplateWarning =
  | {
      kind: "missing_subdir";
      template: TemplateName;
      dir: string;
      role: SubdirRole;
      path: string;
      message: string;
    }
  | {
      kind: "template_not_found";
      template: TemplateName;
      searched: CandidateRoot[];
      message: string;
    }
  | {
      kind: "invalid_conf";
      template: TemplateName;
      path: string;
      reason: string;
      message: string;
    };

// ── Resolution ──────────────────────────────────────────────────────

export interface ResolutionResult {
  /** Requested template; null when templates are disabled. */
  readonly template: TemplateName | null;
  /** Page-template search path, highest priority first. */
  readonly templatePaths: readonly string[];
  /** Static-asset search path; the built-in fallback is always last. */
  readonly staticPaths: readonly string[];
  /** Notebook-conversion template search path. */
  readonly conversionTemplatePaths: readonly string[];
  readonly layers: readonly TemplateLayer[];
  readonly warnings: readonly TemplateWarning[];
}

// ── Listing ─────────────────────────────────────────────────────────

export interface TemplateListing extends TemplateLocation {
  name: TemplateName;
  /** Later roots that also contain this name and are never consulted. */
  shadowed: CandidateRoot[];
}
