/**
 * Template Registry — resolves and lists template packages for one set of
 * candidate roots.
 *
 * Resolution reads conf.json fresh every time; nothing is cached between
 * calls, so a reload is just another `resolve()` whose result replaces the
 * previous one.
 */

import { silentLogger } from "../shared/logger.js";
import type { Logger } from "../shared/logger.js";
import { listTemplates, locateTemplate } from "./locator.js";
import { resolveTemplatePaths } from "./resolver.js";
import type { CandidateRoot, ResolutionResult, TemplateListing, TemplateLocation, TemplateName } from "./types.js";

export interface TemplateRegistryOptions {
  roots: readonly CandidateRoot[];
  builtinStaticDir: string;
  logger?: Logger;
}

export class TemplateRegistry {
  readonly roots: readonly CandidateRoot[];
  readonly builtinStaticDir: string;
  private logger: Logger;

  constructor(options: TemplateRegistryOptions) {
    this.roots = Object.freeze([...options.roots]);
    this.builtinStaticDir = options.builtinStaticDir;
    this.logger = options.logger ?? silentLogger;
  }

  // ── Public API ─────────────────────────────────────────────

  /** Resolve a template's search paths, logging each warning. */
  resolve(name: TemplateName | null): ResolutionResult {
    const result = resolveTemplatePaths(name, this.roots, this.builtinStaticDir);

    for (const warning of result.warnings) {
      this.logger.warn(`[template] ${warning.message}`);
    }
    if (result.template) {
      this.logger.debug(`using template: ${result.template}`);
      this.logger.debug(`nbconvert template paths: ${result.conversionTemplatePaths.join(", ")}`);
      this.logger.debug(`template paths: ${result.templatePaths.join(", ")}`);
      this.logger.debug(`static paths: ${result.staticPaths.join(", ")}`);
    }
    return result;
  }

  /** Location of the package that would be used for `name`. */
  get(name: TemplateName): TemplateLocation | undefined {
    return locateTemplate(name, this.roots) ?? undefined;
  }

  list(): TemplateListing[] {
    return listTemplates(this.roots);
  }
}
