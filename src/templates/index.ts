/**
 * Template System — Barrel Export
 */

export type {
  TemplateName,
  CandidateRoot,
  SubdirRole,
  TemplateLocation,
  TemplateLookup,
  TemplateLookupFn,
  TemplateLayer,
  TemplateChain,
  TemplateWarning,
  ResolutionResult,
  TemplateListing,
} from "./types.js";
export { DEFAULT_TEMPLATE, CONF_FILENAME, SUBDIR_ROLES } from "./types.js";

export type { TemplateConf } from "./template_schema.js";
export { TemplateConfSchema } from "./template_schema.js";

export { loadTemplateConf } from "./conf_loader.js";
export type { ConfLoadResult } from "./conf_loader.js";
export { locateTemplate, listTemplates, isValidTemplateName } from "./locator.js";
export { planTemplateChain, baseTemplateOf } from "./chain.js";
export { resolveTemplatePaths, createFsLookup } from "./resolver.js";
export { TemplateRegistry } from "./registry.js";
export type { TemplateRegistryOptions } from "./registry.js";
export {
  BUILTIN_STATIC_ROOT,
  DEV_TEMPLATE_ROOT,
  candidateTemplateRoots,
  jupyterDataPath,
  userDataDir,
} from "./paths.js";
