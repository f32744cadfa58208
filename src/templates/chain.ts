/**
 * Template Chain — compute the inheritance order of template layers.
 *
 * Pure with respect to the lookup port: all disk access happens in
 * `lookup`, so the override order can be planned against any source.
 *
 * Base selection:
 *   - a template not named "default" inherits from its conf's
 *     base_template, or from "default" when none is given
 *   - "default" inherits only when its conf explicitly names a base
 */

import { TemplateChainError } from "../shared/errors.js";
import { DEFAULT_TEMPLATE } from "./types.js";
import type { TemplateChain, TemplateLayer, TemplateLookup, TemplateLookupFn, TemplateName } from "./types.js";

export function baseTemplateOf(name: TemplateName, lookup: TemplateLookup): TemplateName | null {
  const explicit = lookup.conf.base_template;
  if (explicit !== undefined) return explicit;
  return name === DEFAULT_TEMPLATE ? null : DEFAULT_TEMPLATE;
}

export function planTemplateChain(name: TemplateName, lookup: TemplateLookupFn): TemplateChain {
  const layers: TemplateLayer[] = [];
  const seen: TemplateName[] = [];
  let current: TemplateName | null = name;

  while (current !== null) {
    if (seen.includes(current)) {
      throw new TemplateChainError([...seen.slice(seen.indexOf(current)), current]);
    }
    seen.push(current);

    const found = lookup(current);
    if (!found) {
      return { layers, missing: current };
    }

    layers.push({ name: current, ...found });
    current = baseTemplateOf(current, found);
  }

  return { layers, missing: null };
}
