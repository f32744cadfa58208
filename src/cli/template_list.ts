#!/usr/bin/env node
/**
 * CLI: nbstage-template-list
 *
 * Usage: npm run template:list
 *
 * Lists every template package visible across the candidate roots, and the
 * lower-priority copies each one shadows.
 */

import { TemplateRegistry } from "../templates/registry.js";
import { BUILTIN_STATIC_ROOT, candidateTemplateRoots } from "../templates/paths.js";

function main() {
  const registry = new TemplateRegistry({
    roots: candidateTemplateRoots(),
    builtinStaticDir: BUILTIN_STATIC_ROOT,
  });
  const templates = registry.list();

  console.log(`  Candidate roots: ${registry.roots.length}`);
  for (const root of registry.roots) {
    console.log(`    ${root}`);
  }
  console.log();
  console.log(`  Templates found: ${templates.length}`);
  console.log();

  for (const t of templates) {
    console.log(`  ${t.name}`);
    console.log(`    Path:     ${t.dir}`);
    for (const s of t.shadowed) {
      console.log(`    Shadows:  ${s}`);
    }
    console.log();
  }
}

main();
