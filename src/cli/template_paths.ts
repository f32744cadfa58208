#!/usr/bin/env node
/**
 * CLI: nbstage-template-paths
 *
 * Usage: npm run template:paths [-- --template <name>]
 *
 * Prints the search paths a template resolves to, most specific first,
 * along with any warnings produced while resolving it.
 */

import { TemplateRegistry } from "../templates/registry.js";
import { BUILTIN_STATIC_ROOT, candidateTemplateRoots } from "../templates/paths.js";
import type { ResolutionResult } from "../templates/types.js";
import { formatError } from "../shared/errors.js";
import { parseTemplateOption } from "../shared/server_config.js";

function main() {
  const template = parseTemplateOrExit(process.argv.slice(2));

  const registry = new TemplateRegistry({
    roots: candidateTemplateRoots(),
    builtinStaticDir: BUILTIN_STATIC_ROOT,
  });

  const result = resolveOrExit(registry, template);

  console.log(`  Template: ${result.template ?? "(none)"}`);
  console.log(`  Chain:    ${result.layers.map((l) => l.name).join(" -> ") || "(empty)"}`);
  printList("Page templates", result.templatePaths);
  printList("Static assets", result.staticPaths);
  printList("Conversion templates", result.conversionTemplatePaths);

  if (result.warnings.length > 0) {
    console.log();
    console.log("  Warnings:");
    for (const w of result.warnings) {
      console.log(`    - ${w.message}`);
    }
  }
}

function parseTemplateOrExit(args: string[]): string {
  try {
    return parseTemplateOption(args);
  } catch (err) {
    console.error(`  ✗ ${formatError(err)}`);
    console.error("Usage: npm run template:paths [-- --template <name>]");
    process.exit(1);
  }
}

function resolveOrExit(registry: TemplateRegistry, template: string): ResolutionResult {
  try {
    return registry.resolve(template);
  } catch (err) {
    console.error(`  ✗ ${formatError(err)}`);
    process.exit(1);
  }
}

function printList(label: string, paths: readonly string[]) {
  console.log();
  console.log(`  ${label}:`);
  for (const p of paths) {
    console.log(`    ${p}`);
  }
}

main();
