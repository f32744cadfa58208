/**
 * Server Configuration
 *
 * Parsed from command-line arguments, with environment variables (and a
 * .env file, loaded by the CLI entry point) as fallbacks for port and log
 * level. CLI arguments take priority over the environment.
 *
 *   nbstage [OPTIONS] [NOTEBOOK_FILENAME]
 */

import os from "os";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";
import { BUILTIN_STATIC_ROOT } from "../templates/paths.js";
import { DEFAULT_TEMPLATE } from "../templates/types.js";

export const DEFAULT_PORT = 8866;

export const ServerConfigSchema = z.object({
  notebookPath: z.string().min(1).nullable(),
  port: z.coerce.number().int().min(0).max(65535),
  staticRoot: z.string().min(1),
  stripSources: z.boolean(),
  autoreload: z.boolean(),
  /** null disables template resolution. */
  template: z.string().nullable(),
  connectionDirRoot: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  help: z.boolean(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

type OptionKind = "string" | "boolean";

/** CLI option name → config key. Underscore and dash spellings both work. */
const OPTIONS: Record<string, { key: keyof ServerConfig; kind: OptionKind }> = {
  port: { key: "port", kind: "string" },
  static: { key: "staticRoot", kind: "string" },
  strip_sources: { key: "stripSources", kind: "boolean" },
  autoreload: { key: "autoreload", kind: "boolean" },
  template: { key: "template", kind: "string" },
  connection_dir_root: { key: "connectionDirRoot", kind: "string" },
  log_level: { key: "logLevel", kind: "string" },
  help: { key: "help", kind: "boolean" },
};

export const USAGE = `nbstage [OPTIONS] NOTEBOOK_FILENAME

Launches a stand-alone server for read-only notebooks.

Options:
  --port=<n>                 Port of the server (default ${DEFAULT_PORT}, env NBSTAGE_PORT)
  --static=<dir>             Directory holding built-in static assets
  --strip_sources[=bool]     Strip sources from rendered html (default true)
  --autoreload[=bool]        Reload server and page on template changes (default false)
  --template=<name>          Template name (default "${DEFAULT_TEMPLATE}"; empty disables templates)
  --connection_dir_root=<d>  Location of temporary connection files (default: system temp dir)
  --log-level=<level>        debug | info | warn | error (default info, env NBSTAGE_LOG_LEVEL)
  --help                     Show this message`;

export function parseServerConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const raw: Record<string, unknown> = {
    notebookPath: null,
    port: env.NBSTAGE_PORT ?? DEFAULT_PORT,
    staticRoot: BUILTIN_STATIC_ROOT,
    stripSources: true,
    autoreload: false,
    template: DEFAULT_TEMPLATE,
    connectionDirRoot: os.tmpdir(),
    logLevel: (env.NBSTAGE_LOG_LEVEL ?? "info").toLowerCase(),
    help: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    let name = (eq === -1 ? arg.slice(2) : arg.slice(2, eq)).replace(/-/g, "_");
    let inline: string | undefined = eq === -1 ? undefined : arg.slice(eq + 1);

    let negated = false;
    if (!OPTIONS[name] && name.startsWith("no_") && OPTIONS[name.slice(3)]?.kind === "boolean") {
      name = name.slice(3);
      negated = true;
    }

    const option = OPTIONS[name];
    if (!option) {
      throw new ConfigError(`Unknown option: ${arg}`, { option: arg });
    }

    if (option.kind === "boolean") {
      if (negated) {
        if (inline !== undefined) throw new ConfigError(`Option ${arg} takes no value`);
        raw[option.key] = false;
      } else {
        raw[option.key] = inline === undefined ? true : parseBool(inline, arg);
      }
      continue;
    }

    if (inline === undefined) {
      if (i + 1 >= argv.length) {
        throw new ConfigError(`Option --${name} requires a value`, { option: name });
      }
      inline = argv[++i];
    }
    raw[option.key] = option.key === "template" && inline === "" ? null : inline;
  }

  // Exactly one positional selects a notebook; anything else serves the tree.
  raw.notebookPath = positional.length === 1 ? positional[0] : null;

  const parsed = ServerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

/**
 * Read only `--template` from argv, for tools that resolve a template
 * without starting the server. Other arguments are ignored.
 */
export function parseTemplateOption(argv: string[]): string {
  let template = DEFAULT_TEMPLATE;

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--template") {
      if (i + 1 >= argv.length) {
        throw new ConfigError("Option --template requires a value", { option: "template" });
      }
      template = argv[++i];
    } else if (argv[i].startsWith("--template=")) {
      template = argv[i].slice("--template=".length);
    }
  }
  return template;
}

function parseBool(value: string, arg: string): boolean {
  const v = value.toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  throw new ConfigError(`Option ${arg} expects a boolean`, { value });
}
