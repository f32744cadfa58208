#!/usr/bin/env node
/**
 * CLI: nbstage
 *
 * Usage: npm run serve -- [--port=8866] [--template=<name>] [NOTEBOOK_FILENAME]
 *
 * Resolves the configured template, prepares the connection directory and
 * starts the HTTP server. The connection directory is removed on exit.
 */

import "dotenv/config";
import { parseServerConfig, USAGE } from "../shared/server_config.js";
import type { ServerConfig } from "../shared/server_config.js";
import { createLogger } from "../shared/logger.js";
import type { Logger } from "../shared/logger.js";
import { ConfigError, TemplateChainError, formatError } from "../shared/errors.js";
import { TemplateRegistry } from "../templates/registry.js";
import { candidateTemplateRoots } from "../templates/paths.js";
import type { ResolutionResult } from "../templates/types.js";
import { buildRouteTable } from "../server/routes.js";
import { createApp, unavailableCollaborators } from "../server/app.js";
import { createConnectionDir, removeConnectionDir } from "../server/connection_dir.js";
import { startServer } from "../server/listen.js";

function loadConfig(): ServerConfig {
  try {
    return parseServerConfig(process.argv.slice(2));
  } catch (err) {
    console.error(formatError(err));
    console.error();
    console.error(USAGE);
    process.exit(1);
  }
}

function resolveTemplate(registry: TemplateRegistry, config: ServerConfig, logger: Logger): ResolutionResult {
  try {
    return registry.resolve(config.template);
  } catch (err) {
    if (err instanceof TemplateChainError || err instanceof ConfigError) {
      logger.error(formatError(err));
      process.exit(1);
    }
    throw err;
  }
}

function main(): void {
  const config = loadConfig();

  if (config.help) {
    console.log(USAGE);
    return;
  }

  const logger = createLogger(config.logLevel);
  const registry = new TemplateRegistry({
    roots: candidateTemplateRoots(),
    builtinStaticDir: config.staticRoot,
    logger,
  });

  const resolution = resolveTemplate(registry, config, logger);

  const connectionDir = createConnectionDir(config.connectionDirRoot);
  logger.info(`Storing connection files in ${connectionDir}.`);
  logger.info(`Serving static files from ${config.staticRoot}.`);

  const routes = buildRouteTable(config, resolution);
  const app = createApp(routes, resolution, unavailableCollaborators, {
    autoreload: config.autoreload,
  });

  startServer(app, config.port, connectionDir).then(
    (server) => {
      logger.info(`nbstage listening on port ${config.port}.`);

      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down.`);
        server.close(() => {
          removeConnectionDir(connectionDir);
          process.exit(0);
        });
      };
      process.once("SIGINT", () => shutdown("SIGINT"));
      process.once("SIGTERM", () => shutdown("SIGTERM"));
    },
    (err: unknown) => {
      logger.error(formatError(err));
      process.exit(1);
    },
  );
}

main();
