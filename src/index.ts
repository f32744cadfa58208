export * from "./templates/index.js";

export { parseServerConfig, ServerConfigSchema, DEFAULT_PORT } from "./shared/server_config.js";
export type { ServerConfig } from "./shared/server_config.js";
export { NbstageError, ConfigError, TemplateChainError, formatError } from "./shared/errors.js";
export { createLogger, silentLogger } from "./shared/logger.js";
export type { Logger, LogLevel } from "./shared/logger.js";

export { buildRouteTable, urlPathJoin } from "./server/routes.js";
export type { RouteSpec } from "./server/routes.js";
export { createApp, unavailableCollaborators } from "./server/app.js";
export type { NotebookCollaborators, AppOptions } from "./server/app.js";
export { multiStatic } from "./server/static_files.js";
export { createConnectionDir, removeConnectionDir } from "./server/connection_dir.js";
export { startServer } from "./server/listen.js";
