/**
 * Express application assembly.
 *
 * Static routes are served here; render and tree routes delegate to
 * handlers supplied by the notebook collaborators.
 */

import express from "express";
import type { Express, RequestHandler } from "express";
import { multiStatic } from "./static_files.js";
import type { RouteSpec } from "./routes.js";
import type { ResolutionResult } from "../templates/types.js";

type RenderRoute = Extract<RouteSpec, { kind: "render" }>;
type TreeRoute = Extract<RouteSpec, { kind: "tree" }>;

/** Notebook rendering and directory browsing, provided from outside. */
export interface NotebookCollaborators {
  render(route: RenderRoute): RequestHandler;
  tree(route: TreeRoute): RequestHandler;
}

export interface AppOptions {
  /** Re-read templates from disk on every render instead of caching them. */
  autoreload?: boolean;
}

export function createApp(
  routes: readonly RouteSpec[],
  resolution: ResolutionResult,
  collaborators: NotebookCollaborators,
  options: AppOptions = {},
): Express {
  const app = express();
  app.set("view cache", !options.autoreload);

  // Page-template search path for whichever engine renders pages.
  app.locals.templatePaths = resolution.templatePaths;
  app.locals.conversionTemplatePaths = resolution.conversionTemplatePaths;

  for (const route of routes) {
    switch (route.kind) {
      case "static":
        app.use(route.path, multiStatic(route.paths, { defaultFilename: route.defaultFilename }));
        break;
      case "render":
        mount(app, route.path, route.notebookPath === null, collaborators.render(route));
        break;
      case "tree":
        mount(app, route.path, route.path !== "/" && !route.path.endsWith("/"), collaborators.tree(route));
        break;
    }
  }

  return app;
}

/** Collaborators that answer 501; used when nothing renders notebooks. */
export const unavailableCollaborators: NotebookCollaborators = {
  render: () => (_req, res) => {
    res.status(501).json({ error: "Notebook rendering is not configured" });
  },
  tree: () => (_req, res) => {
    res.status(501).json({ error: "Notebook tree browsing is not configured" });
  },
};

/** Mount a handler at `path`, and below it when the route takes a sub-path. */
function mount(app: Express, path: string, withSubpath: boolean, handler: RequestHandler): void {
  app.get(path, handler);
  if (withSubpath) {
    app.get(`${path.replace(/\/$/, "")}/*`, handler);
  }
}
