/**
 * Route table for the notebook server.
 *
 * Built as plain data from the configuration and the template resolution,
 * then mounted by createApp. Kernel API routes are owned by the kernel
 * management layer and are not part of this table.
 */

import type { ServerConfig } from "../shared/server_config.js";
import type { ResolutionResult } from "../templates/types.js";

export type RouteSpec =
  | {
      kind: "static";
      path: string;
      paths: readonly string[];
      defaultFilename: string;
    }
  | {
      kind: "render";
      path: string;
      /** Fixed notebook; null when the notebook comes from the URL. */
      notebookPath: string | null;
      stripSources: boolean;
      conversionTemplatePaths: readonly string[];
    }
  | {
      kind: "tree";
      path: string;
    };

/** Join URL segments with exactly one slash between them. */
export function urlPathJoin(...pieces: string[]): string {
  const initial = pieces[0]?.startsWith("/") ?? false;
  const final = pieces[pieces.length - 1]?.endsWith("/") ?? false;
  const inner = pieces
    .map((p) => p.replace(/^\/+|\/+$/g, ""))
    .filter((p) => p !== "")
    .join("/");

  let result = inner;
  if (initial) result = "/" + result;
  if (final && result !== "/") result = result + "/";
  return result === "" ? "/" : result;
}

export function buildRouteTable(
  config: Pick<ServerConfig, "notebookPath" | "stripSources">,
  resolution: ResolutionResult,
  baseUrl = "/",
): RouteSpec[] {
  const routes: RouteSpec[] = [
    {
      kind: "static",
      path: urlPathJoin(baseUrl, "/nbstage/static"),
      paths: resolution.staticPaths,
      defaultFilename: "index.html",
    },
  ];

  if (config.notebookPath) {
    routes.push({
      kind: "render",
      path: urlPathJoin(baseUrl, "/"),
      notebookPath: config.notebookPath,
      stripSources: config.stripSources,
      conversionTemplatePaths: resolution.conversionTemplatePaths,
    });
  } else {
    routes.push(
      { kind: "tree", path: urlPathJoin(baseUrl, "/") },
      { kind: "tree", path: urlPathJoin(baseUrl, "/nbstage/tree") },
      {
        kind: "render",
        path: urlPathJoin(baseUrl, "/nbstage/render"),
        notebookPath: null,
        stripSources: config.stripSources,
        conversionTemplatePaths: resolution.conversionTemplatePaths,
      },
    );
  }

  return routes;
}
