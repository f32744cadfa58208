/**
 * HTTP wiring tests against an in-process server on an ephemeral port.
 *
 * Tests:
 *   - Static files come from the first directory on the search path
 *   - Directory requests serve index.html
 *   - Render and tree routes reach the collaborators
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdirSync, writeFileSync } from "fs";
import type { Server } from "http";
import path from "path";
import { createApp, unavailableCollaborators } from "../../src/server/app.js";
import type { NotebookCollaborators } from "../../src/server/app.js";
import { buildRouteTable } from "../../src/server/routes.js";
import type { RouteSpec } from "../../src/server/routes.js";
import type { ResolutionResult } from "../../src/templates/types.js";
import { makeTempDir, removeTempDir } from "../helpers/template_fixture.js";

function listen(app: ReturnType<typeof createApp>): Promise<{ server: Server; base: string }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("expected a TCP address"));
        return;
      }
      resolve({ server, base: `http://127.0.0.1:${address.port}` });
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

describe("createApp", () => {
  let tmp: string;
  let resolution: ResolutionResult;

  beforeAll(() => {
    tmp = makeTempDir();
    const derived = path.join(tmp, "derived");
    const base = path.join(tmp, "base");
    mkdirSync(derived);
    mkdirSync(path.join(base, "docs"), { recursive: true });

    writeFileSync(path.join(derived, "app.css"), "derived");
    writeFileSync(path.join(base, "app.css"), "base");
    writeFileSync(path.join(base, "only-base.js"), "base-only");
    writeFileSync(path.join(base, "docs", "index.html"), "<p>docs</p>");

    resolution = {
      template: "derived",
      templatePaths: [path.join(tmp, "templates")],
      staticPaths: [path.join(tmp, "missing"), derived, base],
      conversionTemplatePaths: [path.join(tmp, "nbconvert_templates")],
      layers: [],
      warnings: [],
    };
  });

  afterAll(() => {
    removeTempDir(tmp);
  });

  describe("static assets", () => {
    let server: Server;
    let base: string;

    beforeAll(async () => {
      const routes = buildRouteTable({ notebookPath: "example.ipynb", stripSources: true }, resolution);
      ({ server, base } = await listen(createApp(routes, resolution, unavailableCollaborators)));
    });

    afterAll(async () => {
      await close(server);
    });

    it("serves the first directory's copy of a file", async () => {
      const res = await fetch(`${base}/nbstage/static/app.css`);
      expect(res.status).toBe(200);
      expect(await res.text()).toBe("derived");
    });

    it("falls through to later directories", async () => {
      const res = await fetch(`${base}/nbstage/static/only-base.js`);
      expect(await res.text()).toBe("base-only");
    });

    it("serves index.html for a directory request", async () => {
      const res = await fetch(`${base}/nbstage/static/docs/`);
      expect(res.status).toBe(200);
      expect(await res.text()).toBe("<p>docs</p>");
    });

    it("redirects a directory request missing its trailing slash", async () => {
      const res = await fetch(`${base}/nbstage/static/docs`, { redirect: "manual" });
      expect(res.status).toBe(301);
      expect(res.headers.get("location")).toBe("/nbstage/static/docs/");
    });

    it("answers 404 when no directory has the file", async () => {
      const res = await fetch(`${base}/nbstage/static/nope.txt`);
      expect(res.status).toBe(404);
    });

    it("answers 501 from the default render collaborator", async () => {
      const res = await fetch(`${base}/`);
      expect(res.status).toBe(501);
      expect(await res.json()).toEqual({ error: "Notebook rendering is not configured" });
    });
  });

  describe("collaborator routes", () => {
    let server: Server;
    let base: string;

    beforeAll(async () => {
      const collaborators: NotebookCollaborators = {
        render: (route) => (req, res) => {
          res.json({ handler: "render", path: req.path, stripSources: route.stripSources });
        },
        tree: (route) => (req, res) => {
          res.json({ handler: "tree", route: route.path, path: req.path });
        },
      };
      const routes: RouteSpec[] = buildRouteTable({ notebookPath: null, stripSources: false }, resolution);
      const app = createApp(routes, resolution, collaborators, { autoreload: true });
      expect(app.locals.templatePaths).toEqual([path.join(tmp, "templates")]);
      expect(app.get("view cache")).toBe(false);
      ({ server, base } = await listen(app));
    });

    afterAll(async () => {
      await close(server);
    });

    it("routes the root to the tree handler", async () => {
      const res = await fetch(`${base}/`);
      expect(await res.json()).toEqual({ handler: "tree", route: "/", path: "/" });
    });

    it("routes nested tree paths", async () => {
      const res = await fetch(`${base}/nbstage/tree/notebooks/demo`);
      expect(await res.json()).toEqual({ handler: "tree", route: "/nbstage/tree", path: "/nbstage/tree/notebooks/demo" });
    });

    it("routes notebook paths to the render handler", async () => {
      const res = await fetch(`${base}/nbstage/render/notebooks/demo.ipynb`);
      expect(await res.json()).toEqual({
        handler: "render",
        path: "/nbstage/render/notebooks/demo.ipynb",
        stripSources: false,
      });
    });
  });
});
