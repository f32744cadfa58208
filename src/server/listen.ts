/**
 * Start the HTTP server for a prepared connection directory.
 *
 * If the server cannot bind (port in use, permission denied) the
 * connection directory is removed before the error is returned.
 */

import type { Express } from "express";
import type { Server } from "http";
import { removeConnectionDir } from "./connection_dir.js";

export function startServer(app: Express, port: number, connectionDir: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once("listening", () => resolve(server));
    server.once("error", (err) => {
      removeConnectionDir(connectionDir);
      reject(err);
    });
  });
}
