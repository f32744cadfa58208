/**
 * Connection directory lifecycle tests.
 *
 * Verifies:
 * - Creates a fresh nbstage_-prefixed directory under the root
 * - Removes it with its contents
 * - Refuses to remove directories without the prefix (safety)
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import path from "path";
import { createConnectionDir, removeConnectionDir } from "../../src/server/connection_dir.js";
import { ConfigError } from "../../src/shared/errors.js";
import { makeTempDir, removeTempDir } from "../helpers/template_fixture.js";

describe("connection directory", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it("creates a fresh prefixed directory under the root", () => {
    const a = createConnectionDir(root);
    const b = createConnectionDir(root);

    expect(path.dirname(a)).toBe(root);
    expect(path.basename(a).startsWith("nbstage_")).toBe(true);
    expect(existsSync(a)).toBe(true);
    expect(b).not.toBe(a);
  });

  it("removes the directory and its contents", () => {
    const dir = createConnectionDir(root);
    writeFileSync(path.join(dir, "kernel-1.json"), "{}");

    removeConnectionDir(dir);

    expect(existsSync(dir)).toBe(false);
  });

  it("tolerates a directory that is already gone", () => {
    const dir = createConnectionDir(root);
    removeConnectionDir(dir);
    expect(() => removeConnectionDir(dir)).not.toThrow();
  });

  it("refuses directories without the connection prefix (safety)", () => {
    const other = path.join(root, "keep-me");
    mkdirSync(other);

    expect(() => removeConnectionDir(other)).toThrow(ConfigError);
    expect(() => removeConnectionDir(root)).toThrow(/Safety/);
    expect(existsSync(other)).toBe(true);
  });
});
