/**
 * Server configuration parsing tests.
 */

import { describe, it, expect } from "vitest";
import os from "os";
import { parseServerConfig, parseTemplateOption, DEFAULT_PORT } from "../src/shared/server_config.js";
import { ConfigError } from "../src/shared/errors.js";
import { BUILTIN_STATIC_ROOT } from "../src/templates/paths.js";

describe("parseServerConfig", () => {
  it("applies defaults with no arguments", () => {
    expect(parseServerConfig([], {})).toEqual({
      notebookPath: null,
      port: DEFAULT_PORT,
      staticRoot: BUILTIN_STATIC_ROOT,
      stripSources: true,
      autoreload: false,
      template: "default",
      connectionDirRoot: os.tmpdir(),
      logLevel: "info",
      help: false,
    });
  });

  it("takes the notebook path from the single positional argument", () => {
    expect(parseServerConfig(["example.ipynb"], {}).notebookPath).toBe("example.ipynb");
  });

  it("serves the tree when given more than one notebook path", () => {
    expect(parseServerConfig(["a.ipynb", "b.ipynb"], {}).notebookPath).toBeNull();
  });

  it("accepts --opt=value and --opt value", () => {
    expect(parseServerConfig(["--port=9000"], {}).port).toBe(9000);
    expect(parseServerConfig(["--port", "9001"], {}).port).toBe(9001);
    expect(parseServerConfig(["--template", "gridstack"], {}).template).toBe("gridstack");
  });

  it("disables templates with an empty --template", () => {
    expect(parseServerConfig(["--template="], {}).template).toBeNull();
  });

  it("parses boolean flags", () => {
    expect(parseServerConfig(["--autoreload"], {}).autoreload).toBe(true);
    expect(parseServerConfig(["--strip_sources=false"], {}).stripSources).toBe(false);
    expect(parseServerConfig(["--strip-sources=no"], {}).stripSources).toBe(false);
    expect(parseServerConfig(["--no-strip_sources"], {}).stripSources).toBe(false);
  });

  it("rejects a non-boolean value for a boolean flag", () => {
    expect(() => parseServerConfig(["--autoreload=maybe"], {})).toThrow("Option --autoreload=maybe expects a boolean");
  });

  it("reads the port and log level from the environment", () => {
    const config = parseServerConfig([], { NBSTAGE_PORT: "7000", NBSTAGE_LOG_LEVEL: "WARN" });
    expect(config.port).toBe(7000);
    expect(config.logLevel).toBe("warn");
  });

  it("prefers command-line values over the environment", () => {
    expect(parseServerConfig(["--port=9000"], { NBSTAGE_PORT: "7000" }).port).toBe(9000);
  });

  it("maps --static and --connection_dir_root", () => {
    const config = parseServerConfig(["--static=/srv/static", "--connection-dir-root", "/var/run/nb"], {});
    expect(config.staticRoot).toBe("/srv/static");
    expect(config.connectionDirRoot).toBe("/var/run/nb");
  });

  it("rejects unknown options", () => {
    expect(() => parseServerConfig(["--bogus"], {})).toThrow("Unknown option: --bogus");
  });

  it("rejects an option missing its value", () => {
    expect(() => parseServerConfig(["--port"], {})).toThrow("Option --port requires a value");
  });

  it("rejects an invalid port", () => {
    expect(() => parseServerConfig(["--port=abc"], {})).toThrow(/^Invalid configuration: port: /);
    expect(() => parseServerConfig(["--port=70000"], {})).toThrow(ConfigError);
  });

  it("rejects an unknown log level", () => {
    expect(() => parseServerConfig(["--log-level=loud"], {})).toThrow(/^Invalid configuration: logLevel: /);
  });

  it("sets help", () => {
    expect(parseServerConfig(["--help"], {}).help).toBe(true);
  });
});

describe("parseTemplateOption", () => {
  it("defaults to 'default'", () => {
    expect(parseTemplateOption([])).toBe("default");
  });

  it("reads --template in both spellings", () => {
    expect(parseTemplateOption(["--template", "gridstack"])).toBe("gridstack");
    expect(parseTemplateOption(["--template=fancy"])).toBe("fancy");
  });

  it("rejects a trailing --template with no value", () => {
    expect(() => parseTemplateOption(["--template"])).toThrow("Option --template requires a value");
    expect(() => parseTemplateOption(["--template"])).toThrow(ConfigError);
  });
});
