import { describe, it, expect } from "vitest";
import { parseArgs } from "../../src/cli/args.js";
import { exitCodeFor } from "../../src/errors.js";

describe("parseArgs", () => {
  it("defaults every switch to off", () => {
    expect(parseArgs([])).toEqual({
      dryRun: false,
      nonInteractive: false,
      ignorePreflight: false,
      verbose: false,
      help: false,
      version: false,
    });
  });

  it("reads values, inline values and toggles", () => {
    expect(
      parseArgs([
        "--dry-run",
        "-y",
        "--old-user",
        "moltbot",
        "--new-user=agent1",
        "--no-create-symlinks",
        "--standardize-workspace",
        "--config",
        "/etc/claw-migrate/test.json",
        "-v",
      ]),
    ).toEqual({
      dryRun: true,
      nonInteractive: true,
      ignorePreflight: false,
      verbose: true,
      help: false,
      version: false,
      oldUser: "moltbot",
      newUser: "agent1",
      createSymlinks: false,
      standardizeWorkspace: true,
      configPath: "/etc/claw-migrate/test.json",
    });
  });

  it("lets the last toggle win", () => {
    const opts = parseArgs(["--rename-user", "--no-rename-user", "--no-migrate-legacy-dirs"]);
    expect(opts.renameUser).toBe(false);
    expect(opts.migrateLegacyDirs).toBe(false);
  });

  it("reads help, version and the preflight override", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--version"]).version).toBe(true);
    expect(parseArgs(["--ignore-preflight"]).ignorePreflight).toBe(true);
  });

  it("rejects unknown options with the usage exit code", () => {
    try {
      parseArgs(["--bogus"]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(Error);
      if (err instanceof Error) expect(err.message).toBe("unknown option: --bogus");
      expect(exitCodeFor(err)).toBe(64);
    }
    expect(() => parseArgs(["--no-rename-user=yes"])).toThrow("unknown option: --no-rename-user=yes");
    expect(() => parseArgs(["--no-dry-run"])).toThrow("unknown option: --no-dry-run");
  });

  it("requires a value after value options", () => {
    expect(() => parseArgs(["--old-user"])).toThrow("--old-user requires a value");
    expect(() => parseArgs(["--new-user", "--dry-run"])).toThrow("--new-user requires a value");
  });
});
