import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  CONFIG_ENV,
  DEFAULT_LEGACY_CONFIG_NAMES,
  DEFAULT_LEGACY_NAMES,
  loadMigrateConfig,
  resolveMigrateConfig,
} from "../src/config.js";

describe("loadMigrateConfig", () => {
  const origEnv = process.env[CONFIG_ENV];
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "claw-migrate-cfg-test-"));
    delete process.env[CONFIG_ENV];
  });

  afterEach(() => {
    if (origEnv !== undefined) {
      process.env[CONFIG_ENV] = origEnv;
    } else {
      delete process.env[CONFIG_ENV];
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns defaults when no config file exists", () => {
    const origCwd = process.cwd();
    process.chdir(tmpDir);
    try {
      const config = loadMigrateConfig();
      expect(config.homeRoot).toBe("/home");
      expect(config.grantDir).toBe("/etc/sudoers.d");
    } finally {
      process.chdir(origCwd);
    }
  });

  it("loads config from the environment variable", () => {
    const configPath = path.join(tmpDir, "custom.json");
    fs.writeFileSync(configPath, JSON.stringify({ homeRoot: "/srv/homes", killGraceMs: 500 }));
    process.env[CONFIG_ENV] = configPath;

    const config = loadMigrateConfig();
    expect(config.homeRoot).toBe("/srv/homes");
    expect(config.killGraceMs).toBe(500);
  });

  it("prefers an explicit path over the environment", () => {
    const fromEnv = path.join(tmpDir, "env.json");
    const explicit = path.join(tmpDir, "explicit.json");
    fs.writeFileSync(fromEnv, JSON.stringify({ homeRoot: "/env" }));
    fs.writeFileSync(explicit, JSON.stringify({ homeRoot: "/explicit" }));
    process.env[CONFIG_ENV] = fromEnv;

    expect(loadMigrateConfig(explicit).homeRoot).toBe("/explicit");
  });

  it("finds claw-migrate.json in the working directory", () => {
    fs.writeFileSync(path.join(tmpDir, "claw-migrate.json"), JSON.stringify({ logLevel: "debug" }));
    const origCwd = process.cwd();
    process.chdir(tmpDir);
    try {
      expect(loadMigrateConfig().logLevel).toBe("debug");
    } finally {
      process.chdir(origCwd);
    }
  });

  it("throws on invalid JSON content", () => {
    const configPath = path.join(tmpDir, "bad.json");
    fs.writeFileSync(configPath, "not json");
    process.env[CONFIG_ENV] = configPath;

    expect(() => loadMigrateConfig()).toThrow();
  });

  it("throws on non-object JSON (array)", () => {
    const configPath = path.join(tmpDir, "array.json");
    fs.writeFileSync(configPath, JSON.stringify([1, 2, 3]));
    process.env[CONFIG_ENV] = configPath;

    expect(() => loadMigrateConfig()).toThrow("expected a JSON object");
  });
});

describe("resolveMigrateConfig", () => {
  it("applies defaults for missing fields", () => {
    const config = resolveMigrateConfig({});
    expect(config).toEqual({
      homeRoot: "/home",
      grantDir: "/etc/sudoers.d",
      systemUnitDir: "/etc/systemd/system",
      legacyNames: DEFAULT_LEGACY_NAMES,
      legacyConfigNames: DEFAULT_LEGACY_CONFIG_NAMES,
      killGraceMs: 2000,
      logLevel: "info",
    });
  });

  it("handles null and undefined input", () => {
    expect(resolveMigrateConfig(null).homeRoot).toBe("/home");
    expect(resolveMigrateConfig(undefined).homeRoot).toBe("/home");
  });

  it("rejects relative paths", () => {
    expect(resolveMigrateConfig({ homeRoot: "homes" }).homeRoot).toBe("/home");
    expect(resolveMigrateConfig({ grantDir: "/etc/sudoers.d/" }).grantDir).toBe("/etc/sudoers.d/");
  });

  it("keeps only valid, distinct legacy names", () => {
    const config = resolveMigrateConfig({ legacyNames: ["oldbot", "Bad Name", 7, "oldbot", "clawd"] });
    expect(config.legacyNames).toEqual(["oldbot", "clawd"]);
  });

  it("falls back for a negative grace period and an unknown log level", () => {
    const config = resolveMigrateConfig({ killGraceMs: -1, logLevel: "loud" });
    expect(config.killGraceMs).toBe(2000);
    expect(config.logLevel).toBe("info");
  });
});
