/**
 * Migrator configuration resolution.
 *
 *   resolveMigrateConfig(raw)  defaults applied to an already-parsed object
 *   loadMigrateConfig(path?)   reads from file / env directly
 *
 * Everything is optional; the defaults describe a stock Linux host.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { isLogLevel, type LogLevel } from "./logger.js";
import { isValidUsername } from "./homes/utils.js";

export interface MigrateConfig {
  /** Parent of all login homes. */
  homeRoot: string;
  /** Directory holding one privilege-grant file per user. */
  grantDir: string;
  /** Directory holding system-level service unit files. */
  systemUnitDir: string;
  /** Old project names whose artifacts are folded into the canonical layout. */
  legacyNames: string[];
  /** Legacy names that had their own `<name>.json` config file. */
  legacyConfigNames: string[];
  /** Grace period between SIGTERM and SIGKILL when stopping a user's processes. */
  killGraceMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_LEGACY_NAMES = ["moltbot", "clawdbot", "clawd"];
export const DEFAULT_LEGACY_CONFIG_NAMES = ["moltbot", "clawdbot"];

export const CONFIG_ENV = "CLAW_MIGRATE_CONFIG";
export const CONFIG_FILENAME = "claw-migrate.json";
export const SYSTEM_CONFIG_PATH = path.join("/etc", "claw-migrate", CONFIG_FILENAME);

/** Safely coerce an unknown value to a string-keyed record. */
function toRecord(v: unknown): Record<string, unknown> {
  if (typeof v === "object" && v !== null && !Array.isArray(v)) {
    return Object.fromEntries(Object.entries(v));
  }
  return {};
}

function absolutePath(v: unknown, fallback: string): string {
  return typeof v === "string" && path.isAbsolute(v) ? path.normalize(v) : fallback;
}

function nameList(v: unknown, fallback: string[]): string[] {
  if (!Array.isArray(v)) return [...fallback];
  const names = v.filter((n): n is string => typeof n === "string" && isValidUsername(n));
  return [...new Set(names)];
}

export function resolveMigrateConfig(raw?: Record<string, unknown> | null): MigrateConfig {
  const r = toRecord(raw);

  const legacyNames = nameList(r.legacyNames, DEFAULT_LEGACY_NAMES);
  const legacyConfigNames = nameList(r.legacyConfigNames, DEFAULT_LEGACY_CONFIG_NAMES);

  return {
    homeRoot: absolutePath(r.homeRoot, "/home"),
    grantDir: absolutePath(r.grantDir, "/etc/sudoers.d"),
    systemUnitDir: absolutePath(r.systemUnitDir, "/etc/systemd/system"),
    legacyNames,
    legacyConfigNames,
    killGraceMs:
      typeof r.killGraceMs === "number" && Number.isFinite(r.killGraceMs) && r.killGraceMs >= 0
        ? r.killGraceMs
        : 2000,
    logLevel: isLogLevel(r.logLevel) ? r.logLevel : "info",
  };
}

/**
 * Config file search paths (highest priority first):
 *   1. explicit path (--config)
 *   2. $CLAW_MIGRATE_CONFIG
 *   3. ./claw-migrate.json (cwd)
 *   4. /etc/claw-migrate/claw-migrate.json
 */
function resolveConfigPath(explicit?: string): string | null {
  if (explicit) return explicit;
  const fromEnv = process.env[CONFIG_ENV];
  if (fromEnv) return fromEnv;

  const cwdPath = path.resolve(CONFIG_FILENAME);
  if (fs.existsSync(cwdPath)) return cwdPath;

  if (fs.existsSync(SYSTEM_CONFIG_PATH)) return SYSTEM_CONFIG_PATH;

  return null;
}

/**
 * Load migrator config from the file system.
 * Falls back to defaults if no config file is found.
 */
export function loadMigrateConfig(explicitPath?: string): MigrateConfig {
  const configPath = resolveConfigPath(explicitPath);
  if (!configPath) {
    return resolveMigrateConfig({});
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid claw-migrate config at ${configPath}: expected a JSON object`);
  }
  return resolveMigrateConfig(toRecord(raw));
}
