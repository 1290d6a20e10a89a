/**
 * Builds the InstallationRecord for the chosen owner: config directory,
 * config file and workspace.
 */

import path from "node:path";
import type { InstallationRecord, Logger } from "../types.js";
import type { MigrateConfig } from "../config.js";
import { createLiveFsView, isDir, isFile, type FsView } from "../exec/view.js";
import { CANONICAL_CONFIG, CANONICAL_DIR, legacyDirName } from "../homes/directory.js";
import { resolveWorkspace } from "./workspace.js";

interface RecordParams {
  config: MigrateConfig;
  logger: Logger;
  fs?: FsView;
}

/** `.openclaw/` if present, else the first legacy directory present. */
export function findConfigDir(
  view: FsView,
  home: string,
  legacyNames: string[],
): { dir: string | null; legacy: boolean } {
  const canonical = path.join(home, CANONICAL_DIR);
  if (isDir(view, canonical)) return { dir: canonical, legacy: false };
  for (const name of legacyNames) {
    const dir = path.join(home, legacyDirName(name));
    if (isDir(view, dir)) return { dir, legacy: true };
  }
  return { dir: null, legacy: false };
}

/** `openclaw.json` if present, else the first legacy `<name>.json`. */
export function findConfigFile(
  view: FsView,
  configDir: string,
  legacyConfigNames: string[],
): { file: string | null; legacy: boolean } {
  const canonical = path.join(configDir, CANONICAL_CONFIG);
  if (isFile(view, canonical)) return { file: canonical, legacy: false };
  for (const name of legacyConfigNames) {
    const file = path.join(configDir, `${name}.json`);
    if (isFile(view, file)) return { file, legacy: true };
  }
  return { file: null, legacy: false };
}

export function buildInstallationRecord(
  owningUser: string,
  homePath: string,
  params: RecordParams,
): InstallationRecord {
  const { config, logger } = params;
  const view = params.fs ?? createLiveFsView();
  const notes: string[] = [];

  const configDir = findConfigDir(view, homePath, config.legacyNames);
  if (configDir.dir && configDir.legacy) {
    notes.push(`Config in legacy location: ${path.basename(configDir.dir)}`);
  }

  let configFile: string | null = null;
  if (configDir.dir) {
    const found = findConfigFile(view, configDir.dir, config.legacyConfigNames);
    configFile = found.file;
    if (found.file && found.legacy) {
      notes.push(`Config file is legacy: ${path.basename(found.file)}`);
    }
  }

  logger.info(`[claw-migrate:discovery] config dir: ${configDir.dir ?? "not found"}`);
  logger.info(`[claw-migrate:discovery] config file: ${configFile ?? "not found"}`);

  const workspace = resolveWorkspace(
    { owningUser, homePath, configFile },
    { legacyNames: config.legacyConfigNames, fs: view, logger },
  );
  if (!workspace.path) {
    notes.push("No workspace directory detected - will create standard workspace");
  }

  return {
    owningUser,
    homePath,
    configDir: configDir.dir,
    configFile,
    workspacePath: workspace.path,
    workspaceSource: workspace.source,
    conflicts: workspace.conflicts,
    notes,
  };
}
