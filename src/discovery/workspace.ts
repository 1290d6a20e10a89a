/**
 * Workspace Resolver: picks the authoritative workspace directory.
 *
 * Sources are tried in fixed priority order and the first hit wins:
 *   1. config    the config file's `workspace` field
 *   2. standard  ~/.openclaw/workspace with marker files
 *   3. custom    ~/workspace, ~/openclaw, ~/<user> with marker files
 *   4. legacy    ~/<legacy name> with marker files
 * Every later hit is reported as a conflict. Nothing is merged here.
 */

import path from "node:path";
import type { Logger, WorkspaceResolution, WorkspaceSource } from "../types.js";
import { createLiveFsView, followLinks, hasAnyFile, isDir, isFile, type FsView } from "../exec/view.js";
import { readWorkspaceField } from "../migration/rewrite.js";
import { expandHome } from "../homes/utils.js";
import {
  CANONICAL_DIR,
  CANONICAL_WORKSPACE,
  CUSTOM_WORKSPACE_MARKERS,
  PACKAGE_NAME,
  WORKSPACE_MARKERS,
} from "../homes/directory.js";

export interface WorkspaceQuery {
  owningUser: string;
  homePath: string;
  configFile: string | null;
}

export interface ResolverOptions {
  /** Legacy product names checked as `~/<name>` workspaces. */
  legacyNames: string[];
  fs?: FsView;
  logger?: Logger;
}

interface Hit {
  path: string;
  source: WorkspaceSource;
  conflictNote: string;
}

/** The path declared in a config file, `~` expanded, or null. */
export function configuredWorkspace(view: FsView, configFile: string | null, home: string): string | null {
  if (!configFile || !isFile(view, configFile)) return null;
  const declared = readWorkspaceField(view.readFile(configFile));
  if (!declared) return null;
  return path.resolve(home, expandHome(declared, home));
}

export function resolveWorkspace(query: WorkspaceQuery, options: ResolverOptions): WorkspaceResolution {
  const view = options.fs ?? createLiveFsView();
  const { homePath: home, owningUser } = query;
  const conflicts: string[] = [];
  const hits: Hit[] = [];

  const declared = configuredWorkspace(view, query.configFile, home);
  if (declared) {
    if (isDir(view, declared)) {
      hits.push({ path: declared, source: "config", conflictNote: "Workspace declared in config" });
    } else {
      conflicts.push(`Config points to non-existent workspace: ${declared}`);
    }
  }

  const standard = path.join(home, CANONICAL_DIR, CANONICAL_WORKSPACE);
  if (hasAnyFile(view, standard, WORKSPACE_MARKERS)) {
    hits.push({ path: standard, source: "standard", conflictNote: "Workspace also found at standard location" });
  }

  for (const custom of [
    path.join(home, CANONICAL_WORKSPACE),
    path.join(home, PACKAGE_NAME),
    path.join(home, owningUser),
  ]) {
    if (hasAnyFile(view, custom, CUSTOM_WORKSPACE_MARKERS)) {
      hits.push({ path: custom, source: "custom", conflictNote: "Additional workspace found" });
    }
  }

  for (const legacy of options.legacyNames) {
    const dir = path.join(home, legacy);
    if (hasAnyFile(view, dir, WORKSPACE_MARKERS)) {
      hits.push({ path: dir, source: "legacy", conflictNote: "Legacy workspace also found" });
    }
  }

  const [winner, ...rest] = hits;
  if (!winner) {
    options.logger?.warn(`[claw-migrate:workspace] no workspace found under ${home}`);
    return { path: null, source: null, conflicts };
  }

  // the same directory can be reached under two names (a compatibility link)
  const seen = new Set<string>([followLinks(view, winner.path)]);
  for (const hit of rest) {
    const identity = followLinks(view, hit.path);
    if (seen.has(identity)) continue;
    seen.add(identity);
    conflicts.push(`${hit.conflictNote}: ${hit.path}`);
  }

  options.logger?.info(`[claw-migrate:workspace] ${winner.path} (from ${winner.source})`);
  for (const c of conflicts) {
    options.logger?.warn(`[claw-migrate:workspace] ${c}`);
  }
  return { path: winner.path, source: winner.source, conflicts };
}

/** Top-level entries worth showing the operator. */
export function describeWorkspaceContents(view: FsView, workspace: string): string[] {
  const shown: string[] = [];
  for (const name of ["AGENTS.md", "SOUL.md", "MEMORY.md"]) {
    if (isFile(view, path.join(workspace, name))) shown.push(name);
  }
  for (const name of ["memory", "scripts"]) {
    if (isDir(view, path.join(workspace, name))) shown.push(`${name}/`);
  }
  return shown;
}
