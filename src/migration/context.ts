/**
 * Migration context: everything a step needs, threaded explicitly
 * instead of shared globals. Built once per run from the frozen plan.
 */

import path from "node:path";
import type { InstallationRecord, Logger, MigrationPlan } from "../types.js";
import type { MigrateConfig } from "../config.js";
import type { GrantValidator } from "../host/types.js";
import type { Executor } from "../exec/executor.js";
import { isDir, isPlainFile, type SystemView } from "../exec/view.js";
import { homeOf, rebase } from "../homes/utils.js";
import { CANONICAL_DIR, CANONICAL_WORKSPACE, legacyDirName } from "../homes/directory.js";
import { findConfigDir, findConfigFile } from "../discovery/installation.js";
import { configuredWorkspace } from "../discovery/workspace.js";
import {
  applyRules,
  buildLegacyDirRules,
  buildPathRules,
  type RewriteRule,
} from "./rewrite.js";

export interface MigrationContext {
  readonly config: MigrateConfig;
  readonly logger: Logger;
  readonly executor: Executor;
  readonly grants: GrantValidator;
  readonly plan: MigrationPlan;
  readonly record: InstallationRecord;
  readonly oldHome: string;
  readonly newHome: string;
  /** Old home and legacy homes to the new home. */
  readonly pathRules: readonly RewriteRule[];
  /** Legacy config directory names to the canonical one. */
  readonly legacyDirRules: readonly RewriteRule[];
}

export interface ContextParams {
  config: MigrateConfig;
  logger: Logger;
  executor: Executor;
  grants: GrantValidator;
  plan: MigrationPlan;
  record: InstallationRecord;
}

export function createMigrationContext(params: ContextParams): MigrationContext {
  const { config, plan } = params;
  const oldHome = homeOf(config.homeRoot, plan.oldUser);
  const newHome = homeOf(config.homeRoot, plan.newUser);
  return {
    ...params,
    oldHome,
    newHome,
    pathRules: buildPathRules({
      oldHome,
      newHome,
      legacyHomes: config.legacyNames.map((name) => homeOf(config.homeRoot, name)),
    }),
    legacyDirRules: buildLegacyDirRules(config.legacyNames.map(legacyDirName), CANONICAL_DIR),
  };
}

/** The account as it is named right now: old before the rename, new after. */
export function accountName(ctx: MigrationContext): string {
  return ctx.executor.view.userExists(ctx.plan.oldUser) ? ctx.plan.oldUser : ctx.plan.newUser;
}

export function canonicalWorkspace(ctx: MigrationContext): string {
  return path.join(ctx.newHome, CANONICAL_DIR, CANONICAL_WORKSPACE);
}

/** Current config directory and file under the new home. */
export function configLocation(ctx: MigrationContext): { dir: string | null; file: string | null } {
  const view = ctx.executor.view.fs;
  const { dir } = findConfigDir(view, ctx.newHome, ctx.config.legacyNames);
  if (!dir) return { dir: null, file: null };
  return { dir, file: findConfigFile(view, dir, ctx.config.legacyConfigNames).file };
}

/**
 * Where the workspace is now: the config's declared directory, else the
 * discovered one carried over to the new home, else the canonical one.
 */
export function currentWorkspace(ctx: MigrationContext): string | null {
  const view = ctx.executor.view.fs;
  const declared = configuredWorkspace(view, configLocation(ctx).file, ctx.newHome);
  if (declared && isDir(view, declared)) return declared;

  if (ctx.record.workspacePath) {
    const carried = rebase(ctx.record.workspacePath, ctx.oldHome, ctx.newHome);
    if (isDir(view, carried)) return carried;
  }

  const canonical = canonicalWorkspace(ctx);
  return isDir(view, canonical) ? canonical : null;
}

/**
 * Rewrite one regular file through the executor when the rules change
 * it. Symlinks and missing files are left alone. Returns whether a write
 * was performed.
 */
export function rewriteFile(
  ctx: MigrationContext,
  file: string,
  rules: readonly RewriteRule[],
): boolean {
  const view: SystemView = ctx.executor.view;
  if (!isPlainFile(view.fs, file)) return false;
  const original = view.fs.readFile(file);
  const result = applyRules(original, rules);
  if (!result.changed) return false;
  ctx.executor.perform({
    kind: "write",
    path: file,
    content: result.text,
    label: `Update paths in ${file} (${result.replacements} replaced)`,
  });
  return true;
}
