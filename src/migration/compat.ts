/**
 * Compatibility Symlink Layer: links left at legacy paths so consumers
 * that still use them keep working. Never replaces anything that exists.
 */

import path from "node:path";
import { isDir, isFile, lexists } from "../exec/view.js";
import { CANONICAL_CONFIG, CANONICAL_DIR, legacyDirName } from "../homes/directory.js";
import { rebase } from "../homes/utils.js";
import { currentWorkspace, type MigrationContext } from "./context.js";
import type { MutationStep, StepReporter } from "./types.js";

function link(ctx: MigrationContext, report: StepReporter, target: string, at: string): void {
  report.attempt(at, () => ctx.executor.perform({ kind: "symlink", target, path: at }));
}

/**
 * Create every missing compatibility link:
 *   old home            -> new home (absolute)
 *   ~/.<legacy>         -> .openclaw
 *   old workspace path  -> new workspace (relative)
 *   <legacy>.json       -> openclaw.json
 */
export function createCompatibilitySymlinks(ctx: MigrationContext, report: StepReporter): void {
  const view = ctx.executor.view.fs;
  const { oldHome, newHome } = ctx;

  if (oldHome !== newHome && !lexists(view, oldHome)) {
    link(ctx, report, newHome, oldHome);
  }

  const canonicalDir = path.join(newHome, CANONICAL_DIR);
  if (isDir(view, canonicalDir)) {
    for (const name of ctx.config.legacyNames) {
      const legacy = path.join(newHome, legacyDirName(name));
      if (!lexists(view, legacy)) link(ctx, report, CANONICAL_DIR, legacy);
    }
  }

  const oldWorkspace = ctx.record.workspacePath;
  const newWorkspace = currentWorkspace(ctx);
  if (oldWorkspace && newWorkspace) {
    const stale = rebase(oldWorkspace, oldHome, newHome);
    if (stale !== newWorkspace && !lexists(view, stale) && isDir(view, newWorkspace)) {
      const parent = path.dirname(stale);
      report.attempt(stale, () => {
        if (!isDir(view, parent)) ctx.executor.perform({ kind: "mkdir", path: parent });
        ctx.executor.perform({ kind: "symlink", target: path.relative(parent, newWorkspace), path: stale });
      });
    }
  }

  const canonicalConfig = path.join(canonicalDir, CANONICAL_CONFIG);
  if (isFile(view, canonicalConfig)) {
    for (const name of ctx.config.legacyConfigNames) {
      const legacy = path.join(canonicalDir, `${name}.json`);
      if (!lexists(view, legacy)) link(ctx, report, CANONICAL_CONFIG, legacy);
    }
  }
}

export const compatibilitySymlinks: MutationStep = {
  name: "create-compatibility-symlinks",
  description: "Creating backward compatibility symlinks",
  fatal: false,
  enabled: (plan) => plan.createSymlinks,
  apply: createCompatibilitySymlinks,
};
