import path from "node:path";
import { followLinks, isDir, isPlainDir, isPlainFile, type FsView } from "../../exec/view.js";
import { CANONICAL_DIR, CREDENTIALS_DIR, SENSITIVE_FILES } from "../../homes/directory.js";
import { isWithin } from "../../homes/utils.js";
import { configLocation, currentWorkspace, type MigrationContext } from "../context.js";
import type { MutationStep, StepReporter } from "../types.js";

const OWNER_ONLY_FILE = 0o600;
const OWNER_ONLY_DIR = 0o700;
const GRANT_MODE = 0o440;
const GRANT_OWNER = "root";

/** Home entries that are often symlinked elsewhere. */
const LINKED_STATE_DIRS = [CANONICAL_DIR, ".config", ".local"];

/** Trees outside the home that the account still owns, in a stable order. */
function externalTrees(ctx: MigrationContext, view: FsView): string[] {
  const trees: string[] = [];
  const add = (p: string) => {
    if (!isWithin(p, ctx.newHome) && !trees.some((t) => isWithin(p, t))) trees.push(p);
  };

  const workspace = currentWorkspace(ctx);
  if (workspace) add(followLinks(view, workspace));

  for (const name of LINKED_STATE_DIRS) {
    const p = path.join(ctx.newHome, name);
    if (view.kind(p) === "symlink" && isDir(view, p)) add(followLinks(view, p));
  }
  return trees;
}

function secureConfig(ctx: MigrationContext, report: StepReporter): void {
  const view = ctx.executor.view.fs;
  const { dir } = configLocation(ctx);
  if (!dir) return;

  for (const name of SENSITIVE_FILES) {
    const file = path.join(dir, name);
    if (!isPlainFile(view, file)) continue;
    report.attempt(file, () => ctx.executor.perform({ kind: "chmod", path: file, mode: OWNER_ONLY_FILE }));
  }

  const credentials = path.join(dir, CREDENTIALS_DIR);
  if (isPlainDir(view, credentials)) {
    report.attempt(credentials, () => {
      ctx.executor.perform({ kind: "chmod", path: credentials, mode: OWNER_ONLY_DIR });
      ctx.executor.perform({ kind: "chmod", path: credentials, mode: OWNER_ONLY_FILE, filesBelow: true });
    });
  }
}

function secureGrant(ctx: MigrationContext, report: StepReporter): void {
  const grant = path.join(ctx.config.grantDir, ctx.plan.newUser);
  if (!isPlainFile(ctx.executor.view.fs, grant)) return;
  report.attempt(grant, () => {
    ctx.executor.perform({ kind: "chown", path: grant, user: GRANT_OWNER, recursive: false });
    ctx.executor.perform({ kind: "chmod", path: grant, mode: GRANT_MODE });
  });
}

/**
 * Give the new account the whole home plus any workspace or state tree
 * linked from outside it, then restore owner-only modes on secrets and
 * root ownership on the grant file.
 */
export const fixOwnership: MutationStep = {
  name: "fix-ownership",
  description: "Fixing file ownership and permissions",
  fatal: false,

  apply(ctx, report) {
    const view = ctx.executor.view;
    const user = ctx.plan.newUser;
    if (!view.userExists(user)) {
      report.note(`account ${user} not found, ownership left unchanged`);
      return;
    }

    if (isPlainDir(view.fs, ctx.newHome)) {
      report.attempt(ctx.newHome, () =>
        ctx.executor.perform({ kind: "chown", path: ctx.newHome, user, recursive: true }),
      );
    }
    for (const tree of externalTrees(ctx, view.fs)) {
      report.attempt(tree, () => ctx.executor.perform({ kind: "chown", path: tree, user, recursive: true }));
    }

    secureConfig(ctx, report);
    secureGrant(ctx, report);
  },
};
