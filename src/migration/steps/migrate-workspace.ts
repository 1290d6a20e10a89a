import path from "node:path";
import { followLinks, isDir, isPlainDir, isPlainFile, lexists, type FsView } from "../../exec/view.js";
import { CANONICAL_WORKSPACE_REF, WORKSPACE_MARKDOWN_DIRS } from "../../homes/directory.js";
import { expandHome } from "../../homes/utils.js";
import { applyRules, workspaceFieldRule } from "../rewrite.js";
import {
  canonicalWorkspace,
  configLocation,
  currentWorkspace,
  rewriteFile,
  type MigrationContext,
} from "../context.js";
import type { MutationStep, StepReporter } from "../types.js";

export const CONFLICT_SUFFIX = ".migrated";

/** First free `<p>.migrated`, `<p>.migrated-2`, ... */
export function conflictPath(view: FsView, p: string): string {
  let candidate = `${p}${CONFLICT_SUFFIX}`;
  for (let n = 2; lexists(view, candidate); n++) {
    candidate = `${p}${CONFLICT_SUFFIX}-${n}`;
  }
  return candidate;
}

function sameContent(view: FsView, a: string, b: string): boolean {
  return isPlainFile(view, a) && isPlainFile(view, b) && view.readFile(a) === view.readFile(b);
}

/**
 * Copy `src` into `dst` without overwriting. Identical files are skipped;
 * a differing file is copied beside the existing one under a conflict name.
 */
function mergeInto(ctx: MigrationContext, src: string, dst: string, report: StepReporter): void {
  const view = ctx.executor.view.fs;
  for (const name of view.readdir(src)) {
    const from = path.join(src, name);
    const to = path.join(dst, name);
    const kind = view.kind(from);

    if (kind === "dir") {
      if (!lexists(view, to)) {
        ctx.executor.perform({ kind: "mkdir", path: to });
        mergeInto(ctx, from, to, report);
      } else if (isPlainDir(view, to)) {
        mergeInto(ctx, from, to, report);
      } else {
        const aside = conflictPath(view, to);
        ctx.executor.perform({ kind: "move", from, to: aside });
        report.note(`kept both: ${to} and ${aside}`);
      }
      continue;
    }
    if (kind !== "file" && kind !== "symlink") continue;

    if (!lexists(view, to)) {
      ctx.executor.perform({ kind: "copy", from, to });
    } else if (sameContent(view, from, to)) {
      report.note(`identical, skipped: ${to}`);
    } else {
      const aside = conflictPath(view, to);
      ctx.executor.perform({ kind: "copy", from, to: aside });
      report.note(`kept both: ${to} and ${aside}`);
    }
  }
}

function moveToCanonical(ctx: MigrationContext, current: string, report: StepReporter): void {
  const view = ctx.executor.view.fs;
  const target = canonicalWorkspace(ctx);

  if (isDir(view, target) && view.readdir(target).length > 0) {
    report.note(`${target} already has content, merging`);
    mergeInto(ctx, current, target, report);
    ctx.executor.perform({ kind: "remove", path: current, recursive: true });
    return;
  }
  if (isPlainDir(view, target)) {
    ctx.executor.perform({ kind: "remove", path: target, recursive: true });
  } else if (lexists(view, target)) {
    const aside = conflictPath(view, target);
    ctx.executor.perform({ kind: "move", from: target, to: aside });
    report.note(`moved aside: ${target} → ${aside}`);
  }
  const parent = path.dirname(target);
  if (!isDir(view, parent)) ctx.executor.perform({ kind: "mkdir", path: parent });
  ctx.executor.perform({ kind: "move", from: current, to: target });
}

/**
 * Point the config's workspace field at the canonical location when it
 * names the moved workspace or a directory that does not exist.
 */
function updateWorkspaceField(ctx: MigrationContext, previous: string, report: StepReporter): void {
  const view = ctx.executor.view.fs;
  const { file } = configLocation(ctx);
  if (!file || !isPlainFile(view, file)) return;

  const isStale = (value: string) => {
    const resolved = path.resolve(ctx.newHome, expandHome(applyRules(value, ctx.pathRules).text, ctx.newHome));
    return resolved === previous || !isDir(view, resolved);
  };
  const text = view.readFile(file);
  const result = applyRules(text, [workspaceFieldRule(isStale, CANONICAL_WORKSPACE_REF)]);
  if (!result.changed) return;

  ctx.executor.perform({
    kind: "write",
    path: file,
    content: result.text,
    label: `Set workspace in ${file} to ${CANONICAL_WORKSPACE_REF}`,
  });
  report.note(`config workspace set to ${CANONICAL_WORKSPACE_REF}`);
}

function rewriteMarkdown(ctx: MigrationContext, workspace: string, report: StepReporter): void {
  const view = ctx.executor.view.fs;
  for (const sub of WORKSPACE_MARKDOWN_DIRS) {
    const dir = path.join(workspace, sub);
    for (const name of view.readdir(dir)) {
      if (!name.endsWith(".md")) continue;
      const file = path.join(dir, name);
      report.attempt(file, () => rewriteFile(ctx, file, ctx.pathRules));
    }
  }
}

/**
 * Apply the resolved workspace: move (or merge) it into the canonical
 * location when standardizing, update the config field, and rewrite home
 * paths in its markdown files.
 */
export const migrateWorkspace: MutationStep = {
  name: "migrate-workspace",
  description: "Migrating workspace",
  fatal: false,

  apply(ctx, report) {
    const view = ctx.executor.view.fs;
    const target = canonicalWorkspace(ctx);
    let workspace = currentWorkspace(ctx);

    if (!workspace) {
      report.note("no workspace found, creating the standard one");
      ctx.executor.perform({ kind: "mkdir", path: target });
      return;
    }
    report.note(`workspace: ${workspace}`);

    const alreadyCanonical = followLinks(view, workspace) === followLinks(view, target);
    if (ctx.plan.standardizeWorkspace && !alreadyCanonical) {
      const previous = workspace;
      const moved = report.attempt(previous, () => moveToCanonical(ctx, previous, report));
      if (!moved) return;
      report.attempt("workspace field", () => updateWorkspaceField(ctx, previous, report));
      workspace = target;
    }

    rewriteMarkdown(ctx, workspace, report);
  },
};
