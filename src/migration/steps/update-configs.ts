import path from "node:path";
import type { FsView } from "../../exec/view.js";
import { isPlainDir, isPlainFile, lexists } from "../../exec/view.js";
import {
  CANONICAL_CONFIG,
  CANONICAL_DIR,
  CANONICAL_WORKSPACE,
  EXTRA_CONFIG_FILES,
  legacyDirName,
} from "../../homes/directory.js";
import { configLocation, rewriteFile, type MigrationContext } from "../context.js";
import type { MutationStep, StepReporter } from "../types.js";

/** Left to MigrateWorkspace. */
const SKIPPED_SUBDIRS = new Set<string>([CANONICAL_WORKSPACE]);
/** Session transcripts record history; they are not rewritten. */
const TRANSCRIPT_SUFFIX = ".jsonl";

function isBackupName(name: string): boolean {
  return name.includes(".bak");
}

function isText(view: FsView, file: string): boolean {
  return !view.readFile(file).includes("\u0000");
}

/** Every other regular text file below the config directory, depth first. */
function otherTextFiles(view: FsView, configDir: string): string[] {
  const found: string[] = [];
  const visit = (dir: string, top: boolean) => {
    for (const name of view.readdir(dir)) {
      const p = path.join(dir, name);
      if (isPlainDir(view, p)) {
        if (!(top && SKIPPED_SUBDIRS.has(name))) visit(p, false);
      } else if (isPlainFile(view, p) && !name.endsWith(TRANSCRIPT_SUFFIX) && isText(view, p)) {
        found.push(p);
      }
    }
  };
  visit(configDir, true);
  return found;
}

/**
 * Files in rewrite order: main config, legacy names, extras, backups, then
 * every other text file (credentials and `.env` included).
 */
export function configFiles(view: FsView, configDir: string, legacyConfigNames: readonly string[]): string[] {
  const top = [
    CANONICAL_CONFIG,
    ...legacyConfigNames.map((name) => `${name}.json`),
    ...EXTRA_CONFIG_FILES,
    ...view.readdir(configDir).filter(isBackupName),
  ];
  const first = [...new Set(top)].map((name) => path.join(configDir, name));
  const seen = new Set(first);
  return [...first, ...otherTextFiles(view, configDir).filter((p) => !seen.has(p))];
}

function adoptLegacyDir(ctx: MigrationContext, report: StepReporter): void {
  const fs = ctx.executor.view.fs;
  const canonical = path.join(ctx.newHome, CANONICAL_DIR);
  for (const name of ctx.config.legacyNames) {
    const legacy = path.join(ctx.newHome, legacyDirName(name));
    if (!isPlainDir(fs, legacy)) continue;
    if (lexists(fs, canonical)) {
      report.note(`${legacyDirName(name)} left in place: ${CANONICAL_DIR} already exists`);
      continue;
    }
    report.attempt(legacy, () => ctx.executor.perform({ kind: "move", from: legacy, to: canonical }));
  }
}

function adoptLegacyConfigFiles(ctx: MigrationContext, configDir: string, report: StepReporter): void {
  const fs = ctx.executor.view.fs;
  const canonical = path.join(configDir, CANONICAL_CONFIG);
  for (const name of ctx.config.legacyConfigNames) {
    const file = path.join(configDir, `${name}.json`);
    if (!isPlainFile(fs, file)) continue;
    report.attempt(file, () => {
      if (lexists(fs, canonical)) {
        ctx.executor.perform({ kind: "remove", path: file, recursive: false });
      } else {
        ctx.executor.perform({ kind: "move", from: file, to: canonical });
      }
    });
  }
}

/**
 * Fold a legacy config directory into the canonical one, rewrite home
 * paths in every config file, then bring legacy config files under the
 * canonical name (or drop them when it is already taken).
 */
export const updateConfigs: MutationStep = {
  name: "update-configs",
  description: "Updating configuration files",
  fatal: false,

  apply(ctx, report) {
    if (ctx.plan.migrateLegacyDirs) adoptLegacyDir(ctx, report);

    const { dir } = configLocation(ctx);
    if (!dir) {
      report.note("no config directory");
      return;
    }

    // legacy directory names only become canonical once the directory is
    const canonical = path.basename(dir) === CANONICAL_DIR;
    const rules = canonical ? [...ctx.pathRules, ...ctx.legacyDirRules] : ctx.pathRules;

    let updated = 0;
    for (const file of configFiles(ctx.executor.view.fs, dir, ctx.config.legacyConfigNames)) {
      report.attempt(file, () => {
        if (rewriteFile(ctx, file, rules)) updated++;
      });
    }
    if (updated === 0) report.note("config paths already current");

    adoptLegacyConfigFiles(ctx, dir, report);
  },
};
