/**
 * Migration Orchestrator: drives one run end to end:
 *
 *   discovery → candidate selection → validation → plan → preflight
 *   → confirmation gates → pipeline → summary
 *
 * Nothing mutates before the last gate. Interactive runs ask through the
 * Prompter; non-interactive runs take flags and defaults and never prompt.
 */

import path from "node:path";
import type {
  Candidate,
  InstallationRecord,
  Logger,
  MigrationPlan,
  PreflightReport,
  Prompter,
} from "../types.js";
import type { MigrateConfig } from "../config.js";
import type { HostServices } from "../host/types.js";
import {
  EXIT_INCOMPLETE,
  EXIT_OK,
  MigrateErrorCode,
  PreflightError,
  UserAbort,
  ValidationError,
} from "../errors.js";
import { createExecutor } from "../exec/executor.js";
import { createLiveFsView, isPlainDir, type FsView } from "../exec/view.js";
import { homeOf, isValidUsername, validateUsername } from "../homes/utils.js";
import { CANONICAL_DIR, CANONICAL_WORKSPACE, legacyDirName } from "../homes/directory.js";
import { createDiscoveryEngine, listHomeDirs } from "../discovery/scanner.js";
import { buildInstallationRecord } from "../discovery/installation.js";
import { describeWorkspaceContents } from "../discovery/workspace.js";
import { createPreflightValidator } from "../preflight/validator.js";
import { createMigrationContext } from "./context.js";
import { runPipeline } from "./pipeline.js";
import type { PipelineSummary } from "./types.js";

/** Operator choices. Undefined optional phases are asked for or defaulted. */
export interface MigrationFlags {
  dryRun: boolean;
  nonInteractive: boolean;
  oldUser?: string;
  newUser?: string;
  renameUser?: boolean;
  standardizeWorkspace?: boolean;
  migrateLegacyDirs?: boolean;
  createSymlinks?: boolean;
  ignorePreflight: boolean;
}

export interface RunMigrationOptions {
  config: MigrateConfig;
  host: HostServices;
  logger: Logger;
  prompter: Prompter;
  flags: MigrationFlags;
  /** Filesystem reads, for tests. Defaults to the live filesystem. */
  fsView?: FsView;
}

export interface MigrationResult {
  plan: MigrationPlan;
  record: InstallationRecord;
  preflight: PreflightReport;
  summary: PipelineSummary;
  /** True when the old account was already renamed by an earlier run. */
  resumed: boolean;
  exitCode: number;
}

export const GATES = {
  start: "Do you want to continue?",
  proceed: "Proceed with migration?",
  preflightOverride: "Pre-flight checks failed. Continue anyway?",
  backup: "Have you created a backup/snapshot? Continue with migration?",
} as const;

const TAG = "[claw-migrate:cli]";

async function gate(opts: RunMigrationOptions, question: string, defaultYes: boolean): Promise<void> {
  if (opts.flags.nonInteractive) return;
  if (!(await opts.prompter.confirm(question, defaultYes))) throw new UserAbort(question);
}

async function choose(
  opts: RunMigrationOptions,
  flag: boolean | undefined,
  question: string,
  fallback: boolean,
): Promise<boolean> {
  if (flag !== undefined) return flag;
  if (opts.flags.nonInteractive) return fallback;
  return opts.prompter.confirm(question, fallback);
}

async function selectOldUser(
  opts: RunMigrationOptions,
  candidates: Candidate[],
  ties: Candidate[],
): Promise<string> {
  const { flags, logger } = opts;
  if (flags.oldUser) {
    logger.info(`${TAG} using old username from command line: ${flags.oldUser}`);
    return flags.oldUser;
  }

  if (ties.length > 0) {
    const names = ties.map((c) => `${c.username} (${c.evidenceScore})`).join(", ");
    logger.warn(`${TAG} several installations score equally: ${names}`);
    if (flags.nonInteractive) {
      throw new ValidationError(
        MigrateErrorCode.AMBIGUOUS_INSTALLATION,
        `ambiguous installation (${names}); use --old-user to choose`,
      );
    }
    return opts.prompter.ask("Current username");
  }

  const best = candidates[0];
  if (flags.nonInteractive) {
    if (!best) {
      throw new ValidationError(
        MigrateErrorCode.MISSING_FIELD,
        "could not auto-detect the installation owner; use --old-user in non-interactive mode",
      );
    }
    logger.info(`${TAG} auto-detected username: ${best.username}`);
    return best.username;
  }
  return opts.prompter.ask("Current username", best?.username);
}

/** The host name, when it is usable as the new login. */
export function suggestNewUser(host: HostServices, oldUser: string): string | undefined {
  const name = host.identity.hostname().split(".")[0]?.toLowerCase() ?? "";
  if (!isValidUsername(name) || name === oldUser || host.accounts.userExists(name)) return undefined;
  return name;
}

async function selectNewUser(opts: RunMigrationOptions, oldUser: string): Promise<string> {
  const { flags, logger, host } = opts;
  if (flags.newUser) {
    logger.info(`${TAG} using new username from command line: ${flags.newUser}`);
    return flags.newUser;
  }
  const suggested = suggestNewUser(host, oldUser);
  if (flags.nonInteractive) {
    if (!suggested) {
      throw new ValidationError(
        MigrateErrorCode.MISSING_FIELD,
        "cannot determine the new username; use --new-user, or --no-rename-user to skip renaming",
      );
    }
    logger.info(`${TAG} using hostname as new username: ${suggested}`);
    return suggested;
  }
  if (suggested) logger.info(`${TAG} suggested username based on hostname: ${suggested}`);
  return opts.prompter.ask("New username", suggested);
}

function logRecord(logger: Logger, record: InstallationRecord, fsView: FsView): void {
  logger.info(`${TAG} installation owner: ${record.owningUser} (${record.homePath})`);
  if (record.workspacePath) {
    const contents = describeWorkspaceContents(fsView, record.workspacePath);
    logger.info(
      `${TAG} workspace: ${record.workspacePath} (from ${record.workspaceSource ?? "unknown"})` +
        (contents.length > 0 ? `: ${contents.join(", ")}` : ""),
    );
  }
  for (const note of record.notes) logger.info(`${TAG} ${note}`);
  for (const conflict of record.conflicts) logger.warn(`${TAG} ${conflict}`);
}

function logPlan(logger: Logger, plan: MigrationPlan, config: MigrateConfig): void {
  const oldHome = homeOf(config.homeRoot, plan.oldUser);
  const newHome = homeOf(config.homeRoot, plan.newUser);
  logger.info(`${TAG} old user: ${plan.oldUser}, new user: ${plan.newUser}`);
  logger.info(`${TAG} old home: ${oldHome}, new home: ${newHome}`);
  logger.info(`${TAG} will replace ${oldHome} → ${newHome}`);
  for (const legacy of config.legacyNames) {
    if (legacy !== plan.oldUser && legacy !== plan.newUser) {
      logger.info(`${TAG} will replace ${homeOf(config.homeRoot, legacy)} → ${newHome} (legacy)`);
    }
  }
  if (plan.migrateLegacyDirs) {
    for (const legacy of config.legacyNames) {
      logger.info(`${TAG} will replace ${legacyDirName(legacy)} → ${CANONICAL_DIR} (legacy)`);
    }
  }
  if (plan.standardizeWorkspace) {
    logger.info(`${TAG} workspace → ~/${CANONICAL_DIR}/${CANONICAL_WORKSPACE} (standard)`);
  }
}

export async function runMigration(opts: RunMigrationOptions): Promise<MigrationResult> {
  const { config, host, logger, flags } = opts;
  const fsView = opts.fsView ?? createLiveFsView();

  if (!host.identity.isRoot()) {
    throw new ValidationError(MigrateErrorCode.NOT_ROOT, "this command must be run as root");
  }
  await gate(opts, GATES.start, false);

  // --- discovery ---
  const engine = createDiscoveryEngine({ config, logger, fs: fsView });
  const candidates = engine.scan(listHomeDirs(config.homeRoot, fsView));
  const ties = engine.findTies(candidates);

  // --- accounts ---
  const oldUser = await selectOldUser(opts, candidates, ties);
  validateUsername(oldUser, "old username");
  const oldExists = host.accounts.userExists(oldUser);

  const renameRequested = await choose(opts, flags.renameUser, "Rename the Linux user account?", true);
  let newUser = oldUser;
  if (renameRequested) {
    newUser = await selectNewUser(opts, oldUser);
    validateUsername(newUser, "new username");
  } else {
    logger.info(`${TAG} not renaming user; only configs and paths are updated`);
  }
  const renameUser = renameRequested && newUser !== oldUser;

  let resumed = false;
  if (!oldExists) {
    if (renameUser && host.accounts.userExists(newUser)) {
      resumed = true;
      logger.warn(`${TAG} ${oldUser} was already renamed to ${newUser}; resuming`);
    } else {
      throw new ValidationError(MigrateErrorCode.USER_NOT_FOUND, `user '${oldUser}' does not exist`);
    }
  } else if (renameUser && host.accounts.userExists(newUser)) {
    throw new ValidationError(MigrateErrorCode.USER_EXISTS, `user '${newUser}' already exists`);
  }

  const account = resumed ? newUser : oldUser;
  if (host.identity.invokingUsers().includes(oldUser)) {
    throw new ValidationError(
      MigrateErrorCode.RUNNING_AS_OLD_USER,
      `cannot run while logged in as '${oldUser}'; use root directly or the console`,
    );
  }

  const home = homeOf(config.homeRoot, account);
  if (!isPlainDir(fsView, home)) {
    throw new ValidationError(MigrateErrorCode.USER_NOT_FOUND, `home directory ${home} not found`);
  }
  const record = buildInstallationRecord(account, home, { config, logger, fs: fsView });
  logRecord(logger, record, fsView);

  // --- plan ---
  const alreadyStandard =
    record.workspacePath !== null &&
    record.workspacePath === path.join(home, CANONICAL_DIR, CANONICAL_WORKSPACE);
  const standardizeWorkspace = alreadyStandard && flags.standardizeWorkspace === undefined
    ? true
    : await choose(
        opts,
        flags.standardizeWorkspace,
        `Move workspace to standard location (~/${CANONICAL_DIR}/${CANONICAL_WORKSPACE})?`,
        !flags.nonInteractive,
      );
  const migrateLegacyDirs = flags.migrateLegacyDirs ?? true;
  const createSymlinks = await choose(opts, flags.createSymlinks, "Create backward compatibility symlinks?", true);

  const plan: MigrationPlan = Object.freeze({
    oldUser,
    newUser,
    renameUser,
    standardizeWorkspace,
    migrateLegacyDirs,
    createSymlinks,
    dryRun: flags.dryRun,
  });
  logPlan(logger, plan, config);
  await gate(opts, GATES.proceed, false);

  // --- preflight ---
  const preflight = createPreflightValidator({ host, config, logger, fs: fsView }).validate(account, home);
  if (!preflight.passed) {
    if (flags.ignorePreflight) {
      logger.warn(`${TAG} continuing despite failed pre-flight checks (--ignore-preflight)`);
    } else if (flags.nonInteractive || !(await opts.prompter.confirm(GATES.preflightOverride, false))) {
      throw new PreflightError(preflight.errors);
    }
  }

  if (plan.dryRun) {
    logger.info(`${TAG} skipping backup prompt (dry-run mode)`);
  } else {
    await gate(opts, GATES.backup, false);
  }

  // --- pipeline ---
  logger.info(`${TAG} starting migration${plan.dryRun ? " (dry-run)" : ""}`);
  const executor = createExecutor({ dryRun: plan.dryRun, host, logger, fsView });
  const ctx = createMigrationContext({ config, logger, executor, grants: host.grants, plan, record });
  const summary = runPipeline(ctx);

  return {
    plan,
    record,
    preflight,
    summary,
    resumed,
    exitCode: summary.incomplete.length > 0 ? EXIT_INCOMPLETE : EXIT_OK,
  };
}
