import path from "node:path";
import { MigrateError, MigrateErrorCode } from "../../errors.js";
import { isPlainDir, isPlainFile, lexists } from "../../exec/view.js";
import { applyRules, identifierRule } from "../rewrite.js";
import type { MigrationContext } from "../context.js";
import type { MutationStep, StepReporter } from "../types.js";

const GRANT_MODE = 0o440;

function renameLogin(ctx: MigrationContext, report: StepReporter): void {
  const { oldUser, newUser } = ctx.plan;
  const view = ctx.executor.view;
  const oldExists = view.userExists(oldUser);
  const newExists = view.userExists(newUser);

  if (oldExists && newExists) {
    throw new MigrateError(
      MigrateErrorCode.USER_EXISTS,
      `both ${oldUser} and ${newUser} exist; refusing to rename onto an existing account`,
    );
  }
  if (!oldExists && !newExists) {
    throw new MigrateError(MigrateErrorCode.USER_NOT_FOUND, `neither ${oldUser} nor ${newUser} exists`);
  }
  if (oldExists) {
    ctx.executor.perform({ kind: "rename-user", from: oldUser, to: newUser });
  } else {
    report.note(`account already renamed to ${newUser}`);
  }

  if (view.groupExists(oldUser) && !view.groupExists(newUser)) {
    ctx.executor.perform({ kind: "rename-group", from: oldUser, to: newUser });
  }
}

function moveHome(ctx: MigrationContext, report: StepReporter): void {
  const { oldHome, newHome } = ctx;
  if (oldHome === newHome) return;
  const fs = ctx.executor.view.fs;

  if (isPlainDir(fs, oldHome)) {
    if (lexists(fs, newHome)) {
      throw new MigrateError(
        MigrateErrorCode.USER_EXISTS,
        `cannot move ${oldHome}: ${newHome} already exists`,
      );
    }
    ctx.executor.perform({ kind: "move-home", user: ctx.plan.newUser, from: oldHome, to: newHome });
  } else if (isPlainDir(fs, newHome)) {
    report.note(`home already at ${newHome}`);
  } else {
    throw new MigrateError(MigrateErrorCode.USER_NOT_FOUND, `no home directory at ${oldHome} or ${newHome}`);
  }
}

/**
 * Move the per-user grant file to the new name with identifiers rewritten.
 * The new file is checked before the old one goes; a file that fails the
 * check is removed again so a malformed grant never stays active.
 */
function migrateGrant(ctx: MigrationContext, report: StepReporter): void {
  const { oldUser, newUser } = ctx.plan;
  const fs = ctx.executor.view.fs;
  const oldGrant = path.join(ctx.config.grantDir, oldUser);
  const newGrant = path.join(ctx.config.grantDir, newUser);

  if (!isPlainFile(fs, oldGrant)) {
    report.note(lexists(fs, newGrant) ? "grant file already migrated" : `no grant file for ${oldUser}`);
    return;
  }

  const content = applyRules(fs.readFile(oldGrant), [identifierRule(oldUser, newUser)]).text;
  ctx.executor.perform({
    kind: "write",
    path: newGrant,
    content,
    mode: GRANT_MODE,
    label: `Write grant file ${newGrant}`,
  });

  const check = ctx.grants.validate(fs.readFile(newGrant));
  if (!check.ok) {
    ctx.executor.perform({ kind: "remove", path: newGrant, recursive: false });
    throw new MigrateError(
      MigrateErrorCode.GRANT_INVALID,
      `grant file for ${newUser} failed validation${check.message ? `: ${check.message}` : ""}`,
      { file: newGrant },
    );
  }
  ctx.executor.perform({ kind: "remove", path: oldGrant, recursive: false });
}

/** Rename the login and its group, move the home, carry the grant file over. */
export const renameAccount: MutationStep = {
  name: "rename-account",
  description: "Renaming user account",
  fatal: true,
  enabled: (plan) => plan.renameUser && plan.oldUser !== plan.newUser,

  apply(ctx, report) {
    renameLogin(ctx, report);
    moveHome(ctx, report);
    migrateGrant(ctx, report);
  },
};
