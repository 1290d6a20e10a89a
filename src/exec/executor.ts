/**
 * Executor: the single place where dry-run and apply differ.
 *
 * Steps hand every mutation to `perform()`. In apply mode the action is
 * carried out against the host; in dry-run mode it is recorded on an
 * overlay so later reads see its effect, and nothing changes. Either way
 * the description lands in the journal, so both modes produce the same
 * journal for the same host state and plan.
 */

import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../types.js";
import { errnoCode } from "../errors.js";
import type { HostServices } from "../host/types.js";
import { describeAction, type Action } from "./actions.js";
import { OverlayView } from "./overlay.js";
import { createLiveView, type FsView, type SystemView } from "./view.js";

export interface Executor {
  readonly dryRun: boolean;
  /** Reads as of every action performed so far. */
  readonly view: SystemView;
  /** Descriptions of the actions performed, in order. */
  readonly journal: readonly string[];
  perform(action: Action): void;
}

export interface ExecutorParams {
  dryRun: boolean;
  host: HostServices;
  logger: Logger;
  /** Filesystem reads, for tests. Defaults to the live filesystem. */
  fsView?: FsView;
}

/** Interpretation of actions: carry them out, or describe them. */
interface ActionStrategy {
  readonly view: SystemView;
  execute(action: Action): void;
}

export const DRY_RUN_PREFIX = "[dry-run] Would";

export function previewLine(description: string): string {
  return `${DRY_RUN_PREFIX} ${description.charAt(0).toLowerCase()}${description.slice(1)}`;
}

/** Inverse of previewLine, for comparing dry-run output with a journal. */
export function stripPreview(line: string): string {
  if (!line.startsWith(`${DRY_RUN_PREFIX} `)) return line;
  const rest = line.slice(DRY_RUN_PREFIX.length + 1);
  return `${rest.charAt(0).toUpperCase()}${rest.slice(1)}`;
}

export function createExecutor(params: ExecutorParams): Executor {
  const { dryRun, host, logger } = params;
  const strategy = dryRun
    ? createDescribeStrategy(host, params.fsView)
    : createApplyStrategy(host, params.fsView);
  const journal: string[] = [];

  function perform(action: Action): void {
    const description = describeAction(action);
    strategy.execute(action);
    journal.push(description);
    logger.info(dryRun ? previewLine(description) : description);
  }

  return {
    dryRun,
    view: strategy.view,
    journal,
    perform,
  };
}

function createDescribeStrategy(host: HostServices, fsView?: FsView): ActionStrategy {
  const view = new OverlayView(host, fsView);
  return {
    view,
    execute: (action) => view.record(action),
  };
}

// --- apply ---

/** Visit `root` and everything below it without following symlinks. */
function walk(root: string, visit: (p: string, stat: fs.Stats) => void): void {
  const stat = fs.lstatSync(root);
  visit(root, stat);
  if (!stat.isDirectory()) return;
  for (const name of fs.readdirSync(root)) {
    walk(path.join(root, name), visit);
  }
}

function moveEntry(from: string, to: string): void {
  try {
    fs.renameSync(from, to);
  } catch (err) {
    if (errnoCode(err) !== "EXDEV") throw err;
    // different filesystem: copy, then drop the source
    fs.cpSync(from, to, { recursive: true, preserveTimestamps: true, verbatimSymlinks: true });
    fs.rmSync(from, { recursive: true, force: true });
  }
}

function createApplyStrategy(host: HostServices, fsView?: FsView): ActionStrategy {
  const view = createLiveView(host, fsView);

  function chown(p: string, user: string, recursive: boolean): void {
    const ids = host.accounts.idsOf(user);
    if (!ids) throw new Error(`unknown user ${user}`);
    if (!recursive) {
      fs.lchownSync(p, ids.uid, ids.gid);
      return;
    }
    walk(p, (entry) => fs.lchownSync(entry, ids.uid, ids.gid));
  }

  function chmod(p: string, mode: number, filesBelow: boolean): void {
    if (!filesBelow) {
      fs.chmodSync(p, mode);
      return;
    }
    walk(p, (entry, stat) => {
      if (stat.isFile()) fs.chmodSync(entry, mode);
    });
  }

  function execute(action: Action): void {
    switch (action.kind) {
      case "write":
        fs.writeFileSync(action.path, action.content);
        if (action.mode !== undefined) fs.chmodSync(action.path, action.mode);
        break;
      case "mkdir":
        fs.mkdirSync(action.path, { recursive: true });
        break;
      case "move":
        moveEntry(action.from, action.to);
        break;
      case "copy":
        if (fs.lstatSync(action.from).isSymbolicLink()) {
          fs.symlinkSync(fs.readlinkSync(action.from), action.to);
        } else {
          fs.copyFileSync(action.from, action.to, fs.constants.COPYFILE_EXCL);
        }
        break;
      case "remove":
        fs.rmSync(action.path, { recursive: action.recursive });
        break;
      case "symlink":
        fs.symlinkSync(action.target, action.path);
        break;
      case "chown":
        chown(action.path, action.user, action.recursive);
        break;
      case "chmod":
        chmod(action.path, action.mode, action.filesBelow === true);
        break;
      case "rename-user":
        host.accounts.renameUser(action.from, action.to);
        break;
      case "rename-group":
        host.accounts.renameGroup(action.from, action.to);
        break;
      case "move-home":
        host.accounts.moveHome(action.user, action.to);
        break;
      case "stop-unit":
        host.services.stop(action.unit, action.scope);
        break;
      case "disable-unit":
        host.services.disable(action.unit);
        break;
      case "daemon-reload":
        host.services.daemonReload();
        break;
      case "terminate-session":
        host.services.terminateSession(action.user);
        break;
      case "terminate-processes":
        host.processes.terminate(action.user, action.graceMs);
        break;
      case "crontab-replace":
        host.schedule.replace(action.user, action.content);
        break;
      case "crontab-remove":
        host.schedule.remove(action.user);
        break;
    }
  }

  return { view, execute };
}
