/**
 * Read-only view of the host. Steps make every decision from a view, so
 * the same step code runs against the live system (apply) and against the
 * live system plus described changes (dry-run).
 */

import fs from "node:fs";
import path from "node:path";
import type { HostServices, UnitScope } from "../host/types.js";

export type EntryKind = "file" | "dir" | "symlink" | "other" | "missing";

export interface FsView {
  /** Kind of the entry itself; symlinks are not followed. */
  kind(p: string): EntryKind;
  /** Kind after following symlinks; dangling links report "missing". */
  statKind(p: string): EntryKind;
  readFile(p: string): string;
  readLink(p: string): string;
  /** Sorted entry names; empty for anything that is not a directory. */
  readdir(p: string): string[];
}

export interface SystemView {
  fs: FsView;
  userExists(user: string): boolean;
  groupExists(group: string): boolean;
  isUnitActive(unit: string, scope: UnitScope): boolean;
  hasSession(user: string): boolean;
  hasProcesses(user: string): boolean;
  readScheduledTasks(user: string): string | null;
}

// --- helpers shared by steps ---

export function lexists(view: FsView, p: string): boolean {
  return view.kind(p) !== "missing";
}

export function isDir(view: FsView, p: string): boolean {
  return view.statKind(p) === "dir";
}

export function isFile(view: FsView, p: string): boolean {
  return view.statKind(p) === "file";
}

/** A regular file that is not reached through a symlink at its own name. */
export function isPlainFile(view: FsView, p: string): boolean {
  return view.kind(p) === "file";
}

/** A directory that is not itself a symlink. */
export function isPlainDir(view: FsView, p: string): boolean {
  return view.kind(p) === "dir";
}

export function hasAnyFile(view: FsView, dir: string, names: readonly string[]): boolean {
  return names.some((n) => isFile(view, path.join(dir, n)));
}

/** Absolute target of the symlink at `p`. */
export function linkTarget(view: FsView, p: string): string {
  return path.resolve(path.dirname(p), view.readLink(p));
}

const MAX_LINK_HOPS = 40;

/**
 * Resolve symlinks in the final component only, as many hops as needed.
 * Returns the input unchanged when it is not a symlink.
 */
export function followLinks(view: FsView, p: string): string {
  let cur = path.resolve(p);
  for (let i = 0; i < MAX_LINK_HOPS && view.kind(cur) === "symlink"; i++) {
    cur = linkTarget(view, cur);
  }
  return cur;
}

// --- live view ---

function lstatKind(stat: fs.Stats): EntryKind {
  if (stat.isSymbolicLink()) return "symlink";
  if (stat.isDirectory()) return "dir";
  if (stat.isFile()) return "file";
  return "other";
}

export function createLiveFsView(): FsView {
  return {
    kind(p) {
      try {
        return lstatKind(fs.lstatSync(p));
      } catch {
        return "missing";
      }
    },
    statKind(p) {
      try {
        return lstatKind(fs.statSync(p));
      } catch {
        return "missing";
      }
    },
    readFile: (p) => fs.readFileSync(p, "utf-8"),
    readLink: (p) => fs.readlinkSync(p),
    readdir(p) {
      try {
        return fs.readdirSync(p).sort();
      } catch {
        return [];
      }
    },
  };
}

export function createLiveView(host: HostServices, fsView: FsView = createLiveFsView()): SystemView {
  return {
    fs: fsView,
    userExists: (user) => host.accounts.userExists(user),
    groupExists: (group) => host.accounts.groupExists(group),
    isUnitActive: (unit, scope) => host.services.isActive(unit, scope),
    hasSession: (user) => host.services.hasSession(user),
    hasProcesses: (user) => host.processes.hasProcesses(user),
    readScheduledTasks: (user) => host.schedule.read(user),
  };
}
