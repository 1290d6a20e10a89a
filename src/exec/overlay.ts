/**
 * Overlay view for dry-run.
 *
 * Reads fall through to the live system except where a described action
 * has changed the answer. Filesystem changes are kept as a map from
 * absolute path to node:
 *
 *   deleted   nothing here, nor below
 *   file      contents written by a described action
 *   dir       directory created by a described action
 *   symlink   link created by a described action
 *   alias     a live path moved here; its subtree appears below this path
 *
 * The nearest node on the way up from a path decides what that path is.
 */

import path from "node:path";
import type { HostServices, UnitScope } from "../host/types.js";
import type { Action } from "./actions.js";
import { createLiveView, type EntryKind, type FsView, type SystemView } from "./view.js";

type OverlayNode =
  | { type: "deleted" }
  | { type: "file"; content: string }
  | { type: "dir" }
  | { type: "symlink"; target: string }
  | { type: "alias"; source: string };

type Located =
  | { where: "missing" }
  | { where: "real"; path: string }
  | { where: "virtual"; node: Exclude<OverlayNode, { type: "deleted" } | { type: "alias" }> };

const MISSING: Located = { where: "missing" };
const MAX_LINK_HOPS = 40;

function enoent(p: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, '${p}'`), { code: "ENOENT" });
}

export class OverlayFs implements FsView {
  private readonly nodes = new Map<string, OverlayNode>();

  constructor(private readonly base: FsView) {}

  // --- reads ---

  kind(p: string): EntryKind {
    const loc = this.locate(path.resolve(p));
    switch (loc.where) {
      case "missing":
        return "missing";
      case "real":
        return this.base.kind(loc.path);
      case "virtual":
        return loc.node.type;
    }
  }

  statKind(p: string): EntryKind {
    const final = this.follow(path.resolve(p));
    if (final === null) return "missing";
    const k = this.kind(final);
    return k === "symlink" ? "missing" : k;
  }

  readFile(p: string): string {
    const final = this.follow(path.resolve(p));
    if (final === null) throw enoent(p);
    const loc = this.locate(final);
    if (loc.where === "real") return this.base.readFile(loc.path);
    if (loc.where === "virtual" && loc.node.type === "file") return loc.node.content;
    throw enoent(p);
  }

  readLink(p: string): string {
    const loc = this.locate(path.resolve(p));
    if (loc.where === "real") return this.base.readLink(loc.path);
    if (loc.where === "virtual" && loc.node.type === "symlink") return loc.node.target;
    throw Object.assign(new Error(`EINVAL: not a symlink, '${p}'`), { code: "EINVAL" });
  }

  readdir(p: string): string[] {
    const final = this.follow(path.resolve(p));
    if (final === null || this.kind(final) !== "dir") return [];

    const names = new Set<string>();
    const loc = this.locate(final);
    if (loc.where === "real") {
      for (const n of this.base.readdir(loc.path)) names.add(n);
    }
    for (const [key, node] of this.nodes) {
      if (path.dirname(key) !== final || key === final) continue;
      const name = path.basename(key);
      if (node.type === "deleted") names.delete(name);
      else names.add(name);
    }
    return [...names].sort();
  }

  // --- described mutations ---

  write(p: string, content: string): void {
    const abs = path.resolve(p);
    this.clearBelow(abs);
    this.nodes.set(abs, { type: "file", content });
  }

  mkdir(p: string): void {
    const abs = path.resolve(p);
    const chain: string[] = [];
    for (let cur = abs; ; cur = path.dirname(cur)) {
      chain.unshift(cur);
      if (path.dirname(cur) === cur) break;
    }
    for (const dir of chain) {
      if (this.statKind(dir) === "missing") {
        this.clearBelow(dir);
        this.nodes.set(dir, { type: "dir" });
      }
    }
  }

  move(from: string, to: string): void {
    const src = path.resolve(from);
    const dst = path.resolve(to);
    const loc = this.locate(src);
    if (loc.where === "missing") throw enoent(from);

    const moved: OverlayNode = loc.where === "real"
      ? { type: "alias", source: loc.path }
      : loc.node;

    const children: Array<[string, OverlayNode]> = [];
    for (const [key, node] of this.nodes) {
      if (key !== src && key.startsWith(src + path.sep)) {
        children.push([dst + key.slice(src.length), node]);
      }
    }

    this.clearBelow(src);
    this.clearBelow(dst);
    this.nodes.set(dst, moved);
    for (const [key, node] of children) this.nodes.set(key, node);
    this.nodes.set(src, { type: "deleted" });
  }

  copy(from: string, to: string): void {
    const src = path.resolve(from);
    const dst = path.resolve(to);
    const loc = this.locate(src);
    if (loc.where === "missing") throw enoent(from);
    this.clearBelow(dst);
    this.nodes.set(dst, loc.where === "real" ? { type: "alias", source: loc.path } : loc.node);
  }

  remove(p: string): void {
    const abs = path.resolve(p);
    this.clearBelow(abs);
    this.nodes.set(abs, { type: "deleted" });
  }

  symlink(target: string, p: string): void {
    const abs = path.resolve(p);
    this.clearBelow(abs);
    this.nodes.set(abs, { type: "symlink", target });
  }

  // --- internals ---

  private clearBelow(p: string): void {
    for (const key of [...this.nodes.keys()]) {
      if (key === p || key.startsWith(p + path.sep)) this.nodes.delete(key);
    }
  }

  private follow(p: string): string | null {
    let cur = p;
    for (let i = 0; i < MAX_LINK_HOPS; i++) {
      if (this.kind(cur) !== "symlink") return cur;
      cur = path.resolve(path.dirname(cur), this.readLink(cur));
    }
    return null;
  }

  private locate(p: string, hops = 0): Located {
    for (let cur = p; ; cur = path.dirname(cur)) {
      const node = this.nodes.get(cur);
      if (node) {
        const rest = path.relative(cur, p);
        if (rest === "") {
          if (node.type === "deleted") return MISSING;
          if (node.type === "alias") return { where: "real", path: node.source };
          return { where: "virtual", node };
        }
        switch (node.type) {
          case "alias":
            return { where: "real", path: path.join(node.source, rest) };
          case "symlink":
            if (hops >= MAX_LINK_HOPS) return MISSING;
            return this.locate(path.join(path.resolve(path.dirname(cur), node.target), rest), hops + 1);
          default:
            // deleted, a file, or a fresh directory whose children live in the map
            return MISSING;
        }
      }
      if (path.dirname(cur) === cur) return { where: "real", path: p };
    }
  }
}

function scopeKey(unit: string, scope: UnitScope): string {
  return scope.kind === "user" ? `user:${scope.user}:${unit}` : `system:${unit}`;
}

/**
 * SystemView that reflects described actions on top of the live host.
 * `record` is called by the describing executor for every action.
 */
export class OverlayView implements SystemView {
  readonly fs: OverlayFs;
  private readonly live: SystemView;
  private readonly usersAdded = new Set<string>();
  private readonly usersRemoved = new Set<string>();
  private readonly groupsAdded = new Set<string>();
  private readonly groupsRemoved = new Set<string>();
  private readonly stoppedUnits = new Set<string>();
  private readonly endedSessions = new Set<string>();
  private readonly terminated = new Set<string>();
  private readonly tables = new Map<string, string | null>();

  constructor(host: HostServices, liveFs?: FsView) {
    this.live = createLiveView(host, liveFs);
    this.fs = new OverlayFs(this.live.fs);
  }

  userExists(user: string): boolean {
    if (this.usersRemoved.has(user)) return false;
    return this.usersAdded.has(user) || this.live.userExists(user);
  }

  groupExists(group: string): boolean {
    if (this.groupsRemoved.has(group)) return false;
    return this.groupsAdded.has(group) || this.live.groupExists(group);
  }

  isUnitActive(unit: string, scope: UnitScope): boolean {
    return !this.stoppedUnits.has(scopeKey(unit, scope)) && this.live.isUnitActive(unit, scope);
  }

  hasSession(user: string): boolean {
    return !this.endedSessions.has(user) && this.live.hasSession(user);
  }

  hasProcesses(user: string): boolean {
    return !this.terminated.has(user) && this.live.hasProcesses(user);
  }

  readScheduledTasks(user: string): string | null {
    const override = this.tables.get(user);
    return override !== undefined ? override : this.live.readScheduledTasks(user);
  }

  record(action: Action): void {
    switch (action.kind) {
      case "write":
        this.fs.write(action.path, action.content);
        break;
      case "mkdir":
        this.fs.mkdir(action.path);
        break;
      case "move":
        this.fs.move(action.from, action.to);
        break;
      case "copy":
        this.fs.copy(action.from, action.to);
        break;
      case "remove":
        this.fs.remove(action.path);
        break;
      case "symlink":
        this.fs.symlink(action.target, action.path);
        break;
      case "rename-user":
        this.usersRemoved.add(action.from);
        this.usersAdded.add(action.to);
        this.usersRemoved.delete(action.to);
        break;
      case "rename-group":
        this.groupsRemoved.add(action.from);
        this.groupsAdded.add(action.to);
        this.groupsRemoved.delete(action.to);
        break;
      case "move-home":
        this.fs.move(action.from, action.to);
        break;
      case "stop-unit":
        this.stoppedUnits.add(scopeKey(action.unit, action.scope));
        break;
      case "terminate-session":
        this.endedSessions.add(action.user);
        break;
      case "terminate-processes":
        this.terminated.add(action.user);
        break;
      case "crontab-replace":
        this.tables.set(action.user, action.content);
        break;
      case "crontab-remove":
        this.tables.set(action.user, null);
        break;
      case "chown":
      case "chmod":
      case "disable-unit":
      case "daemon-reload":
        // nothing the steps read back
        break;
    }
  }
}
