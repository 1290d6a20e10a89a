/**
 * Test helper: in-process stand-ins for the account database, service
 * manager, process table, scheduled-task table, grant validator, disk
 * probe and host identity.
 *
 * Homes live in a real temporary directory; moveHome renames the
 * directory there, the way `usermod -m` would. Ownership changes map every
 * known account to the current process's uid/gid so lchown succeeds
 * without privileges.
 */

import fs from "node:fs";
import type { GrantCheck, HostServices, UnitScope } from "../../src/host/types.js";

export interface FakeHostOptions {
  /** Accounts by name, with their home directories. */
  users?: Record<string, string>;
  /** Groups; defaults to one per user. */
  groups?: string[];
  /** Active units as "system:<unit>" or "user:<user>:<unit>". */
  activeUnits?: string[];
  sessions?: string[];
  processes?: string[];
  tables?: Record<string, string>;
  grantCheck?: (content: string) => GrantCheck;
  availableBytes?: number | null;
  usageBytes?: number | null;
  openFiles?: number;
  root?: boolean;
  invokingUsers?: string[];
  hostname?: string;
}

export interface FakeHost extends HostServices {
  readonly users: Map<string, string>;
  readonly groups: Set<string>;
  readonly activeUnits: Set<string>;
  readonly sessions: Set<string>;
  /** Accounts with processes still running. */
  readonly running: Set<string>;
  readonly tables: Map<string, string>;
  /** Every write-side call, in order. */
  readonly calls: string[];
}

export function unitKey(unit: string, scope: UnitScope): string {
  return scope.kind === "user" ? `user:${scope.user}:${unit}` : `system:${unit}`;
}

export function createFakeHost(opts: FakeHostOptions = {}): FakeHost {
  const users = new Map(Object.entries(opts.users ?? {}));
  const groups = new Set(opts.groups ?? users.keys());
  const activeUnits = new Set(opts.activeUnits ?? []);
  const sessions = new Set(opts.sessions ?? []);
  const running = new Set(opts.processes ?? []);
  const tables = new Map(Object.entries(opts.tables ?? {}));
  const calls: string[] = [];
  const ids = { uid: process.getuid?.() ?? 0, gid: process.getgid?.() ?? 0 };

  return {
    users,
    groups,
    activeUnits,
    sessions,
    running,
    tables,
    calls,

    accounts: {
      userExists: (user) => users.has(user),
      groupExists: (group) => groups.has(group),
      idsOf: (user) => (users.has(user) || user === "root" ? ids : null),
      renameUser(oldUser, newUser) {
        calls.push(`renameUser ${oldUser} ${newUser}`);
        const home = users.get(oldUser);
        if (home === undefined) throw new Error(`usermod: user '${oldUser}' does not exist`);
        users.delete(oldUser);
        users.set(newUser, home);
      },
      renameGroup(oldGroup, newGroup) {
        calls.push(`renameGroup ${oldGroup} ${newGroup}`);
        groups.delete(oldGroup);
        groups.add(newGroup);
      },
      moveHome(user, newHome) {
        calls.push(`moveHome ${user} ${newHome}`);
        const home = users.get(user);
        if (home === undefined) throw new Error(`usermod: user '${user}' does not exist`);
        fs.renameSync(home, newHome);
        users.set(user, newHome);
      },
    },

    services: {
      isActive: (unit, scope) => activeUnits.has(unitKey(unit, scope)),
      hasSession: (user) => sessions.has(user),
      stop(unit, scope) {
        calls.push(`stop ${unitKey(unit, scope)}`);
        activeUnits.delete(unitKey(unit, scope));
      },
      disable(unit) {
        calls.push(`disable ${unit}`);
      },
      daemonReload() {
        calls.push("daemon-reload");
      },
      terminateSession(user) {
        calls.push(`terminateSession ${user}`);
        sessions.delete(user);
      },
    },

    processes: {
      hasProcesses: (user) => running.has(user),
      terminate(user, graceMs) {
        calls.push(`terminate ${user} ${graceMs}`);
        running.delete(user);
      },
    },

    schedule: {
      read: (user) => tables.get(user) ?? null,
      replace(user, content) {
        calls.push(`crontab-replace ${user}`);
        tables.set(user, content);
      },
      remove(user) {
        calls.push(`crontab-remove ${user}`);
        tables.delete(user);
      },
    },

    grants: {
      validate: opts.grantCheck ?? (() => ({ ok: true, message: "" })),
    },

    disk: {
      availableBytes: () => (opts.availableBytes === undefined ? 10 * 1024 * 1024 * 1024 : opts.availableBytes),
      usageBytes: () => (opts.usageBytes === undefined ? 1024 * 1024 : opts.usageBytes),
      openFileCount: () => opts.openFiles ?? 0,
    },

    identity: {
      isRoot: () => opts.root ?? true,
      invokingUsers: () => opts.invokingUsers ?? ["root"],
      hostname: () => opts.hostname ?? "testhost",
    },
  };
}
