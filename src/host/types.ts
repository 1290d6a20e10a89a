/**
 * Collaborator interfaces for everything outside the filesystem.
 *
 * Read methods are free to call at any time. Write methods are only
 * called by the executor in apply mode; steps never call them directly.
 */

export type UnitScope = { kind: "system" } | { kind: "user"; user: string };

export interface AccountIds {
  uid: number;
  gid: number;
}

export interface AccountDatabase {
  userExists(user: string): boolean;
  groupExists(group: string): boolean;
  idsOf(user: string): AccountIds | null;
  /** Rename the login only; home and group are left alone. */
  renameUser(oldUser: string, newUser: string): void;
  renameGroup(oldGroup: string, newGroup: string): void;
  /** Point the account at a new home and move the directory there. */
  moveHome(user: string, newHome: string): void;
}

export interface ServiceManager {
  isActive(unit: string, scope: UnitScope): boolean;
  hasSession(user: string): boolean;
  stop(unit: string, scope: UnitScope): void;
  disable(unit: string): void;
  daemonReload(): void;
  terminateSession(user: string): void;
}

export interface ProcessTable {
  hasProcesses(user: string): boolean;
  /** SIGTERM, wait up to graceMs for exit, then SIGKILL whatever remains. */
  terminate(user: string, graceMs: number): void;
}

export interface ScheduledTaskTable {
  /** Null when the user has no table. */
  read(user: string): string | null;
  replace(user: string, content: string): void;
  remove(user: string): void;
}

export interface GrantCheck {
  ok: boolean;
  message: string;
}

export interface GrantValidator {
  /** Syntax-check grant content without installing it. */
  validate(content: string): GrantCheck;
}

export interface DiskProbe {
  /** Free bytes on the filesystem holding `p`, or null if unknown. */
  availableBytes(p: string): number | null;
  /** Bytes used by the tree at `p`, or null if unknown. */
  usageBytes(p: string): number | null;
  /** Open file handles under `p`. */
  openFileCount(p: string): number;
}

export interface HostIdentity {
  isRoot(): boolean;
  /** Login names the current process is acting for (effective, sudo caller, login). */
  invokingUsers(): string[];
  hostname(): string;
}

export interface HostServices {
  accounts: AccountDatabase;
  services: ServiceManager;
  processes: ProcessTable;
  schedule: ScheduledTaskTable;
  grants: GrantValidator;
  disk: DiskProbe;
  identity: HostIdentity;
}
