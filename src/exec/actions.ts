/**
 * Mutating primitives. Every change the pipeline makes to the host is one
 * of these values, handed to the executor; nothing else writes.
 */

import type { UnitScope } from "../host/types.js";

export type Action =
  | { kind: "write"; path: string; content: string; mode?: number; label?: string }
  | { kind: "mkdir"; path: string }
  | { kind: "move"; from: string; to: string }
  /** Copy one file or symlink; never overwrites. */
  | { kind: "copy"; from: string; to: string }
  | { kind: "remove"; path: string; recursive: boolean }
  | { kind: "symlink"; target: string; path: string }
  /** Owner and the owner's primary group. */
  | { kind: "chown"; path: string; user: string; recursive: boolean }
  /** `filesBelow` applies the mode to every regular file under `path` instead. */
  | { kind: "chmod"; path: string; mode: number; filesBelow?: boolean }
  | { kind: "rename-user"; from: string; to: string }
  | { kind: "rename-group"; from: string; to: string }
  | { kind: "move-home"; user: string; from: string; to: string }
  | { kind: "stop-unit"; unit: string; scope: UnitScope }
  | { kind: "disable-unit"; unit: string }
  | { kind: "daemon-reload" }
  | { kind: "terminate-session"; user: string }
  | { kind: "terminate-processes"; user: string; graceMs: number }
  | { kind: "crontab-replace"; user: string; content: string }
  | { kind: "crontab-remove"; user: string };

export function formatMode(mode: number): string {
  return `0${(mode & 0o777).toString(8).padStart(3, "0")}`;
}

function scopeSuffix(scope: UnitScope): string {
  return scope.kind === "user" ? ` (user ${scope.user})` : "";
}

/** One-line description, shared by dry-run output and the apply journal. */
export function describeAction(action: Action): string {
  switch (action.kind) {
    case "write":
      return action.label ?? `Write ${action.path}`;
    case "mkdir":
      return `Create directory ${action.path}`;
    case "move":
      return `Move ${action.from} → ${action.to}`;
    case "copy":
      return `Copy ${action.from} → ${action.to}`;
    case "remove":
      return `Remove ${action.path}`;
    case "symlink":
      return `Link ${action.path} → ${action.target}`;
    case "chown":
      return `Set owner ${action.user} on ${action.path}${action.recursive ? " (recursive)" : ""}`;
    case "chmod":
      return action.filesBelow
        ? `Set mode ${formatMode(action.mode)} on files under ${action.path}`
        : `Set mode ${formatMode(action.mode)} on ${action.path}`;
    case "rename-user":
      return `Rename user ${action.from} → ${action.to}`;
    case "rename-group":
      return `Rename group ${action.from} → ${action.to}`;
    case "move-home":
      return `Move home of ${action.user}: ${action.from} → ${action.to}`;
    case "stop-unit":
      return `Stop ${action.unit}${scopeSuffix(action.scope)}`;
    case "disable-unit":
      return `Disable ${action.unit}`;
    case "daemon-reload":
      return "Reload service manager configuration";
    case "terminate-session":
      return `Terminate login session of ${action.user}`;
    case "terminate-processes":
      return `Terminate processes of ${action.user} (SIGKILL after ${action.graceMs}ms)`;
    case "crontab-replace":
      return `Replace scheduled tasks of ${action.user}`;
    case "crontab-remove":
      return `Remove scheduled tasks of ${action.user}`;
  }
}
