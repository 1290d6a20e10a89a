/**
 * Synchronous command runner. The pipeline blocks on every external
 * process, so there is no async variant.
 */

import { spawnSync } from "node:child_process";
import { CommandError } from "../errors.js";

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Fed to stdin. */
  input?: string;
  timeoutMs?: number;
}

/** Run a command and return its result whatever the exit status. */
export function tryRun(cmd: string, args: string[], opts?: RunOptions): CommandResult {
  const res = spawnSync(cmd, args, {
    input: opts?.input,
    encoding: "utf-8",
    timeout: opts?.timeoutMs,
    stdio: ["pipe", "pipe", "pipe"],
  });
  if (res.error) {
    return { status: null, stdout: "", stderr: res.error.message };
  }
  return { status: res.status, stdout: res.stdout, stderr: res.stderr };
}

/** Run a command; throw CommandError on a non-zero exit. */
export function run(cmd: string, args: string[], opts?: RunOptions): string {
  const res = tryRun(cmd, args, opts);
  if (res.status !== 0) {
    throw new CommandError([cmd, ...args].join(" "), res.status, res.stderr);
  }
  return res.stdout;
}

/** Exit status 0, with output discarded. */
export function succeeds(cmd: string, args: string[]): boolean {
  return tryRun(cmd, args).status === 0;
}

/** Block the thread for `ms` milliseconds. */
export function sleepSync(ms: number): void {
  if (ms <= 0) return;
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}
