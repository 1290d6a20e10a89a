/**
 * Test helper: temporary host trees and a silent logger.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import { resolveMigrateConfig, type MigrateConfig } from "../../src/config.js";
import type { Logger } from "../../src/types.js";

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** A file's content, or a symlink to `link`. */
export type TreeEntry = string | { link: string };

/** Create files (parents included) and symlinks under `root`. */
export function writeTree(root: string, entries: Record<string, TreeEntry>): void {
  for (const [rel, entry] of Object.entries(entries)) {
    const p = path.join(root, rel);
    fs.mkdirSync(path.dirname(p), { recursive: true });
    if (typeof entry === "string") fs.writeFileSync(p, entry);
    else fs.symlinkSync(entry.link, p);
  }
}

export interface TmpHost {
  root: string;
  homeRoot: string;
  grantDir: string;
  systemUnitDir: string;
  config: MigrateConfig;
  cleanup(): void;
}

export function makeTmpHost(prefix = "claw-migrate-test-"): TmpHost {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const homeRoot = path.join(root, "home");
  const grantDir = path.join(root, "sudoers.d");
  const systemUnitDir = path.join(root, "systemd");
  for (const dir of [homeRoot, grantDir, systemUnitDir]) fs.mkdirSync(dir);
  return {
    root,
    homeRoot,
    grantDir,
    systemUnitDir,
    config: resolveMigrateConfig({ homeRoot, grantDir, systemUnitDir, killGraceMs: 0 }),
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}

/** Every entry under `root` as "rel" (files with content, links with target), sorted. */
export function snapshotTree(root: string): string[] {
  const out: string[] = [];
  const visit = (dir: string) => {
    for (const name of fs.readdirSync(dir).sort()) {
      const p = path.join(dir, name);
      const rel = path.relative(root, p);
      const stat = fs.lstatSync(p);
      if (stat.isSymbolicLink()) out.push(`${rel} -> ${fs.readlinkSync(p)}`);
      else if (stat.isDirectory()) {
        out.push(`${rel}/`);
        visit(p);
      } else out.push(`${rel}: ${fs.readFileSync(p, "utf-8")}`);
    }
  };
  visit(root);
  return out;
}
