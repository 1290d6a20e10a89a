/**
 * Preflight Validator: read-only readiness assessment before mutation.
 *
 * Each check contributes at most one finding. Errors block the migration
 * unless overridden; warnings only need acknowledgement.
 */

import path from "node:path";
import type { Logger, PreflightFinding, PreflightReport } from "../types.js";
import type { HostServices } from "../host/types.js";
import type { MigrateConfig } from "../config.js";
import { createLiveFsView, isDir, isFile, linkTarget, type FsView } from "../exec/view.js";
import { isWithin } from "../homes/utils.js";
import { SESSION_MATERIAL, SSH_DIR, USER_SERVICE_UNITS } from "../homes/directory.js";
import { findConfigDir } from "../discovery/installation.js";

const MB = 1024 * 1024;
const EXTERNAL_LINK_DEPTH = 2;

export interface PreflightValidator {
  validate(oldUser: string, oldHome: string): PreflightReport;
}

interface ValidatorParams {
  host: HostServices;
  config: MigrateConfig;
  logger: Logger;
  fs?: FsView;
}

export function formatMb(bytes: number): string {
  return `${Math.floor(bytes / MB)} MB`;
}

/** Count of scheduled-task lines that are neither blank nor comments. */
export function countScheduledTasks(table: string): number {
  return table.split("\n").filter((l) => l.trim() !== "" && !l.trim().startsWith("#")).length;
}

export function buildReport(findings: PreflightFinding[]): PreflightReport {
  const pick = (level: PreflightFinding["level"]) =>
    findings.filter((f) => f.level === level).map((f) => f.message);
  const errors = pick("error");
  return {
    errors,
    warnings: pick("warning"),
    info: pick("info"),
    findings,
    passed: errors.length === 0,
  };
}

export function createPreflightValidator(params: ValidatorParams): PreflightValidator {
  const { host, config, logger } = params;
  const view = params.fs ?? createLiveFsView();

  function checkDiskSpace(home: string): PreflightFinding | null {
    const available = host.disk.availableBytes(home);
    const needed = host.disk.usageBytes(home);
    if (available === null || needed === null) return null;
    if (available < needed) {
      return {
        level: "error",
        code: "disk-space",
        message: `Insufficient disk space for migration (available: ${formatMb(available)}, needed: ${formatMb(needed)})`,
      };
    }
    return null;
  }

  function checkSsh(home: string): PreflightFinding {
    const sshDir = path.join(home, SSH_DIR);
    if (!isDir(view, sshDir)) {
      return { level: "warning", code: "ssh", message: `No ${SSH_DIR} directory found` };
    }
    const authorized = isFile(view, path.join(sshDir, "authorized_keys"));
    return {
      level: "info",
      code: "ssh",
      message: authorized
        ? "SSH keys found; authorized_keys present, SSH access will continue to work"
        : "SSH keys found; they move with the home directory",
    };
  }

  function externalLinks(home: string): string[] {
    const found: string[] = [];
    const visit = (dir: string, depth: number) => {
      for (const name of view.readdir(dir)) {
        const p = path.join(dir, name);
        const kind = view.kind(p);
        if (kind === "symlink") {
          const raw = view.readLink(p);
          if (path.isAbsolute(raw) && !isWithin(linkTarget(view, p), home)) {
            found.push(`${p} → ${raw}`);
          }
        } else if (kind === "dir" && depth < EXTERNAL_LINK_DEPTH) {
          visit(p, depth + 1);
        }
      }
    };
    visit(home, 1);
    return found;
  }

  function checkExternalLinks(home: string): PreflightFinding | null {
    const links = externalLinks(home);
    if (links.length === 0) return null;
    return {
      level: "info",
      code: "external-symlinks",
      message: `External symlinks found (will remain valid): ${links.join(", ")}`,
    };
  }

  function checkRunningService(user: string): PreflightFinding | null {
    const active = USER_SERVICE_UNITS.filter((unit) =>
      host.services.isActive(unit, { kind: "user", user }),
    );
    if (active.length === 0) return null;
    return {
      level: "warning",
      code: "running-service",
      message: `${active.join(", ")} running - will be stopped`,
    };
  }

  function checkSessionMaterial(home: string): PreflightFinding | null {
    const { dir } = findConfigDir(view, home, config.legacyNames);
    if (!dir) return null;
    const present = SESSION_MATERIAL.some((rel) => view.statKind(path.join(dir, rel)) !== "missing");
    if (!present) return null;
    return {
      level: "warning",
      code: "session-material",
      message: "WhatsApp session found - may need re-authentication after migration",
    };
  }

  function checkOpenFiles(home: string): PreflightFinding | null {
    const count = host.disk.openFileCount(home);
    if (count === 0) return null;
    return {
      level: "warning",
      code: "open-files",
      message: `${count} open files in home directory`,
    };
  }

  function checkScheduledTasks(user: string): PreflightFinding | null {
    const table = host.schedule.read(user);
    const count = table === null ? 0 : countScheduledTasks(table);
    if (count === 0) return null;
    return {
      level: "info",
      code: "scheduled-tasks",
      message: `Found ${count} scheduled tasks - will be migrated`,
    };
  }

  function validate(oldUser: string, oldHome: string): PreflightReport {
    const findings = [
      checkDiskSpace(oldHome),
      checkSsh(oldHome),
      checkExternalLinks(oldHome),
      checkRunningService(oldUser),
      checkSessionMaterial(oldHome),
      checkOpenFiles(oldHome),
      checkScheduledTasks(oldUser),
    ].filter((f): f is PreflightFinding => f !== null);

    const report = buildReport(findings);
    for (const f of findings) {
      const line = `[claw-migrate:preflight] ${f.message}`;
      if (f.level === "error") logger.error(line);
      else if (f.level === "warning") logger.warn(line);
      else logger.info(line);
    }
    if (!report.passed) {
      logger.error(`[claw-migrate:preflight] failed with ${report.errors.length} error(s)`);
    } else if (report.warnings.length > 0) {
      logger.warn(`[claw-migrate:preflight] completed with ${report.warnings.length} warning(s)`);
    } else {
      logger.info("[claw-migrate:preflight] all checks passed");
    }
    return report;
  }

  return { validate };
}
