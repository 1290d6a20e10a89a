/**
 * Shared home utilities: username validation and path mapping.
 */

import path from "node:path";
import { MigrateErrorCode, ValidationError } from "../errors.js";

const USERNAME_PATTERN = /^[a-z_][a-z0-9_-]*$/;
const USERNAME_MAX = 32;

export function isValidUsername(value: string): boolean {
  return value.length > 0 && value.length <= USERNAME_MAX && USERNAME_PATTERN.test(value);
}

/**
 * Validate a login name. Lowercase letters, digits, underscore and hyphen,
 * not starting with a digit or hyphen, at most 32 characters.
 */
export function validateUsername(value: string, label: string): void {
  if (!value) {
    throw new ValidationError(MigrateErrorCode.MISSING_FIELD, `${label} cannot be empty`);
  }
  if (!isValidUsername(value)) {
    throw new ValidationError(
      MigrateErrorCode.INVALID_USERNAME,
      `invalid ${label}: "${value}" (use lowercase letters, numbers, underscore, hyphen; max ${USERNAME_MAX})`,
    );
  }
}

export function homeOf(homeRoot: string, user: string): string {
  return path.join(homeRoot, user);
}

/** Expand a leading `~` against the given home. */
export function expandHome(value: string, home: string): string {
  if (value === "~") return home;
  if (value.startsWith("~/")) return path.join(home, value.slice(2));
  return value;
}

/** True when `child` equals `parent` or lies beneath it. */
export function isWithin(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Re-root a path from one home to another. Paths outside `fromHome`
 * are returned unchanged.
 */
export function rebase(p: string, fromHome: string, toHome: string): string {
  if (!isWithin(p, fromHome)) return p;
  return path.join(toHome, path.relative(fromHome, p));
}
