/**
 * Shared type definitions for claw-migrate.
 * Kept minimal so every subsystem can depend on it without cycles.
 */

// --- Logging ---

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

// --- Discovery ---

/** A home directory evaluated as a possible installation owner. */
export interface Candidate {
  username: string;
  homePath: string;
  evidenceScore: number;
  /** Ordered evidence, one entry per matched signal. */
  evidenceNotes: string[];
}

/** Where the authoritative workspace was found. */
export type WorkspaceSource = "config" | "standard" | "custom" | "legacy";

export interface WorkspaceResolution {
  /** Absolute workspace path, or null when no workspace exists anywhere. */
  path: string | null;
  source: WorkspaceSource | null;
  conflicts: string[];
}

/** The installation chosen as migration target. Built once per run. */
export interface InstallationRecord {
  owningUser: string;
  homePath: string;
  /** Null when neither the canonical nor a legacy config directory exists. */
  configDir: string | null;
  configFile: string | null;
  workspacePath: string | null;
  workspaceSource: WorkspaceSource | null;
  conflicts: string[];
  notes: string[];
}

// --- Plan ---

export interface MigrationPlan {
  readonly oldUser: string;
  readonly newUser: string;
  readonly renameUser: boolean;
  readonly standardizeWorkspace: boolean;
  readonly migrateLegacyDirs: boolean;
  readonly createSymlinks: boolean;
  readonly dryRun: boolean;
}

// --- Preflight ---

export type FindingLevel = "error" | "warning" | "info";

export interface PreflightFinding {
  level: FindingLevel;
  code: string;
  message: string;
}

export interface PreflightReport {
  errors: string[];
  warnings: string[];
  info: string[];
  findings: PreflightFinding[];
  passed: boolean;
}

// --- Prompts ---

/** Confirmation surface. Non-interactive runs never reach it. */
export interface Prompter {
  confirm(question: string, defaultYes: boolean): Promise<boolean>;
  /** Free-text answer; an empty reply yields `defaultValue` (or ""). */
  ask(question: string, defaultValue?: string): Promise<string>;
}
