/**
 * Error taxonomy.
 *
 *   ValidationError       bad input, caught before any mutation
 *   PreflightError        readiness check failed and was not overridden
 *   FatalMigrationError   a fatal pipeline step failed; later steps skipped
 *   RecoverableStepError  one item of a step failed; the pipeline continues
 *   UserAbort             a confirmation gate was declined
 *   CommandError          an external command exited non-zero
 */

export enum MigrateErrorCode {
  INVALID_USERNAME = "INVALID_USERNAME",
  USER_NOT_FOUND = "USER_NOT_FOUND",
  USER_EXISTS = "USER_EXISTS",
  RUNNING_AS_OLD_USER = "RUNNING_AS_OLD_USER",
  MISSING_FIELD = "MISSING_FIELD",
  AMBIGUOUS_INSTALLATION = "AMBIGUOUS_INSTALLATION",
  NOT_ROOT = "NOT_ROOT",
  PREFLIGHT_FAILED = "PREFLIGHT_FAILED",
  STEP_FAILED = "STEP_FAILED",
  ITEM_FAILED = "ITEM_FAILED",
  GRANT_INVALID = "GRANT_INVALID",
  USER_ABORT = "USER_ABORT",
  COMMAND_FAILED = "COMMAND_FAILED",
  USAGE = "USAGE",
}

export class MigrateError extends Error {
  readonly code: MigrateErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: MigrateErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "MigrateError";
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends MigrateError {
  constructor(code: MigrateErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = "ValidationError";
  }
}

export class PreflightError extends MigrateError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(
      MigrateErrorCode.PREFLIGHT_FAILED,
      `Pre-flight failed with ${errors.length} error(s): ${errors.join("; ")}`,
    );
    this.name = "PreflightError";
    this.errors = errors;
  }
}

export class FatalMigrationError extends MigrateError {
  readonly step: string;

  constructor(step: string, message: string, cause?: unknown) {
    super(MigrateErrorCode.STEP_FAILED, `${step} failed: ${message}`, { step });
    this.name = "FatalMigrationError";
    this.step = step;
    if (cause !== undefined) this.cause = cause;
  }
}

export class RecoverableStepError extends MigrateError {
  readonly step: string;
  readonly target: string;

  constructor(step: string, target: string, message: string) {
    super(MigrateErrorCode.ITEM_FAILED, `${step}: ${target}: ${message}`, { step, target });
    this.name = "RecoverableStepError";
    this.step = step;
    this.target = target;
  }
}

export class UserAbort extends MigrateError {
  readonly gate: string;

  constructor(gate: string) {
    super(MigrateErrorCode.USER_ABORT, `Aborted at "${gate}"`, { gate });
    this.name = "UserAbort";
    this.gate = gate;
  }
}

export class CommandError extends MigrateError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    const trimmed = stderr.trim();
    super(
      MigrateErrorCode.COMMAND_FAILED,
      `${command} exited with ${exitCode ?? "signal"}${trimmed ? `: ${trimmed}` : ""}`,
      { command, exitCode },
    );
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** Render any thrown value as a one-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** The `code` of a Node system error, if any. */
export function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// --- Exit codes ---

export const EXIT_OK = 0;
export const EXIT_VALIDATION = 1;
export const EXIT_FATAL = 2;
export const EXIT_INCOMPLETE = 3;
export const EXIT_USAGE = 64;

export function exitCodeFor(err: unknown): number {
  if (err instanceof UserAbort) return EXIT_OK;
  if (err instanceof ValidationError || err instanceof PreflightError) return EXIT_VALIDATION;
  if (err instanceof MigrateError && err.code === MigrateErrorCode.USAGE) return EXIT_USAGE;
  return EXIT_FATAL;
}
