/**
 * claw-migrate: discovery and migration of agent installations.
 *
 * Provides:
 * - Discovery Engine (weighted evidence scoring of home directories)
 * - Workspace Resolver (priority-ordered workspace selection with conflicts)
 * - Preflight Validator (read-only readiness report)
 * - Migration Pipeline (ten ordered steps, fatal/recoverable as data)
 * - Executor (one indirection for dry-run and apply)
 * - Compatibility symlinks
 */

export type {
  Candidate,
  FindingLevel,
  InstallationRecord,
  Logger,
  MigrationPlan,
  PreflightFinding,
  PreflightReport,
  Prompter,
  WorkspaceResolution,
  WorkspaceSource,
} from "./types.js";

export { createMigrateLogger, type LogLevel, type MigrateLoggerOptions } from "./logger.js";
export { loadMigrateConfig, resolveMigrateConfig, type MigrateConfig } from "./config.js";
export {
  CommandError,
  FatalMigrationError,
  MigrateError,
  MigrateErrorCode,
  PreflightError,
  RecoverableStepError,
  UserAbort,
  ValidationError,
  exitCodeFor,
} from "./errors.js";

export { createDiscoveryEngine, listHomeDirs, WEIGHTS, type DiscoveryEngine } from "./discovery/scanner.js";
export { resolveWorkspace, type WorkspaceQuery } from "./discovery/workspace.js";
export { buildInstallationRecord } from "./discovery/installation.js";
export { createPreflightValidator, type PreflightValidator } from "./preflight/validator.js";

export type { Action } from "./exec/actions.js";
export { describeAction } from "./exec/actions.js";
export { createExecutor, previewLine, stripPreview, type Executor } from "./exec/executor.js";
export { createLiveFsView, createLiveView, type FsView, type SystemView } from "./exec/view.js";

export {
  applyRules,
  buildLegacyDirRules,
  buildPathRules,
  literalRule,
  type RewriteRule,
  type RewriteResult,
} from "./migration/rewrite.js";
export { createMigrationContext, type MigrationContext } from "./migration/context.js";
export { runPipeline } from "./migration/pipeline.js";
export { MIGRATION_STEPS } from "./migration/steps/index.js";
export { createCompatibilitySymlinks } from "./migration/compat.js";
export type { MutationStep, PipelineSummary, StepOutcome, StepReporter } from "./migration/types.js";
export {
  runMigration,
  type MigrationFlags,
  type MigrationResult,
  type RunMigrationOptions,
} from "./migration/orchestrator.js";

export type { HostServices } from "./host/types.js";
export { createSystemHost } from "./host/system.js";
