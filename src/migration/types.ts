/**
 * Migration Pipeline: type definitions.
 *
 * The pipeline is an ordered list of MutationStep values. Whether a
 * failure aborts the run is data on the step (`fatal`), not control flow.
 */

import type { MigrationPlan } from "../types.js";
import type { MigrationContext } from "./context.js";

export type StepStatus = "done" | "skipped" | "incomplete";

export interface StepOutcome {
  step: string;
  status: StepStatus;
  /** Progress notes and, for incomplete steps, the failed items. */
  notes: string[];
}

/** Handed to a step while it runs. */
export interface StepReporter {
  note(message: string): void;
  /**
   * Run one item of work. In a recoverable step a thrown error is logged,
   * the step is marked incomplete and `false` is returned; in a fatal step
   * the error propagates.
   */
  attempt(target: string, work: () => void): boolean;
}

export interface MutationStep {
  readonly name: string;
  readonly description: string;
  readonly fatal: boolean;
  /** Optional steps return false when the plan opts out. Default: enabled. */
  enabled?(plan: MigrationPlan): boolean;
  apply(ctx: MigrationContext, report: StepReporter): void;
}

export interface PipelineSummary {
  outcomes: StepOutcome[];
  /** Names of steps that finished with failed items. */
  incomplete: string[];
  /** Every action performed (or described), in order. */
  actions: readonly string[];
}
