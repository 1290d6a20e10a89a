/**
 * Runs the ordered step list against one context.
 *
 * A failing fatal step raises FatalMigrationError and nothing after it
 * runs. A failing recoverable step is marked incomplete and the pipeline
 * moves on; the summary names every incomplete step for a re-run.
 */

import { FatalMigrationError, RecoverableStepError, describeError } from "../errors.js";
import type { MigrationContext } from "./context.js";
import type { MutationStep, PipelineSummary, StepOutcome, StepReporter } from "./types.js";
import { MIGRATION_STEPS } from "./steps/index.js";

function createReporter(
  ctx: MigrationContext,
  step: MutationStep,
  notes: string[],
  failures: RecoverableStepError[],
): StepReporter {
  const tag = `[claw-migrate:pipeline] ${step.name}`;
  return {
    note(message) {
      notes.push(message);
      ctx.logger.info(`${tag}: ${message}`);
    },
    attempt(target, work) {
      if (step.fatal) {
        work();
        return true;
      }
      try {
        work();
        return true;
      } catch (err) {
        const failure = new RecoverableStepError(step.name, target, describeError(err));
        failures.push(failure);
        ctx.logger.error(`${tag}: ${target}: ${describeError(err)}`);
        return false;
      }
    },
  };
}

export function runPipeline(
  ctx: MigrationContext,
  steps: readonly MutationStep[] = MIGRATION_STEPS,
): PipelineSummary {
  const outcomes: StepOutcome[] = [];

  steps.forEach((step, i) => {
    const position = `[${i + 1}/${steps.length}]`;
    if (step.enabled && !step.enabled(ctx.plan)) {
      ctx.logger.info(`[claw-migrate:pipeline] ${position} ${step.description}: skipped (not requested)`);
      outcomes.push({ step: step.name, status: "skipped", notes: ["not requested"] });
      return;
    }

    ctx.logger.info(`[claw-migrate:pipeline] ${position} ${step.description}`);
    const notes: string[] = [];
    const failures: RecoverableStepError[] = [];
    const reporter = createReporter(ctx, step, notes, failures);

    try {
      step.apply(ctx, reporter);
    } catch (err) {
      if (step.fatal) {
        ctx.logger.error(`[claw-migrate:pipeline] ${step.name} failed: ${describeError(err)}`);
        throw err instanceof FatalMigrationError
          ? err
          : new FatalMigrationError(step.name, describeError(err), err);
      }
      failures.push(new RecoverableStepError(step.name, step.name, describeError(err)));
      ctx.logger.error(`[claw-migrate:pipeline] ${step.name}: ${describeError(err)}`);
    }

    outcomes.push({
      step: step.name,
      status: failures.length > 0 ? "incomplete" : "done",
      notes: [...notes, ...failures.map((f) => `failed: ${f.message}`)],
    });
  });

  const incomplete = outcomes.filter((o) => o.status === "incomplete").map((o) => o.step);
  if (incomplete.length > 0) {
    ctx.logger.warn(`[claw-migrate:pipeline] incomplete steps: ${incomplete.join(", ")}`);
  }
  return { outcomes, incomplete, actions: [...ctx.executor.journal] };
}
