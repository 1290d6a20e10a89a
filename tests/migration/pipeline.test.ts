import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { FatalMigrationError, MigrateError, MigrateErrorCode } from "../../src/errors.js";
import { runPipeline } from "../../src/migration/pipeline.js";
import type { MutationStep } from "../../src/migration/types.js";
import { createFakeHost } from "../helpers/fake-host.js";
import { makeContext } from "../helpers/context.js";
import { makeTmpHost, type TmpHost } from "../helpers/fixtures.js";

function step(name: string, fatal: boolean, apply: MutationStep["apply"], enabled?: MutationStep["enabled"]): MutationStep {
  return { name, description: `Running ${name}`, fatal, apply, enabled };
}

describe("runPipeline", () => {
  let tmp: TmpHost;

  beforeEach(() => {
    tmp = makeTmpHost();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("runs steps in order and collects notes and actions", () => {
    const { ctx } = makeContext(tmp, createFakeHost());
    const order: string[] = [];
    const summary = runPipeline(ctx, [
      step("one", false, (c, r) => {
        order.push("one");
        c.executor.perform({ kind: "daemon-reload" });
        r.note("reloaded");
      }),
      step("two", true, () => {
        order.push("two");
      }),
    ]);

    expect(order).toEqual(["one", "two"]);
    expect(summary).toEqual({
      outcomes: [
        { step: "one", status: "done", notes: ["reloaded"] },
        { step: "two", status: "done", notes: [] },
      ],
      incomplete: [],
      actions: ["Reload service manager configuration"],
    });
  });

  it("skips disabled steps", () => {
    const { ctx, logger } = makeContext(tmp, createFakeHost(), { plan: { createSymlinks: false } });
    const summary = runPipeline(ctx, [
      step("links", false, () => {
        throw new Error("must not run");
      }, (plan) => plan.createSymlinks),
    ]);
    expect(summary.outcomes).toEqual([{ step: "links", status: "skipped", notes: ["not requested"] }]);
    expect(logger.info).toHaveBeenCalledWith("[claw-migrate:pipeline] [1/1] Running links: skipped (not requested)");
  });

  it("marks a recoverable step incomplete and keeps going", () => {
    const { ctx, logger } = makeContext(tmp, createFakeHost());
    let laterRan = false;
    const summary = runPipeline(ctx, [
      step("configs", false, (_c, r) => {
        expect(r.attempt("/a", () => {})).toBe(true);
        expect(r.attempt("/b", () => {
          throw new Error("EACCES");
        })).toBe(false);
        r.note("continued");
      }),
      step("later", false, () => {
        laterRan = true;
      }),
    ]);

    expect(laterRan).toBe(true);
    expect(summary.outcomes[0]).toEqual({
      step: "configs",
      status: "incomplete",
      notes: ["continued", "failed: configs: /b: EACCES"],
    });
    expect(summary.incomplete).toEqual(["configs"]);
    expect(logger.error).toHaveBeenCalledWith("[claw-migrate:pipeline] configs: /b: EACCES");
    expect(logger.warn).toHaveBeenCalledWith("[claw-migrate:pipeline] incomplete steps: configs");
  });

  it("records an error thrown outside attempt", () => {
    const { ctx } = makeContext(tmp, createFakeHost());
    const summary = runPipeline(ctx, [
      step("schedule", false, () => {
        throw new Error("oops");
      }),
    ]);
    expect(summary.outcomes[0]?.notes).toEqual(["failed: schedule: schedule: oops"]);
  });

  it("stops at a failing fatal step", () => {
    const { ctx } = makeContext(tmp, createFakeHost());
    let laterRan = false;
    const cause = new MigrateError(MigrateErrorCode.USER_EXISTS, "taken");
    const run = () =>
      runPipeline(ctx, [
        step("rename", true, (_c, r) => {
          r.attempt("login", () => {
            throw cause;
          });
        }),
        step("later", false, () => {
          laterRan = true;
        }),
      ]);

    try {
      run();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FatalMigrationError);
      if (err instanceof FatalMigrationError) {
        expect(err.message).toBe("rename failed: taken");
        expect(err.step).toBe("rename");
        expect(err.cause).toBe(cause);
      }
    }
    expect(laterRan).toBe(false);
  });

  it("passes a FatalMigrationError through unchanged", () => {
    const { ctx } = makeContext(tmp, createFakeHost());
    const original = new FatalMigrationError("inner", "already wrapped");
    expect(() =>
      runPipeline(ctx, [
        step("outer", true, () => {
          throw original;
        }),
      ]),
    ).toThrow(original);
  });
});
