import { applyRules } from "../rewrite.js";
import type { MutationStep } from "../types.js";

/**
 * Rewrite home paths in the new user's scheduled-task table. A table still
 * filed under the old name is moved over first.
 */
export const updateScheduledTasks: MutationStep = {
  name: "update-scheduled-tasks",
  description: "Updating scheduled tasks",
  fatal: false,

  apply(ctx, report) {
    const view = ctx.executor.view;
    const { oldUser, newUser } = ctx.plan;
    const current = view.readScheduledTasks(newUser);
    const stale = oldUser !== newUser ? view.readScheduledTasks(oldUser) : null;

    if (current === null && stale !== null) {
      const content = applyRules(stale, ctx.pathRules).text;
      report.attempt(`scheduled tasks of ${oldUser}`, () => {
        ctx.executor.perform({ kind: "crontab-replace", user: newUser, content });
        ctx.executor.perform({ kind: "crontab-remove", user: oldUser });
      });
      return;
    }
    if (current === null) {
      report.note("no scheduled tasks");
      return;
    }

    const result = applyRules(current, ctx.pathRules);
    if (!result.changed) {
      report.note("scheduled task paths already current");
      return;
    }
    report.attempt(`scheduled tasks of ${newUser}`, () =>
      ctx.executor.perform({ kind: "crontab-replace", user: newUser, content: result.text }),
    );
  },
};
