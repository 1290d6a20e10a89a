import type { UnitScope } from "../../host/types.js";
import { SYSTEM_SERVICE_NAMES, USER_SERVICE_UNITS } from "../../homes/directory.js";
import { accountName } from "../context.js";
import type { MutationStep } from "../types.js";

/**
 * Stop system units under current and legacy names, then the account's
 * user units, its login session and any processes left behind.
 */
export const stopServices: MutationStep = {
  name: "stop-services",
  description: "Stopping services",
  fatal: false,

  apply(ctx, report) {
    const view = ctx.executor.view;
    const user = accountName(ctx);
    const userScope: UnitScope = { kind: "user", user };

    // Read everything first: stopping one thing may end another on its own,
    // and the plan must not depend on how fast that happens.
    const systemUnits = SYSTEM_SERVICE_NAMES
      .map((name) => `${name}.service`)
      .filter((unit) => view.isUnitActive(unit, { kind: "system" }));
    const hasAccount = view.userExists(user);
    const userUnits = hasAccount
      ? USER_SERVICE_UNITS.filter((unit) => view.isUnitActive(unit, userScope))
      : [];
    const hasSession = hasAccount && view.hasSession(user);
    const hasProcesses = hasAccount && view.hasProcesses(user);

    for (const unit of systemUnits) {
      report.attempt(unit, () =>
        ctx.executor.perform({ kind: "stop-unit", unit, scope: { kind: "system" } }),
      );
    }
    for (const unit of userUnits) {
      report.attempt(unit, () => ctx.executor.perform({ kind: "stop-unit", unit, scope: userScope }));
    }
    if (hasSession) {
      report.attempt(`session of ${user}`, () =>
        ctx.executor.perform({ kind: "terminate-session", user }),
      );
    }
    if (hasProcesses) {
      report.attempt(`processes of ${user}`, () =>
        ctx.executor.perform({ kind: "terminate-processes", user, graceMs: ctx.config.killGraceMs }),
      );
    }

    if (systemUnits.length + userUnits.length === 0 && !hasSession && !hasProcesses) {
      report.note("nothing running");
    }
  },
};
