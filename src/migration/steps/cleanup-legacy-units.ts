import path from "node:path";
import { lexists } from "../../exec/view.js";
import type { MutationStep } from "../types.js";

/** Disable and delete system unit files left under legacy names. */
export const cleanupLegacyUnits: MutationStep = {
  name: "cleanup-legacy-units",
  description: "Cleaning up legacy system services",
  fatal: false,

  apply(ctx, report) {
    const fs = ctx.executor.view.fs;
    let found = 0;
    let removed = 0;

    for (const name of ctx.config.legacyNames) {
      const unit = `${name}.service`;
      const file = path.join(ctx.config.systemUnitDir, unit);
      if (!lexists(fs, file)) continue;
      found++;
      const ok = report.attempt(unit, () => {
        ctx.executor.perform({ kind: "disable-unit", unit });
        ctx.executor.perform({ kind: "remove", path: file, recursive: false });
      });
      if (ok) removed++;
    }

    if (found === 0) {
      report.note("no legacy unit files");
      return;
    }
    if (removed === 0) return;
    report.attempt("daemon-reload", () => ctx.executor.perform({ kind: "daemon-reload" }));
  },
};
