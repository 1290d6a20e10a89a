import path from "node:path";
import { SHELL_FILES } from "../../homes/directory.js";
import { rewriteFile } from "../context.js";
import type { MutationStep } from "../types.js";

export const updateShellConfigs: MutationStep = {
  name: "update-shell-configs",
  description: "Updating shell configurations",
  fatal: false,

  apply(ctx, report) {
    for (const name of SHELL_FILES) {
      const file = path.join(ctx.newHome, name);
      report.attempt(file, () => rewriteFile(ctx, file, ctx.pathRules));
    }
  },
};
