import path from "node:path";
import { isDir } from "../../exec/view.js";
import { USER_UNIT_DIR, USER_UNIT_SUFFIXES } from "../../homes/directory.js";
import { rewriteFile } from "../context.js";
import type { MutationStep } from "../types.js";

export const updateUserServices: MutationStep = {
  name: "update-user-services",
  description: "Updating user service units",
  fatal: false,

  apply(ctx, report) {
    const fs = ctx.executor.view.fs;
    const unitDir = path.join(ctx.newHome, USER_UNIT_DIR);
    if (!isDir(fs, unitDir)) {
      report.note("no user service units");
      return;
    }

    const units = fs.readdir(unitDir).filter((name) => USER_UNIT_SUFFIXES.some((s) => name.endsWith(s)));
    for (const name of units) {
      const file = path.join(unitDir, name);
      report.attempt(file, () => rewriteFile(ctx, file, ctx.pathRules));
    }
  },
};
