/**
 * End-of-run text: migration summary and what the operator does next.
 */

import type { MigrateConfig } from "../config.js";
import { CANONICAL_CONFIG, CANONICAL_DIR, CANONICAL_WORKSPACE, GATEWAY_UNIT, PACKAGE_NAME, legacyDirName } from "../homes/directory.js";
import { homeOf } from "../homes/utils.js";
import type { MigrationResult } from "../migration/orchestrator.js";

export function formatSummary(result: MigrationResult, config: MigrateConfig): string[] {
  const { plan, summary } = result;
  const oldHome = homeOf(config.homeRoot, plan.oldUser);
  const newHome = homeOf(config.homeRoot, plan.newUser);
  const lines: string[] = [];

  lines.push(plan.dryRun ? "Dry run complete (nothing was changed)." : "Migration complete!");
  lines.push("");
  if (plan.renameUser) {
    lines.push(`  User renamed: ${plan.oldUser} → ${plan.newUser}`);
    lines.push(`  Home:         ${newHome}`);
  } else {
    lines.push(`  User:         ${plan.oldUser} (unchanged)`);
    lines.push(`  Home:         ${oldHome}`);
  }
  lines.push(`  Config:       ${newHome}/${CANONICAL_DIR}/${CANONICAL_CONFIG}`);
  lines.push(
    plan.standardizeWorkspace
      ? `  Workspace:    ${newHome}/${CANONICAL_DIR}/${CANONICAL_WORKSPACE} (standardized)`
      : "  Workspace:    (current location, see config)",
  );
  lines.push(`  Actions:      ${summary.actions.length}`);

  if (plan.createSymlinks) {
    lines.push("");
    lines.push("Compatibility symlinks:");
    if (plan.renameUser) lines.push(`  ${oldHome} → ${newHome}`);
    const legacyDirs = config.legacyNames.map((n) => `~/${legacyDirName(n)}`).join(", ");
    lines.push(`  ${legacyDirs} → ~/${CANONICAL_DIR}`);
  }

  if (summary.incomplete.length > 0) {
    lines.push("");
    lines.push("Incomplete steps (fix the cause and re-run the same command):");
    for (const outcome of summary.outcomes) {
      if (outcome.status !== "incomplete") continue;
      lines.push(`  ${outcome.step}`);
      for (const note of outcome.notes.filter((n) => n.startsWith("failed: "))) {
        lines.push(`    ${note}`);
      }
    }
  }
  return lines;
}

/**
 * Follow-up commands for the operator. Verification and reconfiguration
 * only run after a reboot as the new user, so they are printed rather than
 * performed; a leftover old account is never deleted.
 */
export function nextSteps(result: MigrationResult, hostname: string): string[] {
  const { plan } = result;
  const lines = ["Next steps:", ""];
  if (plan.renameUser) {
    lines.push(
      "  1. Reboot the system:",
      "     sudo reboot",
      "",
      "  2. SSH as the new user:",
      `     ssh ${plan.newUser}@${hostname}`,
      "",
      "  3. Reinstall global packages (fixes hardcoded paths):",
      `     pnpm add -g ${PACKAGE_NAME}@latest`,
      "",
      "  4. Reinstall the gateway daemon:",
      `     ${PACKAGE_NAME} gateway install --force`,
      "",
      "  5. Start and verify:",
      `     systemctl --user enable --now ${GATEWAY_UNIT}`,
      `     ${PACKAGE_NAME} status`,
    );
  } else {
    lines.push(
      "  1. Restart the gateway:",
      `     systemctl --user restart ${GATEWAY_UNIT}`,
      "",
      "  2. Verify:",
      `     ${PACKAGE_NAME} status`,
    );
  }
  lines.push("", "  If messaging channels need re-auth, run:", `     ${PACKAGE_NAME} configure`);
  return lines;
}
