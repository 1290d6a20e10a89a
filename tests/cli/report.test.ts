import { describe, it, expect } from "vitest";
import { formatSummary, nextSteps } from "../../src/cli/report.js";
import { resolveMigrateConfig } from "../../src/config.js";
import type { MigrationResult } from "../../src/migration/orchestrator.js";
import type { MigrationPlan } from "../../src/types.js";

const config = resolveMigrateConfig({});

function result(plan: Partial<MigrationPlan>, incomplete = false): MigrationResult {
  return {
    plan: {
      oldUser: "moltbot",
      newUser: "agent1",
      renameUser: true,
      standardizeWorkspace: true,
      migrateLegacyDirs: true,
      createSymlinks: true,
      dryRun: false,
      ...plan,
    },
    record: {
      owningUser: "moltbot",
      homePath: "/home/moltbot",
      configDir: "/home/moltbot/.moltbot",
      configFile: "/home/moltbot/.moltbot/moltbot.json",
      workspacePath: "/home/moltbot/moltbot",
      workspaceSource: "config",
      conflicts: [],
      notes: [],
    },
    preflight: { errors: [], warnings: [], info: [], findings: [], passed: true },
    summary: {
      outcomes: incomplete
        ? [
            { step: "update-configs", status: "incomplete", notes: ["progress", "failed: update-configs: /x: EACCES"] },
            { step: "fix-ownership", status: "done", notes: [] },
          ]
        : [],
      incomplete: incomplete ? ["update-configs"] : [],
      actions: ["Rename user moltbot → agent1", "Reload service manager configuration"],
    },
    resumed: false,
    exitCode: incomplete ? 3 : 0,
  };
}

describe("formatSummary", () => {
  it("summarizes a rename with links and incomplete steps", () => {
    expect(formatSummary(result({}, true), config)).toEqual([
      "Migration complete!",
      "",
      "  User renamed: moltbot → agent1",
      "  Home:         /home/agent1",
      "  Config:       /home/agent1/.openclaw/openclaw.json",
      "  Workspace:    /home/agent1/.openclaw/workspace (standardized)",
      "  Actions:      2",
      "",
      "Compatibility symlinks:",
      "  /home/moltbot → /home/agent1",
      "  ~/.moltbot, ~/.clawdbot, ~/.clawd → ~/.openclaw",
      "",
      "Incomplete steps (fix the cause and re-run the same command):",
      "  update-configs",
      "    failed: update-configs: /x: EACCES",
    ]);
  });

  it("summarizes a dry run without renaming", () => {
    expect(
      formatSummary(
        result({ newUser: "moltbot", renameUser: false, standardizeWorkspace: false, createSymlinks: false, dryRun: true }),
        config,
      ),
    ).toEqual([
      "Dry run complete (nothing was changed).",
      "",
      "  User:         moltbot (unchanged)",
      "  Home:         /home/moltbot",
      "  Config:       /home/moltbot/.openclaw/openclaw.json",
      "  Workspace:    (current location, see config)",
      "  Actions:      2",
    ]);
  });
});

describe("nextSteps", () => {
  it("tells a renamed account to reboot and log in again", () => {
    const lines = nextSteps(result({}), "testhost");
    expect(lines.slice(0, 4)).toEqual(["Next steps:", "", "  1. Reboot the system:", "     sudo reboot"]);
    expect(lines).toContain("     ssh agent1@testhost");
    expect(lines.at(-1)).toBe("     openclaw configure");
  });

  it("leaves gateway verification to the operator after a rename", () => {
    const lines = nextSteps(result({}), "testhost");
    expect(lines.slice(lines.indexOf("  5. Start and verify:"))).toEqual([
      "  5. Start and verify:",
      "     systemctl --user enable --now openclaw-gateway.service",
      "     openclaw status",
      "",
      "  If messaging channels need re-auth, run:",
      "     openclaw configure",
    ]);
  });

  it("only restarts the gateway without a rename", () => {
    expect(nextSteps(result({ renameUser: false }), "testhost")).toEqual([
      "Next steps:",
      "",
      "  1. Restart the gateway:",
      "     systemctl --user restart openclaw-gateway.service",
      "",
      "  2. Verify:",
      "     openclaw status",
      "",
      "  If messaging channels need re-auth, run:",
      "     openclaw configure",
    ]);
  });
});
