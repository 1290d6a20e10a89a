/**
 * Verify that the public API is reachable from the main entry point.
 */
import { describe, it, expect } from "vitest";

describe("public API exports", () => {
  it.each([
    "createMigrateLogger",
    "loadMigrateConfig",
    "resolveMigrateConfig",
    "exitCodeFor",
    "createDiscoveryEngine",
    "listHomeDirs",
    "resolveWorkspace",
    "buildInstallationRecord",
    "createPreflightValidator",
    "createExecutor",
    "createLiveView",
    "createMigrationContext",
    "runPipeline",
    "createCompatibilitySymlinks",
    "runMigration",
    "createSystemHost",
  ])("exports %s", async (name) => {
    const mod: Record<string, unknown> = await import("../src/index.js");
    expect(typeof mod[name]).toBe("function");
  });

  it("exports the ten pipeline steps in order", async () => {
    const mod = await import("../src/index.js");
    expect(mod.MIGRATION_STEPS.map((s) => s.name)).toEqual([
      "stop-services",
      "rename-account",
      "cleanup-legacy-units",
      "update-configs",
      "update-user-services",
      "update-shell-configs",
      "migrate-workspace",
      "update-scheduled-tasks",
      "fix-ownership",
      "create-compatibility-symlinks",
    ]);
  });
});
