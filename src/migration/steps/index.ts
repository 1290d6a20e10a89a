import type { MutationStep } from "../types.js";
import { compatibilitySymlinks } from "../compat.js";
import { stopServices } from "./stop-services.js";
import { renameAccount } from "./rename-account.js";
import { cleanupLegacyUnits } from "./cleanup-legacy-units.js";
import { updateConfigs } from "./update-configs.js";
import { updateUserServices } from "./update-user-services.js";
import { updateShellConfigs } from "./update-shell.js";
import { migrateWorkspace } from "./migrate-workspace.js";
import { updateScheduledTasks } from "./update-schedule.js";
import { fixOwnership } from "./fix-ownership.js";

/** The pipeline, in execution order. */
export const MIGRATION_STEPS: readonly MutationStep[] = [
  stopServices,
  renameAccount,
  cleanupLegacyUnits,
  updateConfigs,
  updateUserServices,
  updateShellConfigs,
  migrateWorkspace,
  updateScheduledTasks,
  fixOwnership,
  compatibilitySymlinks,
];

export {
  stopServices,
  renameAccount,
  cleanupLegacyUnits,
  updateConfigs,
  updateUserServices,
  updateShellConfigs,
  migrateWorkspace,
  updateScheduledTasks,
  fixOwnership,
  compatibilitySymlinks,
};
