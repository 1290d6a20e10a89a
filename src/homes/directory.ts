/**
 * Directory convention constants.
 *
 * Canonical layout produced by a standardizing migration:
 *
 *   ~/.openclaw/
 *     openclaw.json        main config (0600)
 *     .env                 secrets (0600)
 *     agents/
 *     credentials/         (0700, files 0600)
 *     cron/
 *     devices/
 *     workspace/           AGENTS.md, SOUL.md, MEMORY.md, memory/, scripts/
 *
 * Older installs used a legacy project name for the config directory
 * (~/.moltbot, ~/.clawdbot, ~/.clawd), the config file (moltbot.json,
 * clawdbot.json) and sometimes for the workspace itself (~/moltbot).
 */

export const CANONICAL_DIR = ".openclaw";
export const CANONICAL_CONFIG = "openclaw.json";
export const CANONICAL_WORKSPACE = "workspace";
/** Value written to the config's workspace field after standardizing. */
export const CANONICAL_WORKSPACE_REF = `~/${CANONICAL_DIR}/${CANONICAL_WORKSPACE}`;
export const PACKAGE_NAME = "openclaw";

/** Other files in the config directory that carry home paths. */
export const EXTRA_CONFIG_FILES = ["exec-approvals.json"] as const;

/** Files that must be owner-only. */
export const SENSITIVE_FILES = [CANONICAL_CONFIG, ".env"] as const;
export const CREDENTIALS_DIR = "credentials";

/** Files that mark a directory as a workspace. */
export const WORKSPACE_MARKERS = ["AGENTS.md", "SOUL.md"] as const;
/** Custom locations also accept MEMORY.md as a marker. */
export const CUSTOM_WORKSPACE_MARKERS = ["AGENTS.md", "SOUL.md", "MEMORY.md"] as const;

/** Workspace sub-directories whose markdown files get path rewrites. */
export const WORKSPACE_MARKDOWN_DIRS = ["", "memory", "scripts"] as const;

/** Shell startup files that may export paths. */
export const SHELL_FILES = [
  ".profile",
  ".bashrc",
  ".zshrc",
  ".bash_profile",
  ".zprofile",
] as const;

export const USER_UNIT_DIR = ".config/systemd/user";
export const USER_UNIT_SUFFIXES = [".service", ".path", ".timer"] as const;
export const GATEWAY_UNIT = "openclaw-gateway.service";

/** System unit names stopped before migrating (current name first). */
export const SYSTEM_SERVICE_NAMES = ["openclaw", "moltbot", "clawdbot"] as const;
/** User unit names stopped before migrating. */
export const USER_SERVICE_UNITS = [
  GATEWAY_UNIT,
  "moltbot-gateway.service",
  "clawdbot-gateway.service",
] as const;

/** Package store locations, relative to a home, that hold a global install. */
export const PNPM_GLOBAL_DIR = ".local/share/pnpm/global";
export const NPM_GLOBAL_MODULES = ".npm-global/lib/node_modules";

/** Third-party session material that cannot be migrated. */
export const SESSION_MATERIAL = [
  `${CREDENTIALS_DIR}/whatsapp`,
  "whatsapp-session.json",
] as const;

export const SSH_DIR = ".ssh";

/** Legacy config directory name for a legacy project name. */
export function legacyDirName(name: string): string {
  return `.${name}`;
}
