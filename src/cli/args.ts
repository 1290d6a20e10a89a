/**
 * Command-line flag parsing.
 */

import { MigrateError, MigrateErrorCode } from "../errors.js";
import type { MigrationFlags } from "../migration/orchestrator.js";

export interface CliOptions extends MigrationFlags {
  configPath?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

/** Optional phases with a `--x` / `--no-x` pair. */
const TOGGLES = {
  "rename-user": "renameUser",
  "standardize-workspace": "standardizeWorkspace",
  "migrate-legacy-dirs": "migrateLegacyDirs",
  "create-symlinks": "createSymlinks",
} as const;

type ToggleFlag = keyof typeof TOGGLES;

function isToggle(name: string): name is ToggleFlag {
  return Object.hasOwn(TOGGLES, name);
}

function usageError(message: string): MigrateError {
  return new MigrateError(MigrateErrorCode.USAGE, message);
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const opts: CliOptions = {
    dryRun: false,
    nonInteractive: false,
    ignorePreflight: false,
    verbose: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const eq = arg.indexOf("=");
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw usageError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case "--dry-run":
        opts.dryRun = true;
        break;
      case "--non-interactive":
      case "-y":
        opts.nonInteractive = true;
        break;
      case "--old-user":
        opts.oldUser = value();
        break;
      case "--new-user":
        opts.newUser = value();
        break;
      case "--ignore-preflight":
        opts.ignorePreflight = true;
        break;
      case "--config":
        opts.configPath = value();
        break;
      case "--verbose":
      case "-v":
        opts.verbose = true;
        break;
      case "--help":
      case "-h":
        opts.help = true;
        break;
      case "--version":
        opts.version = true;
        break;
      default: {
        const name = flag.replace(/^--(no-)?/, "");
        if (flag.startsWith("--") && inline === undefined && isToggle(name)) {
          opts[TOGGLES[name]] = !flag.startsWith("--no-");
          break;
        }
        throw usageError(`unknown option: ${arg}`);
      }
    }
  }
  return opts;
}

export const USAGE = `
claw-migrate: find an agent installation and migrate it to a new account
and the standard ~/.openclaw layout

Usage:
  sudo claw-migrate [options]

Options:
  --dry-run                       Show every action without changing anything
  --non-interactive, -y           Never prompt; use flags and defaults
  --old-user <name>               Account that owns the installation
  --new-user <name>               New account name (default: host name)
  --[no-]rename-user              Rename the account and move its home (default: yes)
  --[no-]standardize-workspace    Move the workspace to ~/.openclaw/workspace
  --[no-]migrate-legacy-dirs      Fold ~/.moltbot and friends into ~/.openclaw (default: yes)
  --[no-]create-symlinks          Leave links at the old paths (default: yes)
  --ignore-preflight              Continue when pre-flight checks fail
  --config <path>                 Configuration file
  --verbose, -v                   Debug logging
  --help, -h                      Show this help message
  --version                       Print the version

Examples:
  sudo claw-migrate --dry-run
  sudo claw-migrate --non-interactive --old-user moltbot --new-user agent1
  sudo claw-migrate --no-rename-user --standardize-workspace
`;
