#!/usr/bin/env node
/**
 * claw-migrate CLI: discover an agent installation on this host and
 * migrate it to a new account and the standard ~/.openclaw layout.
 *
 * Must run as root. Every destructive phase is behind a confirmation
 * unless --non-interactive is given; --dry-run prints each action the
 * real run would take, in order, and changes nothing.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadMigrateConfig } from "../config.js";
import { createMigrateLogger } from "../logger.js";
import {
  EXIT_OK,
  EXIT_USAGE,
  FatalMigrationError,
  MigrateError,
  MigrateErrorCode,
  UserAbort,
  describeError,
  exitCodeFor,
} from "../errors.js";
import { createSystemHost } from "../host/system.js";
import { runMigration } from "../migration/orchestrator.js";
import { USAGE, parseArgs, type CliOptions } from "./args.js";
import { createReadlinePrompter, createScriptedPrompter } from "./prompt.js";
import { formatSummary, nextSteps } from "./report.js";

function readVersion(): string {
  const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "package.json");
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    return "unknown";
  }
  return "unknown";
}

async function migrate(opts: CliOptions): Promise<number> {
  const config = loadMigrateConfig(opts.configPath);
  const logger = createMigrateLogger({
    level: opts.verbose ? "debug" : config.logLevel,
    timestamps: false,
  });
  const host = createSystemHost();
  const prompter = opts.nonInteractive ? createScriptedPrompter() : createReadlinePrompter();

  try {
    const result = await runMigration({ config, host, logger, prompter, flags: opts });
    console.log("");
    for (const line of formatSummary(result, config)) console.log(line);
    if (!result.plan.dryRun) {
      console.log("");
      for (const line of nextSteps(result, host.identity.hostname())) console.log(line);
    }
    return result.exitCode;
  } catch (err) {
    if (err instanceof UserAbort) {
      console.log("Aborted.");
      return EXIT_OK;
    }
    logger.error(`[claw-migrate:cli] ${describeError(err)}`);
    if (err instanceof FatalMigrationError) {
      logger.error("[claw-migrate:cli] the system is left as of the last completed step; re-run the same command to continue");
    }
    return exitCodeFor(err);
  }
}

async function main(): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof MigrateError && err.code === MigrateErrorCode.USAGE) {
      console.error(err.message);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (opts.help) {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (opts.version) {
    console.log(readVersion());
    return EXIT_OK;
  }
  return migrate(opts);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 2;
  },
);
