/**
 * Discovery Engine: scores home directories as installation owners.
 *
 * Signals are independent and additive; a home with no signal at all is
 * not a candidate. Read-only.
 */

import path from "node:path";
import type { Candidate, Logger } from "../types.js";
import type { MigrateConfig } from "../config.js";
import { createLiveFsView, hasAnyFile, isDir, isFile, isPlainDir, type FsView } from "../exec/view.js";
import {
  CANONICAL_CONFIG,
  CANONICAL_DIR,
  CANONICAL_WORKSPACE,
  GATEWAY_UNIT,
  NPM_GLOBAL_MODULES,
  PACKAGE_NAME,
  PNPM_GLOBAL_DIR,
  USER_UNIT_DIR,
  WORKSPACE_MARKERS,
  legacyDirName,
} from "../homes/directory.js";

/** Signal weights. */
export const WEIGHTS = {
  canonicalDir: 100,
  legacyDir: 80,
  canonicalConfig: 50,
  legacyConfig: 40,
  userService: 30,
  globalPackage: 20,
  workspaceMarker: 25,
} as const;

export interface DiscoveryEngine {
  /** Candidates sorted by score descending, then username ascending. */
  scan(homeDirs: string[]): Candidate[];
  /** Highest-scoring candidate, or null when nothing was found. */
  pickBest(candidates: Candidate[]): Candidate | null;
  /** Every candidate sharing the top score, when more than one does. */
  findTies(candidates: Candidate[]): Candidate[];
}

interface DiscoveryParams {
  config: MigrateConfig;
  logger: Logger;
  fs?: FsView;
}

/** Real directories directly under the home root, sorted. */
export function listHomeDirs(homeRoot: string, view: FsView = createLiveFsView()): string[] {
  return view.readdir(homeRoot)
    .map((name) => path.join(homeRoot, name))
    .filter((p) => isPlainDir(view, p));
}

export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.evidenceScore !== b.evidenceScore) return b.evidenceScore - a.evidenceScore;
  if (a.username < b.username) return -1;
  if (a.username > b.username) return 1;
  return 0;
}

export function createDiscoveryEngine(params: DiscoveryParams): DiscoveryEngine {
  const { config, logger } = params;
  const view = params.fs ?? createLiveFsView();

  function hasGlobalPackage(home: string): boolean {
    const pnpmRoot = path.join(home, PNPM_GLOBAL_DIR);
    for (const store of view.readdir(pnpmRoot)) {
      if (isDir(view, path.join(pnpmRoot, store, "node_modules", PACKAGE_NAME))) return true;
    }
    return isDir(view, path.join(home, NPM_GLOBAL_MODULES, PACKAGE_NAME));
  }

  function scoreHome(home: string): Candidate {
    const username = path.basename(home);
    const canonical = path.join(home, CANONICAL_DIR);
    let score = 0;
    const notes: string[] = [];
    const add = (weight: number, note: string) => {
      score += weight;
      notes.push(note);
    };

    if (isDir(view, canonical)) add(WEIGHTS.canonicalDir, `has ${CANONICAL_DIR} dir`);

    for (const name of config.legacyNames) {
      const dir = legacyDirName(name);
      if (isDir(view, path.join(home, dir))) add(WEIGHTS.legacyDir, `has ${dir} (legacy)`);
    }

    if (isFile(view, path.join(canonical, CANONICAL_CONFIG))) {
      add(WEIGHTS.canonicalConfig, `has ${CANONICAL_CONFIG}`);
    }

    for (const name of config.legacyConfigNames) {
      const file = `${name}.json`;
      if (isFile(view, path.join(canonical, file)) || isFile(view, path.join(home, legacyDirName(name), file))) {
        add(WEIGHTS.legacyConfig, `has ${file} (legacy)`);
      }
    }

    if (isFile(view, path.join(home, USER_UNIT_DIR, GATEWAY_UNIT))) {
      add(WEIGHTS.userService, "has user service unit");
    }

    if (hasGlobalPackage(home)) add(WEIGHTS.globalPackage, `has global ${PACKAGE_NAME} package`);

    const workspaceGuesses = [
      path.join(home, CANONICAL_WORKSPACE),
      path.join(canonical, CANONICAL_WORKSPACE),
      path.join(home, username),
    ];
    if (workspaceGuesses.some((ws) => hasAnyFile(view, ws, WORKSPACE_MARKERS))) {
      add(WEIGHTS.workspaceMarker, "has workspace with marker files");
    }

    return { username, homePath: home, evidenceScore: score, evidenceNotes: notes };
  }

  function scan(homeDirs: string[]): Candidate[] {
    const candidates = homeDirs
      .map(scoreHome)
      .filter((c) => c.evidenceScore > 0)
      .sort(compareCandidates);

    for (const c of candidates) {
      logger.debug?.(`[claw-migrate:discovery] ${c.username}: ${c.evidenceScore} (${c.evidenceNotes.join("; ")})`);
    }
    if (candidates.length === 0) {
      logger.warn("[claw-migrate:discovery] no installation detected");
    }
    return candidates;
  }

  function pickBest(candidates: Candidate[]): Candidate | null {
    return [...candidates].sort(compareCandidates)[0] ?? null;
  }

  function findTies(candidates: Candidate[]): Candidate[] {
    const best = pickBest(candidates);
    if (!best) return [];
    const tied = candidates
      .filter((c) => c.evidenceScore === best.evidenceScore)
      .sort(compareCandidates);
    return tied.length > 1 ? tied : [];
  }

  return { scan, pickBest, findTies };
}
