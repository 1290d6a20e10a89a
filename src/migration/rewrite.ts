/**
 * Text rewriting: ordered (pattern, replacement) rules applied by one
 * function, with no file I/O.
 */

export type Replacement = string | ((match: string, ...groups: string[]) => string);

export interface RewriteRule {
  pattern: RegExp;
  replacement: Replacement;
}

export interface RewriteResult {
  text: string;
  changed: boolean;
  replacements: number;
}

/** Characters that continue a path segment or a name. */
const SEGMENT_CHAR = "[A-Za-z0-9_.-]";
const NOT_AFTER_SEGMENT = `(?<!${SEGMENT_CHAR})`;
const SEGMENT_END = `(?!${SEGMENT_CHAR})`;

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Replace `from` wherever it stands as a whole path prefix or name, so
 * `/home/bot` matches in `/home/bot/x` and `"/home/bot"` but not in
 * `/home/bot2` or `/srv/home/bot`.
 */
export function literalRule(from: string, to: string): RewriteRule {
  return {
    pattern: new RegExp(`${NOT_AFTER_SEGMENT}${escapeRegExp(from)}${SEGMENT_END}`, "g"),
    replacement: () => to,
  };
}

export interface PathRuleParams {
  oldHome: string;
  newHome: string;
  /** Homes of legacy project names, e.g. /home/moltbot. */
  legacyHomes: string[];
}

/** Old home and every legacy home become the new home. */
export function buildPathRules(params: PathRuleParams): RewriteRule[] {
  const seen = new Set<string>([params.newHome]);
  const rules: RewriteRule[] = [];
  for (const from of [params.oldHome, ...params.legacyHomes]) {
    if (seen.has(from)) continue;
    seen.add(from);
    rules.push(literalRule(from, params.newHome));
  }
  return rules;
}

/** `.moltbot` and friends become the canonical directory name. */
export function buildLegacyDirRules(legacyDirs: string[], canonicalDir: string): RewriteRule[] {
  return legacyDirs
    .filter((d) => d !== canonicalDir)
    .map((d) => literalRule(d, canonicalDir));
}

/** Rule for a user name inside a grant file (`moltbot ALL=...`). */
export function identifierRule(from: string, to: string): RewriteRule {
  return {
    pattern: new RegExp(`(?<![A-Za-z0-9_-])${escapeRegExp(from)}(?![A-Za-z0-9_-])`, "g"),
    replacement: () => to,
  };
}

const WORKSPACE_FIELD = /(["']?)workspace\1(\s*):\s*(["'])([^"'\n]*)\3/g;

/**
 * Rewrite the value of every `workspace` field for which `matches(value)`
 * holds. Handles JSON and JSON5 quoting.
 */
export function workspaceFieldRule(matches: (value: string) => boolean, newValue: string): RewriteRule {
  return {
    pattern: WORKSPACE_FIELD,
    replacement: (match, keyQuote, _space, valueQuote, value) =>
      matches(value) ? `${keyQuote}workspace${keyQuote}: ${valueQuote}${newValue}${valueQuote}` : match,
  };
}

export function applyRules(text: string, rules: readonly RewriteRule[]): RewriteResult {
  let current = text;
  let replacements = 0;
  for (const rule of rules) {
    const pattern = new RegExp(rule.pattern.source, rule.pattern.flags.includes("g") ? rule.pattern.flags : `${rule.pattern.flags}g`);
    const groupCount = countGroups(pattern);
    current = current.replace(pattern, (match: string, ...rest: unknown[]) => {
      // rest is: captures..., offset, whole string
      const groups = rest.slice(0, groupCount).map((g) => (typeof g === "string" ? g : ""));
      const next = typeof rule.replacement === "string"
        ? rule.replacement
        : rule.replacement(match, ...groups);
      if (next !== match) replacements++;
      return next;
    });
  }
  return { text: current, changed: current !== text, replacements };
}

function countGroups(pattern: RegExp): number {
  // number of capture groups: match "" against an alternation with the pattern
  const probe = new RegExp(`${pattern.source}|`).exec("");
  return probe ? probe.length - 1 : 0;
}

/**
 * First `workspace` string in a config file. JSON is walked depth-first;
 * text that is not plain JSON (JSON5 comments, trailing commas) falls back
 * to the first textual match.
 */
export function readWorkspaceField(text: string): string | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return findWorkspace(parsed);
  } catch {
    const m = new RegExp(WORKSPACE_FIELD.source).exec(text);
    return m?.[4] ?? null;
  }
}

function findWorkspace(node: unknown): string | null {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findWorkspace(item);
      if (found !== null) return found;
    }
    return null;
  }
  if (typeof node !== "object" || node === null) return null;
  const entries = Object.entries(node);
  for (const [key, value] of entries) {
    if (key === "workspace" && typeof value === "string") return value;
  }
  for (const [, value] of entries) {
    const found = findWorkspace(value);
    if (found !== null) return found;
  }
  return null;
}
