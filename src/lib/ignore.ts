import fs from "node:fs/promises";
import path from "node:path";
import picomatch from "picomatch";
import binaryExtensions from "binary-extensions";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { errorMessage, normalizeRelPath } from "./utils.js";

export interface IgnoreRule {
  pattern: string;
  source: string;
  test(relPath: string): boolean;
}

export interface IgnoreRuleSet {
  readonly rules: readonly IgnoreRule[];
}

// Directories and files that never carry project knowledge. Same line syntax as an ignore file.
export const BASELINE_PATTERNS: readonly string[] = [
  ".git/",
  ".svn/",
  ".hg/",
  ".vscode/",
  ".idea/",
  "node_modules/",
  "bower_components/",
  "__pycache__/",
  ".venv/",
  "venv/",
  ".tox/",
  ".mypy_cache/",
  ".pytest_cache/",
  "vendor/",
  "dist/",
  "build/",
  "target/",
  "coverage/",
  ".cache/",
  ".next/",
  ".nuxt/",
  "tmp/",
  "temp/",
  "logs/",
  ".repobrief/",
  ".tmp-tests/",
  ".DS_Store",
  "Thumbs.db",
  "*.log",
  "*.pyc",
  "*.svg",
  ".repobriefignore",
  ...binaryExtensions.map((ext) => `*.${ext.toLowerCase()}`)
];

/** Ignore-file lines worth compiling: no blanks, no comments, no negations. */
export function parseIgnoreSpec(text: string, logger: Logger = silentLogger): string[] {
  const out: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    if (line.startsWith("!")) {
      logger.debug(`Negation pattern not supported, skipped: ${line}`);
      continue;
    }
    out.push(line);
  }
  return out;
}

/**
 * Compile one pattern. A pattern without a slash matches any single path segment
 * ("*.png", "build/"); a pattern with one (or a leading "/") is matched against the
 * full path and its directory prefixes. A trailing "/" restricts matches to directories.
 */
export function compileIgnorePattern(pattern: string, source = "inline", nocase = false): IgnoreRule | null {
  let p = pattern.trim();
  if (!p || p.startsWith("#") || p.startsWith("!")) return null;
  const anchored = p.startsWith("/");
  const dirOnly = p.endsWith("/");
  p = p.replace(/^\/+/, "").replace(/\/+$/, "");
  if (!p) return null;

  const isMatch = picomatch(p, { dot: true, nocase });
  const pathShaped = anchored || p.includes("/");

  const test = (relPath: string): boolean => {
    const segments = normalizeRelPath(relPath).split("/");
    // a directory-only rule never matches the final (file) segment
    const last = dirOnly ? segments.length - 1 : segments.length;
    if (!pathShaped) {
      for (let i = 0; i < last; i++) if (isMatch(segments[i])) return true;
      return false;
    }
    for (let i = 1; i <= last; i++) {
      if (isMatch(segments.slice(0, i).join("/"))) return true;
    }
    return false;
  };

  return { pattern, source, test };
}

export function compileIgnoreRules(patterns: readonly string[], source = "inline", nocase = false): IgnoreRuleSet {
  const rules: IgnoreRule[] = [];
  for (const p of patterns) {
    const rule = compileIgnorePattern(p, source, nocase);
    if (rule) rules.push(rule);
  }
  return { rules };
}

/** The baseline ignores "LOGO.PNG" as readily as "logo.png". */
export function compileBaselineRules(): IgnoreRuleSet {
  return compileIgnoreRules(BASELINE_PATTERNS, "baseline", true);
}

export function mergeIgnoreRules(...sets: IgnoreRuleSet[]): IgnoreRuleSet {
  return { rules: sets.flatMap((s) => s.rules) };
}

export function matchIgnoreRule(set: IgnoreRuleSet, relPath: string): IgnoreRule | undefined {
  return set.rules.find((r) => r.test(relPath));
}

export function shouldIgnore(set: IgnoreRuleSet, relPath: string): boolean {
  return matchIgnoreRule(set, relPath) !== undefined;
}

export function filterFileTree(set: IgnoreRuleSet, paths: readonly string[]): string[] {
  return paths.filter((p) => !shouldIgnore(set, p));
}

export interface LoadIgnoreOptions {
  cwd: string;
  ignoreFiles?: readonly string[];
  useIgnoreFiles?: boolean;
  extraPatterns?: readonly string[];
  logger?: Logger;
}

/** Baseline ∪ repository ignore files ∪ configured excludes. Unreadable files are skipped. */
export async function loadIgnoreRules(options: LoadIgnoreOptions): Promise<IgnoreRuleSet> {
  const logger = options.logger ?? silentLogger;
  const sets: IgnoreRuleSet[] = [compileBaselineRules()];

  if (options.useIgnoreFiles !== false) {
    for (const name of options.ignoreFiles ?? []) {
      const file = path.join(options.cwd, name);
      let raw: string;
      try {
        raw = await fs.readFile(file, "utf8");
      } catch (e) {
        if (isNotFound(e)) logger.debug(`No ${name} found`);
        else logger.warn(`Could not read ${name}, skipping it: ${errorMessage(e)}`);
        continue;
      }
      const set = compileIgnoreRules(parseIgnoreSpec(raw, logger), name);
      logger.info(`Added ${set.rules.length} patterns from ${name}`);
      sets.push(set);
    }
  }

  if (options.extraPatterns?.length) sets.push(compileIgnoreRules(options.extraPatterns, "config"));
  return mergeIgnoreRules(...sets);
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
