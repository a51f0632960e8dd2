import path from "node:path";
import { extnameLower, pathDepth } from "../utils.js";
import type { CandidateRanking, FileTree, RankedFile } from "../../types.js";
import type { SelectionStrategy } from "./types.js";

export type RuleCategory = "entry" | "config" | "docs" | "core" | "source" | "text" | "test" | "excluded";

export const CATEGORY_WEIGHTS: Record<RuleCategory, number> = {
  entry: 100,
  config: 80,
  docs: 60,
  core: 50,
  source: 30,
  text: 10,
  test: 5,
  excluded: 0
};

const SOURCE_EXTS = new Set([
  "ts", "tsx", "js", "jsx", "mjs", "cjs", "py", "rb", "go", "rs", "java", "kt", "swift",
  "php", "cs", "c", "h", "cpp", "hpp", "scala", "ex", "exs", "sh", "sql", "vue", "svelte"
]);

const STYLE_EXTS = new Set(["css", "scss", "sass", "less", "styl"]);

const LOCK_FILES = new Set(["package-lock.json", "yarn.lock", "pnpm-lock.yaml", "npm-shrinkwrap.json", "bun.lockb"]);

const MANIFESTS = new Set([
  "package.json", "tsconfig.json", "setup.py", "setup.cfg", "pyproject.toml", "requirements.txt",
  "gemfile", "composer.json", "cargo.toml", "go.mod", "pom.xml", "build.gradle", "dockerfile",
  "docker-compose.yml", "docker-compose.yaml", "makefile", ".env.example", "webpack.config.js",
  "vite.config.ts", "vite.config.js"
]);

const CORE_DIRS = new Set(["src", "app", "lib", "core", "controllers", "models", "services", "views", "templates", "api", "routes"]);

const ENTRY_POINT = /^(index|main|app|server|cli|__main__|manage)\.(js|jsx|ts|tsx|mjs|cjs|py|php|go|rs|rb|java|kt)$/;
const TOP_LEVEL_DOC = /^(readme|contributing|license|changelog|architecture)(\.(md|rst|txt))?$/;
const TEST_DIR = /(^|\/)(tests?|__tests__|spec|specs)\//;
const TEST_FILE = /(^test_.*|.*_test\.[a-z]+|.*\.(test|spec)\.[a-z]+)$/;
const GENERATED = /(\.min\.(js|css)$|\.map$|\.snap$|(^|\/)__snapshots__\/|\.generated\.|_pb2\.py$|\.pb\.go$)/;

/** Classify one path. First match wins, from the excluded categories down. */
export function categorize(relPath: string): RuleCategory {
  const base = path.posix.basename(relPath).toLowerCase();
  const ext = extnameLower(relPath);
  const depth = pathDepth(relPath);

  if (STYLE_EXTS.has(ext) || LOCK_FILES.has(base) || ext === "lock" || GENERATED.test(relPath.toLowerCase())) return "excluded";
  if (TEST_DIR.test(relPath) || TEST_FILE.test(base)) return "test";
  if (ENTRY_POINT.test(base)) return "entry";
  if (MANIFESTS.has(base) || base.startsWith(".eslintrc")) return "config";
  if (depth === 0 && TOP_LEVEL_DOC.test(base)) return "docs";
  const top = relPath.split("/")[0];
  if (SOURCE_EXTS.has(ext)) return depth > 0 && CORE_DIRS.has(top) ? "core" : "source";
  return "text";
}

export function ruleWeight(relPath: string): number {
  return CATEGORY_WEIGHTS[categorize(relPath)];
}

function compareRanked(a: RankedFile, b: RankedFile): number {
  return b.score - a.score || pathDepth(a.path) - pathDepth(b.path) || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0);
}

/**
 * Pure pattern heuristics. Never throws and never returns an empty ranking for
 * a non-empty tree: if every file is excluded they come back at weight 1.
 */
export function rankByRules(fileTree: FileTree): RankedFile[] {
  const unique = [...new Set(fileTree)];
  let ranked = unique.map((p) => ({ path: p, score: ruleWeight(p) })).filter((r) => r.score > 0);
  if (ranked.length === 0) ranked = unique.map((p) => ({ path: p, score: 1 }));
  return ranked.sort(compareRanked);
}

export class RuleBasedStrategy implements SelectionStrategy {
  readonly name = "rules";

  async rank(fileTree: FileTree): Promise<CandidateRanking> {
    return rankByRules(fileTree);
  }
}
