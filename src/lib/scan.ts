import fs from "node:fs/promises";
import path from "node:path";
import { globby } from "globby";
import { shouldIgnore, type IgnoreRuleSet } from "./ignore.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { errorMessage, toPosix } from "./utils.js";
import type { FileTree } from "../types.js";

export interface ScanOptions {
  cwd: string;
  include: readonly string[];
  rules: IgnoreRuleSet;
  logger?: Logger;
}

export interface TextRead {
  content?: string;
  bytes: number;
  reason?: string;
}

/**
 * List the repository's files as a FileTree: posix separators, deduplicated,
 * lexically sorted, with every ignored path removed.
 */
export async function scanFileTree(options: ScanOptions): Promise<FileTree> {
  const logger = options.logger ?? silentLogger;
  const patterns = options.include.length ? [...options.include] : ["**/*"];
  const paths = await globby(patterns, {
    cwd: options.cwd,
    gitignore: false,
    // pruned during the walk; the ignore rules below still cover them
    ignore: ["**/node_modules/**", "**/.git/**"],
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false
  });

  const seen = new Set<string>();
  let ignored = 0;
  for (const rel of paths) {
    const relPosix = toPosix(rel);
    if (seen.has(relPosix)) continue;
    if (shouldIgnore(options.rules, relPosix)) {
      ignored++;
      continue;
    }
    seen.add(relPosix);
  }
  const tree = [...seen].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  logger.info(`Found ${tree.length} files (${ignored} ignored)`);
  return tree;
}

export async function readTextFile(cwd: string, relPath: string, maxBytes: number): Promise<TextRead> {
  const file = path.join(cwd, relPath);
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) return { bytes: 0, reason: "not-a-file" };
    if (stat.size > maxBytes) return { bytes: stat.size, reason: "too-large" };
    const buf = await fs.readFile(file);
    // NUL bytes mean this is not text whatever its extension says
    if (buf.includes(0)) return { bytes: stat.size, reason: "binary-content" };
    return { content: buf.toString("utf8"), bytes: stat.size };
  } catch (e) {
    return { bytes: 0, reason: errorMessage(e) };
  }
}

export interface Readme {
  path: string;
  content: string;
}

/** The root README.md (any case), if present in the tree. */
export async function readReadme(cwd: string, tree: FileTree, maxBytes: number, logger: Logger = silentLogger): Promise<Readme | undefined> {
  const rel = tree.find((p) => p.toLowerCase() === "readme.md");
  if (!rel) {
    logger.warn("README.md not found");
    return undefined;
  }
  const read = await readTextFile(cwd, rel, maxBytes);
  if (read.content === undefined) {
    logger.warn(`README.md unreadable: ${read.reason ?? "unknown"}`);
    return undefined;
  }
  logger.info(`README.md contains ${read.content.length.toLocaleString("en-US")} characters`);
  return { path: rel, content: read.content };
}
