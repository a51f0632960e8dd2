import path from "node:path";
import { extnameLower } from "./utils.js";
import type { AssembledContext, FileTree } from "../types.js";

const EXT_TO_LANG: Record<string, string> = {
  ts: "ts",
  tsx: "tsx",
  js: "js",
  cjs: "js",
  mjs: "js",
  jsx: "jsx",
  json: "json",
  md: "md",
  sh: "bash",
  py: "python",
  rb: "ruby",
  go: "go",
  rs: "rust",
  java: "java",
  kt: "kotlin",
  swift: "swift",
  php: "php",
  sql: "sql",
  yml: "yaml",
  yaml: "yaml",
  toml: "toml",
  c: "c",
  h: "c",
  cpp: "cpp",
  cs: "csharp",
  html: "html",
  css: "css",
  txt: "text"
};

export function langForFile(relPath: string): string {
  const byExt = EXT_TO_LANG[extnameLower(relPath)];
  if (byExt) return byExt;
  const base = path.posix.basename(relPath).toLowerCase();
  if (base === "dockerfile") return "dockerfile";
  if (base === "makefile") return "makefile";
  return "";
}

type DirNode = { name: string; dirs: Map<string, DirNode>; files: string[] };

function buildTree(paths: FileTree, rootName: string): DirNode {
  const root: DirNode = { name: rootName, dirs: new Map(), files: [] };
  for (const p of paths) {
    const parts = p.split("/");
    let node = root;
    parts.forEach((part, i) => {
      if (i === parts.length - 1) {
        node.files.push(part);
        return;
      }
      let next = node.dirs.get(part);
      if (!next) {
        next = { name: part, dirs: new Map(), files: [] };
        node.dirs.set(part, next);
      }
      node = next;
    });
  }
  return root;
}

function renderTreeAscii(node: DirNode, prefix = ""): string[] {
  const lines: string[] = [];
  const dirs = [...node.dirs.values()].sort((a, b) => (a.name < b.name ? -1 : 1));
  const files = [...node.files].sort();
  const total = dirs.length + files.length;

  dirs.forEach((dir, idx) => {
    const last = idx === total - 1;
    lines.push(prefix + (last ? "└─ " : "├─ ") + dir.name + "/");
    lines.push(...renderTreeAscii(dir, prefix + (last ? "   " : "│  ")));
  });
  files.forEach((name, idx) => {
    const last = dirs.length + idx === total - 1;
    lines.push(prefix + (last ? "└─ " : "├─ ") + name);
  });
  return lines;
}

/** Directories first, then files, each level sorted; the root label ends in "/". */
export function renderFileTree(paths: FileTree, rootName = "."): string {
  return [rootName + "/", ...renderTreeAscii(buildTree(paths, rootName))].join("\n");
}

// A fence longer than any backtick run inside the content
function fenceFor(content: string): string {
  const longest = Math.max(0, ...(content.match(/`+/g) ?? []).map((run) => run.length));
  return "`".repeat(Math.max(3, longest + 1));
}

export function fenced(content: string, lang = ""): string {
  const fence = fenceFor(content);
  return `${fence}${lang}\n${content.replace(/\s+$/u, "")}\n${fence}`;
}

/**
 * Header, tree and README of a bundle. Rendered on its own so the pipeline can
 * reserve its token cost before any file is admitted.
 */
export function renderPreamble(projectName: string, fileTree: FileTree, readme?: string): string {
  const lines = [`# ${projectName}`, "", `## File tree (${fileTree.length} files)`, "", fenced(renderFileTree(fileTree, projectName)), ""];
  if (readme !== undefined) lines.push("## README", "", fenced(readme, "md"), "");
  return lines.join("\n");
}

/** Content of a loaded file; only own keys count, so "constructor" and friends are plain paths. */
export function loadedContent(ctx: AssembledContext, relPath: string): string | undefined {
  return Object.hasOwn(ctx.contents, relPath) ? ctx.contents[relPath] : undefined;
}

export function renderMarkdown(ctx: AssembledContext, projectName: string): string {
  const lines = [renderPreamble(projectName, ctx.fileTree, ctx.readme), "## Files", ""];
  for (const { path: rel } of ctx.selected) {
    const content = loadedContent(ctx, rel);
    if (content === undefined) continue;
    lines.push(`### \`${rel}\``, "", fenced(content, langForFile(rel)), "");
  }
  return lines.join("\n");
}

export function renderJson(ctx: AssembledContext, projectName: string): string {
  return JSON.stringify(
    {
      name: projectName,
      strategy: ctx.strategy,
      tokenSource: ctx.tokenSource,
      tokenLimit: ctx.tokenLimit,
      budget: ctx.budget,
      totalTokens: ctx.totalTokens,
      reservedTokens: ctx.reservedTokens,
      fileTree: ctx.fileTree,
      readme: ctx.readme,
      files: ctx.selected.flatMap((f) => {
        const content = loadedContent(ctx, f.path);
        return content === undefined ? [] : [{ path: f.path, score: f.score, content }];
      }),
      skipped: ctx.skipped
    },
    null,
    2
  );
}
