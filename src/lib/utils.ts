import path from "node:path";

export function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

/**
 * Normalize a user- or model-supplied relative path to the tree's canonical form:
 * forward slashes, no leading "./" or "/", no duplicate separators.
 */
export function normalizeRelPath(p: string): string {
  return p
    .trim()
    .replace(/\\/g, "/")
    .replace(/^(\.\/)+/, "")
    .replace(/^\/+/, "")
    .replace(/\/{2,}/g, "/");
}

export function extnameLower(p: string): string {
  return path.extname(p).toLowerCase().replace(/^\./, "");
}

export function pathDepth(p: string): number {
  return p.split("/").length - 1;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// Minimal ANSI escape stripper for width calculations
const ANSI_PATTERN = /[\u001B\u009B][[\]()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g;

export function stripAnsi(s: string): string {
  return s.replace(ANSI_PATTERN, "");
}

export function padPlain(s: string, w: number): string {
  const plain = stripAnsi(s);
  if (plain.length > w) return plain.slice(0, Math.max(1, w - 1)) + "…";
  return plain.padEnd(w);
}
