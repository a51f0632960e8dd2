import type { EmbeddingBackend } from "./embeddings.js";
import { normalize } from "./embeddings.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { errorMessage } from "./utils.js";

export interface SimilarityHit {
  path: string;
  similarity: number;
}

export type IndexResult = { ok: true; count: number } | { ok: false; error: Error };

export interface VectorIndexOptions {
  // Only this many leading characters of each file are embedded
  prefixChars?: number;
  logger?: Logger;
}

interface Entry {
  path: string;
  order: number;
  vector: number[];
}

/**
 * Ephemeral path -> unit vector index. Built once per run from the whole
 * candidate set; similarity is cosine over normalized vectors, clamped to [0, 1].
 */
export class VectorIndex {
  private entries = new Map<string, Entry>();
  private dimensions = 0;
  private readonly prefixChars: number;
  private readonly logger: Logger;

  constructor(private readonly backend: EmbeddingBackend, options: VectorIndexOptions = {}) {
    this.prefixChars = options.prefixChars ?? 2_048;
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.entries.size;
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  /** Replaces any previous contents. A path missing from `contents` is embedded by its name alone. */
  async index(paths: readonly string[], contents: ReadonlyMap<string, string>): Promise<IndexResult> {
    const unique = [...new Set(paths)];
    const texts = unique.map((p) => `${p}\n${(contents.get(p) ?? "").slice(0, this.prefixChars)}`);
    let vectors: number[][];
    try {
      vectors = unique.length ? await this.backend.embed(texts) : [];
    } catch (e) {
      return { ok: false, error: e instanceof Error ? e : new Error(errorMessage(e)) };
    }
    if (vectors.length !== unique.length) {
      return { ok: false, error: new Error(`embedding backend returned ${vectors.length} vectors for ${unique.length} files`) };
    }
    const dims = vectors[0]?.length ?? 0;
    if (vectors.some((v) => v.length !== dims)) {
      return { ok: false, error: new Error("embedding backend returned vectors of mixed dimensionality") };
    }

    const next = new Map<string, Entry>();
    unique.forEach((p, i) => next.set(p, { path: p, order: i, vector: normalize(vectors[i]) }));
    this.entries = next;
    this.dimensions = dims;
    this.logger.info(`Indexed ${next.size} files with ${this.backend.name} (${dims} dimensions)`);
    return { ok: true, count: next.size };
  }

  async query(text: string, k: number): Promise<SimilarityHit[]> {
    if (this.entries.size === 0 || k <= 0) return [];
    const [raw] = await this.backend.embed([text]);
    if (!raw || raw.length !== this.dimensions) {
      throw new Error(`query embedding has ${raw?.length ?? 0} dimensions, index has ${this.dimensions}`);
    }
    return this.nearest(normalize(raw), k);
  }

  /** Files most similar to an indexed file, excluding itself. Unknown paths yield nothing. */
  related(path: string, k: number): SimilarityHit[] {
    const entry = this.entries.get(path);
    if (!entry || k <= 0) return [];
    return this.nearest(entry.vector, k, path);
  }

  private nearest(vector: readonly number[], k: number, exclude?: string): SimilarityHit[] {
    const scored: Array<{ entry: Entry; similarity: number }> = [];
    for (const entry of this.entries.values()) {
      if (entry.path === exclude) continue;
      scored.push({ entry, similarity: clamp01(dot(vector, entry.vector)) });
    }
    scored.sort(
      (a, b) =>
        b.similarity - a.similarity ||
        a.entry.path.length - b.entry.path.length ||
        a.entry.order - b.entry.order
    );
    return scored.slice(0, k).map((s) => ({ path: s.entry.path, similarity: s.similarity }));
  }
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

function clamp01(x: number): number {
  return Math.max(0, Math.min(1, x));
}
