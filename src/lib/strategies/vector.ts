import type { EmbeddingBackend } from "../embeddings.js";
import { SelectionFailure } from "../errors.js";
import { readTextFile } from "../scan.js";
import { errorMessage } from "../utils.js";
import { VectorIndex, type SimilarityHit } from "../vectorIndex.js";
import type { CandidateRanking, FileTree } from "../../types.js";
import type { SelectionContext, SelectionStrategy } from "./types.js";

export const SUMMARY_QUERY =
  "Project overview: main entry point, core business logic, domain rules, data models and how the components fit together.";

export interface VectorStrategyOptions {
  backend: EmbeddingBackend;
  maxFiles: number;
  minSimilarity: number;
  prefixChars: number;
  maxBytesPerFile: number;
}

/**
 * Embeds the whole tree, queries with the README and a synthetic summary, and
 * keeps each file's best similarity.
 */
export class VectorStrategy implements SelectionStrategy {
  readonly name = "vector";

  constructor(private readonly options: VectorStrategyOptions) {}

  async rank(fileTree: FileTree, context: SelectionContext): Promise<CandidateRanking> {
    const { backend, maxFiles, minSimilarity, prefixChars, maxBytesPerFile } = this.options;

    const contents = new Map<string, string>();
    for (const rel of fileTree) {
      const read = await readTextFile(context.cwd, rel, maxBytesPerFile);
      if (read.content !== undefined) contents.set(rel, read.content);
      else context.logger.debug(`Embedding ${rel} by name only (${read.reason ?? "unreadable"})`);
    }

    const index = new VectorIndex(backend, { prefixChars, logger: context.logger });
    const built = await index.index(fileTree, contents);
    if (!built.ok) throw new SelectionFailure(this.name, `indexing failed: ${built.error.message}`, { cause: built.error });

    const queries = [context.readme?.content.slice(0, prefixChars), SUMMARY_QUERY].filter(
      (q): q is string => q !== undefined && q.trim() !== ""
    );
    const best = new Map<string, number>();
    for (const q of queries) {
      let hits: SimilarityHit[];
      try {
        hits = await index.query(q, fileTree.length);
      } catch (e) {
        throw new SelectionFailure(this.name, `query failed: ${errorMessage(e)}`, { cause: e });
      }
      for (const hit of hits) best.set(hit.path, Math.max(best.get(hit.path) ?? 0, hit.similarity));
    }

    const order = new Map(fileTree.map((p, i) => [p, i]));
    const ranked = [...best]
      .filter(([, similarity]) => similarity >= minSimilarity)
      .sort(
        ([pa, sa], [pb, sb]) => sb - sa || pa.length - pb.length || (order.get(pa) ?? 0) - (order.get(pb) ?? 0)
      )
      .slice(0, maxFiles)
      .map(([p, similarity]) => ({ path: p, score: similarity }));

    if (ranked.length === 0) throw new SelectionFailure(this.name, `no file reaches similarity ${minSimilarity}`);
    context.logger.info(`Vector search kept ${ranked.length} files (similarity >= ${minSimilarity})`);
    return ranked;
  }
}
