import type { GeminiClient } from "./gemini.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { ResilientCaller } from "./remote.js";
import { errorMessage } from "./utils.js";

export interface EmbeddingBackend {
  readonly name: string;
  embed(texts: readonly string[]): Promise<number[][]>;
}

export const KEYWORD_MODEL = "keyword";
const KEYWORD_DIMENSIONS = 64;

// Programming vocabulary tracked by the keyword backend, one dimension each.
const KEYWORDS = [
  "class", "function", "def", "import", "export", "const", "var", "let",
  "return", "if", "else", "for", "while", "try", "catch", "async",
  "await", "component", "model", "controller", "view", "route",
  "database", "schema", "api", "http", "request", "response"
];

/**
 * Local, dependency-free embeddings: keyword frequencies normalized to unit length.
 * Crude, but deterministic and always available.
 */
export class KeywordEmbeddingBackend implements EmbeddingBackend {
  readonly name = KEYWORD_MODEL;

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((t) => keywordVector(t));
  }
}

export function keywordVector(text: string): number[] {
  const counts = new Map<string, number>();
  for (const word of text.toLowerCase().split(/[^a-z0-9_]+/)) {
    if (word) counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  const vector = new Array<number>(KEYWORD_DIMENSIONS).fill(0);
  KEYWORDS.forEach((k, i) => {
    vector[i] = counts.get(k) ?? 0;
  });
  return normalize(vector);
}

export interface GeminiEmbeddingOptions {
  batchSize?: number;
}

/** Remote embeddings; every batch goes through the resilient caller and lands in the ledger. */
export class GeminiEmbeddingBackend implements EmbeddingBackend {
  private readonly batchSize: number;

  constructor(
    private readonly client: Pick<GeminiClient, "batchEmbed">,
    readonly name: string,
    private readonly caller: ResilientCaller,
    options: GeminiEmbeddingOptions = {}
  ) {
    // batchEmbedContents accepts at most 100 requests
    this.batchSize = Math.max(1, Math.min(100, options.batchSize ?? 100));
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const out: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const vectors = await this.caller.run({
        name: `embed:${this.name}`,
        input: batch.join("\n"),
        invoke: () => this.client.batchEmbed(this.name, batch)
      });
      out.push(...vectors);
    }
    return out;
  }
}

/** Startup availability check: one tiny embedding must come back as a non-empty vector. */
export async function probeEmbeddingBackend(backend: EmbeddingBackend, logger: Logger = silentLogger): Promise<boolean> {
  try {
    const [vector] = await backend.embed(["repository overview"]);
    if (!vector || vector.length === 0) {
      logger.warn(`Embedding backend ${backend.name} returned no vector`);
      return false;
    }
    logger.info(`Embedding backend ${backend.name} available (${vector.length} dimensions)`);
    return true;
  } catch (e) {
    logger.warn(`Embedding backend ${backend.name} unavailable: ${errorMessage(e)}`);
    return false;
  }
}

export function normalize(vector: readonly number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (magnitude === 0) return [...vector];
  return vector.map((value) => value / magnitude);
}
