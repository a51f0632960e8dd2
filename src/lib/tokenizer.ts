// Token counting bound to a single source for the whole session: the exact
// @dqbd/tiktoken encoder when it loads, otherwise a chars/4 estimate.
import type { Tiktoken, TiktokenEncoding } from "@dqbd/tiktoken";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { errorMessage } from "./utils.js";
import type { TokenSource } from "../types.js";

export interface TokenCounter {
  readonly source: TokenSource;
  count(text: string): number;
  dispose(): void;
}

type TiktokenModule = typeof import("@dqbd/tiktoken");

let modPromise: Promise<TiktokenModule> | null = null;
async function loadModule(): Promise<TiktokenModule> {
  if (!modPromise) modPromise = import("@dqbd/tiktoken");
  return modPromise;
}

const ENCODINGS: readonly TiktokenEncoding[] = ["gpt2", "r50k_base", "p50k_base", "p50k_edit", "cl100k_base", "o200k_base"];

export function isEncodingName(name: string): name is TiktokenEncoding {
  return ENCODINGS.some((e) => e === name);
}

/**
 * Map model names to a reasonable default encoding.
 * Gemini models have no public local tokenizer; o200k_base is the closest general-purpose fit.
 */
export function defaultEncodingForModel(model?: string): TiktokenEncoding {
  if (!model) return "o200k_base";
  const m = model.toLowerCase();
  if (m.includes("4o") || m.includes("4.1") || m.startsWith("o3") || m.startsWith("o1")) return "o200k_base";
  if (m.includes("gpt-4") || m.includes("gpt-3.5")) return "cl100k_base";
  return "o200k_base";
}

/** Deterministic fallback: one token per four characters, rounded down. */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export function createEstimatingCounter(): TokenCounter {
  return {
    source: "estimated",
    count: estimateTokens,
    dispose: () => {}
  };
}

export function createExactCounter(encoder: Tiktoken): TokenCounter {
  let live = true;
  return {
    source: "exact",
    count(text: string): number {
      if (!live) throw new Error("token counter used after dispose()");
      // "all" lets special-token text through as plain text instead of throwing
      return encoder.encode(text, "all").length;
    },
    dispose() {
      if (!live) return;
      live = false;
      encoder.free();
    }
  };
}

export interface TokenCounterOptions {
  model?: string;
  encoding?: string;
  // false forces the estimator
  exact?: boolean;
  logger?: Logger;
}

/**
 * Resolve the session's counter once, at startup. A missing or broken tiktoken
 * install degrades to the estimator with a warning; it never switches later.
 */
export async function createTokenCounter(options: TokenCounterOptions = {}): Promise<TokenCounter> {
  const logger = options.logger ?? silentLogger;
  if (options.exact === false) {
    logger.info("Token counting: estimated (chars/4)");
    return createEstimatingCounter();
  }
  const encName =
    options.encoding && isEncodingName(options.encoding) ? options.encoding : defaultEncodingForModel(options.model);
  if (options.encoding && !isEncodingName(options.encoding)) {
    logger.warn(`Unknown encoding "${options.encoding}", using ${encName}`);
  }
  try {
    const t = await loadModule();
    const counter = createExactCounter(t.get_encoding(encName));
    logger.info(`Token counting: exact (${encName})`);
    return counter;
  } catch (e) {
    logger.warn(`Tokenizer unavailable (${errorMessage(e)}); token counts will be estimated`);
    return createEstimatingCounter();
  }
}
