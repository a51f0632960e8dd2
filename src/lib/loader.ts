import type { UsageLedger } from "./ledger.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { readTextFile, type TextRead } from "./scan.js";
import type { TokenCounter } from "./tokenizer.js";
import type { AssembledContext, BudgetSkip, CandidateRanking, FileTree, RankedFile } from "../types.js";

export interface LoadOptions {
  cwd: string;
  fileTree: FileTree;
  strategy: string;
  tokenLimit: number;
  bufferFraction: number;
  // Tokens already spoken for by the tree and README in the final document
  reservedTokens?: number;
  maxBytesPerFile: number;
  readme?: string;
  counter: TokenCounter;
  ledger: UsageLedger;
  logger?: Logger;
  read?: (relPath: string) => Promise<TextRead>;
}

const fmt = (n: number) => (Number.isFinite(n) ? n.toLocaleString("en-US") : "unlimited");

/**
 * Greedy fill in ranking order. A file is admitted iff it fits what is left of
 * `tokenLimit * (1 - bufferFraction)`; otherwise it is skipped and the walk goes on.
 * Files are never truncated or reordered.
 */
export async function loadUnderBudget(ranking: CandidateRanking, options: LoadOptions): Promise<AssembledContext> {
  const logger = options.logger ?? silentLogger;
  const { tokenLimit, bufferFraction, counter, ledger } = options;
  const reservedTokens = options.reservedTokens ?? 0;
  if (!(tokenLimit > 0)) throw new RangeError(`tokenLimit must be positive, got ${tokenLimit}`);
  if (!(bufferFraction >= 0 && bufferFraction < 1)) throw new RangeError(`bufferFraction must be in [0, 1), got ${bufferFraction}`);

  const budget = tokenLimit * (1 - bufferFraction);
  const read = options.read ?? ((rel: string) => readTextFile(options.cwd, rel, options.maxBytesPerFile));
  // Keyed by path in a Map: repository paths may collide with Object.prototype names
  const contents = new Map<string, string>();
  const seen = new Set<string>();
  const selected: RankedFile[] = [];
  const skipped: BudgetSkip[] = [];
  let totalTokens = 0;

  logger.info(`Token budget ${fmt(budget)} of ${fmt(tokenLimit)} (${fmt(reservedTokens)} reserved)`);

  for (const file of ranking) {
    if (seen.has(file.path)) continue;
    seen.add(file.path);
    const remaining = Math.max(0, budget - reservedTokens - totalTokens);
    const text = await read(file.path);
    if (text.content === undefined) {
      skipped.push({ path: file.path, estimate: 0, remaining, reason: "unreadable" });
      ledger.append({ operation: `load:${file.path}`, inputTokens: 0, outputTokens: 0, outcome: "skipped", detail: text.reason ?? "unreadable" });
      logger.warn(`Skipping ${file.path}: ${text.reason ?? "unreadable"}`);
      continue;
    }

    const estimate = counter.count(text.content);
    if (reservedTokens + totalTokens + estimate > budget) {
      skipped.push({ path: file.path, estimate, remaining, reason: "over-budget" });
      ledger.append({
        operation: `load:${file.path}`,
        inputTokens: 0,
        outputTokens: 0,
        outcome: "skipped",
        detail: `needs ${estimate}, ${fmt(remaining)} left`
      });
      logger.warn(`Skipping ${file.path}: ${fmt(estimate)} tokens, ${fmt(remaining)} left`);
      continue;
    }

    contents.set(file.path, text.content);
    selected.push({ path: file.path, score: file.score });
    totalTokens += estimate;
    ledger.append({ operation: `load:${file.path}`, inputTokens: estimate, outputTokens: 0, outcome: "success" });
    logger.debug(`Added ${file.path}: ${fmt(estimate)} tokens (total ${fmt(totalTokens)})`);
  }

  logger.info(`Loaded ${selected.length} files with ${fmt(totalTokens)} tokens; skipped ${skipped.length}`);

  const context: AssembledContext = {
    fileTree: Object.freeze([...options.fileTree]),
    selected: Object.freeze(selected.map((f) => Object.freeze(f))),
    contents: Object.freeze(Object.fromEntries(contents)),
    totalTokens,
    reservedTokens,
    tokenLimit,
    budget,
    tokenSource: counter.source,
    strategy: options.strategy,
    skipped: Object.freeze(skipped.map((s) => Object.freeze(s)))
  };
  if (options.readme !== undefined) context.readme = options.readme;
  return Object.freeze(context);
}
