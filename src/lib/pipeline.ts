import path from "node:path";
import type { RepoBriefConfig } from "./config.js";
import {
  GeminiEmbeddingBackend,
  KEYWORD_MODEL,
  KeywordEmbeddingBackend,
  probeEmbeddingBackend,
  type EmbeddingBackend
} from "./embeddings.js";
import { renderPreamble } from "./format.js";
import { GeminiClient } from "./gemini.js";
import { loadIgnoreRules } from "./ignore.js";
import { UsageLedger, type LedgerSummary } from "./ledger.js";
import { loadUnderBudget } from "./loader.js";
import { createLogger, type Logger } from "./logger.js";
import { createDebugRecorder, ResilientCaller, type CallState, type TextGenerator } from "./remote.js";
import { readReadme, scanFileTree, type Readme } from "./scan.js";
import { AiAssistedStrategy } from "./strategies/aiAssisted.js";
import { MODE_CHAINS, SelectionChain, type SelectionOutcome } from "./strategies/chain.js";
import { RuleBasedStrategy } from "./strategies/ruleBased.js";
import type { SelectionStrategy } from "./strategies/types.js";
import { VectorStrategy } from "./strategies/vector.js";
import { createTokenCounter, type TokenCounter } from "./tokenizer.js";
import type { AssembledContext, FileTree } from "../types.js";

export interface SessionOptions {
  logger?: Logger;
  counter?: TokenCounter;
  generator?: TextGenerator;
  embeddingBackend?: EmbeddingBackend;
  sleep?: (ms: number) => Promise<void>;
  onStateChange?: (operation: string, from: CallState, to: CallState) => void;
}

/** Everything one run shares: one logger, one token counter, one ledger. */
export interface Session {
  readonly config: RepoBriefConfig;
  readonly projectName: string;
  readonly logger: Logger;
  readonly counter: TokenCounter;
  readonly ledger: UsageLedger;
  readonly caller: ResilientCaller;
  readonly generator?: TextGenerator;
  readonly embeddingBackend?: EmbeddingBackend;
}

export async function openSession(config: RepoBriefConfig, options: SessionOptions = {}): Promise<Session> {
  const logger = options.logger ?? createLogger({ level: config.logLevel, file: config.logFile });
  const counter =
    options.counter ?? (await createTokenCounter({ model: config.tokenizerModel, encoding: config.encoding, logger }));
  const ledger = new UsageLedger(counter.source);
  const caller = new ResilientCaller({
    ledger,
    counter,
    retry: config.retry,
    logger,
    maxInputTokens: config.tokenLimit,
    debug: config.debugRemoteCalls ? createDebugRecorder(path.resolve(config.cwd, config.debugDir), logger) : undefined,
    sleep: options.sleep,
    onStateChange: options.onStateChange
  });
  const client = config.apiKey ? new GeminiClient({ apiKey: config.apiKey }) : undefined;

  let embeddingBackend = options.embeddingBackend;
  if (!embeddingBackend && config.embeddingModel === KEYWORD_MODEL) embeddingBackend = new KeywordEmbeddingBackend();
  else if (!embeddingBackend && client) embeddingBackend = new GeminiEmbeddingBackend(client, config.embeddingModel, caller);

  return {
    config,
    projectName: path.basename(path.resolve(config.cwd)),
    logger,
    counter,
    ledger,
    caller,
    generator: options.generator ?? client?.generator(config.generativeModel),
    embeddingBackend
  };
}

/** Finalize the ledger, release the tokenizer and close the log file. Call exactly once per session. */
export async function closeSession(session: Session): Promise<LedgerSummary> {
  const summary = session.ledger.finalize();
  session.counter.dispose();
  await session.logger.close();
  return summary;
}

/**
 * The strategies of the configured mode that are usable right now. Unavailable
 * ones are dropped with a warning before anything is ranked.
 */
export async function buildStrategies(session: Session): Promise<SelectionStrategy[]> {
  const { config, logger } = session;
  const out: SelectionStrategy[] = [];
  for (const name of MODE_CHAINS[config.selectionMode]) {
    if (name === "rules") {
      out.push(new RuleBasedStrategy());
    } else if (name === "vector") {
      const backend = session.embeddingBackend;
      if (!backend) {
        logger.warn(`Vector strategy unavailable: ${config.embeddingModel} embeddings need an API key`);
      } else if (await probeEmbeddingBackend(backend, logger)) {
        out.push(
          new VectorStrategy({
            backend,
            maxFiles: config.maxVectorFiles,
            minSimilarity: config.minSimilarity,
            prefixChars: config.embedPrefixChars,
            maxBytesPerFile: config.maxBytesPerFile
          })
        );
      } else {
        logger.warn("Vector strategy unavailable: embedding backend did not answer");
      }
    } else if (session.generator) {
      out.push(new AiAssistedStrategy({ caller: session.caller, generator: session.generator, projectName: session.projectName }));
    } else {
      logger.warn("AI-assisted strategy unavailable: no API key");
    }
  }
  return out;
}

export interface ScanResult {
  fileTree: FileTree;
  readme?: Readme;
}

export async function scanProject(session: Session): Promise<ScanResult> {
  const { config, logger } = session;
  const rules = await loadIgnoreRules({
    cwd: config.cwd,
    ignoreFiles: config.ignoreFiles,
    useIgnoreFiles: config.useIgnoreFiles,
    extraPatterns: config.excludePatterns,
    logger
  });
  const fileTree = await scanFileTree({ cwd: config.cwd, include: config.includePatterns, rules, logger });
  const readme = await readReadme(config.cwd, fileTree, config.maxBytesPerFile, logger);
  return readme ? { fileTree, readme } : { fileTree };
}

export interface AssemblyResult {
  context: AssembledContext;
  selection: SelectionOutcome;
}

/** Scan, select through the fallback chain, then fill the token budget. */
export async function assembleContext(session: Session): Promise<AssemblyResult> {
  const { config, logger, counter, ledger } = session;
  const { fileTree, readme } = await scanProject(session);

  const chain = new SelectionChain(await buildStrategies(session));
  logger.info(`Selection chain: ${chain.names.join(" -> ")}`);
  const selection = await chain.select(fileTree, { cwd: config.cwd, readme, logger });

  // The README is rendered in the preamble already
  const ranking = readme ? selection.ranking.filter((r) => r.path !== readme.path) : selection.ranking;
  const reservedTokens = config.reserveOverhead
    ? counter.count(renderPreamble(session.projectName, fileTree, readme?.content))
    : 0;

  const context = await loadUnderBudget(ranking, {
    cwd: config.cwd,
    fileTree,
    strategy: selection.strategy,
    tokenLimit: config.tokenLimit,
    bufferFraction: config.bufferFraction,
    reservedTokens,
    maxBytesPerFile: config.maxBytesPerFile,
    readme: readme?.content,
    counter,
    ledger,
    logger
  });
  return { context, selection };
}
