export type SelectionMode = 'vector' | 'ai' | 'auto' | 'rules';

export type OutputFormat = 'markdown' | 'json';

export type TokenSource = 'exact' | 'estimated';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Relative, `/`-separated, deduplicated paths in scan order. */
export type FileTree = readonly string[];

export interface RankedFile {
  path: string;
  score: number;
}

export type CandidateRanking = readonly RankedFile[];

export interface BudgetSkip {
  path: string;
  estimate: number;
  remaining: number;
  reason: 'over-budget' | 'unreadable';
}

export interface AssembledContext {
  fileTree: FileTree;
  selected: CandidateRanking;
  contents: Readonly<Record<string, string>>;
  readme?: string;
  totalTokens: number;
  reservedTokens: number;
  tokenLimit: number;
  budget: number;
  tokenSource: TokenSource;
  strategy: string;
  skipped: readonly BudgetSkip[];
}

export type UsageOutcome = 'success' | 'retry' | 'failure' | 'skipped';

export interface UsageRecord {
  operation: string;
  inputTokens: number;
  outputTokens: number;
  timestamp: string;
  latencyMs: number;
  outcome: UsageOutcome;
  detail?: string;
}

export interface UsageTotals {
  records: number;
  inputTokens: number;
  outputTokens: number;
  remoteCalls: number;
  failures: number;
}

export interface PipelineConfig {
  cwd: string;
  selectionMode: SelectionMode;
  includePatterns: string[];
  excludePatterns: string[];
  embeddingModel: string;
  maxVectorFiles: number;
  minSimilarity: number;
  tokenLimit: number;
  bufferFraction: number;
  debugRemoteCalls: boolean;
  apiKey?: string;
  generativeModel: string;
  tokenizerModel?: string;
  encoding?: string;
  maxBytesPerFile: number;
  embedPrefixChars: number;
  ignoreFiles: string[];
  useIgnoreFiles: boolean;
  reserveOverhead: boolean;
  retry: RetryPolicy;
  logLevel: LogLevel;
  logFile?: string;
  debugDir: string;
}
