import type { TokenSource, UsageOutcome, UsageRecord, UsageTotals } from "../types.js";

export interface UsageEntry {
  operation: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs?: number;
  outcome: UsageOutcome;
  detail?: string;
}

export interface LedgerSummary {
  tokenSource: TokenSource;
  records: readonly UsageRecord[];
  totals: UsageTotals;
  finalizedAt: string;
}

/**
 * Append-only accounting of every remote call attempt and every file load in a run.
 * One instance per run, one writer; `finalize()` closes it exactly once.
 */
export class UsageLedger {
  private readonly entries: UsageRecord[] = [];
  private readonly running: UsageTotals = { records: 0, inputTokens: 0, outputTokens: 0, remoteCalls: 0, failures: 0 };
  private summary: LedgerSummary | null = null;

  constructor(
    readonly tokenSource: TokenSource,
    private readonly now: () => Date = () => new Date()
  ) {}

  append(entry: UsageEntry): UsageRecord {
    if (this.summary) throw new Error(`usage ledger already finalized; cannot record "${entry.operation}"`);
    if (entry.inputTokens < 0 || entry.outputTokens < 0) {
      throw new RangeError(`negative token count for "${entry.operation}"`);
    }
    const record: UsageRecord = {
      operation: entry.operation,
      inputTokens: entry.inputTokens,
      outputTokens: entry.outputTokens,
      timestamp: this.now().toISOString(),
      latencyMs: entry.latencyMs ?? 0,
      outcome: entry.outcome
    };
    if (entry.detail !== undefined) record.detail = entry.detail;
    this.entries.push(Object.freeze(record));

    this.running.records += 1;
    this.running.inputTokens += record.inputTokens;
    this.running.outputTokens += record.outputTokens;
    if (!record.operation.startsWith("load:")) this.running.remoteCalls += 1;
    if (record.outcome === "failure") this.running.failures += 1;
    return record;
  }

  get records(): readonly UsageRecord[] {
    return this.entries;
  }

  get totals(): UsageTotals {
    return { ...this.running };
  }

  forOperation(operation: string): UsageRecord[] {
    return this.entries.filter((r) => r.operation === operation);
  }

  /** Writes the grand-total row. Calling it twice is a bug. */
  finalize(): LedgerSummary {
    if (this.summary) throw new Error("usage ledger already finalized");
    this.summary = Object.freeze({
      tokenSource: this.tokenSource,
      records: Object.freeze([...this.entries]),
      totals: Object.freeze(this.totals),
      finalizedAt: this.now().toISOString()
    });
    return this.summary;
  }
}
