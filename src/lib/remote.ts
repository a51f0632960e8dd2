import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import { RemoteError, RemoteFatalError, RemoteTransientError } from "./errors.js";
import type { UsageLedger } from "./ledger.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { TokenCounter } from "./tokenizer.js";
import { errorMessage } from "./utils.js";
import type { RetryPolicy } from "../types.js";

export type CallState = "ready" | "calling" | "retrying" | "succeeded" | "failed";

export interface RemoteOperation<T> {
  /** Ledger operation name. */
  name: string;
  /** Text sent to the service, for token accounting and debug dumps. */
  input: string;
  invoke(): Promise<T>;
  /** Text received, for token accounting. */
  outputText?(result: T): string;
}

/** A generative model: prompt in, text out. Transports throw RemoteError subclasses. */
export interface TextGenerator {
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export interface DebugRecorder {
  record(kind: "prompt" | "response" | "error", operation: string, text: string): Promise<void>;
}

export interface ResilientCallerOptions {
  ledger: UsageLedger;
  counter: TokenCounter;
  retry: RetryPolicy;
  logger?: Logger;
  // Prompts above this many tokens are rejected before any attempt
  maxInputTokens?: number;
  debug?: DebugRecorder;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
  onStateChange?: (operation: string, from: CallState, to: CallState) => void;
}

export const DEFAULT_RETRY: RetryPolicy = { maxAttempts: 4, baseDelayMs: 2_000, maxDelayMs: 60_000 };

/** Exponential backoff for the given (1-based) failed attempt, honouring a larger Retry-After, capped. */
export function backoffDelay(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const exp = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(exp, retryAfterMs ?? 0));
}

/**
 * Runs remote operations with rate-limit retries and usage accounting.
 * Only RemoteTransientError is retried; everything else fails the call at once.
 * Fallback on failure is the caller's business.
 */
export class ResilientCaller {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;

  constructor(private readonly options: ResilientCallerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.clock = options.clock ?? Date.now;
    if (!Number.isInteger(options.retry.maxAttempts) || options.retry.maxAttempts < 1) {
      throw new RangeError(`retry.maxAttempts must be a positive integer, got ${options.retry.maxAttempts}`);
    }
  }

  get counter(): TokenCounter {
    return this.options.counter;
  }

  /** Send a prompt to a generative model. */
  async call(generator: TextGenerator, prompt: string, operation = "generate"): Promise<string> {
    const limit = this.options.maxInputTokens;
    if (limit !== undefined) {
      const promptTokens = this.options.counter.count(prompt);
      if (promptTokens > limit) {
        throw new RemoteFatalError(`${operation}: prompt exceeds token limit (${promptTokens} > ${limit})`);
      }
    }
    return this.run({
      name: operation,
      input: prompt,
      invoke: () => generator.generate(prompt),
      outputText: (text) => text
    });
  }

  async run<T>(op: RemoteOperation<T>): Promise<T> {
    const { ledger, counter, retry, debug, onStateChange } = this.options;
    let state: CallState = "ready";
    const transition = (to: CallState) => {
      onStateChange?.(op.name, state, to);
      this.logger.debug(`${op.name}: ${state} -> ${to}`);
      state = to;
    };

    const inputTokens = counter.count(op.input);
    await debug?.record("prompt", op.name, op.input);
    this.logger.info(`Calling ${op.name} (~${inputTokens.toLocaleString("en-US")} tokens)`);

    for (let attempt = 1; ; attempt++) {
      transition("calling");
      const started = this.clock();
      try {
        const result = await op.invoke();
        const output = op.outputText ? op.outputText(result) : "";
        ledger.append({
          operation: op.name,
          inputTokens,
          outputTokens: counter.count(output),
          latencyMs: this.clock() - started,
          outcome: "success",
          detail: `attempt ${attempt}`
        });
        transition("succeeded");
        await debug?.record("response", op.name, output);
        return result;
      } catch (e) {
        const err = toRemoteError(e, op.name);
        const retryable = err instanceof RemoteTransientError && attempt < retry.maxAttempts;
        ledger.append({
          operation: op.name,
          inputTokens,
          outputTokens: 0,
          latencyMs: this.clock() - started,
          outcome: retryable ? "retry" : "failure",
          detail: err.message
        });
        await debug?.record("error", op.name, `${err.name}: ${err.message}`);

        if (!(err instanceof RemoteTransientError)) {
          transition("failed");
          this.logger.error(`${op.name} failed: ${err.message}`);
          throw err;
        }
        if (!retryable) {
          transition("failed");
          this.logger.error(`${op.name} still rate limited after ${attempt} attempts`);
          throw new RemoteTransientError(`${op.name}: still rate limited after ${attempt} attempts`, err.status, err.retryAfterMs);
        }
        transition("retrying");
        const wait = backoffDelay(retry, attempt, err.retryAfterMs);
        this.logger.warn(`${op.name} rate limited; retrying in ${wait}ms (attempt ${attempt + 1} of ${retry.maxAttempts})`);
        await this.sleep(wait);
      }
    }
  }
}

function toRemoteError(e: unknown, operation: string): RemoteError {
  if (e instanceof RemoteError) return e;
  return new RemoteError(`${operation}: ${errorMessage(e)}`, undefined, { cause: e });
}

/** Writes every prompt, response and error of a run to timestamped files. */
export function createDebugRecorder(dir: string, logger: Logger = silentLogger): DebugRecorder {
  let seq = 0;
  return {
    async record(kind, operation, text) {
      seq += 1;
      const stamp = new Date().toISOString().replace(/[:.]/g, "-");
      const safeOp = operation.replace(/[^a-zA-Z0-9_-]+/g, "_");
      const file = path.join(dir, `${stamp}_${String(seq).padStart(4, "0")}_${safeOp}_${kind}.txt`);
      try {
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(file, text, "utf8");
        logger.debug(`Saved ${kind} to ${file}`);
      } catch (e) {
        logger.warn(`Could not save ${kind} debug file: ${errorMessage(e)}`);
      }
    }
  };
}
