import { describe, it, expect } from 'vitest';
import path from 'node:path';
import fs from 'node:fs/promises';
import { RemoteError, RemoteFatalError, RemoteTransientError } from './errors.js';
import { UsageLedger } from './ledger.js';
import { backoffDelay, createDebugRecorder, ResilientCaller, type CallState, type TextGenerator } from './remote.js';
import { createEstimatingCounter } from './tokenizer.js';

const POLICY = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 1_000 };

function scripted(outcomes: Array<string | Error>): TextGenerator & { calls: number } {
  const gen = {
    model: 'test-model',
    calls: 0,
    async generate(): Promise<string> {
      const next = outcomes[gen.calls++];
      if (next instanceof Error) throw next;
      return next;
    },
  };
  return gen;
}

function setup(maxAttempts = POLICY.maxAttempts) {
  const ledger = new UsageLedger('estimated', () => new Date('2026-01-01T00:00:00.000Z'));
  const sleeps: number[] = [];
  const states: Array<[CallState, CallState]> = [];
  const caller = new ResilientCaller({
    ledger,
    counter: createEstimatingCounter(),
    retry: { ...POLICY, maxAttempts },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    onStateChange: (_op, from, to) => states.push([from, to]),
  });
  return { ledger, sleeps, states, caller };
}

describe('ResilientCaller', () => {
  it('retries rate limits and records every attempt', async () => {
    const { ledger, sleeps, states, caller } = setup();
    const gen = scripted([
      new RemoteTransientError('rate limited', 429),
      new RemoteTransientError('rate limited', 429),
      'done!!!!',
    ]);

    const text = await caller.call(gen, 'x'.repeat(40), 'select-files');

    expect(text).toBe('done!!!!');
    expect(gen.calls).toBe(3);
    const records = ledger.forOperation('select-files');
    expect(records.map((r) => r.outcome)).toEqual(['retry', 'retry', 'success']);
    expect(records.map((r) => r.inputTokens)).toEqual([10, 10, 10]);
    expect(records[2].outputTokens).toBe(2);
    expect(sleeps).toEqual([100, 200]);
    expect(states).toEqual([
      ['ready', 'calling'],
      ['calling', 'retrying'],
      ['retrying', 'calling'],
      ['calling', 'retrying'],
      ['retrying', 'calling'],
      ['calling', 'succeeded'],
    ]);
  });

  it('fails immediately on fatal errors without sleeping', async () => {
    const { ledger, sleeps, states, caller } = setup();
    const gen = scripted([new RemoteFatalError('bad key', 401), 'never']);

    await expect(caller.call(gen, 'prompt')).rejects.toBeInstanceOf(RemoteFatalError);
    expect(gen.calls).toBe(1);
    expect(sleeps).toEqual([]);
    expect(ledger.records.map((r) => r.outcome)).toEqual(['failure']);
    expect(states[states.length - 1]).toEqual(['calling', 'failed']);
  });

  it('does not retry other remote errors', async () => {
    const { ledger, caller } = setup();
    const gen = scripted([new RemoteError('server error', 500), 'never']);
    await expect(caller.call(gen, 'prompt')).rejects.toThrow('server error');
    expect(gen.calls).toBe(1);
    expect(ledger.totals.failures).toBe(1);
  });

  it('wraps unexpected exceptions as RemoteError', async () => {
    const { caller } = setup();
    const gen = scripted([new TypeError('socket hang up')]);
    const err = await caller.call(gen, 'prompt', 'generate').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteError);
    expect(err).not.toBeInstanceOf(RemoteTransientError);
    expect(err instanceof Error ? err.message : '').toBe('generate: socket hang up');
  });

  it('gives up after maxAttempts rate limits', async () => {
    const { ledger, sleeps, caller } = setup(3);
    const limited = () => new RemoteTransientError('rate limited', 429);
    const gen = scripted([limited(), limited(), limited(), 'never']);

    await expect(caller.call(gen, 'prompt', 'generate')).rejects.toThrow('generate: still rate limited after 3 attempts');
    expect(gen.calls).toBe(3);
    expect(sleeps).toEqual([100, 200]);
    expect(ledger.records.map((r) => r.outcome)).toEqual(['retry', 'retry', 'failure']);
  });

  it('rejects prompts above the input limit before calling', async () => {
    const ledger = new UsageLedger('estimated');
    const caller = new ResilientCaller({
      ledger,
      counter: createEstimatingCounter(),
      retry: POLICY,
      maxInputTokens: 5,
    });
    const gen = scripted(['never']);
    await expect(caller.call(gen, 'y'.repeat(24))).rejects.toThrow('generate: prompt exceeds token limit (6 > 5)');
    expect(gen.calls).toBe(0);
    expect(ledger.records).toEqual([]);
  });

  it('rejects a non-positive attempt budget', () => {
    expect(
      () =>
        new ResilientCaller({
          ledger: new UsageLedger('estimated'),
          counter: createEstimatingCounter(),
          retry: { ...POLICY, maxAttempts: 0 },
        }),
    ).toThrow(RangeError);
  });

  it('run() accounts for non-text operations', async () => {
    const { ledger, caller } = setup();
    const vectors = await caller.run({
      name: 'embed',
      input: 'abcdefgh',
      invoke: async () => [[1, 0]],
      outputText: () => '',
    });
    expect(vectors).toEqual([[1, 0]]);
    expect(ledger.records[0]).toMatchObject({ operation: 'embed', inputTokens: 2, outputTokens: 0, outcome: 'success' });
  });
});

describe('backoffDelay', () => {
  it('doubles per attempt and caps at maxDelayMs', () => {
    expect([1, 2, 3, 4, 5].map((a) => backoffDelay(POLICY, a))).toEqual([100, 200, 400, 800, 1_000]);
  });

  it('prefers a longer Retry-After but still caps it', () => {
    expect(backoffDelay(POLICY, 1, 500)).toBe(500);
    expect(backoffDelay(POLICY, 1, 50)).toBe(100);
    expect(backoffDelay(POLICY, 1, 60_000)).toBe(1_000);
  });
});

describe('createDebugRecorder', () => {
  it('writes one file per recorded exchange', async () => {
    const dir = path.join(process.cwd(), '.tmp-tests', 'remote-debug');
    await fs.rm(dir, { recursive: true, force: true });
    const recorder = createDebugRecorder(dir);
    const { ledger } = setup();
    const caller = new ResilientCaller({ ledger, counter: createEstimatingCounter(), retry: POLICY, debug: recorder });
    await caller.call(scripted(['answer']), 'question', 'select-files');

    const files = (await fs.readdir(dir)).sort();
    expect(files).toHaveLength(2);
    expect(files[0].endsWith('_0001_select-files_prompt.txt')).toBe(true);
    expect(files[1].endsWith('_0002_select-files_response.txt')).toBe(true);
    expect(await fs.readFile(path.join(dir, files[0]), 'utf8')).toBe('question');
  });
});
