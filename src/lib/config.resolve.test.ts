import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import path from 'node:path';
import fs from 'node:fs/promises';
import os from 'node:os';
import { ConfigurationError } from './errors.js';
import { DEFAULT_CONFIG, loadConfig, loadRepoBriefConfig, resolveConfig, writeDefaultConfig } from './config.js';

const TMP_ROOT = path.join(process.cwd(), '.tmp-tests', 'config');

async function writeJson(p: string, obj: unknown) {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, JSON.stringify(obj, null, 2));
}

async function project(name: string) {
  const dir = path.join(TMP_ROOT, name);
  await fs.rm(dir, { recursive: true, force: true });
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

describe('config file precedence', () => {
  let homeSpy: MockInstance<typeof os.homedir>;
  let fakeHome: string;

  beforeEach(async () => {
    fakeHome = path.join(TMP_ROOT, 'home');
    await fs.rm(fakeHome, { recursive: true, force: true });
    await fs.mkdir(fakeHome, { recursive: true });
    // Point os.homedir() to our fake home
    homeSpy = vi.spyOn(os, 'homedir').mockReturnValue(fakeHome);
  });

  afterEach(() => {
    homeSpy.mockRestore();
  });

  it('applies precedence: global < package.json#repobrief < .repobriefrc.json', async () => {
    const proj = await project('precedence');
    await writeJson(path.join(fakeHome, '.repobrief', 'config.json'), { includePatterns: ['from-global'], maxVectorFiles: 7 });
    await writeJson(path.join(proj, 'package.json'), { name: 'x', repobrief: { includePatterns: ['from-pkg'] } });
    await writeJson(path.join(proj, '.repobriefrc.json'), { includePatterns: ['from-rc'] });

    const layer = await loadRepoBriefConfig(proj);
    expect(layer.includePatterns).toEqual(['from-rc']);
    expect(layer.maxVectorFiles).toBe(7);
  });

  it('falls back to package.json over global when the rc file is missing', async () => {
    const proj = await project('pkg-over-global');
    await writeJson(path.join(fakeHome, '.repobrief', 'config.json'), { includePatterns: ['from-global'] });
    await writeJson(path.join(proj, 'package.json'), { name: 'x', repobrief: { includePatterns: ['from-pkg'] } });

    const layer = await loadRepoBriefConfig(proj);
    expect(layer.includePatterns).toEqual(['from-pkg']);
  });

  it('skips unparseable files', async () => {
    const proj = await project('broken-rc');
    await fs.writeFile(path.join(proj, '.repobriefrc.json'), '{ not json');
    expect(await loadRepoBriefConfig(proj)).toEqual({});
  });

  it('merges retry settings key by key across layers', async () => {
    const proj = await project('retry-merge');
    await writeJson(path.join(fakeHome, '.repobrief', 'config.json'), { retry: { maxAttempts: 2 } });
    await writeJson(path.join(proj, '.repobriefrc.json'), { retry: { baseDelayMs: 10 } });

    const config = await loadConfig(proj);
    expect(config.retry).toEqual({ maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 60_000 });
  });

  it('writeDefaultConfig round-trips to the defaults', async () => {
    const proj = await project('init');
    const p = await writeDefaultConfig(proj);
    expect(path.basename(p)).toBe('.repobriefrc.json');
    const config = await loadConfig(proj);
    expect(config.selectionMode).toBe(DEFAULT_CONFIG.selectionMode);
    expect(config.tokenLimit).toBe(1_800_000);
  });
});

describe('resolveConfig', () => {
  it('uses documented defaults', () => {
    const config = resolveConfig({ cwd: '/repo' });
    expect(config).toMatchObject({
      cwd: '/repo',
      selectionMode: 'auto',
      maxVectorFiles: 50,
      minSimilarity: 0.6,
      bufferFraction: 0.05,
      tokenLimit: 1_800_000,
      debugRemoteCalls: false,
      format: 'markdown',
    });
    expect(config.apiKey).toBeUndefined();
  });

  it('layers environment over files and overrides over both', () => {
    const config = resolveConfig({
      cwd: '/repo',
      files: { selectionMode: 'vector', embeddingModel: 'keyword', tokenLimit: 10_000 },
      env: { REPOBRIEF_SELECTION_MODE: 'rules', REPOBRIEF_EXCLUDE: 'a/, *.tmp', GEMINI_API_KEY: 'test-key' },
      overrides: { tokenLimit: 500, outFile: undefined },
    });
    expect(config.selectionMode).toBe('rules');
    expect(config.excludePatterns).toEqual(['a/', '*.tmp']);
    expect(config.tokenLimit).toBe(500);
    expect(config.apiKey).toBe('test-key');
    expect(config.outFile).toBeUndefined();
  });

  it('prefers REPOBRIEF_API_KEY over GEMINI_API_KEY', () => {
    const config = resolveConfig({ cwd: '/repo', env: { REPOBRIEF_API_KEY: 'test-a', GEMINI_API_KEY: 'test-b' } });
    expect(config.apiKey).toBe('test-a');
  });

  it.each([
    [{ selectionMode: 'magic' }, 'selectionMode must be one of vector, ai, auto, rules, got "magic"'],
    [{ bufferFraction: 1 }, 'bufferFraction must be at least 0 and below 1, got 1'],
    [{ minSimilarity: -0.1 }, 'minSimilarity must be between 0 and 1, got -0.1'],
    [{ tokenLimit: 0 }, 'tokenLimit must be a positive number, got 0'],
    [{ maxVectorFiles: '5' }, 'maxVectorFiles must be a positive integer, got "5"'],
    [{ excludePatterns: 'dist/' }, 'excludePatterns must be a list of strings'],
    [{ logLevel: 'verbose' }, 'logLevel must be debug, info, warn, error or silent, got "verbose"'],
    [{ retry: { maxAttempts: 0 } }, 'maxAttempts must be a positive integer, got 0'],
  ])('rejects %j', (files, message) => {
    expect(() => resolveConfig({ cwd: '/repo', files })).toThrow(new ConfigurationError(message));
  });

  it('rejects a non-numeric token limit from the environment', () => {
    expect(() => resolveConfig({ cwd: '/repo', env: { REPOBRIEF_TOKEN_LIMIT: 'lots' } })).toThrow(
      'tokenLimit must be a positive number, got NaN',
    );
  });

  it('requires an API key only where a feature explicitly needs one', () => {
    expect(() => resolveConfig({ cwd: '/repo', files: { selectionMode: 'ai' } })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ cwd: '/repo', files: { selectionMode: 'vector' } })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ cwd: '/repo', requireGenerator: true })).toThrow(ConfigurationError);
    expect(resolveConfig({ cwd: '/repo', files: { selectionMode: 'vector', embeddingModel: 'keyword' } }).selectionMode).toBe('vector');
    expect(resolveConfig({ cwd: '/repo', files: { selectionMode: 'auto' } }).selectionMode).toBe('auto');
  });
});
