import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { ConfigurationError } from './errors.js';
import { KEYWORD_MODEL } from './embeddings.js';
import { isLogLevel } from './logger.js';
import { DEFAULT_RETRY } from './remote.js';
import { isRecord } from './utils.js';
import type { OutputFormat, PipelineConfig, RetryPolicy, SelectionMode } from '../types.js';

export const CONFIG_KEY = 'repobrief';
export const RC_FILE = '.repobriefrc.json';
export const GLOBAL_DIR = '.repobrief';

export type RepoBriefConfig = PipelineConfig & {
  format: OutputFormat;
  outFile?: string;
};

/** Raw, unvalidated settings as read from JSON files, the environment or CLI flags. */
export type ConfigLayer = Record<string, unknown>;

export const DEFAULT_CONFIG = {
  selectionMode: 'auto',
  includePatterns: ['**/*'],
  excludePatterns: [],
  embeddingModel: 'text-embedding-004',
  maxVectorFiles: 50,
  minSimilarity: 0.6,
  tokenLimit: 1_800_000,
  bufferFraction: 0.05,
  debugRemoteCalls: false,
  generativeModel: 'gemini-1.5-pro',
  maxBytesPerFile: 512_000, // 0.5 MB per file
  embedPrefixChars: 2_048,
  ignoreFiles: ['.gitignore', '.repobriefignore'],
  useIgnoreFiles: true,
  reserveOverhead: true,
  retry: DEFAULT_RETRY,
  logLevel: 'info',
  debugDir: '.repobrief/debug',
  format: 'markdown',
} satisfies Omit<RepoBriefConfig, 'cwd'>;

const SELECTION_MODES: readonly SelectionMode[] = ['vector', 'ai', 'auto', 'rules'];
const FORMATS: readonly OutputFormat[] = ['markdown', 'json'];

function homeDir(): string {
  return os.homedir?.() || process.env.HOME || process.env.USERPROFILE || '';
}

// Missing or unparseable files yield undefined
async function readJsonIfPresent(p: string): Promise<unknown> {
  try {
    const raw = await fs.readFile(p, 'utf8');
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function mergeLayers(base: ConfigLayer, next: ConfigLayer): ConfigLayer {
  const merged = { ...base, ...next };
  // retry is the one nested setting; merge it key by key
  if (isRecord(base.retry) && isRecord(next.retry)) merged.retry = { ...base.retry, ...next.retry };
  return merged;
}

/**
 * Layered file configuration, lowest first:
 *  1) Global ~/.repobrief/config.json
 *  2) Project package.json#repobrief
 *  3) Project .repobriefrc.json
 * Missing or unparseable files are skipped.
 */
export async function loadRepoBriefConfig(cwd: string): Promise<ConfigLayer> {
  const home = homeDir();
  let config: ConfigLayer = {};

  if (home) {
    const global = await readJsonIfPresent(path.join(home, GLOBAL_DIR, 'config.json'));
    if (isRecord(global)) config = mergeLayers(config, global);
  }

  const pkg = await readJsonIfPresent(path.join(cwd, 'package.json'));
  if (isRecord(pkg) && isRecord(pkg[CONFIG_KEY])) config = mergeLayers(config, pkg[CONFIG_KEY]);

  const rc = await readJsonIfPresent(path.join(cwd, RC_FILE));
  if (isRecord(rc)) config = mergeLayers(config, rc);

  return config;
}

const splitList = (v: string) =>
  v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

/** Settings taken from REPOBRIEF_* variables; the API key also from GEMINI_API_KEY. */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const layer: ConfigLayer = {};
  if (env.REPOBRIEF_SELECTION_MODE) layer.selectionMode = env.REPOBRIEF_SELECTION_MODE;
  if (env.REPOBRIEF_INCLUDE) layer.includePatterns = splitList(env.REPOBRIEF_INCLUDE);
  if (env.REPOBRIEF_EXCLUDE) layer.excludePatterns = splitList(env.REPOBRIEF_EXCLUDE);
  if (env.REPOBRIEF_TOKEN_LIMIT) layer.tokenLimit = Number(env.REPOBRIEF_TOKEN_LIMIT);
  if (env.REPOBRIEF_DEBUG_REMOTE_CALLS) layer.debugRemoteCalls = env.REPOBRIEF_DEBUG_REMOTE_CALLS.toLowerCase() === 'true';
  if (env.REPOBRIEF_LOG_LEVEL) layer.logLevel = env.REPOBRIEF_LOG_LEVEL;
  const apiKey = env.REPOBRIEF_API_KEY || env.GEMINI_API_KEY;
  if (apiKey) layer.apiKey = apiKey;
  return layer;
}

// --- validation ---

function str(layer: ConfigLayer, key: string): string | undefined {
  const v = layer[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'string') throw new ConfigurationError(`${key} must be a string`, key);
  return v;
}

function num(layer: ConfigLayer, key: string, check: (n: number) => boolean, rule: string): number | undefined {
  const v = layer[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'number' || Number.isNaN(v) || !check(v)) {
    throw new ConfigurationError(`${key} must be ${rule}, got ${typeof v === 'string' ? `"${v}"` : String(v)}`, key);
  }
  return v;
}

function bool(layer: ConfigLayer, key: string): boolean | undefined {
  const v = layer[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== 'boolean') throw new ConfigurationError(`${key} must be true or false`, key);
  return v;
}

function list(layer: ConfigLayer, key: string): string[] | undefined {
  const v = layer[key];
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v)) throw new ConfigurationError(`${key} must be a list of strings`, key);
  const out: string[] = [];
  for (const item of v) {
    if (typeof item !== 'string') throw new ConfigurationError(`${key} must be a list of strings`, key);
    out.push(item);
  }
  return out;
}

function oneOf<T extends string>(layer: ConfigLayer, key: string, allowed: readonly T[]): T | undefined {
  const v = str(layer, key);
  if (v === undefined) return undefined;
  const match = allowed.find((a) => a === v);
  if (!match) throw new ConfigurationError(`${key} must be one of ${allowed.join(', ')}, got "${v}"`, key);
  return match;
}

const positive = (n: number) => n > 0;
const positiveInt = (n: number) => Number.isInteger(n) && n > 0;
const nonNegativeInt = (n: number) => Number.isInteger(n) && n >= 0;

function retryPolicy(layer: ConfigLayer): RetryPolicy {
  const v = layer.retry;
  if (v === undefined || v === null) return DEFAULT_RETRY;
  if (!isRecord(v)) throw new ConfigurationError('retry must be an object', 'retry');
  return {
    maxAttempts: num(v, 'maxAttempts', positiveInt, 'a positive integer') ?? DEFAULT_RETRY.maxAttempts,
    baseDelayMs: num(v, 'baseDelayMs', nonNegativeInt, 'a non-negative integer') ?? DEFAULT_RETRY.baseDelayMs,
    maxDelayMs: num(v, 'maxDelayMs', nonNegativeInt, 'a non-negative integer') ?? DEFAULT_RETRY.maxDelayMs,
  };
}

export interface ResolveOptions {
  cwd: string;
  files?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigLayer;
  // The command cannot run without the generative model (e.g. `generate`)
  requireGenerator?: boolean;
}

/**
 * Merge defaults < files < environment < overrides and validate the result.
 * Throws ConfigurationError for anything invalid, including a missing API key
 * when an explicitly requested feature needs one.
 */
export function resolveConfig(options: ResolveOptions): RepoBriefConfig {
  let layer: ConfigLayer = { ...DEFAULT_CONFIG };
  for (const next of [options.files ?? {}, configFromEnv(options.env ?? {}), options.overrides ?? {}]) {
    const defined = Object.fromEntries(Object.entries(next).filter(([, v]) => v !== undefined));
    layer = mergeLayers(layer, defined);
  }

  const logLevel = str(layer, 'logLevel') ?? DEFAULT_CONFIG.logLevel;
  if (!isLogLevel(logLevel)) throw new ConfigurationError(`logLevel must be debug, info, warn, error or silent, got "${logLevel}"`, 'logLevel');

  const config: RepoBriefConfig = {
    cwd: options.cwd,
    selectionMode: oneOf(layer, 'selectionMode', SELECTION_MODES) ?? 'auto',
    includePatterns: list(layer, 'includePatterns') ?? [...DEFAULT_CONFIG.includePatterns],
    excludePatterns: list(layer, 'excludePatterns') ?? [],
    embeddingModel: str(layer, 'embeddingModel') ?? DEFAULT_CONFIG.embeddingModel,
    maxVectorFiles: num(layer, 'maxVectorFiles', positiveInt, 'a positive integer') ?? DEFAULT_CONFIG.maxVectorFiles,
    minSimilarity: num(layer, 'minSimilarity', (n) => n >= 0 && n <= 1, 'between 0 and 1') ?? DEFAULT_CONFIG.minSimilarity,
    tokenLimit: num(layer, 'tokenLimit', positive, 'a positive number') ?? DEFAULT_CONFIG.tokenLimit,
    bufferFraction: num(layer, 'bufferFraction', (n) => n >= 0 && n < 1, 'at least 0 and below 1') ?? DEFAULT_CONFIG.bufferFraction,
    debugRemoteCalls: bool(layer, 'debugRemoteCalls') ?? false,
    generativeModel: str(layer, 'generativeModel') ?? DEFAULT_CONFIG.generativeModel,
    maxBytesPerFile: num(layer, 'maxBytesPerFile', positiveInt, 'a positive integer') ?? DEFAULT_CONFIG.maxBytesPerFile,
    embedPrefixChars: num(layer, 'embedPrefixChars', positiveInt, 'a positive integer') ?? DEFAULT_CONFIG.embedPrefixChars,
    ignoreFiles: list(layer, 'ignoreFiles') ?? [...DEFAULT_CONFIG.ignoreFiles],
    useIgnoreFiles: bool(layer, 'useIgnoreFiles') ?? true,
    reserveOverhead: bool(layer, 'reserveOverhead') ?? true,
    retry: retryPolicy(layer),
    logLevel,
    debugDir: str(layer, 'debugDir') ?? DEFAULT_CONFIG.debugDir,
    format: oneOf(layer, 'format', FORMATS) ?? 'markdown',
  };
  const apiKey = str(layer, 'apiKey');
  if (apiKey) config.apiKey = apiKey;
  const tokenizerModel = str(layer, 'tokenizerModel');
  if (tokenizerModel) config.tokenizerModel = tokenizerModel;
  const encoding = str(layer, 'encoding');
  if (encoding) config.encoding = encoding;
  const logFile = str(layer, 'logFile');
  if (logFile) config.logFile = logFile;
  const outFile = str(layer, 'outFile');
  if (outFile) config.outFile = outFile;

  if (!config.apiKey) {
    if (options.requireGenerator) {
      throw new ConfigurationError('An API key is required to generate documents: set GEMINI_API_KEY or apiKey', 'apiKey');
    }
    if (config.selectionMode === 'ai') {
      throw new ConfigurationError('selectionMode "ai" needs an API key: set GEMINI_API_KEY or apiKey', 'apiKey');
    }
    if (config.selectionMode === 'vector' && config.embeddingModel !== KEYWORD_MODEL) {
      throw new ConfigurationError(
        `selectionMode "vector" with ${config.embeddingModel} embeddings needs an API key; set one or use embeddingModel "${KEYWORD_MODEL}"`,
        'apiKey',
      );
    }
  }
  return config;
}

/** Files, then environment, then overrides; the usual entry point for commands. */
export async function loadConfig(
  cwd: string,
  options: Omit<ResolveOptions, 'cwd' | 'files'> = {},
): Promise<RepoBriefConfig> {
  return resolveConfig({ ...options, cwd, files: await loadRepoBriefConfig(cwd) });
}

export async function writeDefaultConfig(cwd: string) {
  const configPath = path.join(cwd, RC_FILE);
  const content = JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n';
  await fs.writeFile(configPath, content, 'utf8');
  return configPath;
}

export async function writeDefaultGlobalConfig() {
  const home = homeDir();
  if (!home) throw new ConfigurationError(`Cannot resolve HOME directory for ~/${GLOBAL_DIR}`);
  const dir = path.join(home, GLOBAL_DIR);
  await fs.mkdir(dir, { recursive: true });
  const p = path.join(dir, 'config.json');
  const content = JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n';
  await fs.writeFile(p, content, 'utf8');
  return p;
}
