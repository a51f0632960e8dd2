import { RemoteError, RemoteFatalError, RemoteTransientError } from "./errors.js";
import type { TextGenerator } from "./remote.js";
import { errorMessage, isRecord } from "./utils.js";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

export interface GeminiClientOptions {
  apiKey: string;
  baseUrl?: string;
}

/**
 * Thin transport over the Gemini REST API. Maps HTTP failures onto the remote
 * error taxonomy and leaves retries to ResilientCaller.
 */
export class GeminiClient {
  private readonly baseUrl: string;

  constructor(private readonly options: GeminiClientOptions) {
    this.baseUrl = (options.baseUrl ?? GEMINI_BASE_URL).replace(/\/$/, "");
  }

  async generateContent(model: string, prompt: string): Promise<string> {
    const raw = await this.post(`models/${model}:generateContent`, {
      contents: [{ parts: [{ text: prompt }] }]
    });
    const text = extractCandidateText(raw);
    if (text === undefined) throw new RemoteFatalError(`generateContent: unexpected response format: ${preview(raw)}`);
    return text;
  }

  async batchEmbed(model: string, texts: readonly string[]): Promise<number[][]> {
    const raw = await this.post(`models/${model}:batchEmbedContents`, {
      requests: texts.map((text) => ({ model: `models/${model}`, content: { parts: [{ text }] } }))
    });
    const vectors = extractEmbeddings(raw);
    if (!vectors || vectors.length !== texts.length) {
      throw new RemoteFatalError(`batchEmbedContents: expected ${texts.length} embeddings, got ${preview(raw)}`);
    }
    return vectors;
  }

  generator(model: string): TextGenerator {
    return { model, generate: (prompt) => this.generateContent(model, prompt) };
  }

  private async post(endpoint: string, body: unknown): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/${endpoint}`, {
        method: "POST",
        headers: { "content-type": "application/json", "x-goog-api-key": this.options.apiKey },
        body: JSON.stringify(body)
      });
    } catch (e) {
      throw new RemoteError(`${endpoint}: request failed: ${errorMessage(e)}`, undefined, { cause: e });
    }
    if (!res.ok) throw await toRemoteError(res, endpoint);
    try {
      const parsed: unknown = await res.json();
      return parsed;
    } catch (e) {
      throw new RemoteFatalError(`${endpoint}: response is not JSON`, res.status, { cause: e });
    }
  }
}

export async function toRemoteError(res: Response, endpoint: string): Promise<RemoteError> {
  const body = (await res.text()).slice(0, 300);
  if (res.status === 429) {
    return new RemoteTransientError(`${endpoint}: rate limited (429)`, 429, parseRetryAfter(res.headers.get("retry-after")));
  }
  if (res.status === 400 || res.status === 401 || res.status === 403 || res.status === 404) {
    return new RemoteFatalError(`${endpoint}: request rejected with status ${res.status}: ${body}`, res.status);
  }
  return new RemoteError(`${endpoint}: request failed with status ${res.status}: ${body}`, res.status);
}

export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(value);
  return Number.isNaN(at) ? undefined : Math.max(0, at - Date.now());
}

function extractCandidateText(raw: unknown): string | undefined {
  if (!isRecord(raw) || !Array.isArray(raw.candidates)) return undefined;
  const first: unknown = raw.candidates[0];
  if (!isRecord(first) || !isRecord(first.content) || !Array.isArray(first.content.parts)) return undefined;
  const texts = first.content.parts
    .map((p: unknown) => (isRecord(p) && typeof p.text === "string" ? p.text : undefined))
    .filter((t): t is string => t !== undefined);
  return texts.length ? texts.join("") : undefined;
}

function extractEmbeddings(raw: unknown): number[][] | undefined {
  if (!isRecord(raw) || !Array.isArray(raw.embeddings)) return undefined;
  const out: number[][] = [];
  for (const e of raw.embeddings) {
    if (!isRecord(e) || !Array.isArray(e.values)) return undefined;
    const values: number[] = [];
    for (const v of e.values) {
      if (typeof v !== "number") return undefined;
      values.push(v);
    }
    out.push(values);
  }
  return out;
}

function preview(raw: unknown): string {
  return JSON.stringify(raw)?.slice(0, 100) ?? String(raw);
}
