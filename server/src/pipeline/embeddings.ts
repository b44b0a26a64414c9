import OpenAI from "openai";
import { hash32 } from "./utils.js";

export interface Embedder {
  embed(text: string, signal: AbortSignal): Promise<number[]>;
}

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

export function configuredEmbeddingModel(): string {
  const value = process.env.CDX_EMBEDDING_MODEL;
  return value && value.trim().length > 0 ? value.trim() : DEFAULT_EMBEDDING_MODEL;
}

export class OpenAiEmbedder implements Embedder {
  private client: OpenAI | null = null;

  constructor(
    private readonly apiKey: string,
    private readonly model = configuredEmbeddingModel()
  ) {}

  private getClient(): OpenAI {
    if (!this.client) this.client = new OpenAI({ apiKey: this.apiKey });
    return this.client;
  }

  async embed(text: string, signal: AbortSignal): Promise<number[]> {
    const res = await this.getClient().embeddings.create({ model: this.model, input: text }, { signal });
    const vector = res.data[0]?.embedding;
    if (!vector || vector.length === 0) throw new Error(`Embedding response for ${this.model} was empty`);
    return vector;
  }
}

const STOP_WORDS = new Set([
  "a",
  "an",
  "and",
  "are",
  "as",
  "at",
  "be",
  "by",
  "for",
  "from",
  "in",
  "into",
  "is",
  "it",
  "of",
  "on",
  "or",
  "that",
  "the",
  "this",
  "to",
  "was",
  "with"
]);

export function tokens(input: string): string[] {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9\s]+/g, " ")
    .split(/\s+/)
    .map((w) => w.trim())
    .filter((w) => w.length >= 2 && !STOP_WORDS.has(w));
}

/**
 * Bag-of-words hashed into a fixed number of buckets, L2-normalised.
 * Deterministic and offline; used in fake mode and tests.
 */
export class HashingEmbedder implements Embedder {
  constructor(private readonly dimensions = 256) {}

  embedSync(text: string): number[] {
    const v = new Array<number>(this.dimensions).fill(0);
    for (const t of tokens(text)) v[hash32(t) % this.dimensions] += 1;
    const norm = Math.sqrt(v.reduce((sum, x) => sum + x * x, 0));
    return norm === 0 ? v : v.map((x) => x / norm);
  }

  async embed(text: string, _signal?: AbortSignal): Promise<number[]> {
    return this.embedSync(text);
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}
