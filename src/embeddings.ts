import { createHash } from "node:crypto";
import { embed, type EmbeddingModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { assertDimension, ConfigError, EmbeddingError } from "./errors";
import type { EmbeddingStrategy, Vector } from "./types";
import type { Config } from "./config";

/**
 * Produces a fixed-length vector for a string. One instance is selected at
 * startup and used for every ingest, update and query embedding.
 */
export interface EmbeddingProvider {
  readonly strategy: EmbeddingStrategy;
  /** Number of components every returned vector has. */
  readonly dimension: number;
  /** Model identifier, or a descriptive label for the local strategy. */
  readonly modelName: string;
  embed(text: string): Promise<Vector>;
}

/**
 * Deterministic, dependency-free embeddings derived from SHA-256. Identical
 * text yields identical vectors; similarity between distinct texts carries no
 * meaning.
 */
export class LocalHashEmbeddings implements EmbeddingProvider {
  public readonly strategy = "local" as const;
  public readonly modelName = "sha256-hash";

  public constructor(public readonly dimension: number) {}

  public async embed(text: string): Promise<Vector> {
    return LocalHashEmbeddings.hashVector(text, this.dimension);
  }

  /**
   * Stretch the digest by repetition to at least 4 * dimension bytes, then read
   * one little-endian uint32 per component and map it into [0, 1).
   */
  public static hashVector(text: string, dimension: number): Vector {
    const digest = createHash("sha256").update(text, "utf8").digest();
    const repeats = Math.floor((dimension * 4) / digest.length) + 1;
    const bytes = Buffer.concat(Array.from({ length: repeats }, () => digest));
    const vec: Vector = [];
    for (let i = 0; i < dimension; i++) {
      const n = bytes.readUInt32LE(i * 4);
      vec.push((n % 100000) / 100000.0);
    }
    assertDimension(vec, dimension);
    return vec;
  }
}

export interface ExternalEmbeddingsOptions {
  dimension: number;
  modelName: string;
  apiKey?: string;
  /** Pre-built model; bypasses the credential check (used by tests). */
  model?: EmbeddingModel<string>;
}

/**
 * Embeddings from a remote API (OpenAI through the AI SDK). No retry and no
 * fallback: a failure fails the calling operation.
 */
export class ExternalEmbeddings implements EmbeddingProvider {
  public readonly strategy = "external" as const;
  public readonly dimension: number;
  public readonly modelName: string;
  private readonly apiKey?: string;
  private model: EmbeddingModel<string> | null;

  public constructor(opts: ExternalEmbeddingsOptions) {
    this.dimension = opts.dimension;
    this.modelName = opts.modelName;
    this.apiKey = opts.apiKey?.trim() || undefined;
    this.model = opts.model ?? null;
  }

  /** Whether a call to {@link embed} can get past the credential check. */
  public isConfigured(): boolean {
    return this.model !== null || this.apiKey !== undefined;
  }

  /**
   * @throws {ConfigError} No credential configured.
   * @throws {EmbeddingError} The provider call failed.
   * @throws {DimensionMismatchError} The provider returned a vector of another length.
   */
  public async embed(text: string): Promise<Vector> {
    const model = this.resolveModel();
    let embedding: Vector;
    try {
      ({ embedding } = await embed({ model, value: text, maxRetries: 0 }));
    } catch (e) {
      throw new EmbeddingError(`Embedding request to '${this.modelName}' failed`, { cause: e });
    }
    assertDimension(embedding, this.dimension);
    return embedding;
  }

  private resolveModel(): EmbeddingModel<string> {
    if (this.model) return this.model;
    if (!this.apiKey) throw new ConfigError("OPENAI_API_KEY is missing from the environment");
    const openai = createOpenAI({ apiKey: this.apiKey });
    this.model = openai.embedding(this.modelName);
    return this.model;
  }
}

/** Select the embedding strategy once, from configuration. */
export function createEmbeddingProvider(
  config: Pick<Config, "EMBEDDING_PROVIDER" | "EMBEDDING_DIM" | "OPENAI_API_KEY" | "OPENAI_EMBED_MODEL">,
): EmbeddingProvider {
  if (config.EMBEDDING_PROVIDER === "external") {
    return new ExternalEmbeddings({
      dimension: config.EMBEDDING_DIM,
      modelName: config.OPENAI_EMBED_MODEL,
      apiKey: config.OPENAI_API_KEY,
    });
  }
  return new LocalHashEmbeddings(config.EMBEDDING_DIM);
}

/**
 * Compute cosine similarity between two vectors. Length mismatch is handled by
 * comparing up to the shortest length.
 *
 * @returns Cosine similarity in range [-1, 1]
 */
export function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}
