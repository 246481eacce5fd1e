import { z } from "zod";

/** Structured value stored verbatim as document metadata. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Opaque metadata mapping. Never interpreted by the retrieval core. */
export type Metadata = { [key: string]: JsonValue };

/** Embedding vector (exactly `EMBEDDING_DIM` components once validated). */
export type Vector = number[];

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const metadataSchema: z.ZodType<Metadata> = z.record(jsonValueSchema);

/**
 * Document body as held by the backing store. The id lives outside the body
 * (it is the store key).
 */
export interface StoredDocument {
  readonly text: string;
  readonly metadata: Metadata;
  readonly embedding: Vector;
}

export const storedDocumentSchema: z.ZodType<StoredDocument, z.ZodTypeDef, unknown> = z.object({
  text: z.string(),
  metadata: metadataSchema.default({}),
  embedding: z.array(z.number()),
});

/** A document addressed by its id. */
export interface Document extends StoredDocument {
  /** UUID generated at ingest time; immutable. */
  readonly id: string;
}

export type SearchMode = "lexical" | "semantic" | "hybrid";

/** One ranked search result, as returned to callers. */
export interface SearchHit {
  readonly id: string;
  readonly text: string;
  readonly metadata: Metadata;
  readonly score: number;
}

export type EmbeddingStrategy = "local" | "external";

/** Health snapshot reported by the service. */
export interface HealthReport {
  backendReachable: boolean;
  indexName: string;
  embeddingDimension: number;
  embeddingStrategy: EmbeddingStrategy;
}
