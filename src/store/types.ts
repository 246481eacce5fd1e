import type { StoredDocument, Vector } from "../types";

/**
 * Lexical clause of a store search. `must` filters to documents matching the
 * text; `should` only contributes score when other clauses are present.
 */
export interface LexicalClause {
  query: string;
  occur: "must" | "should";
}

/** Approximate nearest-neighbour clause over the `embedding` field (cosine). */
export interface KnnClause {
  vector: Vector;
  k: number;
  /** Candidate pool explored per shard before picking the k nearest. */
  numCandidates: number;
}

/**
 * One retrieval request. When both clauses are present the store combines
 * them with its default scoring; callers do not re-rank.
 */
export interface StoreSearchRequest {
  size: number;
  lexical?: LexicalClause;
  knn?: KnnClause;
}

export interface StoreHit {
  id: string;
  score: number;
  source: StoredDocument;
}

/**
 * Contract the retrieval core needs from a backing store. Implementations own
 * collection naming, persistence and scoring; connection failures surface as
 * `BackendUnavailableError`.
 */
export interface DocumentStore {
  /** Backend family, e.g. "elasticsearch" or "memory". */
  readonly kind: string;
  /** Human-readable address (URL or file path). */
  readonly location: string;
  /** Target collection name. */
  readonly collection: string;

  ping(): Promise<boolean>;
  collectionExists(): Promise<boolean>;
  /** Create the collection with `text`, `metadata` and `embedding` (dims = dimension) fields. */
  createCollection(dimension: number): Promise<void>;
  /** Real-time read by id; `null` when absent. */
  get(id: string): Promise<StoredDocument | null>;
  upsert(id: string, doc: StoredDocument): Promise<void>;
  /** @returns false when no document had that id. */
  delete(id: string): Promise<boolean>;
  /** Make every preceding write visible to {@link search}. */
  refresh(): Promise<void>;
  search(request: StoreSearchRequest): Promise<StoreHit[]>;
}
