import type { EmbeddingProvider } from "./embeddings";
import type { SchemaManager } from "./schema";
import type { StatusManager } from "./status";
import type { DocumentStore, KnnClause, StoreHit, StoreSearchRequest } from "./store/types";
import type { SearchHit, SearchMode } from "./types";

export interface SearchDeps {
  store: DocumentStore;
  embeddings: EmbeddingProvider;
  schema: SchemaManager;
  status?: StatusManager;
}

/** A query strategy returning at most `topK` hits, best first. */
export interface SearchStrategy {
  readonly mode: SearchMode;
  search(query: string, topK: number): Promise<SearchHit[]>;
}

/**
 * Candidate pool for approximate kNN: wider pools raise recall at extra
 * query cost.
 */
export function candidatePoolSize(topK: number): number {
  return Math.max(topK * 20, 100);
}

function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new RangeError(`topK must be a positive integer, got ${topK}`);
  }
}

function toSearchHit(hit: StoreHit): SearchHit {
  return { id: hit.id, text: hit.source.text, metadata: hit.source.metadata, score: hit.score };
}

/**
 * Shared request flow: validate topK, ensure the collection, issue exactly one
 * store request, map hits.
 */
abstract class BaseSearch implements SearchStrategy {
  public abstract readonly mode: SearchMode;
  protected readonly store: DocumentStore;
  protected readonly embeddings: EmbeddingProvider;
  private readonly schema: SchemaManager;
  private readonly status?: StatusManager;

  public constructor(deps: SearchDeps) {
    this.store = deps.store;
    this.embeddings = deps.embeddings;
    this.schema = deps.schema;
    this.status = deps.status;
  }

  public async search(query: string, topK: number): Promise<SearchHit[]> {
    assertTopK(topK);
    await this.schema.ensureSchema();
    const request = await this.buildRequest(query, topK);
    const hits = await this.store.search(request);
    this.status?.recordSearch(this.mode);
    return hits.slice(0, topK).map(toSearchHit);
  }

  protected abstract buildRequest(query: string, topK: number): Promise<StoreSearchRequest>;

  protected async knnClause(query: string, topK: number): Promise<KnnClause> {
    const vector = await this.embeddings.embed(query);
    return { vector, k: topK, numCandidates: candidatePoolSize(topK) };
  }
}

/** Term-matching relevance over `text` (single match expression). */
export class LexicalSearch extends BaseSearch {
  public readonly mode = "lexical" as const;

  protected async buildRequest(query: string, topK: number): Promise<StoreSearchRequest> {
    return { size: topK, lexical: { query, occur: "must" } };
  }
}

/** Approximate nearest neighbours of the query embedding (cosine). */
export class SemanticSearch extends BaseSearch {
  public readonly mode = "semantic" as const;

  protected async buildRequest(query: string, topK: number): Promise<StoreSearchRequest> {
    return { size: topK, knn: await this.knnClause(query, topK) };
  }
}

/**
 * Lexical `should` clause and kNN clause in one request. Ranking is the
 * store's default combination of the two, with no separate
 * fusion (e.g. reciprocal rank fusion) step.
 */
export class HybridSearch extends BaseSearch {
  public readonly mode = "hybrid" as const;

  protected async buildRequest(query: string, topK: number): Promise<StoreSearchRequest> {
    return {
      size: topK,
      lexical: { query, occur: "should" },
      knn: await this.knnClause(query, topK),
    };
  }
}

export function createSearchStrategies(deps: SearchDeps): Record<SearchMode, SearchStrategy> {
  return {
    lexical: new LexicalSearch(deps),
    semantic: new SemanticSearch(deps),
    hybrid: new HybridSearch(deps),
  };
}
