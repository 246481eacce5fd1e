import { Client, errors, type estypes } from "@elastic/elasticsearch";
import { BackendUnavailableError } from "../errors";
import { storedDocumentSchema, type StoredDocument } from "../types";
import type { DocumentStore, StoreHit, StoreSearchRequest } from "./types";

export interface ElasticsearchStoreOptions {
  /** Cluster address, e.g. http://localhost:9200. */
  node: string;
  index: string;
  /** Pre-built client (shares connection pools / test doubles). */
  client?: Client;
}

/**
 * Index mapping: full-text `text`, opaque `metadata` (stored, not indexed) and
 * an HNSW-indexed `embedding` compared by cosine similarity.
 */
export function buildMappings(dimension: number): estypes.MappingTypeMapping {
  return {
    properties: {
      text: { type: "text" },
      metadata: { type: "object", enabled: false },
      embedding: {
        type: "dense_vector",
        dims: dimension,
        index: true,
        similarity: "cosine",
      },
    },
  };
}

/**
 * Translate a store request into one `_search` body. A `should`-only bool
 * query next to a top-level `knn` section yields the union of both hit sets
 * with summed scores (Elasticsearch's default combination).
 */
export function buildSearchRequest(index: string, request: StoreSearchRequest): estypes.SearchRequest {
  const body: estypes.SearchRequest = { index, size: request.size };
  const { lexical, knn } = request;
  if (lexical) {
    const match: estypes.QueryDslQueryContainer = { match: { text: lexical.query } };
    body.query = lexical.occur === "should" ? { bool: { should: [match] } } : match;
  }
  if (knn) {
    body.knn = {
      field: "embedding",
      query_vector: knn.vector,
      k: knn.k,
      num_candidates: knn.numCandidates,
    };
  }
  return body;
}

/** Map raw hits to store hits, validating each `_source`. */
export function toStoreHits(response: estypes.SearchResponse<unknown>): StoreHit[] {
  const out: StoreHit[] = [];
  for (const hit of response.hits.hits) {
    const id = hit._id ?? null;
    if (id === null) continue;
    out.push({ id, score: hit._score ?? 0, source: storedDocumentSchema.parse(hit._source) });
  }
  return out;
}

function isConnectionFailure(e: unknown): boolean {
  return (
    e instanceof errors.ConnectionError ||
    e instanceof errors.NoLivingConnectionsError ||
    e instanceof errors.TimeoutError
  );
}

function isNotFound(e: unknown): boolean {
  return e instanceof errors.ResponseError && e.meta.statusCode === 404;
}

/** {@link DocumentStore} backed by an Elasticsearch index. */
export class ElasticsearchStore implements DocumentStore {
  public readonly kind = "elasticsearch";
  public readonly location: string;
  public readonly collection: string;
  private readonly client: Client;

  public constructor(opts: ElasticsearchStoreOptions) {
    this.location = opts.node;
    this.collection = opts.index;
    // Store calls fail on their first error; no client-side retry.
    this.client = opts.client ?? new Client({ node: opts.node, maxRetries: 0 });
  }

  public async ping(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch (e) {
      if (!isConnectionFailure(e)) throw e;
      console.error(`[MCP] Elasticsearch ping to ${this.location} failed:`, e);
      return false;
    }
  }

  public async collectionExists(): Promise<boolean> {
    return this.call("indices.exists", () => this.client.indices.exists({ index: this.collection }));
  }

  public async createCollection(dimension: number): Promise<void> {
    await this.call("indices.create", () =>
      this.client.indices.create({ index: this.collection, mappings: buildMappings(dimension) }),
    );
  }

  public async get(id: string): Promise<StoredDocument | null> {
    try {
      const res = await this.call("get", () =>
        this.client.get<unknown>({ index: this.collection, id }),
      );
      return res.found ? storedDocumentSchema.parse(res._source) : null;
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  public async upsert(id: string, doc: StoredDocument): Promise<void> {
    await this.call("index", () =>
      this.client.index({ index: this.collection, id, document: doc }),
    );
  }

  public async delete(id: string): Promise<boolean> {
    try {
      await this.call("delete", () => this.client.delete({ index: this.collection, id }));
      return true;
    } catch (e) {
      if (isNotFound(e)) return false;
      throw e;
    }
  }

  public async refresh(): Promise<void> {
    await this.call("indices.refresh", () =>
      this.client.indices.refresh({ index: this.collection }),
    );
  }

  public async search(request: StoreSearchRequest): Promise<StoreHit[]> {
    const res = await this.call("search", () =>
      this.client.search<unknown>(buildSearchRequest(this.collection, request)),
    );
    return toStoreHits(res);
  }

  private async call<T>(operation: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (e) {
      if (isConnectionFailure(e)) {
        throw new BackendUnavailableError(
          `Elasticsearch at ${this.location} unreachable during ${operation}`,
          { cause: e },
        );
      }
      throw e;
    }
  }
}
