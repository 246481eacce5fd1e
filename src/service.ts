import type { Config } from "./config";
import { DocumentService, type DocumentUpdate } from "./documents";
import { createEmbeddingProvider, type EmbeddingProvider } from "./embeddings";
import { BackendUnavailableError } from "./errors";
import { SchemaManager } from "./schema";
import { createSearchStrategies, type SearchStrategy } from "./search";
import { StatusManager } from "./status";
import { ElasticsearchStore } from "./store/elasticsearch";
import { InMemoryStore } from "./store/memory";
import type { DocumentStore } from "./store/types";
import type { Document, HealthReport, Metadata, SearchHit, SearchMode } from "./types";

export interface RetrievalServiceDeps {
  store: DocumentStore;
  embeddings: EmbeddingProvider;
  status?: StatusManager;
  verbose?: boolean;
}

/**
 * Entry point for every logical operation (schema, lifecycle, search,
 * health). Holds no state beyond its injected collaborators.
 */
export class RetrievalService {
  public readonly store: DocumentStore;
  public readonly embeddings: EmbeddingProvider;
  public readonly status: StatusManager;
  private readonly schema: SchemaManager;
  private readonly documents: DocumentService;
  private readonly strategies: Record<SearchMode, SearchStrategy>;

  public constructor(deps: RetrievalServiceDeps) {
    this.store = deps.store;
    this.embeddings = deps.embeddings;
    this.status =
      deps.status ??
      new StatusManager({
        indexName: deps.store.collection,
        backend: deps.store.kind,
        backendLocation: deps.store.location,
        embeddingStrategy: deps.embeddings.strategy,
        embeddingModel: deps.embeddings.modelName,
        embeddingDimension: deps.embeddings.dimension,
      });
    this.schema = new SchemaManager(this.store, this.embeddings.dimension, deps.verbose);
    const shared = { store: this.store, embeddings: this.embeddings, schema: this.schema, status: this.status };
    this.documents = new DocumentService({ ...shared, verbose: deps.verbose });
    this.strategies = createSearchStrategies(shared);
  }

  /**
   * Startup checks: the backend must answer, then the collection is ensured.
   *
   * @throws {BackendUnavailableError} The backend is unreachable (fatal at startup).
   */
  public async start(): Promise<void> {
    if (!(await this.store.ping())) {
      throw new BackendUnavailableError(
        `Cannot connect to ${this.store.kind} backend at ${this.store.location}`,
      );
    }
    await this.schema.ensureSchema();
    this.status.markReady();
  }

  public async createSchema(): Promise<{ index: string; dimension: number; created: boolean }> {
    const created = await this.schema.ensureSchema();
    return { index: this.store.collection, dimension: this.embeddings.dimension, created };
  }

  public ingest(texts: readonly string[], metadata?: Metadata): Promise<string[]> {
    return this.documents.ingest(texts, metadata);
  }

  public update(id: string, changes: DocumentUpdate): Promise<Document> {
    return this.documents.update(id, changes);
  }

  public delete(id: string): Promise<void> {
    return this.documents.delete(id);
  }

  public get(id: string): Promise<Document> {
    return this.documents.get(id);
  }

  public search(mode: SearchMode, query: string, topK: number): Promise<SearchHit[]> {
    return this.strategies[mode].search(query, topK);
  }

  public searchLexical(query: string, topK: number): Promise<SearchHit[]> {
    return this.search("lexical", query, topK);
  }

  public searchSemantic(query: string, topK: number): Promise<SearchHit[]> {
    return this.search("semantic", query, topK);
  }

  public searchHybrid(query: string, topK: number): Promise<SearchHit[]> {
    return this.search("hybrid", query, topK);
  }

  public async health(): Promise<HealthReport> {
    return {
      backendReachable: await this.store.ping(),
      indexName: this.store.collection,
      embeddingDimension: this.embeddings.dimension,
      embeddingStrategy: this.embeddings.strategy,
    };
  }
}

/** Build the backing store selected by configuration. */
export async function createDocumentStore(
  config: Pick<Config, "STORE_BACKEND" | "ELASTIC_URL" | "ELASTIC_INDEX" | "INDEX_STORE_PATH" | "EMBEDDING_DIM" | "VERBOSE">,
): Promise<DocumentStore> {
  if (config.STORE_BACKEND === "memory") {
    return InMemoryStore.open({
      collection: config.ELASTIC_INDEX,
      storePath: config.INDEX_STORE_PATH,
      dimension: config.EMBEDDING_DIM,
      verbose: config.VERBOSE,
    });
  }
  return new ElasticsearchStore({ node: config.ELASTIC_URL, index: config.ELASTIC_INDEX });
}

/** Wire store, embeddings and status from configuration. */
export async function createRetrievalService(config: Config): Promise<RetrievalService> {
  const store = await createDocumentStore(config);
  const embeddings = createEmbeddingProvider(config);
  return new RetrievalService({ store, embeddings, verbose: config.VERBOSE });
}
