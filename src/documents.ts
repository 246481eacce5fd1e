import { randomUUID } from "node:crypto";
import type { EmbeddingProvider } from "./embeddings";
import { NotFoundError } from "./errors";
import type { SchemaManager } from "./schema";
import type { StatusManager } from "./status";
import type { DocumentStore } from "./store/types";
import type { Document, Metadata } from "./types";

export interface DocumentServiceDeps {
  store: DocumentStore;
  embeddings: EmbeddingProvider;
  schema: SchemaManager;
  status?: StatusManager;
  verbose?: boolean;
}

/** Replacement values for {@link DocumentService.update}; omitted fields are retained. */
export interface DocumentUpdate {
  text?: string;
  metadata?: Metadata;
}

/**
 * Document lifecycle: ingest, update, delete (and read by id). Every mutation
 * ends with a refresh so the change is visible to the next search.
 */
export class DocumentService {
  private readonly store: DocumentStore;
  private readonly embeddings: EmbeddingProvider;
  private readonly schema: SchemaManager;
  private readonly status?: StatusManager;
  private readonly verbose: boolean;

  public constructor(deps: DocumentServiceDeps) {
    this.store = deps.store;
    this.embeddings = deps.embeddings;
    this.schema = deps.schema;
    this.status = deps.status;
    this.verbose = !!deps.verbose;
  }

  /**
   * Store one document per text, in input order, all sharing `metadata`.
   * Embedding and storage run sequentially; the first failure aborts the batch
   * and leaves earlier documents stored (no rollback) and searchable.
   *
   * @returns One new id per input text, in input order.
   */
  public async ingest(texts: readonly string[], metadata?: Metadata): Promise<string[]> {
    await this.schema.ensureSchema();
    const meta = metadata ?? {};
    const ids: string[] = [];
    try {
      for (const text of texts) {
        const id = randomUUID();
        const embedding = await this.embeddings.embed(text);
        await this.store.upsert(id, { text, metadata: meta, embedding });
        ids.push(id);
        this.status?.recordIngested();
      }
    } catch (e) {
      if (ids.length) await this.store.refresh();
      throw e;
    }
    if (ids.length) await this.store.refresh();
    if (this.verbose) console.error(`[MCP][verbose] Ingested ${ids.length} documents`);
    return ids;
  }

  /**
   * Rewrite a document. The embedding is recomputed from the effective text
   * even when only metadata changed.
   *
   * @throws {NotFoundError} If no document has `id`.
   */
  public async update(id: string, changes: DocumentUpdate): Promise<Document> {
    await this.schema.ensureSchema();
    const current = await this.store.get(id);
    if (!current) throw new NotFoundError(id);

    const text = changes.text ?? current.text;
    const metadata = changes.metadata ?? current.metadata;
    // TODO: skip re-embedding when text is unchanged once stored embeddings are trusted across model changes.
    const embedding = await this.embeddings.embed(text);

    await this.store.upsert(id, { text, metadata, embedding });
    await this.store.refresh();
    this.status?.recordUpdated();
    return { id, text, metadata, embedding };
  }

  /** @throws {NotFoundError} If no document has `id`. */
  public async delete(id: string): Promise<void> {
    await this.schema.ensureSchema();
    const removed = await this.store.delete(id);
    if (!removed) throw new NotFoundError(id);
    await this.store.refresh();
    this.status?.recordDeleted();
  }

  /** @throws {NotFoundError} If no document has `id`. */
  public async get(id: string): Promise<Document> {
    await this.schema.ensureSchema();
    const current = await this.store.get(id);
    if (!current) throw new NotFoundError(id);
    return { id, ...current };
  }
}
