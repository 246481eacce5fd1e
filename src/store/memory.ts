import { cosine } from "../embeddings";
import { assertDimension } from "../errors";
import { Persistence } from "../persistence";
import type { StoredDocument } from "../types";
import { bm25, termStats, type TermStats } from "./lexical";
import type { DocumentStore, StoreHit, StoreSearchRequest } from "./types";

export interface InMemoryStoreOptions {
  collection: string;
  /** Optional JSON file written on every refresh and read by {@link InMemoryStore.open}. */
  storePath?: string;
  verbose?: boolean;
}

interface IndexedDocument {
  doc: StoredDocument;
  stats: TermStats;
}

/**
 * Zero-dependency {@link DocumentStore}: exact cosine kNN plus BM25 over an
 * in-process map. Reads by id are real-time; searches only see the snapshot
 * published by the last {@link refresh}, like a near-real-time engine.
 */
export class InMemoryStore implements DocumentStore {
  public readonly kind = "memory";
  public readonly location: string;
  public readonly collection: string;
  private readonly persistence?: Persistence;
  private dimension: number | null = null;
  private readonly live = new Map<string, StoredDocument>();
  private searchable = new Map<string, IndexedDocument>();

  public constructor(opts: InMemoryStoreOptions) {
    this.collection = opts.collection;
    this.location = opts.storePath ?? "memory";
    if (opts.storePath) this.persistence = new Persistence(opts.storePath, !!opts.verbose);
  }

  /**
   * Build a store and hydrate it from `storePath` when a compatible file exists.
   * The collection counts as created once a file was loaded.
   */
  public static async open(opts: InMemoryStoreOptions & { dimension: number }): Promise<InMemoryStore> {
    const store = new InMemoryStore(opts);
    const docs = await store.persistence?.load({
      collection: opts.collection,
      dimension: opts.dimension,
    });
    if (docs) {
      store.dimension = opts.dimension;
      for (const [id, doc] of docs) store.live.set(id, doc);
      store.publish();
    }
    return store;
  }

  public async ping(): Promise<boolean> {
    return true;
  }

  public async collectionExists(): Promise<boolean> {
    return this.dimension !== null;
  }

  public async createCollection(dimension: number): Promise<void> {
    if (this.dimension !== null) {
      throw new Error(`Collection '${this.collection}' already exists`);
    }
    this.dimension = dimension;
  }

  public async get(id: string): Promise<StoredDocument | null> {
    this.requireCollection();
    const doc = this.live.get(id);
    return doc ? structuredClone(doc) : null;
  }

  public async upsert(id: string, doc: StoredDocument): Promise<void> {
    const dimension = this.requireCollection();
    assertDimension(doc.embedding, dimension);
    this.live.set(id, structuredClone(doc));
  }

  public async delete(id: string): Promise<boolean> {
    this.requireCollection();
    return this.live.delete(id);
  }

  public async refresh(): Promise<void> {
    const dimension = this.requireCollection();
    this.publish();
    await this.persistence?.save({ collection: this.collection, dimension, docs: this.live });
  }

  /**
   * Lexical and kNN clauses each produce a hit set; with both present the
   * result is their union with scores summed. kNN scores are `(1 + cos) / 2`.
   */
  public async search(request: StoreSearchRequest): Promise<StoreHit[]> {
    this.requireCollection();
    const scores = new Map<string, number>();
    const add = (id: string, score: number) => scores.set(id, (scores.get(id) ?? 0) + score);

    if (request.lexical) {
      const stats = new Map<string, TermStats>();
      for (const [id, entry] of this.searchable) stats.set(id, entry.stats);
      for (const [id, score] of bm25(request.lexical.query, stats)) add(id, score);
    }

    if (request.knn) {
      const { vector, k } = request.knn;
      // Exact scan: the candidate pool is the whole collection.
      const nearest = Array.from(this.searchable, ([id, entry]) => ({
        id,
        score: (1 + cosine(entry.doc.embedding, vector)) / 2,
      }))
        .sort((a, b) => b.score - a.score)
        .slice(0, k);
      for (const n of nearest) add(n.id, n.score);
    }

    const hits: StoreHit[] = [];
    for (const [id, score] of scores) {
      const entry = this.searchable.get(id);
      if (entry) hits.push({ id, score, source: structuredClone(entry.doc) });
    }
    hits.sort((a, b) => b.score - a.score); // stable: ties keep insertion order
    return hits.slice(0, request.size);
  }

  private publish(): void {
    const next = new Map<string, IndexedDocument>();
    for (const [id, doc] of this.live) {
      const previous = this.searchable.get(id);
      next.set(id, previous && previous.doc === doc ? previous : { doc, stats: termStats(doc.text) });
    }
    this.searchable = next;
  }

  private requireCollection(): number {
    if (this.dimension === null) {
      throw new Error(`Collection '${this.collection}' does not exist`);
    }
    return this.dimension;
  }
}
