import type { DocumentStore } from "./store/types";

/**
 * Guarantees the document collection exists before any read or write.
 */
export class SchemaManager {
  public constructor(
    private readonly store: DocumentStore,
    private readonly dimension: number,
    private readonly verbose = false,
  ) {}

  /**
   * Create the collection (`text`, `metadata`, `embedding` with dims = D,
   * cosine) when it is missing. Safe to call repeatedly.
   *
   * @returns true when this call created the collection.
   */
  public async ensureSchema(): Promise<boolean> {
    if (await this.store.collectionExists()) {
      if (this.verbose) console.error(`[MCP][verbose] Collection '${this.store.collection}' present`);
      return false;
    }
    await this.store.createCollection(this.dimension);
    console.error(
      `[MCP] Created collection '${this.store.collection}' (dim=${this.dimension}, similarity=cosine)`,
    );
    return true;
  }
}
