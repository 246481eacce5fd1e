import { APP_VERSION } from "./config";
import type { EmbeddingStrategy, SearchMode } from "./types";

/**
 * Operation counters since process start. All values are monotonic,
 * non‑negative integers updated in-place.
 */
export interface OperationCounters {
  documentsIngested: number;
  documentsUpdated: number;
  documentsDeleted: number;
  searches: Record<SearchMode, number>;
}

/**
 * Mutable in-memory snapshot of server lifecycle + activity.
 * Exposed read-only to external callers via `getStatus()`.
 *
 * ready = true once the backend answered a ping and the collection exists.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Target collection name. */
  indexName: string;
  /** Backend family ("elasticsearch" | "memory"). */
  backend: string;
  /** Backend address (URL or file path). */
  backendLocation: string;
  embeddingStrategy: EmbeddingStrategy | "unknown";
  embeddingModel: string;
  embeddingDimension: number;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  counters: OperationCounters;
}

/**
 * Class wrapper around mutable server status state. One instance is created
 * at startup and handed to every component that reports activity.
 */
export class StatusManager {
  /** Internal mutable status object. */
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      indexName: initial?.indexName ?? "",
      backend: initial?.backend ?? "",
      backendLocation: initial?.backendLocation ?? "",
      embeddingStrategy: initial?.embeddingStrategy ?? "unknown",
      embeddingModel: initial?.embeddingModel ?? "",
      embeddingDimension: initial?.embeddingDimension ?? 0,
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      counters: initial?.counters ?? {
        documentsIngested: 0,
        documentsUpdated: 0,
        documentsDeleted: 0,
        searches: { lexical: 0, semantic: 0, hybrid: 0 },
      },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  /** Mark startup checks as complete (transition ready=false -> true). */
  public markReady() {
    this.data.ready = true;
  }

  public recordIngested() {
    this.data.counters.documentsIngested++;
  }

  public recordUpdated() {
    this.data.counters.documentsUpdated++;
  }

  public recordDeleted() {
    this.data.counters.documentsDeleted++;
  }

  public recordSearch(mode: SearchMode) {
    this.data.counters.searches[mode]++;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  /** JSON serialization helper (returns underlying object). */
  public toJSON() {
    return this.data;
  }
}
