import { LocalHashEmbeddings, type EmbeddingProvider } from "../src/embeddings";
import { EmbeddingError } from "../src/errors";
import { RetrievalService } from "../src/service";
import { InMemoryStore } from "../src/store/memory";
import type { Vector } from "../src/types";

export const TEST_DIM = 16;

export function createTestService(embeddings: EmbeddingProvider = new LocalHashEmbeddings(TEST_DIM)) {
  const store = new InMemoryStore({ collection: "test-docs" });
  const service = new RetrievalService({ store, embeddings });
  return { store, embeddings, service };
}

/**
 * Local hash embeddings that count calls and can be told to fail on a given
 * text.
 */
export class RecordingEmbeddings implements EmbeddingProvider {
  public readonly strategy = "local" as const;
  public readonly modelName = "recording";
  public readonly calls: string[] = [];
  public failOn: string | null = null;
  private readonly inner: LocalHashEmbeddings;

  public constructor(public readonly dimension = TEST_DIM) {
    this.inner = new LocalHashEmbeddings(dimension);
  }

  public async embed(text: string): Promise<Vector> {
    this.calls.push(text);
    if (text === this.failOn) throw new EmbeddingError(`refusing to embed '${text}'`);
    return this.inner.embed(text);
  }
}
