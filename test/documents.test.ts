import { describe, it, expect } from "vitest";
import { NotFoundError } from "../src/errors";
import { createTestService, RecordingEmbeddings } from "./helpers";

describe("DocumentService via RetrievalService", () => {
  it("ingest returns one id per text, in order, and stores shared metadata", async () => {
    const { service } = createTestService();
    const ids = await service.ingest(["first", "second", "third"], { lang: "en" });
    expect(ids).toHaveLength(3);
    expect(new Set(ids).size).toBe(3);
    for (const id of ids) expect(id).toMatch(/^[0-9a-f-]{36}$/);

    const texts = await Promise.all(ids.map(async (id) => (await service.get(id)).text));
    expect(texts).toEqual(["first", "second", "third"]);
    expect((await service.get(ids[1])).metadata).toEqual({ lang: "en" });
  });

  it("ingest defaults metadata to an empty object and creates the collection", async () => {
    const { service, store } = createTestService();
    expect(await store.collectionExists()).toBe(false);
    const [id] = await service.ingest(["no metadata"]);
    expect(await store.collectionExists()).toBe(true);
    expect((await service.get(id)).metadata).toEqual({});
  });

  it("makes ingested documents searchable before returning", async () => {
    const { service } = createTestService();
    const [id] = await service.ingest(["visible immediately"]);
    const hits = await service.searchLexical("visible", 5);
    expect(hits.map((h) => h.id)).toEqual([id]);
  });

  it("aborts a batch at the failing text and keeps earlier documents searchable", async () => {
    const embeddings = new RecordingEmbeddings();
    embeddings.failOn = "bad";
    const { service } = createTestService(embeddings);

    await expect(service.ingest(["good one", "bad", "never reached"])).rejects.toMatchObject({
      kind: "EmbeddingError",
    });
    expect(embeddings.calls).toEqual(["good one", "bad"]);

    const hits = await service.searchLexical("good", 5);
    expect(hits.map((h) => h.text)).toEqual(["good one"]);
    expect(await service.searchLexical("reached", 5)).toEqual([]);
  });

  it("update with only metadata keeps the text and still re-embeds", async () => {
    const embeddings = new RecordingEmbeddings();
    const { service } = createTestService(embeddings);
    const [id] = await service.ingest(["keep me"], { v: 1 });
    const before = await service.get(id);

    const updated = await service.update(id, { metadata: { v: 2 } });
    expect(updated).toMatchObject({ id, text: "keep me", metadata: { v: 2 } });
    expect(embeddings.calls).toEqual(["keep me", "keep me"]);
    expect((await service.get(id)).embedding).toEqual(before.embedding);
  });

  it("update with only text keeps the metadata and replaces the embedding", async () => {
    const { service } = createTestService();
    const [id] = await service.ingest(["hello world"], { lang: "en" });
    const before = await service.get(id);

    await service.update(id, { text: "goodbye" });
    const after = await service.get(id);
    expect(after.text).toBe("goodbye");
    expect(after.metadata).toEqual({ lang: "en" });
    expect(after.embedding).not.toEqual(before.embedding);
  });

  it("update replaces metadata wholesale rather than merging", async () => {
    const { service } = createTestService();
    const [id] = await service.ingest(["doc"], { a: 1, b: 2 });
    await service.update(id, { metadata: { c: 3 } });
    expect((await service.get(id)).metadata).toEqual({ c: 3 });
  });

  it("update and delete on an unknown id fail with NotFound", async () => {
    const { service } = createTestService();
    await expect(service.update("missing", { text: "x" })).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.delete("missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.get("missing")).rejects.toMatchObject({ kind: "NotFound", id: "missing" });
  });

  it("delete removes the document from search and a second delete is NotFound", async () => {
    const { service } = createTestService();
    const [id, other] = await service.ingest(["delete me please", "delete me later"]);
    await service.delete(id);

    for (const hits of [
      await service.searchLexical("delete", 5),
      await service.searchSemantic("delete me please", 5),
      await service.searchHybrid("delete me please", 5),
    ]) {
      expect(hits.map((h) => h.id)).toEqual([other]);
    }
    await expect(service.delete(id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("counts lifecycle operations in the status", async () => {
    const { service } = createTestService();
    const [id] = await service.ingest(["a", "b"]);
    await service.update(id, { text: "c" });
    await service.delete(id);
    expect(service.status.getStatus().counters).toMatchObject({
      documentsIngested: 2,
      documentsUpdated: 1,
      documentsDeleted: 1,
    });
  });
});
