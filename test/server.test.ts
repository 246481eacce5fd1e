import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { FileIngestor } from "../src/indexer";
import { CallToolResultSchema, Client, ErrorCode, InMemoryTransport } from "../src/mcp-sdk";
import { createServer } from "../src/server";
import type { RetrievalService } from "../src/service";
import { createTestService } from "./helpers";

/** Parse the JSON text payload of a tool result. */
function payload(result: unknown): { isError: boolean; data: unknown } {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  if (first?.type !== "text") throw new Error("expected text content");
  return { isError: parsed.isError === true, data: JSON.parse(first.text) };
}

const idsPayload = z.object({ ids: z.array(z.string()) });

async function connect(service: RetrievalService, ingestor?: FileIngestor): Promise<Client> {
  const server = createServer({ service, ingestor, defaultTopK: 5 });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: "test-client", version: "0.0.0" });
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  return client;
}

describe("MCP tools", () => {
  let client: Client;
  let service: RetrievalService;

  beforeEach(async () => {
    ({ service } = createTestService());
    client = await connect(service);
  });

  afterEach(async () => {
    await client.close();
  });

  it("lists the document and search tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toEqual([
      "create_index",
      "ingest_documents",
      "update_document",
      "delete_document",
      "get_document",
      "search_lexical",
      "search_semantic",
      "search_hybrid",
      "health",
    ]);
  });

  it("ingests, searches, updates and deletes", async () => {
    const ingest = payload(
      await client.callTool({
        name: "ingest_documents",
        arguments: { texts: ["hello world"], metadata: { lang: "en" } },
      }),
    );
    expect(ingest.data).toMatchObject({ ok: true, inserted_count: 1 });
    const [id] = idsPayload.parse(ingest.data).ids;

    const lexical = payload(
      await client.callTool({ name: "search_lexical", arguments: { query: "hello" } }),
    );
    expect(lexical.data).toMatchObject({
      ok: true,
      type: "lexical",
      results: [{ id, text: "hello world", metadata: { lang: "en" } }],
    });

    const updated = payload(
      await client.callTool({ name: "update_document", arguments: { id, text: "goodbye" } }),
    );
    expect(updated.data).toEqual({ ok: true, id, text: "goodbye" });

    const fetched = payload(await client.callTool({ name: "get_document", arguments: { id } }));
    expect(fetched.data).toEqual({ ok: true, id, text: "goodbye", metadata: { lang: "en" } });

    const deleted = payload(await client.callTool({ name: "delete_document", arguments: { id } }));
    expect(deleted.data).toEqual({ ok: true, deleted_id: id });

    const semantic = payload(
      await client.callTool({ name: "search_semantic", arguments: { query: "goodbye", top_k: 3 } }),
    );
    expect(semantic.data).toEqual({ ok: true, type: "semantic", results: [] });
  });

  it("reports NotFound as a tool error result", async () => {
    const result = payload(
      await client.callTool({ name: "delete_document", arguments: { id: "missing" } }),
    );
    expect(result.isError).toBe(true);
    expect(result.data).toEqual({
      ok: false,
      error: "NotFound",
      message: "Document not found: missing",
    });
  });

  it("rejects invalid arguments with InvalidParams", async () => {
    await expect(
      client.callTool({ name: "search_hybrid", arguments: { query: "x", top_k: 0 } }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
    await expect(
      client.callTool({ name: "ingest_documents", arguments: { texts: [] } }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it("rejects unknown tools", async () => {
    await expect(client.callTool({ name: "ingest_files", arguments: {} })).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });
  });

  it("creates the index and reports health", async () => {
    const created = payload(await client.callTool({ name: "create_index", arguments: {} }));
    expect(created.data).toEqual({ ok: true, index: "test-docs", dim: 16, created: true });

    const health = payload(await client.callTool({ name: "health", arguments: {} }));
    expect(health.data).toEqual({
      ok: true,
      backendReachable: true,
      indexName: "test-docs",
      embeddingDimension: 16,
      embeddingStrategy: "local",
    });
  });
});

describe("ingest_files tool", () => {
  let dir: string;
  let client: Client;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mcp-hybrid-files-"));
    await fs.writeFile(path.join(dir, "notes.md"), "retrieval notes");
    const { service } = createTestService();
    const ingestor = new FileIngestor({
      root: dir,
      allowedExt: ["md"],
      excludedFolders: [],
      target: service,
    });
    client = await connect(service, ingestor);
  });

  afterEach(async () => {
    await client.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("is listed and ingests files under the root", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name)).toContain("ingest_files");

    const result = payload(await client.callTool({ name: "ingest_files", arguments: {} }));
    expect(result.data).toMatchObject({ ok: true, files: 1, chunks: 1, skipped: [] });
  });

  it("rejects directories outside the root", async () => {
    await expect(
      client.callTool({ name: "ingest_files", arguments: { dir: "../elsewhere" } }),
    ).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });
});
