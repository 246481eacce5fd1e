import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import { metadataSchema, type StoredDocument } from "./types";

/**
 * Parameters controlling a load attempt for a previously persisted collection.
 *
 * `collection` and `dimension` must match the metadata found on disk; otherwise
 * the load is treated as incompatible and returns `null` (callers start empty).
 */
export interface LoadParams {
  collection: string;
  dimension: number;
}

export interface SaveParams extends LoadParams {
  docs: ReadonlyMap<string, StoredDocument>;
}

const persistedFileSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    collection: z.string(),
    dimension: z.number(),
    savedAt: z.string().optional(),
    embEncoding: z.literal("f64-base64"),
  }),
  docs: z.array(
    z.object({
      id: z.string(),
      text: z.string(),
      metadata: metadataSchema,
      emb: z.string(),
    }),
  ),
});

/** Encode a vector as base64 little-endian float64 values. */
export function encodeVector(vec: readonly number[]): string {
  const arr = Float64Array.from(vec);
  return Buffer.from(arr.buffer, arr.byteOffset, arr.byteLength).toString("base64");
}

/** Inverse of {@link encodeVector}; `null` if the payload is not whole float64s. */
export function decodeVector(encoded: string): number[] | null {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % 8 !== 0) return null;
  const out: number[] = [];
  for (let off = 0; off < buf.byteLength; off += 8) out.push(buf.readDoubleLE(off));
  return out;
}

/**
 * JSON file persistence for the in-process store. Loading is best-effort (a
 * missing, corrupt or incompatible file means "start empty"); saving errors
 * propagate to the caller.
 */
export class Persistence {
  public constructor(
    private readonly storePath: string,
    private readonly verbose = false,
  ) {}

  public async load(params: LoadParams): Promise<Map<string, StoredDocument> | null> {
    const { collection, dimension } = params;
    if (!fsSync.existsSync(this.storePath)) return null;
    try {
      const raw = await fs.readFile(this.storePath, "utf8");
      const parsed = persistedFileSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        console.error(`[MCP] Ignoring unreadable store at ${this.storePath}:`, parsed.error.message);
        return null;
      }
      const { meta } = parsed.data;
      if (meta.collection !== collection || meta.dimension !== dimension) {
        console.error(
          `[MCP] Stored collection incompatible (name/dimension differ). Starting empty.`,
        );
        return null;
      }
      const docs = new Map<string, StoredDocument>();
      for (const d of parsed.data.docs) {
        const embedding = decodeVector(d.emb);
        if (!embedding || embedding.length !== dimension) continue; // require a valid embedding
        docs.set(d.id, { text: d.text, metadata: d.metadata, embedding });
      }
      console.error(`[MCP] Loaded persisted collection: ${docs.size} documents.`);
      if (this.verbose) console.error(`[MCP][verbose] Loaded from ${this.storePath}`);
      return docs;
    } catch (e) {
      console.error(`[MCP] Failed to load store at ${this.storePath}:`, e);
      return null;
    }
  }

  public async save(params: SaveParams): Promise<void> {
    const { collection, dimension, docs } = params;
    const out = {
      version: 1,
      meta: {
        collection,
        dimension,
        savedAt: new Date().toISOString(),
        embEncoding: "f64-base64",
      },
      docs: Array.from(docs, ([id, d]) => ({
        id,
        text: d.text,
        metadata: d.metadata,
        emb: encodeVector(d.embedding),
      })),
    };
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    await fs.writeFile(this.storePath, JSON.stringify(out));
    if (this.verbose) console.error(`[MCP][verbose] Persisted collection to ${this.storePath}`);
  }
}
