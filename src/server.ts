import { z } from "zod";
import { APP_VERSION } from "./config";
import { attempt, type RetrievalError } from "./errors";
import type { FileIngestor } from "./indexer";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Server,
  type CallToolResult,
  type Tool,
} from "./mcp-sdk";
import type { RetrievalService } from "./service";
import { metadataSchema, type SearchMode } from "./types";

export interface ServerContext {
  service: RetrievalService;
  /** Default `top_k` for searches that omit it. */
  defaultTopK: number;
  /** Enables the `ingest_files` tool. */
  ingestor?: FileIngestor;
}

// Tool argument schemas
const ingestArgs = z.object({
  texts: z.array(z.string()).min(1),
  metadata: metadataSchema.nullish(),
});
const updateArgs = z.object({
  id: z.string().min(1),
  text: z.string().nullish(),
  metadata: metadataSchema.nullish(),
});
const idArgs = z.object({ id: z.string().min(1) });
const searchArgs = z.object({
  query: z.string(),
  top_k: z.number().int().positive().optional(),
});
const ingestFilesArgs = z.object({
  dir: z.string().optional(),
  metadata: metadataSchema.nullish(),
});

const SEARCH_TOOLS = new Map<string, SearchMode>([
  ["search_lexical", "lexical"],
  ["search_semantic", "semantic"],
  ["search_hybrid", "hybrid"],
]);

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown, tool: string): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${tool}: ${detail}`);
  }
  return parsed.data;
}

function jsonResult(payload: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
}

function errorResult(error: RetrievalError): CallToolResult {
  return {
    isError: true,
    content: [
      {
        type: "text",
        text: JSON.stringify({ ok: false, error: error.kind, message: error.message }, null, 2),
      },
    ],
  };
}

/** Run a service call and render its outcome as a tool result. */
async function run<T>(op: () => Promise<T>, render: (value: T) => unknown): Promise<CallToolResult> {
  const outcome = await attempt(op);
  return outcome.ok ? jsonResult(render(outcome.value)) : errorResult(outcome.error);
}

const searchInputSchema = {
  type: "object",
  properties: {
    query: { type: "string", description: "Search text." },
    top_k: {
      type: "number",
      description: "Maximum number of results (positive integer). Defaults to server DEFAULT_TOP_K.",
      minimum: 1,
    },
  },
  required: ["query"],
} satisfies Tool["inputSchema"];

const metadataInputSchema = {
  type: "object",
  description: "Arbitrary JSON metadata stored verbatim with the document.",
  additionalProperties: true,
};

function listTools(ctx: ServerContext): Tool[] {
  const tools: Tool[] = [
    {
      name: "create_index",
      description: "Ensure the document collection exists (idempotent).",
      inputSchema: { type: "object", properties: {} },
    },
    {
      name: "ingest_documents",
      description:
        "Store one document per text with a computed embedding. All texts share the given metadata. Returns the new ids in input order.",
      inputSchema: {
        type: "object",
        properties: {
          texts: { type: "array", items: { type: "string" }, minItems: 1 },
          metadata: metadataInputSchema,
        },
        required: ["texts"],
      },
    },
    {
      name: "update_document",
      description:
        "Replace a document's text and/or metadata. Omitted fields keep their current value; the embedding is always recomputed.",
      inputSchema: {
        type: "object",
        properties: {
          id: { type: "string" },
          text: { type: "string" },
          metadata: metadataInputSchema,
        },
        required: ["id"],
      },
    },
    {
      name: "delete_document",
      description: "Delete a document by id.",
      inputSchema: { type: "object", properties: { id: { type: "string" } }, required: ["id"] },
    },
    {
      name: "get_document",
      description: "Read a document (text and metadata) by id.",
      inputSchema: { type: "object", properties: { id: { type: "string" } }, required: ["id"] },
    },
    {
      name: "search_lexical",
      description: "Keyword (BM25-style) search over document text.",
      inputSchema: searchInputSchema,
    },
    {
      name: "search_semantic",
      description: "Nearest-neighbour search by embedding cosine similarity.",
      inputSchema: searchInputSchema,
    },
    {
      name: "search_hybrid",
      description:
        "Single search combining an optional keyword clause with the nearest-neighbour clause, ranked by the backend's default score combination.",
      inputSchema: searchInputSchema,
    },
    {
      name: "health",
      description: "Backend reachability, collection name and embedding settings.",
      inputSchema: { type: "object", properties: {} },
    },
  ];
  if (ctx.ingestor) {
    tools.push({
      name: "ingest_files",
      description: `Chunk and ingest text files under '${ctx.ingestor.getRoot()}'. Each chunk's metadata gets the file's relative 'path'.`,
      inputSchema: {
        type: "object",
        properties: {
          dir: { type: "string", description: "Directory relative to the ingest root (default '.')." },
          metadata: metadataInputSchema,
        },
      },
    });
  }
  return tools;
}

/**
 * Factory to construct a new MCP Server instance with tool handlers.
 *
 * A fresh server is created per transport session (streamable HTTP may serve
 * several clients); the retrieval service is shared.
 *
 * Argument validation failures are protocol errors (InvalidParams); failures of
 * the operation itself are tool results with `isError: true` and the error kind.
 */
export function createServer(ctx: ServerContext): Server {
  const { service } = ctx;
  const server = new Server(
    { name: "mcp-hybrid-search", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: listTools(ctx) }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const name = req.params.name;
    const args = req.params.arguments ?? {};

    const mode = SEARCH_TOOLS.get(name);
    if (mode) {
      const { query, top_k } = parseArgs(searchArgs, args, name);
      return run(
        () => service.search(mode, query, top_k ?? ctx.defaultTopK),
        (results) => ({ ok: true, type: mode, results }),
      );
    }

    switch (name) {
      case "create_index":
        return run(
          () => service.createSchema(),
          (r) => ({ ok: true, index: r.index, dim: r.dimension, created: r.created }),
        );

      case "ingest_documents": {
        const { texts, metadata } = parseArgs(ingestArgs, args, name);
        return run(
          () => service.ingest(texts, metadata ?? undefined),
          (ids) => ({ ok: true, inserted_count: ids.length, ids }),
        );
      }

      case "update_document": {
        const { id, text, metadata } = parseArgs(updateArgs, args, name);
        return run(
          () => service.update(id, { text: text ?? undefined, metadata: metadata ?? undefined }),
          (doc) => ({ ok: true, id: doc.id, text: doc.text }),
        );
      }

      case "delete_document": {
        const { id } = parseArgs(idArgs, args, name);
        return run(
          () => service.delete(id),
          () => ({ ok: true, deleted_id: id }),
        );
      }

      case "get_document": {
        const { id } = parseArgs(idArgs, args, name);
        return run(
          () => service.get(id),
          (doc) => ({ ok: true, id: doc.id, text: doc.text, metadata: doc.metadata }),
        );
      }

      case "health":
        return run(
          () => service.health(),
          (report) => ({ ok: true, ...report }),
        );

      case "ingest_files": {
        const ingestor = ctx.ingestor;
        if (!ingestor) break;
        const { dir, metadata } = parseArgs(ingestFilesArgs, args, name);
        try {
          ingestor.ensureWithinRoot(dir ?? ".");
        } catch (e) {
          if (e instanceof RangeError) throw new McpError(ErrorCode.InvalidParams, e.message);
          throw e;
        }
        return run(
          () => ingestor.ingestDirectory(dir, metadata ?? undefined),
          (r) => ({ ok: true, files: r.files, chunks: r.chunks, ids: r.ids, skipped: r.skipped }),
        );
      }
    }

    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  });

  return server;
}
