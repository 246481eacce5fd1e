/**
 * Application entry point.
 *
 * High‑level flow:
 * 1. Load environment configuration (.env via dotenv, see config.ts).
 * 2. Build the backing store (Elasticsearch or in-process) and the embedding
 *    provider selected by EMBEDDING_PROVIDER.
 * 3. Refuse to start when the backend does not answer; ensure the collection.
 * 4. Start a Model Context Protocol (MCP) server over either:
 *      - STDIO (default): local editor / agent integration.
 *      - Streamable HTTP (MCP_TRANSPORT=http|streamable-http), with GET /health.
 *
 * Exposed tools: create_index, ingest_documents, update_document,
 * delete_document, get_document, search_lexical, search_semantic,
 * search_hybrid, health, and ingest_files when INGEST_ROOT is set.
 *
 * ENVIRONMENT VARIABLES: see `.env.example` and `loadConfig` in config.ts.
 */
import { loadConfig, type Config } from "./config";
import { isRetrievalError } from "./errors";
import { FileIngestor } from "./indexer";
import { createServer } from "./server";
import { createRetrievalService } from "./service";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

try {
  const config: Config = loadConfig();
  const service = await createRetrievalService(config);
  const { embeddings, status } = service;

  console.error(
    `[MCP] Backend ${service.store.kind} at ${service.store.location}, collection '${service.store.collection}'`,
  );
  console.error(
    `[MCP] Embeddings: ${embeddings.strategy} (${embeddings.modelName}, dim=${embeddings.dimension})`,
  );
  if (config.EMBEDDING_PROVIDER === "external" && !config.OPENAI_API_KEY) {
    console.error("[MCP] OPENAI_API_KEY is not set: every embedding call will fail with ConfigError.");
  }

  // Fatal when the backend is unreachable.
  await service.start();

  const ingestor = config.INGEST_ROOT
    ? new FileIngestor({
        root: config.INGEST_ROOT,
        allowedExt: config.ALLOWED_EXT,
        excludedFolders: config.EXCLUDED_FOLDERS,
        chunkSize: config.CHUNK_SIZE,
        chunkOverlap: config.CHUNK_OVERLAP,
        target: service,
        verbose: config.VERBOSE,
      })
    : undefined;

  const factory = () => createServer({ service, ingestor, defaultTopK: config.DEFAULT_TOP_K });

  const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";
  if (useHttp) {
    status.markTransport("http");
    await startHttpTransport(factory, {
      port: config.MCP_PORT,
      host: config.HOST,
      allowedHosts: config.ALLOWED_HOSTS,
      enableDnsRebindingProtection: config.ENABLE_DNS_REBINDING_PROTECTION,
      health: async () => ({ ...(await service.health()), status: status.getStatus() }),
    });
  } else {
    status.markTransport("stdio");
    await startStdioTransport(factory);
  }
} catch (e) {
  const label = isRetrievalError(e) ? e.kind : "Error";
  console.error(`[MCP] Fatal startup error (${label}):`, e);
  process.exit(1);
}
