import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError } from "./errors";
import type { EmbeddingStrategy } from "./types";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// When running from src/, resolve ../.env (project root). Otherwise use default.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[MCP] Could not resolve project .env, falling back to cwd:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type StoreBackend = "elasticsearch" | "memory";

export interface Config {
  STORE_BACKEND: StoreBackend;
  ELASTIC_URL: string;
  ELASTIC_INDEX: string;
  INDEX_STORE_PATH: string | undefined;
  EMBEDDING_PROVIDER: EmbeddingStrategy;
  EMBEDDING_DIM: number;
  OPENAI_API_KEY: string | undefined;
  OPENAI_EMBED_MODEL: string;
  DEFAULT_TOP_K: number;
  INGEST_ROOT: string | undefined;
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  VERBOSE: boolean;
  MCP_TRANSPORT: string;
  MCP_PORT: number;
  HOST: string;
  ALLOWED_HOSTS: string[] | undefined;
  ENABLE_DNS_REBINDING_PROTECTION: boolean;
}

type Env = Record<string, string | undefined>;

function parseList(raw: string | undefined): string[] | undefined {
  return raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

function parsePositiveInt(raw: string | undefined, fallback: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? Math.min(max, Math.floor(n)) : fallback;
}

function parseEmbeddingProvider(raw: string | undefined): EmbeddingStrategy {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v || v === "local" || v === "fake") return "local";
  if (v === "external" || v === "openai") return "external";
  throw new ConfigError(`Unknown EMBEDDING_PROVIDER '${v}' (expected local or external)`);
}

function parseStoreBackend(raw: string | undefined): StoreBackend {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v || v === "elasticsearch" || v === "elastic") return "elasticsearch";
  if (v === "memory") return "memory";
  throw new ConfigError(`Unknown STORE_BACKEND '${v}' (expected elasticsearch or memory)`);
}

function parseDimension(raw: string | undefined): number {
  const v = raw?.trim();
  if (!v) return 64;
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`EMBEDDING_DIM must be a positive integer, got '${v}'`);
  }
  return n;
}

/**
 * Parse and normalize the process configuration. Fixed at startup; every
 * component receives the values it needs explicitly.
 *
 * @throws {ConfigError} On an unknown strategy/backend selector or a bad dimension.
 */
export function loadConfig(env: Env = process.env): Config {
  const STORE_BACKEND = parseStoreBackend(env.STORE_BACKEND);
  const ELASTIC_URL = env.ELASTIC_URL?.trim() || "http://localhost:9200";
  const ELASTIC_INDEX = env.ELASTIC_INDEX?.trim() || "documents";

  // Only read by the memory backend.
  const INDEX_STORE_PATH = env.INDEX_STORE_PATH?.trim() || undefined;

  const EMBEDDING_PROVIDER = parseEmbeddingProvider(env.EMBEDDING_PROVIDER);
  const EMBEDDING_DIM = parseDimension(env.EMBEDDING_DIM);
  // A missing key is reported by the external strategy on first use.
  const OPENAI_API_KEY = env.OPENAI_API_KEY?.trim() || undefined;
  const OPENAI_EMBED_MODEL = env.OPENAI_EMBED_MODEL?.trim() || "text-embedding-3-small";

  const DEFAULT_TOP_K = parsePositiveInt(env.DEFAULT_TOP_K, 5, 1000);

  const INGEST_ROOT = env.INGEST_ROOT?.trim() || undefined;
  const ALLOWED_EXT = parseList(env.ALLOWED_EXT) ?? ["md", "markdown", "txt", "rst", "adoc", "html"];
  const EXCLUDED_FOLDERS = parseList(env.EXCLUDED_FOLDERS) ?? [
    "node_modules",
    "dist",
    "build",
    ".git",
    ".cache",
    "coverage",
  ];

  const CHUNK_SIZE = parsePositiveInt(env.CHUNK_SIZE, 800, 8000);
  // Overlap may legitimately be 0.
  const CHUNK_OVERLAP = (() => {
    const raw = env.CHUNK_OVERLAP?.trim();
    if (!raw) return 120;
    const n = Number(raw);
    return Number.isFinite(n) && n >= 0 ? Math.min(4000, Math.floor(n)) : 120;
  })();

  const VERBOSE = parseBool(env.VERBOSE, false);

  // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();
  const MCP_PORT = parsePositiveInt(env.MCP_PORT, 3000, 65535);
  const HOST = env.HOST?.trim() || "127.0.0.1";
  const ALLOWED_HOSTS = parseList(env.ALLOWED_HOSTS);
  const ENABLE_DNS_REBINDING_PROTECTION = parseBool(env.ENABLE_DNS_REBINDING_PROTECTION, true);

  return {
    STORE_BACKEND,
    ELASTIC_URL,
    ELASTIC_INDEX,
    INDEX_STORE_PATH,
    EMBEDDING_PROVIDER,
    EMBEDDING_DIM,
    OPENAI_API_KEY,
    OPENAI_EMBED_MODEL,
    DEFAULT_TOP_K,
    INGEST_ROOT,
    ALLOWED_EXT,
    EXCLUDED_FOLDERS,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    VERBOSE,
    MCP_TRANSPORT,
    MCP_PORT,
    HOST,
    ALLOWED_HOSTS,
    ENABLE_DNS_REBINDING_PROTECTION,
  };
}
