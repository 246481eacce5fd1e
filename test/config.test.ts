import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config";
import { ConfigError } from "../src/errors";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      STORE_BACKEND: "elasticsearch",
      ELASTIC_URL: "http://localhost:9200",
      ELASTIC_INDEX: "documents",
      INDEX_STORE_PATH: undefined,
      EMBEDDING_PROVIDER: "local",
      EMBEDDING_DIM: 64,
      OPENAI_API_KEY: undefined,
      OPENAI_EMBED_MODEL: "text-embedding-3-small",
      DEFAULT_TOP_K: 5,
      CHUNK_SIZE: 800,
      CHUNK_OVERLAP: 120,
      VERBOSE: false,
      MCP_TRANSPORT: "",
      MCP_PORT: 3000,
      HOST: "127.0.0.1",
      ALLOWED_HOSTS: undefined,
      ENABLE_DNS_REBINDING_PROTECTION: true,
    });
  });

  it("accepts strategy aliases", () => {
    expect(loadConfig({ EMBEDDING_PROVIDER: "fake" }).EMBEDDING_PROVIDER).toBe("local");
    expect(loadConfig({ EMBEDDING_PROVIDER: " OpenAI " }).EMBEDDING_PROVIDER).toBe("external");
    expect(loadConfig({ STORE_BACKEND: "memory" }).STORE_BACKEND).toBe("memory");
  });

  it("parses lists, booleans and numbers", () => {
    const config = loadConfig({
      EMBEDDING_DIM: "1536",
      ALLOWED_EXT: "md, txt,,",
      VERBOSE: "yes",
      CHUNK_SIZE: "99999",
      CHUNK_OVERLAP: "0",
      ENABLE_DNS_REBINDING_PROTECTION: "false",
      OPENAI_API_KEY: "  test-secret ",
    });
    expect(config.EMBEDDING_DIM).toBe(1536);
    expect(config.ALLOWED_EXT).toEqual(["md", "txt"]);
    expect(config.VERBOSE).toBe(true);
    expect(config.CHUNK_SIZE).toBe(8000);
    expect(config.CHUNK_OVERLAP).toBe(0);
    expect(config.ENABLE_DNS_REBINDING_PROTECTION).toBe(false);
    expect(config.OPENAI_API_KEY).toBe("test-secret");
  });

  it("rejects an unknown embedding strategy or backend", () => {
    expect(() => loadConfig({ EMBEDDING_PROVIDER: "cohere" })).toThrow(ConfigError);
    expect(() => loadConfig({ STORE_BACKEND: "sqlite" })).toThrow(ConfigError);
  });

  it("rejects a dimension that is not a positive integer", () => {
    expect(() => loadConfig({ EMBEDDING_DIM: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ EMBEDDING_DIM: "12.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ EMBEDDING_DIM: "abc" })).toThrow(ConfigError);
  });
});
