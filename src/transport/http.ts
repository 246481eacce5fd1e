/**
 * HTTP transport bootstrap.
 *
 * Starts an Express application wired to the MCP SDK's
 * `StreamableHTTPServerTransport` in a per-session fashion.
 *
 * Session model:
 *  - A client begins by sending a JSON-RPC `initialize` request to POST /mcp
 *    WITHOUT an `mcp-session-id` header.
 *  - A new transport + MCP Server instance are created; the SDK returns the
 *    generated session id (UUID v4) in the response headers.
 *  - All subsequent requests for that session carry the same `mcp-session-id`.
 *  - When the transport or server closes, the session is evicted.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent). Body must be JSON.
 *  - GET  /mcp    : Streaming / follow-up channel (delegated to transport).
 *  - DELETE /mcp  : Session teardown.
 *  - GET  /health : Backend reachability + collection/embedding settings + status counters.
 *
 * Errors:
 *  - Malformed / out-of-order session usage => 400 with JSON-RPC error (-32000).
 *  - Uncaught internal errors => 500 with JSON-RPC error (-32603).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { isInitializeRequest, type Server, StreamableHTTPServerTransport } from "../mcp-sdk";

export interface HttpTransportOptions {
  port: number;
  host: string;
  /** Explicit host[:port] whitelist; defaults to local-only names. */
  allowedHosts?: string[];
  enableDnsRebindingProtection: boolean;
  /** Body for GET /health. */
  health: () => Promise<unknown>;
}

/**
 * Bootstraps the Express HTTP server & per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` instance for each session.
 * @returns Resolves once the HTTP listener is bound and ready.
 */
export async function startHttpTransport(createServer: () => Server, opts: HttpTransportOptions) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const { port, host } = opts;
  const allowedHosts = opts.allowedHosts ?? [
    ...new Set([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  ];

  /** Active session transports mapped by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  const sessionIdOf = (req: express.Request): string | undefined => {
    const raw = req.headers["mcp-session-id"];
    return Array.isArray(raw) ? raw[0] : raw;
  };

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport: StreamableHTTPServerTransport | undefined = sessionId
        ? transports[sessionId]
        : undefined;

      // Session creation path: only when no header AND the body is a valid initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
          },
          enableDnsRebindingProtection: opts.enableDnsRebindingProtection,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return; // Idempotent guard to avoid recursion.
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          // Detach handler before server.close(): it closes the transport again.
          created.onclose = undefined;
          server.close().catch((e: unknown) => console.error("[MCP] Failed to close session server:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[MCP] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /**
   * Shared handler for GET /mcp and DELETE /mcp where only an existing session
   * is valid.
   */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[MCP] HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", async (_req, res) => {
    try {
      res.json(await opts.health());
    } catch (err) {
      console.error("[MCP] Health check failed:", err);
      res.status(500).json({ ok: false, error: "Health check failed" });
    }
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[MCP] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
