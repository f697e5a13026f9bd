import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import { apiRouter, handleError } from "./api/routes.js";
import type { Config } from "./config.js";
import { log } from "./logger.js";
import { createMcpServer, SERVER_NAME, SERVER_VERSION } from "./mcp/server.js";
import { HttpTransport } from "./mcp/transport.js";
import { auditLog } from "./middleware/audit.js";
import { rateLimit } from "./middleware/rate-limit.js";

interface McpSession {
  server: ReturnType<typeof createMcpServer>;
  transport: HttpTransport;
  lastAccess: number;
}

const SESSION_IDLE_MS = 30 * 60_000;

/**
 * Build the HTTP application: health check, MCP endpoint and REST API.
 * `stop()` closes every open MCP session.
 */
export function createHttpApp(config: Config): { app: Hono; stop: () => Promise<void> } {
  const app = new Hono();
  const sessions = new Map<string, McpSession>();

  // ── Middleware ──
  app.use(logger((message) => log.debug(message)));
  app.use(auditLog());
  app.use(
    cors({
      origin: config.server.corsOrigins.includes("*") ? "*" : config.server.corsOrigins,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Mcp-Session-Id"],
      exposeHeaders: [
        "Mcp-Session-Id",
        "X-RateLimit-Limit",
        "X-RateLimit-Remaining",
      ],
    })
  );
  app.onError(handleError);

  // ── Health check ──
  app.get("/health", (c) =>
    c.json({ status: "ok", server: SERVER_NAME, version: SERVER_VERSION })
  );

  // ── MCP endpoint ──
  const closeSession = async (id: string, session: McpSession) => {
    sessions.delete(id);
    await session.server.close();
  };

  const sweep = setInterval(() => {
    const cutoff = Date.now() - SESSION_IDLE_MS;
    for (const [id, session] of sessions) {
      if (session.lastAccess < cutoff) {
        closeSession(id, session).catch((err: unknown) =>
          log.warn("failed to close idle session", { id, error: String(err) })
        );
      }
    }
  }, 5 * 60_000);
  sweep.unref();

  app.post("/mcp", rateLimit({ rpm: config.rateLimit.rpm }), async (c) => {
    const parsed = JSONRPCMessageSchema.safeParse(await c.req.json().catch(() => null));
    if (!parsed.success) {
      return c.json(
        {
          jsonrpc: "2.0",
          id: null,
          error: { code: -32700, message: "Invalid JSON-RPC message" },
        },
        400
      );
    }

    const sessionId = c.req.header("mcp-session-id");
    const existing = sessionId ? sessions.get(sessionId) : undefined;

    let transport: HttpTransport;
    let newSessionId: string | undefined;

    if (existing) {
      transport = existing.transport;
      existing.lastAccess = Date.now();
    } else {
      newSessionId = randomUUID();
      const mcpServer = createMcpServer();
      transport = new HttpTransport();
      await mcpServer.connect(transport);
      sessions.set(newSessionId, {
        server: mcpServer,
        transport,
        lastAccess: Date.now(),
      });
      log.info("mcp session opened", { sessionId: newSessionId });
    }

    const response = await transport.handleJsonRpc(parsed.data);

    if (newSessionId) {
      c.header("mcp-session-id", newSessionId);
    }
    if (response === null) {
      return c.body(null, 202);
    }
    return c.json(response);
  });

  // ── REST API ──
  // One limiter shared by both mounts; registered after /health and /mcp,
  // which answer before reaching it.
  const rest = new Hono();
  rest.use(rateLimit({ rpm: config.rateLimit.rpm }));
  rest.route("/", apiRouter);
  app.route("/api/v1", rest);
  app.route("/", rest);

  return {
    app,
    stop: async () => {
      clearInterval(sweep);
      await Promise.all([...sessions].map(([id, s]) => closeSession(id, s)));
    },
  };
}
