#!/usr/bin/env node
/**
 * Pocket Pilot
 *
 * Expense ledger with keyword categorisation, monthly trend forecasts and
 * budget alerts, served over MCP and a REST API.
 *
 * Usage:
 *   node dist/index.js --transport stdio   # Local MCP client
 *   node dist/index.js --transport http    # HTTP server (MCP + REST) on port 3200
 */

import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { log, setLogLevel } from "./logger.js";
import { createMcpServer } from "./mcp/server.js";
import { closeLedgerStore, initLedgerStore } from "./store/ledger.js";

const config = loadConfig();
setLogLevel(config.logLevel);
initLedgerStore(config.dbPath);

try {
  if (config.server.transport === "stdio") {
    await startStdio();
  } else {
    await startHttp();
  }
} catch (error) {
  log.error("failed to start", { error: errorMessage(error) });
  closeLedgerStore();
  process.exit(1);
}

// ── stdio mode ──────────────────────────────────────────────────────────────

async function startStdio() {
  const { StdioServerTransport } = await import(
    "@modelcontextprotocol/sdk/server/stdio.js"
  );

  const server = createMcpServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("mcp server ready", { transport: "stdio", dbPath: config.dbPath });

  onShutdown(async () => {
    await server.close();
  });
}

// ── HTTP mode ───────────────────────────────────────────────────────────────

async function startHttp() {
  const { serve } = await import("@hono/node-server");
  const { createHttpApp } = await import("./app.js");

  const { app, stop } = createHttpApp(config);
  const port = config.server.port;

  const httpServer = serve({ fetch: app.fetch, port }, (info) => {
    log.info("http server listening", {
      url: `http://localhost:${info.port}`,
      mcp: "POST /mcp",
      api: "/api/v1",
      health: "GET /health",
    });
  });

  onShutdown(async () => {
    await stop();
    await new Promise<void>((resolve, reject) =>
      httpServer.close((err) => (err ? reject(err) : resolve()))
    );
  });
}

function onShutdown(close: () => Promise<void>) {
  const shutdown = (signal: string) => {
    log.info("shutting down", { signal });
    close()
      .catch((error: unknown) => log.error("shutdown failed", { error: errorMessage(error) }))
      .finally(() => {
        closeLedgerStore();
        process.exit(0);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}
