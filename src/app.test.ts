import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { z } from "zod";
import { createHttpApp } from "./app.js";
import { loadConfig } from "./config.js";
import { closeLedgerStore, initLedgerStore } from "./store/ledger.js";

let http: ReturnType<typeof createHttpApp>;

function rpc(body: unknown, sessionId?: string) {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (sessionId) headers["mcp-session-id"] = sessionId;
  return http.app.request("/mcp", { method: "POST", headers, body: JSON.stringify(body) });
}

const initialize = {
  jsonrpc: "2.0",
  id: 1,
  method: "initialize",
  params: {
    protocolVersion: "2025-03-26",
    capabilities: {},
    clientInfo: { name: "test-client", version: "0.0.0" },
  },
};

const ToolResponse = z.object({ result: CallToolResultSchema });

async function openSession() {
  const res = await rpc(initialize);
  return res.headers.get("mcp-session-id") ?? undefined;
}

async function callTool(
  sessionId: string | undefined,
  id: number,
  name: string,
  args: Record<string, unknown> = {},
) {
  const res = await rpc(
    { jsonrpc: "2.0", id, method: "tools/call", params: { name, arguments: args } },
    sessionId,
  );
  const { result } = ToolResponse.parse(await res.json());
  const [first] = result.content;
  return {
    isError: result.isError ?? false,
    text: first?.type === "text" ? first.text : "",
  };
}

beforeEach(() => {
  initLedgerStore(":memory:");
  http = createHttpApp(loadConfig({}, []));
});

afterEach(async () => {
  await http.stop();
  closeLedgerStore();
});

describe("GET /health", () => {
  test("reports server name and version", async () => {
    const res = await http.app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      server: "pocket-pilot",
      version: "0.1.0",
    });
  });
});

describe("POST /mcp", () => {
  test("initialize opens a session", async () => {
    const res = await rpc(initialize);
    expect(res.status).toBe(200);
    expect(res.headers.get("mcp-session-id")).toBeTruthy();
    expect(await res.json()).toMatchObject({
      jsonrpc: "2.0",
      id: 1,
      result: { serverInfo: { name: "pocket-pilot", version: "0.1.0" } },
    });
  });

  test("lists ledger tools within a session", async () => {
    const init = await rpc(initialize);
    const sessionId = init.headers.get("mcp-session-id") ?? undefined;

    const ack = await rpc({ jsonrpc: "2.0", method: "notifications/initialized" }, sessionId);
    expect(ack.status).toBe(202);

    const res = await rpc({ jsonrpc: "2.0", id: 2, method: "tools/list" }, sessionId);
    expect(res.headers.get("mcp-session-id")).toBeNull();
    expect(await res.json()).toMatchObject({
      id: 2,
      result: {
        tools: expect.arrayContaining([
          expect.objectContaining({ name: "add_expense" }),
          expect.objectContaining({ name: "get_budget_alerts" }),
        ]),
      },
    });
  });

  test("rejects bodies that are not JSON-RPC", async () => {
    const res = await rpc({ hello: "world" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      id: null,
      error: { code: -32700, message: "Invalid JSON-RPC message" },
    });
  });
});

describe("MCP tools", () => {
  test("records expenses, sets a budget and reports the breach", async () => {
    const sessionId = await openSession();

    const added = await callTool(sessionId, 2, "add_expense", {
      date: "2025-01-10",
      amount: 100,
      merchant: "Starbucks",
    });
    expect(added.isError).toBe(false);
    expect(JSON.parse(added.text)).toMatchObject({ ok: true, category: "Food" });
    await callTool(sessionId, 3, "add_expense", {
      date: "2025-02-12",
      amount: 110,
      merchant: "Cafe Nero",
    });

    const budget = await callTool(sessionId, 4, "set_budget", { category: "Food", amount: 100 });
    expect(JSON.parse(budget.text)).toEqual({ ok: true, category: "Food", amount: 100 });

    const alerts = await callTool(sessionId, 5, "get_budget_alerts");
    expect(alerts.isError).toBe(false);
    expect(JSON.parse(alerts.text)).toEqual([{ category: "Food", predicted: 120, budget: 100 }]);
  });

  test("forecasts from stored expenses", async () => {
    const sessionId = await openSession();
    await callTool(sessionId, 2, "add_expense", { date: "2025-01-10", amount: 100, merchant: "Uber" });
    await callTool(sessionId, 3, "add_expense", { date: "2025-02-10", amount: 110, merchant: "Taxi" });

    const forecast = await callTool(sessionId, 4, "predict_spending", { horizon: 2 });
    expect(JSON.parse(forecast.text)).toEqual({ Transport: [120, 130] });
  });

  test("reports an unknown category as a tool error", async () => {
    const sessionId = await openSession();
    const res = await callTool(sessionId, 2, "get_category_breakdown", { category: "Travel" });
    expect(res).toEqual({ isError: true, text: "Error: Category not found: Travel" });
  });
});

describe("REST API mount", () => {
  test("serves the API under /api/v1", async () => {
    const res = await http.app.request("/api/v1/budgets");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({});
  });

  test("maps service errors to error responses", async () => {
    const res = await http.app.request("/api/v1/budgets/Travel");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "not_found",
      error_description: "Budget not found: Travel",
    });
  });
});

describe("rate limiting", () => {
  test("applies one limit to the API at /api/v1 and at the root", async () => {
    const limited = createHttpApp(loadConfig({ RATE_LIMIT_RPM: "2" }, []));
    try {
      const statuses: number[] = [];
      for (let i = 0; i < 3; i++) {
        statuses.push((await limited.app.request("/keywords")).status);
      }
      expect(statuses).toEqual([200, 200, 429]);

      const versioned = await limited.app.request("/api/v1/keywords");
      expect(versioned.status).toBe(429);
      expect(await versioned.json()).toMatchObject({ error: "rate_limit_exceeded" });

      expect((await limited.app.request("/health")).status).toBe(200);
    } finally {
      await limited.stop();
    }
  });
});
