import { Hono, type Context } from "hono";
import { errorMessage, PocketPilotError, ValidationError } from "../errors.js";
import { log } from "../logger.js";
import {
  BudgetInput,
  CategorizeInput,
  ExpenseInput,
  HorizonQuery,
  KeywordsInput,
  ListQuery,
  parseInput,
} from "../schemas.js";
import {
  allBudgets,
  budgetFor,
  categorizeText,
  categoryReport,
  currentKeywords,
  findExpenses,
  importExpensesCsv,
  predictSpending,
  recordExpense,
  replaceKeywords,
  spendingSummary,
  updateBudget,
} from "../service.js";

export const apiRouter = new Hono();

// ── Helpers ─────────────────────────────────────────────────────────────────

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new ValidationError("Invalid JSON body.");
  }
}

/** Map thrown errors to `{ error, error_description }` responses. */
export function handleError(err: Error, c: Context) {
  if (err instanceof PocketPilotError) {
    return c.json({ error: err.code, error_description: err.message }, err.status);
  }
  log.error("unhandled request error", {
    method: c.req.method,
    path: c.req.path,
    error: errorMessage(err),
  });
  return c.json({ error: "internal_error", error_description: "Internal server error." }, 500);
}

apiRouter.onError(handleError);

// ── Expenses ────────────────────────────────────────────────────────────────

apiRouter.post("/expenses", async (c) => {
  const input = parseInput(ExpenseInput, await readJson(c));
  const expense = recordExpense(input);
  return c.json({ ok: true, category: expense.category, expense }, 201);
});

apiRouter.get("/expenses", (c) => {
  const query = parseInput(ListQuery, c.req.query());
  return c.json(findExpenses(query));
});

apiRouter.get("/expenses/summary", (c) => {
  const { horizon } = parseInput(HorizonQuery, c.req.query());
  const fillGaps = c.req.query("fill_gaps") === "true";
  return c.json(spendingSummary({ horizon, fillGaps }));
});

apiRouter.get("/expenses/summary/:category", (c) => {
  const { horizon } = parseInput(HorizonQuery, c.req.query());
  return c.json(categoryReport(c.req.param("category"), horizon));
});

// ── Import ──────────────────────────────────────────────────────────────────

apiRouter.post("/import", async (c) => {
  const body = await c.req.parseBody().catch(() => {
    throw new ValidationError("Expected a multipart/form-data body.");
  });

  const file = body["file"];
  if (!file || typeof file === "string" || Array.isArray(file)) {
    return c.json({ error: "invalid_request", error_description: "missing file" }, 400);
  }

  return c.json(importExpensesCsv(await file.text()));
});

// ── Budgets ─────────────────────────────────────────────────────────────────

apiRouter.post("/budgets", async (c) => {
  const { category, amount } = parseInput(BudgetInput, await readJson(c));
  return c.json({ ok: true, ...updateBudget(category, amount) });
});

apiRouter.get("/budgets", (c) => c.json(allBudgets()));

apiRouter.get("/budgets/:category", (c) => c.json(budgetFor(c.req.param("category"))));

// ── Forecasts ───────────────────────────────────────────────────────────────

apiRouter.get("/predict", (c) => {
  const { horizon } = parseInput(HorizonQuery, c.req.query());
  return c.json(predictSpending(horizon));
});

// ── Keywords ────────────────────────────────────────────────────────────────

apiRouter.get("/keywords", (c) => c.json(currentKeywords()));

apiRouter.post("/keywords", async (c) => {
  const { category, keywords } = parseInput(KeywordsInput, await readJson(c));
  return c.json({ ok: true, ...replaceKeywords(category, keywords) });
});

apiRouter.post("/categorize", async (c) => {
  const { merchant, note } = parseInput(CategorizeInput, await readJson(c));
  return c.json({ category: categorizeText(merchant, note) });
});
