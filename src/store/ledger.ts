import Database from "better-sqlite3";
import {
  categorize,
  createKeywordIndex,
  DEFAULT_KEYWORDS,
  normalizeCategory,
  parseKeywordList,
  type Budgets,
  type KeywordIndex,
  type Transaction,
} from "../analysis/index.js";
import { log } from "../logger.js";

// ── Types ───────────────────────────────────────────────────────────────────

export interface ExpenseRecordInput {
  timestamp: string;
  amount: number;
  merchant: string;
  note: string;
}

export interface StoredExpense extends Transaction {
  id: number;
  timestamp: string;
  merchant: string;
  note: string;
  /** Category assigned when the row was written or last re-categorised */
  category: string;
}

export interface LedgerSnapshot {
  transactions: StoredExpense[];
  index: KeywordIndex;
  budgets: Budgets;
}

interface ExpenseRow {
  id: number;
  date: string;
  amount: number;
  merchant: string | null;
  note: string | null;
  category: string;
}

interface KeywordRow {
  category: string;
  keywords: string | null;
}

interface BudgetRow {
  category: string;
  amount: number;
}

// ── Database singleton ──────────────────────────────────────────────────────

let db: Database.Database | null = null;

export function initLedgerStore(dbPath = "pocket-pilot.db"): void {
  db?.close();
  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");

  db.exec(`
    CREATE TABLE IF NOT EXISTS expenses (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      date TEXT NOT NULL,
      amount REAL NOT NULL,
      merchant TEXT,
      note TEXT,
      category TEXT NOT NULL
    )
  `);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_expenses_date ON expenses(date)`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_expenses_category ON expenses(category)`);

  db.exec(`
    CREATE TABLE IF NOT EXISTS keywords (
      category TEXT PRIMARY KEY,
      keywords TEXT NOT NULL DEFAULT '',
      position INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS budgets (
      category TEXT PRIMARY KEY,
      amount REAL NOT NULL CHECK(amount >= 0)
    )
  `);

  seedKeywords(db);
}

export function closeLedgerStore(): void {
  db?.close();
  db = null;
}

function getDb(): Database.Database {
  if (!db) {
    throw new Error("Ledger store not initialized. Call initLedgerStore() first.");
  }
  return db;
}

function seedKeywords(store: Database.Database): void {
  const count = store
    .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM keywords")
    .get();
  if (count && count.n > 0) return;

  const insert = store.prepare<[string, string, number]>(
    "INSERT INTO keywords (category, keywords, position) VALUES (?, ?, ?)",
  );
  store.transaction(() => {
    DEFAULT_KEYWORDS.forEach((entry, i) => {
      insert.run(entry.category, entry.keywords.join(","), i);
    });
  })();
  log.info("seeded default keywords", { categories: DEFAULT_KEYWORDS.length });
}

// ── Expenses ────────────────────────────────────────────────────────────────

/** Store one expense with the category the current index assigns. */
export function addExpense(
  input: ExpenseRecordInput,
  index: KeywordIndex,
): StoredExpense {
  const store = getDb();
  const category = categorize(input, index);

  const result = store
    .prepare<[string, number, string, string, string]>(
      `INSERT INTO expenses (date, amount, merchant, note, category) VALUES (?, ?, ?, ?, ?)`,
    )
    .run(input.timestamp, input.amount, input.merchant, input.note, category);

  return { id: Number(result.lastInsertRowid), ...input, category };
}

/** Store many expenses in one transaction. Returns the number written. */
export function addExpenses(
  inputs: readonly ExpenseRecordInput[],
  index: KeywordIndex,
): number {
  const store = getDb();
  const insertAll = store.transaction((rows: readonly ExpenseRecordInput[]) => {
    for (const row of rows) addExpense(row, index);
    return rows.length;
  });
  return insertAll(inputs);
}

export function listExpenses(
  options: { category?: string; limit?: number } = {},
): StoredExpense[] {
  const store = getDb();
  const limit = options.limit ?? 200;

  const rows = options.category
    ? store
        .prepare<[string, number], ExpenseRow>(
          "SELECT * FROM expenses WHERE category = ? ORDER BY date DESC, id DESC LIMIT ?",
        )
        .all(options.category, limit)
    : store
        .prepare<[number], ExpenseRow>(
          "SELECT * FROM expenses ORDER BY date DESC, id DESC LIMIT ?",
        )
        .all(limit);

  return rows.map(toExpense);
}

/** Every expense, oldest first. */
export function allExpenses(): StoredExpense[] {
  return getDb()
    .prepare<[], ExpenseRow>("SELECT * FROM expenses ORDER BY date ASC, id ASC")
    .all()
    .map(toExpense);
}

function toExpense(row: ExpenseRow): StoredExpense {
  return {
    id: row.id,
    timestamp: row.date,
    amount: row.amount,
    merchant: row.merchant ?? "",
    note: row.note ?? "",
    category: row.category,
  };
}

// ── Keywords ────────────────────────────────────────────────────────────────

export function getKeywordIndex(fallback: string): KeywordIndex {
  const rows = getDb()
    .prepare<[], KeywordRow>(
      "SELECT category, keywords FROM keywords ORDER BY position ASC, category ASC",
    )
    .all();
  return createKeywordIndex(
    rows.map((r) => ({ category: r.category, keywords: r.keywords ?? "" })),
    fallback,
  );
}

/**
 * Replace one category's keywords and re-categorise stored expenses
 * against the new index.
 */
export function setCategoryKeywords(
  category: string,
  keywords: readonly string[] | string,
  fallback: string,
): { index: KeywordIndex; recategorized: number } {
  const store = getDb();
  const name = normalizeCategory(category);
  const cleaned = parseKeywordList(keywords).join(",");

  return store.transaction(() => {
    store
      .prepare<[string, string]>(
        `INSERT INTO keywords (category, keywords, position)
         VALUES (?, ?, (SELECT COALESCE(MAX(position), -1) + 1 FROM keywords))
         ON CONFLICT(category) DO UPDATE SET keywords = excluded.keywords`,
      )
      .run(name, cleaned);

    const index = getKeywordIndex(fallback);
    const recategorized = recategorizeExpenses(index);
    log.info("keywords updated", { category: name, recategorized });
    return { index, recategorized };
  })();
}

/** Refresh the cached category of every stored expense. */
export function recategorizeExpenses(index: KeywordIndex): number {
  const store = getDb();
  const update = store.prepare<[string, number]>(
    "UPDATE expenses SET category = ? WHERE id = ?",
  );

  let changed = 0;
  for (const row of allExpenses()) {
    const category = categorize(row, index);
    if (category !== row.category) {
      update.run(category, row.id);
      changed++;
    }
  }
  return changed;
}

// ── Budgets ─────────────────────────────────────────────────────────────────

export function getBudgets(): Map<string, number> {
  const rows = getDb()
    .prepare<[], BudgetRow>("SELECT category, amount FROM budgets ORDER BY category ASC")
    .all();
  return new Map(rows.map((r): [string, number] => [r.category, r.amount]));
}

export function getBudget(category: string): number | undefined {
  return getDb()
    .prepare<[string], BudgetRow>("SELECT category, amount FROM budgets WHERE category = ?")
    .get(normalizeCategory(category))?.amount;
}

/** Set a category's budget. The latest write wins. */
export function setBudget(category: string, amount: number): { category: string; amount: number } {
  const name = normalizeCategory(category);
  getDb()
    .prepare<[string, number]>(
      `INSERT INTO budgets (category, amount) VALUES (?, ?)
       ON CONFLICT(category) DO UPDATE SET amount = excluded.amount`,
    )
    .run(name, amount);
  return { category: name, amount };
}

// ── Snapshot ────────────────────────────────────────────────────────────────

/**
 * Read expenses, keywords and budgets in one transaction so a single
 * evaluation sees one consistent state.
 */
export function loadSnapshot(fallback: string): LedgerSnapshot {
  const store = getDb();
  return store.transaction(() => ({
    transactions: allExpenses(),
    index: getKeywordIndex(fallback),
    budgets: getBudgets(),
  }))();
}
