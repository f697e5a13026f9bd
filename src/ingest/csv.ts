import Papa from "papaparse";
import { EmptyCsvError } from "../errors.js";
import type { ExpenseRecordInput } from "../store/ledger.js";
import { toAmount } from "../schemas.js";

type CsvRow = Record<string, string | undefined>;

/**
 * Read expenses from a CSV export.
 *
 * Headers are matched case-insensitively: `date` or `transaction_date`,
 * `amount` or `value`, `merchant` or `description`. Rows without a date
 * are stamped with `now`; missing or non-numeric amounts count as 0.
 */
export function parseExpenseCsv(
  text: string,
  now: Date = new Date(),
): ExpenseRecordInput[] {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (h) => h.trim().toLowerCase(),
  });

  const fields = parsed.meta.fields ?? [];
  if (fields.length === 0 || fields.every((f) => !f)) {
    throw new EmptyCsvError();
  }

  return parsed.data.map((row) => {
    const cell = (name: string) => (row[name] ?? "").trim();
    return {
      timestamp: cell("date") || cell("transaction_date") || now.toISOString(),
      amount: toAmount(cell("amount") || cell("value")),
      merchant: cell("merchant") || cell("description"),
      note: "",
    };
  });
}
