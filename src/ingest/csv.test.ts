import { describe, expect, test } from "vitest";
import { EmptyCsvError } from "../errors.js";
import { parseExpenseCsv } from "./csv.js";

const NOW = new Date("2025-06-01T10:00:00.000Z");

describe("parseExpenseCsv", () => {
  test("reads the standard columns", () => {
    const rows = parseExpenseCsv("date,amount,merchant\n2025-01-15,12.50,Starbucks\n", NOW);
    expect(rows).toEqual([
      { timestamp: "2025-01-15", amount: 12.5, merchant: "Starbucks", note: "" },
    ]);
  });

  test("matches alternative headers case-insensitively", () => {
    const rows = parseExpenseCsv(
      " Transaction_Date , VALUE ,Description\n2025-02-01, 40 , Uber Trip \n",
      NOW,
    );
    expect(rows).toEqual([
      { timestamp: "2025-02-01", amount: 40, merchant: "Uber Trip", note: "" },
    ]);
  });

  test("defaults missing dates and unreadable amounts", () => {
    const rows = parseExpenseCsv("date,amount,merchant\n,abc,Shop\n2025-03-03,,Kiosk\n", NOW);
    expect(rows).toEqual([
      { timestamp: "2025-06-01T10:00:00.000Z", amount: 0, merchant: "Shop", note: "" },
      { timestamp: "2025-03-03", amount: 0, merchant: "Kiosk", note: "" },
    ]);
  });

  test("skips blank lines and tolerates short rows", () => {
    const rows = parseExpenseCsv("date,amount,merchant\n\n2025-01-01,5\n   \n", NOW);
    expect(rows).toEqual([{ timestamp: "2025-01-01", amount: 5, merchant: "", note: "" }]);
  });

  test("handles quoted fields with commas", () => {
    const rows = parseExpenseCsv('date,amount,merchant\n2025-01-01,7,"Cafe, Corner"\n', NOW);
    expect(rows[0]!.merchant).toBe("Cafe, Corner");
  });

  test("rejects an empty file", () => {
    expect(() => parseExpenseCsv("", NOW)).toThrow(EmptyCsvError);
  });
});
