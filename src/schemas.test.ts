import { describe, expect, test } from "vitest";
import { ValidationError } from "./errors.js";
import { BudgetInput, ExpenseInput, KeywordsInput, ListQuery, parseInput, toAmount, toExpenseRecord } from "./schemas.js";

describe("toAmount", () => {
  test("keeps numbers and numeric strings", () => {
    expect(toAmount(12.5)).toBe(12.5);
    expect(toAmount(" -3.25 ")).toBe(-3.25);
  });

  test("maps missing or non-numeric values to zero", () => {
    expect(toAmount(undefined)).toBe(0);
    expect(toAmount(null)).toBe(0);
    expect(toAmount("")).toBe(0);
    expect(toAmount("twelve")).toBe(0);
    expect(toAmount(Number.NaN)).toBe(0);
    expect(toAmount({})).toBe(0);
  });
});

describe("schemas", () => {
  test("expense input defaults the amount and date", () => {
    const input = parseInput(ExpenseInput, { merchant: "Uber" });
    expect(input.amount).toBe(0);
    expect(toExpenseRecord(input, new Date("2025-01-02T03:04:05.000Z"))).toEqual({
      timestamp: "2025-01-02T03:04:05.000Z",
      amount: 0,
      merchant: "Uber",
      note: "",
    });
  });

  test("expense input treats a null date as missing", () => {
    const input = parseInput(ExpenseInput, { date: null, amount: 5, merchant: "Uber" });
    expect(toExpenseRecord(input, new Date("2025-01-02T03:04:05.000Z")).timestamp).toBe(
      "2025-01-02T03:04:05.000Z",
    );
  });

  test("budget input rejects negative amounts and blank categories", () => {
    expect(() => parseInput(BudgetInput, { category: "Food", amount: -1 })).toThrow(ValidationError);
    expect(() => parseInput(BudgetInput, { category: "  ", amount: 5 })).toThrow(
      "category: category must not be empty",
    );
    expect(parseInput(BudgetInput, { category: " Food ", amount: "75.5" })).toEqual({
      category: "Food",
      amount: 75.5,
    });
  });

  test("keywords input accepts strings or arrays", () => {
    expect(parseInput(KeywordsInput, { category: "Pets" }).keywords).toBe("");
    expect(parseInput(KeywordsInput, { category: "Pets", keywords: ["vet"] }).keywords).toEqual(["vet"]);
  });

  test("list query coerces and bounds the limit", () => {
    expect(parseInput(ListQuery, { limit: "5" })).toEqual({ limit: 5 });
    expect(parseInput(ListQuery, {})).toEqual({ limit: 200 });
    expect(() => parseInput(ListQuery, { limit: "0" })).toThrow(ValidationError);
  });

  test("list query drops an empty category filter", () => {
    expect(parseInput(ListQuery, { category: "" }).category).toBeUndefined();
    expect(parseInput(ListQuery, { category: "  " }).category).toBeUndefined();
    expect(parseInput(ListQuery, { category: " Food " }).category).toBe("Food");
  });
});
