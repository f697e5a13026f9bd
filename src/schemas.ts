import { z } from "zod";
import { ValidationError } from "./errors.js";

/** Missing or non-numeric amounts become 0. */
export function toAmount(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

const categoryName = z
  .string()
  .trim()
  .min(1, "category must not be empty")
  .max(100);

export const ExpenseInput = z.object({
  date: z.string().trim().nullish(),
  amount: z.unknown().transform(toAmount),
  merchant: z.string().nullish(),
  note: z.string().nullish(),
});
export type ExpenseInput = z.infer<typeof ExpenseInput>;

export const BudgetInput = z.object({
  category: categoryName,
  amount: z.coerce.number().finite().nonnegative(),
});
export type BudgetInput = z.infer<typeof BudgetInput>;

export const KeywordsInput = z.object({
  category: categoryName,
  keywords: z.union([z.string(), z.array(z.string())]).default(""),
});
export type KeywordsInput = z.infer<typeof KeywordsInput>;

export const ListQuery = z.object({
  // An empty filter means "all categories"
  category: z
    .string()
    .trim()
    .optional()
    .transform((v) => v || undefined),
  limit: z.coerce.number().int().min(1).max(1000).default(200),
});
export type ListQuery = z.infer<typeof ListQuery>;

export const HorizonQuery = z.object({
  horizon: z.coerce.number().int().min(1).max(36).optional(),
});

export const CategorizeInput = z.object({
  merchant: z.string().nullish(),
  note: z.string().nullish(),
});

/** Parse with a schema, throwing a ValidationError on failure. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}

export function toExpenseRecord(
  input: ExpenseInput,
  now: Date = new Date(),
): { timestamp: string; amount: number; merchant: string; note: string } {
  return {
    timestamp: input.date || now.toISOString(),
    amount: input.amount,
    merchant: input.merchant ?? "",
    note: input.note ?? "",
  };
}
