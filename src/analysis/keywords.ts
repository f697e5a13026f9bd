// ── Keyword Index ───────────────────────────────────────────────────
// Ordered category → keyword snapshot used to categorise free text.
// Snapshots are immutable: updates return a new index.

export interface CategoryKeywords {
  category: string;
  keywords: readonly string[];
}

export interface KeywordIndex {
  /** Categories in configuration order. First match wins. */
  readonly categories: readonly CategoryKeywords[];
  /** Returned when no keyword matches. Never takes part in the scan. */
  readonly fallback: string;
}

export const DEFAULT_FALLBACK_CATEGORY = "Others";

export const DEFAULT_KEYWORDS: readonly CategoryKeywords[] = [
  {
    category: "Food",
    keywords: ["starbucks", "cafe", "restaurant", "ubereats", "zomato", "dominos", "mcdonald"],
  },
  {
    category: "Transport",
    keywords: ["uber", "ola", "metro", "bus", "taxi", "fuel", "petrol"],
  },
  {
    category: "Groceries",
    keywords: ["bigbasket", "grocery", "supermarket", "reliance", "dmart"],
  },
  {
    category: "Bills",
    keywords: ["electricity", "water", "bill", "netflix", "spotify", "subscription"],
  },
  { category: "Rent", keywords: ["rent"] },
  { category: "Salary", keywords: ["salary", "payroll", "direct deposit"] },
  { category: "Entertainment", keywords: ["movie", "concert", "theatre"] },
  { category: DEFAULT_FALLBACK_CATEGORY, keywords: [] },
];

/**
 * Build a snapshot from configuration entries.
 *
 * A repeated category replaces the earlier entry but keeps its position.
 */
export function createKeywordIndex(
  entries: Iterable<{ category: string; keywords: Iterable<string> | string }>,
  fallback: string = DEFAULT_FALLBACK_CATEGORY,
): KeywordIndex {
  const ordered = new Map<string, string[]>();
  for (const entry of entries) {
    const category = normalizeCategory(entry.category);
    if (!category) continue;
    ordered.set(category, parseKeywordList(entry.keywords));
  }

  const fallbackName = normalizeCategory(fallback) || DEFAULT_FALLBACK_CATEGORY;
  if (!ordered.has(fallbackName)) {
    ordered.set(fallbackName, []);
  }

  return {
    categories: [...ordered].map(([category, keywords]) => ({
      category,
      keywords,
    })),
    fallback: fallbackName,
  };
}

/**
 * Find the category for a piece of text.
 *
 * Categories are tried in index order and the fallback is only returned
 * once every other category has failed to match.
 */
export function categoryFor(index: KeywordIndex, text: string): string {
  const haystack = text.toLowerCase();

  for (const { category, keywords } of index.categories) {
    if (category === index.fallback) continue;
    for (const kw of keywords) {
      if (kw && haystack.includes(kw)) return category;
    }
  }

  return index.fallback;
}

/** Replace one category's keyword list. Unknown categories are appended. */
export function withCategoryKeywords(
  index: KeywordIndex,
  category: string,
  keywords: Iterable<string> | string,
): KeywordIndex {
  const name = normalizeCategory(category);
  if (!name) return index;

  const replacement: CategoryKeywords = {
    category: name,
    keywords: parseKeywordList(keywords),
  };

  const exists = index.categories.some((c) => c.category === name);
  const categories = exists
    ? index.categories.map((c) => (c.category === name ? replacement : c))
    : [...index.categories, replacement];

  return { categories, fallback: index.fallback };
}

/**
 * Clean a keyword list. Accepts the comma-delimited form (`"uber,taxi"`)
 * or an iterable of keywords.
 */
export function parseKeywordList(input: Iterable<string> | string): string[] {
  const raw = typeof input === "string" ? input.split(",") : [...input];
  const seen = new Set<string>();
  for (const kw of raw) {
    const cleaned = kw.trim().toLowerCase();
    if (cleaned) seen.add(cleaned);
  }
  return [...seen];
}

/** Plain `{ category: keywords }` view, in index order. */
export function keywordMap(index: KeywordIndex): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const { category, keywords } of index.categories) {
    out[category] = [...keywords];
  }
  return out;
}

export function normalizeCategory(name: string): string {
  return name.trim();
}
