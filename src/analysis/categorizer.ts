// ── Categorizer ─────────────────────────────────────────────────────
// Derives a transaction's category from its merchant and note text.

import { categoryFor, type KeywordIndex } from "./keywords.js";

export interface CategorizableText {
  merchant?: string | null;
  note?: string | null;
}

export function matchText(tx: CategorizableText): string {
  return [tx.merchant, tx.note]
    .filter((part): part is string => !!part)
    .join(" ")
    .toLowerCase();
}

/**
 * Categorise a transaction against the given index snapshot.
 * Nothing is cached, so the result always reflects the index passed in.
 */
export function categorize(tx: CategorizableText, index: KeywordIndex): string {
  return categoryFor(index, matchText(tx));
}
