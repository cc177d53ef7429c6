// src/catalog/retrieval.ts
import type { CatalogCandidate } from "../types";
import type { CatalogSearch } from "./catalogSearch";

function errMsg(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * One catalog query per distinct product term, results merged and deduped
 * by title in first-seen order. A failed query counts as zero candidates.
 */
export async function findRelated(
  catalog: CatalogSearch,
  terms: string[],
  limit: number
): Promise<CatalogCandidate[]> {
  const seenTerms = new Set<string>();
  const distinct: string[] = [];
  for (const raw of terms) {
    const t = raw.trim();
    const key = t.toLowerCase();
    if (!t || seenTerms.has(key)) continue;
    seenTerms.add(key);
    distinct.push(t);
  }

  // queries run together; merge order follows the term order
  const batches = await Promise.all(
    distinct.map(async (term) => {
      try {
        return await catalog.search(term, limit);
      } catch (e: unknown) {
        console.warn("[CATALOG][search failed]", { term, error: errMsg(e) });
        return [];
      }
    })
  );

  const seenTitles = new Set<string>();
  const merged: CatalogCandidate[] = [];
  for (const batch of batches) {
    for (const c of batch) {
      if (seenTitles.has(c.title)) continue;
      seenTitles.add(c.title);
      merged.push(c);
    }
  }
  return merged;
}
