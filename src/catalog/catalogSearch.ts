// src/catalog/catalogSearch.ts
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { CatalogCandidate } from "../types";

export interface CatalogSearch {
  /** Ordered candidates for a term; an empty list is a normal answer. */
  search(term: string, limit: number): Promise<CatalogCandidate[]>;
}

const GroceryRow = z.object({
  title: z.string(),
  sub_category: z.string(),
  price: z.coerce.number(),
  rating_value: z.coerce.number().nullable(),
});

const toCandidate = (r: z.infer<typeof GroceryRow>): CatalogCandidate => ({
  title: r.title,
  category: r.sub_category,
  price: r.price,
  rating: r.rating_value,
});

// ilike wildcards in user text would widen the match
function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/**
 * grocery_items lookup in three tiers:
 *   1. title ILIKE %term%
 *   2. sub_category ILIKE %term%
 *   3. highest rated items
 */
export class SupabaseCatalogSearch implements CatalogSearch {
  constructor(private readonly supa: SupabaseClient) {}

  async search(term: string, limit: number): Promise<CatalogCandidate[]> {
    const pattern = `%${escapeLike(term.trim())}%`;
    const cols = "title, sub_category, price, rating_value";

    const byTitle = await this.supa.from("grocery_items").select(cols).ilike("title", pattern).limit(limit);
    if (byTitle.error) throw new Error(`catalog title lookup: ${byTitle.error.message}`);
    if (byTitle.data?.length) return z.array(GroceryRow).parse(byTitle.data).map(toCandidate);

    const byCategory = await this.supa
      .from("grocery_items")
      .select(cols)
      .ilike("sub_category", pattern)
      .limit(limit);
    if (byCategory.error) throw new Error(`catalog category lookup: ${byCategory.error.message}`);
    if (byCategory.data?.length) return z.array(GroceryRow).parse(byCategory.data).map(toCandidate);

    const topRated = await this.supa
      .from("grocery_items")
      .select(cols)
      .order("rating_value", { ascending: false, nullsFirst: false })
      .limit(limit);
    if (topRated.error) throw new Error(`catalog fallback lookup: ${topRated.error.message}`);
    return z.array(GroceryRow).parse(topRated.data ?? []).map(toCandidate);
  }
}

/** Used when Supabase is not configured: nothing to recommend. */
export class EmptyCatalogSearch implements CatalogSearch {
  async search(): Promise<CatalogCandidate[]> {
    return [];
  }
}
