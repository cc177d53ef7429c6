// src/ai/planners/menuGenerator.ts
import type { CatalogCandidate } from "../../types";
import { decodeMenu, type MenuResult, type StockLine } from "../results";
import { candidatesForPrompt, JSON_ONLY, type Generate } from "./shared";

const SYSTEM_PROMPT = `
You are the chef of a small restaurant. Suggest dishes that can be cooked from the
current inventory. Use "catalog_matches" to name what could be bought for anything missing.

Return JSON:
{
  "narrative": "<short explanation>",
  "dishes": [
    {
      "name": "<dish name>",
      "ingredients_used": ["tomatoes", "cheese"],
      "missing_ingredients": ["basil"],
      "suggested_suppliers_needed": ["basil"]
    }
  ]
}
${JSON_ONLY}
`.trim();

export async function generateMenu(
  generate: Generate,
  input: { inventory: StockLine[]; candidates: CatalogCandidate[] }
): Promise<MenuResult> {
  const payload = { inventory: input.inventory, catalog_matches: candidatesForPrompt(input.candidates) };
  const raw = await generate([
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: `Available ingredients:\n${JSON.stringify(payload, null, 2)}\nSuggest dishes.` },
  ]);
  return decodeMenu(raw);
}
