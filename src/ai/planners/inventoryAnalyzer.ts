// src/ai/planners/inventoryAnalyzer.ts
import type { CatalogCandidate } from "../../types";
import { decodeAnalysis, type AnalysisResult, type StockLine } from "../results";
import { candidatesForPrompt, JSON_ONLY, type Generate } from "./shared";

const SYSTEM_PROMPT = `
You are an inventory analyst for a small restaurant.

Input:
- "low_stock": items below their safety stock level
- "healthy": items at or above their safety stock level
- "catalog_matches": catalog products that may replace the low-stock items

Task:
1. Summarise the inventory status in a few friendly sentences.
2. For each low-stock item, say whether "catalog_matches" has something that can be ordered.
3. Never change any stock number.

Return JSON: {"narrative": "<summary including availability>"}
${JSON_ONLY}
`.trim();

export const RESTOCK_HINT = " If you need a restock plan, type '@gro restock'.";

export async function analyzeInventory(
  generate: Generate,
  input: { low_stock: StockLine[]; healthy: StockLine[]; candidates: CatalogCandidate[] }
): Promise<AnalysisResult> {
  const payload = {
    low_stock: input.low_stock,
    healthy: input.healthy,
    catalog_matches: candidatesForPrompt(input.candidates),
  };

  const raw = await generate([
    { role: "system", content: SYSTEM_PROMPT },
    { role: "user", content: JSON.stringify(payload, null, 2) },
  ]);

  const result = decodeAnalysis(raw, { low_stock: input.low_stock, healthy: input.healthy });
  return input.low_stock.length ? { ...result, narrative: result.narrative + RESTOCK_HINT } : result;
}
