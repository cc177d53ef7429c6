// src/ai/planners/restockPlanner.ts
import type { CatalogCandidate } from "../../types";
import { decodeRestock, type RestockResult, type StockLine } from "../results";
import { candidatesForPrompt, JSON_ONLY, type Generate } from "./shared";

const SYSTEM_PROMPT = `
You plan the weekly restock for a small restaurant.

Given the low-stock items and a catalog sample with prices and categories, decide how
much of each item to buy (at least enough to get back above its safety stock level)
and which catalog product to buy it as.

Return JSON:
{
  "narrative": "<short story-style explanation>",
  "restock_plan": [
    {
      "product_name": "<inventory item>",
      "needed_qty": <int>,
      "recommended_supplier": "<catalog title or supplier>",
      "price_estimate": <number>
    }
  ]
}
${JSON_ONLY}
`.trim();

export async function generateRestockPlan(
  generate: Generate,
  input: { low_stock: StockLine[]; candidates: CatalogCandidate[] }
): Promise<RestockResult> {
  const raw = await generate([
    { role: "system", content: SYSTEM_PROMPT },
    {
      role: "user",
      content: [
        `Low-stock inventory: ${JSON.stringify(input.low_stock, null, 2)}`,
        `Catalog sample: ${JSON.stringify(candidatesForPrompt(input.candidates), null, 2)}`,
        "Create the weekly restock plan.",
      ].join("\n\n"),
    },
  ]);
  return decodeRestock(raw);
}
