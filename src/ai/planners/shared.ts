// src/ai/planners/shared.ts
import type { CatalogCandidate } from "../../types";
import type { Turn } from "../providers";

/** A generation call already bound to the acting user's backend. */
export type Generate = (turns: Turn[]) => Promise<string>;

export type HistoryLine = { author: string; content: string };

export function formatChatHistory(history: HistoryLine[]): string {
  return history.map((m) => `- ${m.author}: ${m.content}`).join("\n");
}

export function candidatesForPrompt(items: CatalogCandidate[], max = 30) {
  return items.slice(0, max).map((c) => ({
    title: c.title,
    category: c.category,
    price: c.price,
    rating: c.rating,
  }));
}

export const JSON_ONLY = "Output ONLY valid JSON. No markdown fences, no commentary outside the JSON.";
