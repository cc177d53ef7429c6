// src/ai/results.ts
import { z } from "zod";
import type { InventoryItem } from "../types";
import { extractJson, type JsonMap } from "./extractJson";

// ─────────────────────────────────────────────
// Field helpers: every field has a default, bad array entries are dropped
// ─────────────────────────────────────────────

const text = (fallback: string) => z.string().trim().min(1).catch(fallback);

const optionalText = z.string().trim().catch("");

function listOf<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((arr) =>
      arr.flatMap((x) => {
        const r = item.safeParse(x);
        return r.success ? [r.data] : [];
      })
    );
}

const stringList = listOf(z.string().trim().min(1));

// ─────────────────────────────────────────────
// Per-kind item shapes
// ─────────────────────────────────────────────

export const StockLineSchema = z.object({
  product_name: z.string().trim().min(1),
  stock: z.coerce.number().int().nonnegative(),
  safety_stock_level: z.coerce.number().int().nonnegative(),
});
export type StockLine = z.infer<typeof StockLineSchema>;

const DishSchema = z.object({
  name: z.string().trim().min(1),
  ingredients_used: stringList,
  missing_ingredients: stringList,
  suggested_suppliers_needed: stringList,
});
export type Dish = z.infer<typeof DishSchema>;

const RestockLineSchema = z.object({
  product_name: z.string().trim().min(1),
  needed_qty: z.coerce.number().int().nonnegative().catch(0),
  recommended_supplier: optionalText,
  price_estimate: z.coerce.number().nonnegative().nullable().catch(null),
});
export type RestockLine = z.infer<typeof RestockLineSchema>;

const PlanItemSchema = z.object({
  name: z.string().trim().min(1),
  quantity: z.union([z.string(), z.number()]).transform(String).catch(""),
  category: text("Other"),
  notes: optionalText,
});
export type PlanItem = z.infer<typeof PlanItemSchema>;

const AssignedItemSchema = z.object({
  name: z.string().trim().min(1),
  assigned_to: text("Unassigned"),
});

// ─────────────────────────────────────────────
// Tagged union of everything the planners return
// ─────────────────────────────────────────────

export type AnalysisResult = {
  kind: "analysis";
  narrative: string;
  low_stock: StockLine[];
  healthy: StockLine[];
};

export type MenuResult = {
  kind: "menu";
  narrative: string;
  dishes: Dish[];
};

export type RestockResult = {
  kind: "restock";
  narrative: string;
  restock_plan: RestockLine[];
};

export type ProcurementPlanResult = {
  kind: "procurement-plan";
  goal: string;
  summary: string;
  narrative: string;
  items: PlanItem[];
};

export type GroupPlanResult = {
  kind: "group-plan";
  event: string;
  summary: string;
  items: { name: string; assigned_to: string }[];
  timeline: string[];
  narrative: string;
};

export type InviteSuggestionResult = {
  kind: "invite-suggestion";
  suggested_invites: string[];
  missing_roles: string[];
  narrative: string;
};

export type AiResult =
  | AnalysisResult
  | MenuResult
  | RestockResult
  | ProcurementPlanResult
  | GroupPlanResult
  | InviteSuggestionResult;

/** Everything but the tag and the narrative: what goes out as an event's `payload`. */
export function resultData(r: AiResult): Record<string, unknown> {
  const { kind: _kind, narrative: _narrative, ...rest } = r;
  return rest;
}

// When the model ignored the JSON instruction, its prose still beats a canned line.
function narrativeOr(map: JsonMap, raw: string, fallback: string): string {
  const parsed = text(fallback).parse(map.narrative);
  if (parsed !== fallback) return parsed;
  if (Object.keys(map).length === 0 && raw.trim()) return raw.trim();
  return fallback;
}

export function toStockLine(i: InventoryItem): StockLine {
  return { product_name: i.product_name, stock: i.stock, safety_stock_level: i.safety_stock_level };
}

// ─────────────────────────────────────────────
// Decoders (raw model text → typed result)
// ─────────────────────────────────────────────

/** Stock numbers always come from the snapshot, never from the model. */
export function decodeAnalysis(raw: string, snapshot: { low_stock: StockLine[]; healthy: StockLine[] }): AnalysisResult {
  const map = extractJson(raw);
  return {
    kind: "analysis",
    narrative: narrativeOr(map, raw, "Inventory analysis generated."),
    low_stock: snapshot.low_stock,
    healthy: snapshot.healthy,
  };
}

export function decodeMenu(raw: string): MenuResult {
  const map = extractJson(raw);
  return {
    kind: "menu",
    narrative: narrativeOr(map, raw, "Here are some dishes you can make."),
    dishes: listOf(DishSchema).parse(map.dishes),
  };
}

export function decodeRestock(raw: string): RestockResult {
  const map = extractJson(raw);
  return {
    kind: "restock",
    narrative: narrativeOr(map, raw, "Here is your restock plan."),
    restock_plan: listOf(RestockLineSchema).parse(map.restock_plan),
  };
}

export function decodeProcurementPlan(raw: string, inferredGoal: string): ProcurementPlanResult {
  const map = extractJson(raw);
  return {
    kind: "procurement-plan",
    goal: text(inferredGoal).parse(map.goal),
    summary: text("Shopping list generated.").parse(map.summary),
    narrative: narrativeOr(map, raw, "Here is your consolidated shopping plan."),
    items: listOf(PlanItemSchema).parse(map.items),
  };
}

export function decodeGroupPlan(raw: string, goal: string): GroupPlanResult {
  const map = extractJson(raw);
  return {
    kind: "group-plan",
    event: text(goal).parse(map.event ?? map.event_type),
    summary: optionalText.parse(map.summary),
    items: listOf(AssignedItemSchema).parse(map.items),
    timeline: stringList.parse(map.timeline),
    narrative: narrativeOr(map, raw, "Here is your plan!"),
  };
}

/** Only names from `members` survive. */
export function decodeInviteSuggestion(raw: string, members: string[]): InviteSuggestionResult {
  const map = extractJson(raw);
  return {
    kind: "invite-suggestion",
    suggested_invites: stringList.parse(map.suggested_invites).filter((n) => members.includes(n)),
    missing_roles: stringList.parse(map.missing_roles),
    narrative: narrativeOr(map, raw, "Here are some helpful suggestions."),
  };
}

export function decodeGoal(raw: string): string {
  return optionalText.parse(extractJson(raw).goal);
}

export function decodeAssigned(raw: string, members: string[]): string[] {
  return stringList.parse(extractJson(raw).assigned).filter((n) => members.includes(n));
}
