// src/pipeline/inventoryIngest.ts
import type { RoomBroadcaster } from "../realtime/broadcast";
import type { RecordStore } from "../store/recordStore";
import type { InventoryUpsert } from "../types";
import { stripToken, TRIGGERS } from "./triggers";

export const INVENTORY_TEMPLATE = [
  "📦 To update inventory, send one item per line after @inventory:",
  "name, stock, safety_stock",
  "",
  "For example:",
  "@inventory",
  "Tomatoes, 50, 20",
  "Cheese, 10, 5",
].join("\n");

export type ParsedInventory = {
  items: InventoryUpsert[];
  /** Malformed lines, verbatim (trimmed). */
  errors: string[];
};

const INT = /^\d+$/;

/** Upper bound of the `integer` stock columns. */
export const MAX_STOCK = 2_147_483_647;

function stockField(raw: string): number | null {
  if (!INT.test(raw)) return null;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n <= MAX_STOCK ? n : null;
}

/**
 * "name, stock, safety_stock" per line. A line is kept only with exactly three
 * fields, a non-empty name and two integers in 0..MAX_STOCK.
 */
export function parseInventoryLines(text: string): ParsedInventory {
  const items: InventoryUpsert[] = [];
  const errors: string[] = [];

  const lines = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);

  for (const line of lines) {
    const parts = line.split(",").map((p) => p.trim());
    if (parts.length !== 3) {
      errors.push(line);
      continue;
    }
    const [name, stockRaw, safetyRaw] = parts;
    const stock = stockField(stockRaw);
    const safety = stockField(safetyRaw);
    if (!name || stock === null || safety === null) {
      errors.push(line);
      continue;
    }
    items.push({ product_name: name, stock, safety_stock_level: safety });
  }

  return { items, errors };
}

export function formatIngestReply(updated: number, errors: string[]): string {
  const out: string[] = [];
  if (updated > 0) out.push(`✅ Updated ${updated} item(s).`);
  else out.push("No valid inventory lines found.");
  if (errors.length) {
    out.push("⚠️ Could not parse these lines:");
    out.push(...errors);
  }
  return out.join("\n");
}

export type IngestResult = { updated: number; errors: string[]; templateSent: boolean };

export async function ingestInventory(
  deps: { store: RecordStore; broadcaster: RoomBroadcaster },
  cmd: { roomId: number; userId: number; content: string }
): Promise<IngestResult> {
  const body = stripToken(cmd.content, TRIGGERS.inventory);
  if (!body) {
    await deps.broadcaster.postAgentMessage(cmd.roomId, INVENTORY_TEMPLATE);
    return { updated: 0, errors: [], templateSent: true };
  }

  const { items, errors } = parseInventoryLines(body);
  let updated = 0;
  for (const item of items) {
    await deps.store.upsertInventory(cmd.userId, item);
    updated++;
  }

  console.log("[PIPELINE][inventory]", { room_id: cmd.roomId, user_id: cmd.userId, updated, errors: errors.length });
  await deps.broadcaster.postAgentMessage(cmd.roomId, formatIngestReply(updated, errors));
  return { updated, errors, templateSent: false };
}
