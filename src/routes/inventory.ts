// src/routes/inventory.ts
import express from "express";
import { z } from "zod";
import type { AppContext } from "../context";
import { MAX_STOCK } from "../pipeline/inventoryIngest";
import { currentUser } from "./_ensureAuth";
import { HttpError, parseBody, parseIdParam, sendError } from "./_http";

const UpsertBody = z.object({
  product_name: z.string().trim().min(1).max(200),
  stock: z.coerce.number().int().nonnegative().max(MAX_STOCK),
  safety_stock_level: z.coerce.number().int().nonnegative().max(MAX_STOCK),
});

export function inventoryRouter(ctx: AppContext) {
  const inventory = express.Router();

  // GET /api/inventory
  inventory.get("/", async (req, res) => {
    try {
      const me = currentUser(req);
      const items = await ctx.store.listInventory(me.user_id);
      return res.json({ ok: true, items });
    } catch (e: unknown) {
      return sendError(res, e, "[INVENTORY][list]", "inventory_list_failed");
    }
  });

  // POST /api/inventory {product_name, stock, safety_stock_level}
  inventory.post("/", async (req, res) => {
    try {
      const me = currentUser(req);
      const body = parseBody(UpsertBody, req.body);
      const item = await ctx.store.upsertInventory(me.user_id, body);
      return res.json({ ok: true, item });
    } catch (e: unknown) {
      return sendError(res, e, "[INVENTORY][upsert]", "inventory_upsert_failed");
    }
  });

  // DELETE /api/inventory/:productId
  inventory.delete("/:productId", async (req, res) => {
    try {
      const me = currentUser(req);
      const productId = parseIdParam(req.params.productId, "invalid_product_id");
      const removed = await ctx.store.deleteInventory(me.user_id, productId);
      if (!removed) throw new HttpError(404, "item_not_found");
      return res.json({ ok: true });
    } catch (e: unknown) {
      return sendError(res, e, "[INVENTORY][delete]", "inventory_delete_failed");
    }
  });

  return inventory;
}
