// src/routes/users.ts
import express from "express";
import { z } from "zod";
import { LOCAL_BACKEND_ID, type AppContext } from "../context";
import { currentUser } from "./_ensureAuth";
import { HttpError, parseBody, sendError } from "./_http";

const MOBILE_PLATFORMS = new Set(["ios", "android"]);

const ModelBody = z.object({ model: z.string().trim().toLowerCase().min(1) });

const PlatformQuery = z.object({
  platform: z.string().trim().toLowerCase().catch("desktop").default("desktop"),
});

export function usersRouter(ctx: AppContext) {
  const users = express.Router();

  // GET /api/users/llm-model?platform=desktop|web|ios|android
  // Phones have no local runtime, so the local backend is never offered there.
  users.get("/llm-model", async (req, res) => {
    try {
      const me = currentUser(req);
      const { platform } = PlatformQuery.parse(req.query);
      const isMobile = MOBILE_PLATFORMS.has(platform);

      const user = await ctx.store.getUser(me.user_id);
      if (!user) throw new HttpError(401, "unauthorized");

      const availability = await ctx.providers.availability();
      const available_models = ctx.providers.ids().filter((id) => {
        if (id === LOCAL_BACKEND_ID) return !isMobile; // listed on desktop even before the pull
        return availability[id] === true;
      });

      let model = ctx.providers.resolveBackendId(user.preferred_llm_model);
      if (isMobile && model === LOCAL_BACKEND_ID) model = ctx.providers.defaultBackend;

      return res.json({
        ok: true,
        model,
        available_models,
        availability,
        local_model_available: !isMobile && availability[LOCAL_BACKEND_ID] === true,
        platform,
      });
    } catch (e: unknown) {
      return sendError(res, e, "[USERS][llm-model][get]", "llm_model_failed");
    }
  });

  // PUT /api/users/llm-model {model}
  users.put("/llm-model", async (req, res) => {
    try {
      const me = currentUser(req);
      const { model } = parseBody(ModelBody, req.body);

      const backend = ctx.providers.get(model);
      if (!backend) throw new HttpError(400, "invalid_model", { choose_from: ctx.providers.ids() });
      if (!(await backend.available())) {
        const code = model === LOCAL_BACKEND_ID ? "model_not_downloaded" : "model_not_configured";
        throw new HttpError(400, code);
      }

      await ctx.store.setPreferredModel(me.user_id, model);
      console.log("[USERS][llm-model][set]", { user_id: me.user_id, model });
      return res.json({ ok: true, model });
    } catch (e: unknown) {
      return sendError(res, e, "[USERS][llm-model][put]", "llm_model_update_failed");
    }
  });

  return users;
}

export function modelsRouter(ctx: AppContext) {
  const models = express.Router();

  // POST /api/models/download-tinyllama
  models.post("/download-tinyllama", async (_req, res) => {
    try {
      const progress = await ctx.modelDownload.start();
      return res.json({ ok: true, ...progress });
    } catch (e: unknown) {
      return sendError(res, e, "[MODELS][download]", "download_failed");
    }
  });

  // GET /api/models/download-progress
  models.get("/download-progress", (_req, res) => {
    return res.json({ ok: true, ...ctx.modelDownload.progress() });
  });

  return models;
}
