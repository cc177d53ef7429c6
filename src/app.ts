// src/app.ts
import express from "express";
import cors from "cors";
import bodyParser from "body-parser";
import type { AppContext } from "./context";
import { ensureAuth } from "./routes/_ensureAuth";
import { authRouter } from "./routes/auth";
import { inventoryRouter } from "./routes/inventory";
import { roomsRouter } from "./routes/rooms";
import { modelsRouter, usersRouter } from "./routes/users";

export function buildApp(ctx: AppContext) {
  const app = express();

  // ─────────────────────────────
  // Global CORS
  // ─────────────────────────────
  app.use(
    cors({
      // a literal "*" in the list would only match an Origin header of "*"
      origin: ctx.config.corsOrigins.includes("*") ? "*" : ctx.config.corsOrigins,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      credentials: false,
    })
  );

  app.use(bodyParser.json());

  // ─────────────────────────────
  // Health check
  // ─────────────────────────────
  app.get("/health", (_req, res) =>
    res.json({
      ok: true,
      realtime: ctx.registry.stats(),
      pipeline: ctx.pool.stats(),
    })
  );

  // ─────────────────────────────
  // Main API routes
  // ─────────────────────────────
  const requireAuth = ensureAuth(ctx.config.jwtSecret);
  app.use("/api/auth", authRouter(ctx));
  app.use("/api/rooms", requireAuth, roomsRouter(ctx));
  app.use("/api/users", requireAuth, usersRouter(ctx));
  app.use("/api/models", requireAuth, modelsRouter(ctx));
  app.use("/api/inventory", requireAuth, inventoryRouter(ctx));

  return app;
}
