// src/routes/auth.ts
import express from "express";
import bcrypt from "bcryptjs";
import { z } from "zod";
import type { AppContext } from "../context";
import { signToken } from "./_ensureAuth";
import { HttpError, parseBody, sendError } from "./_http";

const Credentials = z.object({
  username: z.string().trim().min(1).max(64),
  password: z.string().min(1),
});

export function authRouter(ctx: AppContext) {
  const auth = express.Router();

  // POST /api/auth/signup {username, password}
  auth.post("/signup", async (req, res) => {
    try {
      const { username, password } = parseBody(Credentials, req.body);

      const existing = await ctx.store.findUserByUsername(username);
      if (existing) throw new HttpError(409, "username_taken");

      const hash = await bcrypt.hash(password, 10);
      const user = await ctx.store.createUser({
        username,
        password_hash: hash,
        preferred_llm_model: ctx.providers.defaultBackend,
      });

      console.log("[AUTH][signup]", { user_id: user.id });
      return res.json({ ok: true, token: signToken(ctx.config.jwtSecret, { user_id: user.id, username: user.username }) });
    } catch (e: unknown) {
      return sendError(res, e, "[AUTH][signup]", "signup_failed");
    }
  });

  // POST /api/auth/login {username, password}
  auth.post("/login", async (req, res) => {
    try {
      const { username, password } = parseBody(Credentials, req.body);

      const user = await ctx.store.findUserByUsername(username);
      // same answer for unknown user and wrong password
      const ok = user ? await bcrypt.compare(password, user.password_hash) : false;
      if (!user || !ok) throw new HttpError(401, "invalid_credentials");

      return res.json({ ok: true, token: signToken(ctx.config.jwtSecret, { user_id: user.id, username: user.username }) });
    } catch (e: unknown) {
      return sendError(res, e, "[AUTH][login]", "login_failed");
    }
  });

  return auth;
}
