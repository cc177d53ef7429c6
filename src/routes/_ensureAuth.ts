// src/routes/_ensureAuth.ts
import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { HttpError } from "./_http";

export type AuthUser = { user_id: number; username: string };

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

const TokenClaims = z.object({
  user_id: z.number().int().positive(),
  username: z.string().min(1),
});

export function signToken(secret: string, user: AuthUser): string {
  return jwt.sign({ user_id: user.user_id, username: user.username }, secret, { expiresIn: "14d" });
}

export function verifyToken(secret: string, token: string): AuthUser | null {
  try {
    const decoded = jwt.verify(token, secret);
    const claims = TokenClaims.safeParse(decoded);
    return claims.success ? claims.data : null;
  } catch {
    return null; // expired, bad signature or malformed
  }
}

export function ensureAuth(secret: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const h = req.headers.authorization || "";
    const t = h.startsWith("Bearer ") ? h.slice(7) : "";
    const user = t ? verifyToken(secret, t) : null;
    if (!user) return res.status(401).json({ ok: false, error: "unauthorized" });
    req.user = user;
    return next();
  };
}

export function currentUser(req: Request): AuthUser {
  if (!req.user) throw new HttpError(401, "unauthorized");
  return req.user;
}
