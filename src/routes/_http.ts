// src/routes/_http.ts
import type { Response } from "express";
import type { z } from "zod";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    readonly details?: unknown
  ) {
    super(code);
    this.name = "HttpError";
  }
}

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) throw new HttpError(400, "invalid_body", parsed.error.issues);
  return parsed.data;
}

export function parseIdParam(raw: string | undefined, code: string): number {
  const t = (raw || "").trim();
  const n = /^\d+$/.test(t) ? Number(t) : NaN;
  if (!Number.isSafeInteger(n) || n <= 0) throw new HttpError(400, code);
  return n;
}

/** Maps anything thrown in a handler to the `{ ok:false, error }` shape. */
export function sendError(res: Response, e: unknown, tag: string, fallback: string) {
  if (e instanceof HttpError) {
    return res
      .status(e.status)
      .json({ ok: false, error: e.code, ...(e.details !== undefined ? { details: e.details } : {}) });
  }
  console.error(tag, e instanceof Error ? e.message : e);
  return res.status(500).json({ ok: false, error: fallback });
}
