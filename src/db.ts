// src/db.ts
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "./config";

export function createSupa(cfg: NonNullable<AppConfig["supabase"]>): SupabaseClient {
  console.log("[DB] SUPABASE_SERVICE_ROLE len", cfg.serviceRole.length);
  return createClient(
    cfg.url,
    cfg.serviceRole, // MUST be service role (not anon)
    { auth: { persistSession: false } }
  );
}
