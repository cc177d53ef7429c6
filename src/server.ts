// src/server.ts
import "dotenv/config";
import http from "http";
import { buildApp } from "./app";
import { loadConfig } from "./config";
import { createContext } from "./context";
import { attachWsGateway } from "./realtime/wsGateway";

// ─────────────────────────────
// Boot diagnostics
// ─────────────────────────────
const config = loadConfig(process.env);
console.log("[BOOT] env =", config.env);
console.log("[BOOT] SUPABASE configured?", !!config.supabase);
console.log("[AI] OPENAI_API_KEY present?", !!config.openai.apiKey, "model:", config.openai.model);
console.log("[AI] GEMINI_API_KEY present?", !!config.gemini.apiKey, "model:", config.gemini.model);
console.log("[AI] OLLAMA_BASE_URL =", config.ollama.baseUrl, "model:", config.ollama.model);
console.log("[AI] DEFAULT_BACKEND =", config.defaultBackend);

const ctx = createContext(config);
const app = buildApp(ctx);
const server = http.createServer(app);
const gateway = attachWsGateway({ server, registry: ctx.registry, heartbeatMs: config.heartbeatMs });

// ─────────────────────────────
// Server start
// ─────────────────────────────
server.listen(config.port, () => console.log("✅ Backend listening on", config.port, "(ws at /ws)"));

function shutdown(signal: string) {
  console.log(`[BOOT] ${signal} received, shutting down`);
  gateway
    .close()
    .then(() => ctx.pool.idle())
    .then(() => server.close(() => process.exit(0)))
    .catch((e: unknown) => {
      console.error("[BOOT] shutdown failed", e instanceof Error ? e.message : e);
      process.exit(1);
    });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
