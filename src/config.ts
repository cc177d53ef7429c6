// src/config.ts
import { z } from "zod";

const optionalStr = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(8787),
  CORS_ORIGIN: z.string().default("*"),
  JWT_SECRET: optionalStr,

  SUPABASE_URL: optionalStr,
  SUPABASE_SERVICE_ROLE: optionalStr,

  OPENAI_API_KEY: optionalStr,
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  GEMINI_API_KEY: optionalStr,
  GEMINI_MODEL: z.string().default("gemini-1.5-flash"),
  OLLAMA_BASE_URL: z.string().default("http://localhost:11434"),
  TINYLLAMA_MODEL: z.string().default("tinyllama"),

  DEFAULT_BACKEND: z.string().default("openai"),
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  AI_MAX_TOKENS: z.coerce.number().int().positive().default(512),

  PIPELINE_CONCURRENCY: z.coerce.number().int().positive().default(4),
  CATALOG_LIMIT: z.coerce.number().int().positive().default(20),
  HEARTBEAT_MS: z.coerce.number().int().positive().default(25_000),
  AGENT_NAME: z.string().default("Gro Bot"),
});

export type AppConfig = {
  env: string;
  port: number;
  corsOrigins: string[];
  jwtSecret: string;
  supabase: { url: string; serviceRole: string } | null;
  openai: { apiKey: string | null; model: string };
  gemini: { apiKey: string | null; model: string };
  ollama: { baseUrl: string; model: string };
  defaultBackend: string;
  generation: { timeoutMs: number; temperature: number; maxTokens: number };
  pipelineConcurrency: number;
  catalogLimit: number;
  heartbeatMs: number;
  agentName: string;
};

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`[CONFIG] invalid environment: ${issues}`);
  }
  const e = parsed.data;

  const isProd = e.NODE_ENV === "production";
  if (isProd && !e.JWT_SECRET) {
    throw new Error("[CONFIG] JWT_SECRET is required in production");
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGIN.split(",").map((o) => o.trim()).filter(Boolean),
    jwtSecret: e.JWT_SECRET ?? "dev-secret",
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE
        ? { url: e.SUPABASE_URL, serviceRole: e.SUPABASE_SERVICE_ROLE }
        : null,
    openai: { apiKey: e.OPENAI_API_KEY ?? null, model: e.OPENAI_MODEL },
    gemini: { apiKey: e.GEMINI_API_KEY ?? null, model: e.GEMINI_MODEL },
    ollama: { baseUrl: e.OLLAMA_BASE_URL.replace(/\/+$/, ""), model: e.TINYLLAMA_MODEL },
    defaultBackend: e.DEFAULT_BACKEND,
    generation: {
      timeoutMs: e.AI_TIMEOUT_MS,
      temperature: e.AI_TEMPERATURE,
      maxTokens: e.AI_MAX_TOKENS,
    },
    pipelineConcurrency: e.PIPELINE_CONCURRENCY,
    catalogLimit: e.CATALOG_LIMIT,
    heartbeatMs: e.HEARTBEAT_MS,
    agentName: e.AGENT_NAME,
  };
}
