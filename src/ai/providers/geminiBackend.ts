// src/ai/providers/geminiBackend.ts
import { z } from "zod";
import { axiosPost, describeHttpError } from "./http";
import {
  BackendRejected,
  BackendUnavailable,
  type GenerationBackend,
  type GenerationParams,
  type HttpPost,
  type Turn,
} from "./types";

const GEMINI_BASE = "https://generativelanguage.googleapis.com/v1beta";

const BLOCKING_FINISH_REASONS = new Set(["SAFETY", "RECITATION", "BLOCKLIST", "PROHIBITED_CONTENT", "SPII"]);

type GeminiContent = { role: "user" | "model"; parts: { text: string }[] };

export type GeminiRequest = {
  systemInstruction?: { parts: { text: string }[] };
  contents: GeminiContent[];
  generationConfig: { temperature: number; maxOutputTokens: number };
};

const GeminiResponse = z.object({
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  candidates: z
    .array(
      z.object({
        finishReason: z.string().optional(),
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      })
    )
    .optional(),
});

/**
 * Gemini has no "system" or "assistant" turns: system text moves into
 * systemInstruction and assistant turns are sent as "model".
 */
export function toGeminiRequest(turns: Turn[], params: GenerationParams): GeminiRequest {
  const system = turns.filter((t) => t.role === "system").map((t) => ({ text: t.content }));
  const contents: GeminiContent[] = turns
    .filter((t) => t.role !== "system")
    .map((t): GeminiContent => ({ role: t.role === "assistant" ? "model" : "user", parts: [{ text: t.content }] }));

  return {
    ...(system.length ? { systemInstruction: { parts: system } } : {}),
    contents,
    generationConfig: { temperature: params.temperature, maxOutputTokens: params.maxTokens },
  };
}

export class GeminiBackend implements GenerationBackend {
  readonly id = "gemini";

  constructor(
    private readonly cfg: { apiKey: string | null; model: string },
    private readonly post: HttpPost = axiosPost
  ) {}

  async available(): Promise<boolean> {
    return !!this.cfg.apiKey;
  }

  async generate(turns: Turn[], params: GenerationParams, signal: AbortSignal): Promise<string> {
    if (!this.cfg.apiKey) throw new BackendUnavailable(this.id, "GEMINI_API_KEY missing");

    const url = `${GEMINI_BASE}/models/${encodeURIComponent(this.cfg.model)}:generateContent`;
    const start = Date.now();
    let raw: unknown;
    try {
      const res = await this.post(url, toGeminiRequest(turns, params), {
        headers: { "Content-Type": "application/json", "x-goog-api-key": this.cfg.apiKey },
        signal,
      });
      raw = res.data;
    } catch (e: unknown) {
      throw new BackendUnavailable(this.id, describeHttpError(e));
    }
    console.log("[AI][gemini] model used:", this.cfg.model, "latency_ms:", Date.now() - start);

    const parsed = GeminiResponse.safeParse(raw);
    if (!parsed.success) throw new BackendUnavailable(this.id, "unexpected response shape");
    const body = parsed.data;

    const blockReason = body.promptFeedback?.blockReason;
    if (blockReason) throw new BackendRejected(this.id, `prompt blocked: ${blockReason}`);

    const candidate = body.candidates?.[0];
    if (!candidate) throw new BackendUnavailable(this.id, "no candidates returned");
    if (candidate.finishReason && BLOCKING_FINISH_REASONS.has(candidate.finishReason)) {
      throw new BackendRejected(this.id, `finish reason ${candidate.finishReason}`);
    }

    return (candidate.content?.parts ?? []).map((p) => p.text ?? "").join("");
  }
}
