// src/ai/providers/localBackend.ts
import { z } from "zod";
import { axiosGet, axiosPost, describeHttpError } from "./http";
import {
  BackendRejected,
  BackendUnavailable,
  type GenerationBackend,
  type GenerationParams,
  type HttpGet,
  type HttpPost,
  type Turn,
} from "./types";

const CompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullable().optional(),
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
});

const TagsResponse = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Small model served by a local Ollama daemon through its OpenAI-compatible
 * endpoint. Roles pass through unchanged.
 */
export class LocalBackend implements GenerationBackend {
  readonly id = "tinyllama";

  constructor(
    private readonly cfg: { baseUrl: string; model: string },
    private readonly post: HttpPost = axiosPost,
    private readonly get: HttpGet = axiosGet
  ) {}

  /** True once the model shows up in the daemon's local tags. */
  async available(): Promise<boolean> {
    try {
      const res = await this.get(`${this.cfg.baseUrl}/api/tags`, { timeout: 3000 });
      const tags = TagsResponse.safeParse(res.data);
      if (!tags.success) return false;
      return tags.data.models.some((m) => m.name === this.cfg.model || m.name.startsWith(`${this.cfg.model}:`));
    } catch (e: unknown) {
      console.warn("[AI][tinyllama] tags check failed", describeHttpError(e));
      return false;
    }
  }

  async generate(turns: Turn[], params: GenerationParams, signal: AbortSignal): Promise<string> {
    const start = Date.now();
    let raw: unknown;
    try {
      const res = await this.post(
        `${this.cfg.baseUrl}/v1/chat/completions`,
        {
          model: this.cfg.model,
          messages: turns,
          temperature: params.temperature,
          max_tokens: params.maxTokens,
          stream: false,
        },
        { headers: { "Content-Type": "application/json" }, signal }
      );
      raw = res.data;
    } catch (e: unknown) {
      throw new BackendUnavailable(this.id, describeHttpError(e));
    }
    console.log("[AI][tinyllama] model used:", this.cfg.model, "latency_ms:", Date.now() - start);

    const parsed = CompletionResponse.safeParse(raw);
    if (!parsed.success) throw new BackendUnavailable(this.id, "unexpected response shape");

    const choice = parsed.data.choices[0];
    if (choice.finish_reason === "content_filter") throw new BackendRejected(this.id, "content_filter");
    return choice.message.content ?? "";
  }
}
