// src/ai/providers/openaiBackend.ts
import OpenAI from "openai";
import {
  BackendRejected,
  BackendUnavailable,
  errorText,
  type GenerationBackend,
  type GenerationParams,
  type Turn,
} from "./types";

export type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;
type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export type CreateCompletion = (
  body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
  opts: { signal: AbortSignal }
) => Promise<ChatCompletion>;

// OpenAI speaks the same role vocabulary we do
function toMessage(t: Turn): ChatCompletionMessageParam {
  switch (t.role) {
    case "system":
      return { role: "system", content: t.content };
    case "assistant":
      return { role: "assistant", content: t.content };
    default:
      return { role: "user", content: t.content };
  }
}

export class OpenAIBackend implements GenerationBackend {
  readonly id = "openai";
  private readonly create: CreateCompletion | null;

  constructor(
    private readonly cfg: { apiKey: string | null; model: string },
    create?: CreateCompletion
  ) {
    if (create) {
      this.create = create;
    } else if (cfg.apiKey) {
      const client = new OpenAI({ apiKey: cfg.apiKey, maxRetries: 0 });
      this.create = (body, opts) => client.chat.completions.create(body, opts);
    } else {
      this.create = null;
    }
  }

  async available(): Promise<boolean> {
    return this.create !== null;
  }

  async generate(turns: Turn[], params: GenerationParams, signal: AbortSignal): Promise<string> {
    if (!this.create) throw new BackendUnavailable(this.id, "OPENAI_API_KEY missing");

    const start = Date.now();
    let completion: ChatCompletion;
    try {
      completion = await this.create(
        {
          model: this.cfg.model,
          temperature: params.temperature,
          max_tokens: params.maxTokens,
          messages: turns.map(toMessage),
        },
        { signal }
      );
    } catch (e: unknown) {
      throw new BackendUnavailable(this.id, errorText(e));
    }
    console.log("[AI][openai] model used:", this.cfg.model, "latency_ms:", Date.now() - start);

    const choice = completion.choices[0];
    if (!choice) throw new BackendUnavailable(this.id, "empty completion");
    if (choice.finish_reason === "content_filter" || choice.message.refusal) {
      throw new BackendRejected(this.id, choice.message.refusal || "content_filter");
    }
    return choice.message.content ?? "";
  }
}
