// src/ai/providers/types.ts

export type TurnRole = "system" | "user" | "assistant";

export type Turn = {
  role: TurnRole;
  content: string;
};

export type GenerationParams = {
  temperature: number;
  maxTokens: number;
};

/** Posts JSON and hands back the decoded body; axios.post fits this shape. */
export type HttpPost = (
  url: string,
  body: unknown,
  config: {
    headers?: Record<string, string>;
    signal?: AbortSignal;
    timeout?: number;
    responseType?: "json" | "stream";
  }
) => Promise<{ data: unknown }>;

export type HttpGet = (url: string, config: { timeout?: number }) => Promise<{ data: unknown }>;

/**
 * One text-generation service. Adapters own their wire shape and role
 * vocabulary; callers only ever see plain text or a GenerationError.
 */
export interface GenerationBackend {
  readonly id: string;
  available(): Promise<boolean>;
  generate(turns: Turn[], params: GenerationParams, signal: AbortSignal): Promise<string>;
}

export type GenerationErrorCode = "BackendUnavailable" | "BackendRejected" | "UnknownBackend";

export class GenerationError extends Error {
  constructor(
    readonly code: GenerationErrorCode,
    readonly backendId: string,
    message: string
  ) {
    super(message);
    this.name = code;
  }
}

/** Network, auth, timeout or malformed reply. */
export class BackendUnavailable extends GenerationError {
  constructor(backendId: string, message: string) {
    super("BackendUnavailable", backendId, message);
  }
}

/** Safety filter or policy block. Never reaches callers of ProviderRegistry. */
export class BackendRejected extends GenerationError {
  constructor(backendId: string, message: string) {
    super("BackendRejected", backendId, message);
  }
}

/** Selector not registered: a configuration defect. */
export class UnknownBackend extends GenerationError {
  constructor(backendId: string) {
    super("UnknownBackend", backendId, `unknown generation backend "${backendId}"`);
  }
}

export const BLOCKED_REPLY =
  "Sorry, I can't help with that one: the model's safety filter blocked the response.";

export function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
