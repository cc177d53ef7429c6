// src/ai/providers/index.ts
import {
  BackendRejected,
  BackendUnavailable,
  BLOCKED_REPLY,
  errorText,
  GenerationError,
  UnknownBackend,
  type GenerationBackend,
  type GenerationParams,
  type Turn,
} from "./types";

export * from "./types";

export type ProviderRegistryOptions = {
  defaultBackend: string;
  timeoutMs: number;
  defaults: GenerationParams;
};

/**
 * Single entry point for text generation. Callers hand over role-tagged turns
 * and a backend id; they get text back, or BackendUnavailable / UnknownBackend.
 * Safety blocks come back as BLOCKED_REPLY so there is always something to show.
 */
export class ProviderRegistry {
  private readonly backends = new Map<string, GenerationBackend>();

  constructor(backends: GenerationBackend[], private readonly opts: ProviderRegistryOptions) {
    for (const b of backends) this.backends.set(b.id, b);
  }

  ids(): string[] {
    return [...this.backends.keys()];
  }

  has(id: string): boolean {
    return this.backends.has(id);
  }

  get(id: string): GenerationBackend | null {
    return this.backends.get(id) ?? null;
  }

  get defaultBackend(): string {
    return this.opts.defaultBackend;
  }

  /** Stored preference if it names a registered backend, else the default. */
  resolveBackendId(preference: string | null | undefined): string {
    const p = (preference || "").trim().toLowerCase();
    return p && this.backends.has(p) ? p : this.opts.defaultBackend;
  }

  async availability(): Promise<Record<string, boolean>> {
    const out: Record<string, boolean> = {};
    for (const [id, b] of this.backends) out[id] = await b.available();
    return out;
  }

  async generate(turns: Turn[], backendId: string, params: Partial<GenerationParams> = {}): Promise<string> {
    const backend = this.backends.get(backendId);
    if (!backend) {
      console.error("[AI][CONFIG] unknown backend requested", { backendId, registered: this.ids() });
      throw new UnknownBackend(backendId);
    }

    const merged: GenerationParams = { ...this.opts.defaults, ...params };
    const ms = this.opts.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        // settle first so the race reports the timeout, not the abort it causes
        reject(new BackendUnavailable(backendId, `timed out after ${ms}ms`));
        controller.abort();
      }, ms);
    });

    const work = backend.generate(turns, merged, controller.signal);
    void work.catch((e: unknown) => {
      if (timedOut) console.warn(`[AI][${backendId}] late failure after timeout`, errorText(e));
    });

    try {
      return await Promise.race([work, timeout]);
    } catch (e: unknown) {
      if (e instanceof BackendRejected) {
        console.warn(`[AI][${backendId}] blocked output`, e.message);
        return BLOCKED_REPLY;
      }
      if (e instanceof GenerationError) {
        console.warn(`[AI][${backendId}] ${e.code}`, e.message);
        throw e;
      }
      console.warn(`[AI][${backendId}] unexpected failure`, errorText(e));
      throw new BackendUnavailable(backendId, errorText(e));
    } finally {
      clearTimeout(timer);
    }
  }
}
