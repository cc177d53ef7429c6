// src/context.ts
import { GeminiBackend } from "./ai/providers/geminiBackend";
import { axiosPost } from "./ai/providers/http";
import { LocalBackend } from "./ai/providers/localBackend";
import { ModelDownloadTracker } from "./ai/providers/modelDownload";
import { OpenAIBackend } from "./ai/providers/openaiBackend";
import { ProviderRegistry, type GenerationBackend } from "./ai/providers";
import { EmptyCatalogSearch, SupabaseCatalogSearch, type CatalogSearch } from "./catalog/catalogSearch";
import type { AppConfig } from "./config";
import { createSupa } from "./db";
import { CommandRouter } from "./pipeline/commandRouter";
import { TaskPool } from "./pipeline/taskPool";
import { RoomBroadcaster } from "./realtime/broadcast";
import { RoomRegistry } from "./realtime/roomRegistry";
import { MemoryStore } from "./store/memoryStore";
import type { RecordStore } from "./store/recordStore";
import { SupabaseStore } from "./store/supabaseStore";

export const LOCAL_BACKEND_ID = "tinyllama";

/** Process-wide collaborators, built once at boot and handed to routes/gateway. */
export type AppContext = {
  config: AppConfig;
  store: RecordStore;
  catalog: CatalogSearch;
  registry: RoomRegistry;
  broadcaster: RoomBroadcaster;
  providers: ProviderRegistry;
  router: CommandRouter;
  pool: TaskPool;
  modelDownload: ModelDownloadTracker;
};

export type ContextOverrides = {
  store?: RecordStore;
  catalog?: CatalogSearch;
  backends?: GenerationBackend[];
  modelDownload?: ModelDownloadTracker;
};

export function createContext(config: AppConfig, overrides: ContextOverrides = {}): AppContext {
  let store = overrides.store;
  let catalog = overrides.catalog;

  if (!store || !catalog) {
    if (config.supabase) {
      const supa = createSupa(config.supabase);
      store = store ?? new SupabaseStore(supa);
      catalog = catalog ?? new SupabaseCatalogSearch(supa);
    } else {
      console.warn("[BOOT] SUPABASE_URL / SUPABASE_SERVICE_ROLE missing → in-memory store, empty catalog");
      store = store ?? new MemoryStore();
      catalog = catalog ?? new EmptyCatalogSearch();
    }
  }

  const local = new LocalBackend(config.ollama);
  const backends = overrides.backends ?? [new OpenAIBackend(config.openai), new GeminiBackend(config.gemini), local];

  const providers = new ProviderRegistry(backends, {
    defaultBackend: config.defaultBackend,
    timeoutMs: config.generation.timeoutMs,
    defaults: { temperature: config.generation.temperature, maxTokens: config.generation.maxTokens },
  });
  if (!providers.has(config.defaultBackend)) {
    console.error("[AI][CONFIG] DEFAULT_BACKEND is not a registered backend", {
      defaultBackend: config.defaultBackend,
      registered: providers.ids(),
    });
  }

  const registry = new RoomRegistry();
  const broadcaster = new RoomBroadcaster(registry, store, config.agentName);
  const router = new CommandRouter({
    store,
    broadcaster,
    providers,
    catalog,
    catalogLimit: config.catalogLimit,
  });

  return {
    config,
    store,
    catalog,
    registry,
    broadcaster,
    providers,
    router,
    pool: new TaskPool(config.pipelineConcurrency),
    modelDownload: overrides.modelDownload ?? new ModelDownloadTracker(config.ollama, () => local.available(), axiosPost),
  };
}
