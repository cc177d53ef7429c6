// tests/helpers/fakes.ts
import { ProviderRegistry, type GenerationBackend, type GenerationParams, type Turn } from "../../src/ai/providers";
import type { CatalogSearch } from "../../src/catalog/catalogSearch";
import { CommandRouter } from "../../src/pipeline/commandRouter";
import { RoomBroadcaster } from "../../src/realtime/broadcast";
import { RoomRegistry, type RoomConnection } from "../../src/realtime/roomRegistry";
import { MemoryStore } from "../../src/store/memoryStore";
import type { CatalogCandidate, ServerPayload } from "../../src/types";

export class FakeConnection implements RoomConnection {
  readonly frames: string[] = [];
  open = true;
  throwOnSend = false;
  failLater = false;
  private static seq = 0;
  readonly id: string;

  constructor(id?: string) {
    this.id = id ?? `conn-${++FakeConnection.seq}`;
  }

  isOpen(): boolean {
    return this.open;
  }

  send(data: string, onError: (err: Error) => void): void {
    if (this.throwOnSend) throw new Error("socket write failed");
    this.frames.push(data);
    if (this.failLater) onError(new Error("flush failed"));
  }

  payloads(): ServerPayload[] {
    return this.frames.map((f) => JSON.parse(f));
  }
}

type Reply = string | Error | ((turns: Turn[]) => string | Promise<string>);

/** Answers each generate call with the next scripted reply; the last one repeats. */
export class ScriptedBackend implements GenerationBackend {
  readonly calls: { turns: Turn[]; params: GenerationParams }[] = [];
  isAvailable = true;

  constructor(
    readonly id: string,
    private readonly replies: Reply[]
  ) {}

  async available(): Promise<boolean> {
    return this.isAvailable;
  }

  async generate(turns: Turn[], params: GenerationParams): Promise<string> {
    this.calls.push({ turns, params });
    const idx = Math.min(this.calls.length - 1, this.replies.length - 1);
    const reply = this.replies[idx];
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply(turns);
    return reply ?? "";
  }
}

export class FakeCatalog implements CatalogSearch {
  readonly terms: string[] = [];

  constructor(
    private readonly byTerm: Record<string, CatalogCandidate[]> = {},
    private readonly failing: Set<string> = new Set()
  ) {}

  async search(term: string, limit: number): Promise<CatalogCandidate[]> {
    this.terms.push(term);
    if (this.failing.has(term)) throw new Error(`catalog down for ${term}`);
    return (this.byTerm[term] ?? []).slice(0, limit);
  }
}

export function candidate(title: string, category = "Produce", price = 1.5): CatalogCandidate {
  return { title, category, price, rating: 4 };
}

export const AGENT = "Gro Bot";

export function makeRig(opts: { backends?: GenerationBackend[]; catalog?: CatalogSearch; defaultBackend?: string } = {}) {
  const store = new MemoryStore(() => new Date("2026-01-02T03:04:05.000Z"));
  const registry = new RoomRegistry();
  const broadcaster = new RoomBroadcaster(registry, store, AGENT);
  const backends = opts.backends ?? [new ScriptedBackend("openai", ["{}"])];
  const providers = new ProviderRegistry(backends, {
    defaultBackend: opts.defaultBackend ?? "openai",
    timeoutMs: 1_000,
    defaults: { temperature: 0.2, maxTokens: 512 },
  });
  const catalog = opts.catalog ?? new FakeCatalog();
  const router = new CommandRouter({ store, broadcaster, providers, catalog, catalogLimit: 20 });
  return { store, registry, broadcaster, providers, catalog, router };
}

/** Creates a user + room with that user as owner/member and one listening connection. */
export async function seedRoom(rig: ReturnType<typeof makeRig>, username = "alice", preferred = "openai") {
  const user = await rig.store.createUser({ username, password_hash: "x", preferred_llm_model: preferred });
  const room = await rig.store.createRoom({ name: `${username}'s kitchen`, owner_id: user.id });
  await rig.store.addMember(room.id, user.id);
  const conn = new FakeConnection();
  rig.registry.subscribe(conn, room.id);
  return { user, room, conn };
}
