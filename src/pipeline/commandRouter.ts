// src/pipeline/commandRouter.ts
import { analyzeInventory } from "../ai/planners/inventoryAnalyzer";
import { generateMenu } from "../ai/planners/menuGenerator";
import { generateProcurementPlan } from "../ai/planners/procurementPlanner";
import { generateRestockPlan } from "../ai/planners/restockPlanner";
import type { Generate, HistoryLine } from "../ai/planners/shared";
import { GenerationError, type ProviderRegistry } from "../ai/providers";
import { resultData, toStockLine, type AiResult, type StockLine } from "../ai/results";
import { findRelated } from "../catalog/retrieval";
import type { CatalogSearch } from "../catalog/catalogSearch";
import type { RoomBroadcaster } from "../realtime/broadcast";
import type { RecordStore } from "../store/recordStore";
import type { AiEventKind } from "../types";
import { ingestInventory } from "./inventoryIngest";
import type { TaskPool } from "./taskPool";
import { classifyCommand, HELP_TEXT, stripToken, TRIGGERS, type CommandKind } from "./triggers";

export const MENTION_SYSTEM_PROMPT =
  "You are a helpful assistant taking part in a small group chat about groceries and cooking. " +
  "Give concise, accurate answers that suit a shared chat, and avoid very long messages.";

export const EMPTY_INVENTORY_REPLY =
  "Your inventory is empty. Add items first with @inventory (one \"name, stock, safety_stock\" per line).";

export const NOTHING_TO_RESTOCK_REPLY = "Every item is at or above its safety stock level, so there is nothing to restock. 👍";

export const CONFIRMATIONS: Record<Exclude<AiEventKind, "procurement-plan">, string> = {
  analysis: "📊 Inventory analysis is ready.",
  menu: "🍽️ Menu suggestions are ready.",
  restock: "🛒 Restock plan is ready.",
};

export type IncomingCommand = {
  roomId: number;
  userId: number;
  content: string;
};

export type RouterDeps = {
  store: RecordStore;
  broadcaster: RoomBroadcaster;
  providers: ProviderRegistry;
  catalog: CatalogSearch;
  catalogLimit: number;
  historyLimit?: number;
};

type Snapshot = { all: StockLine[]; low_stock: StockLine[]; healthy: StockLine[] };

function errMsg(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** The text shown in the room when a triggered command fails. */
export function errorReply(e: unknown): string {
  if (e instanceof GenerationError) return `⚠️ (${e.backendId} error) ${e.message}`;
  return `⚠️ (error) ${errMsg(e)}`;
}

/**
 * Decides what an incoming chat message asks the agent to do and does it.
 * Every triggered command ends in at least one broadcast: a reply, an event
 * (+ confirmation), or an error message.
 */
export class CommandRouter {
  constructor(private readonly deps: RouterDeps) {}

  /** Fire-and-forget entry used by the message route. */
  dispatch(pool: TaskPool, cmd: IncomingCommand): CommandKind {
    const kind = classifyCommand(cmd.content);
    if (kind === "none") return kind;

    pool.submit(
      `pipeline:${kind}:room${cmd.roomId}`,
      async () => {
        await this.run(kind, cmd);
      },
      async (err) => {
        await this.deps.broadcaster.postAgentMessage(cmd.roomId, errorReply(err));
      }
    );
    return kind;
  }

  /** Runs the matching branch to completion; failures propagate to the caller. */
  async handle(cmd: IncomingCommand): Promise<CommandKind> {
    const kind = classifyCommand(cmd.content);
    await this.run(kind, cmd);
    return kind;
  }

  private async run(kind: CommandKind, cmd: IncomingCommand): Promise<void> {
    switch (kind) {
      case "inventory":
        await ingestInventory(this.deps, cmd);
        return;
      case "analysis":
        return this.runAnalysis(cmd);
      case "menu":
        return this.runMenu(cmd);
      case "restock":
        return this.runRestock(cmd);
      case "plan":
        return this.runPlan(cmd);
      case "mention":
        return this.runMention(cmd);
      case "none":
        return;
    }
  }

  // ─────────────────────────────────────────────
  // shared helpers
  // ─────────────────────────────────────────────

  /** Resolved once per branch; the stored preference is only read. Also used by the plan routes. */
  async generatorFor(userId: number): Promise<{ backendId: string; generate: Generate }> {
    const user = await this.deps.store.getUser(userId);
    const backendId = this.deps.providers.resolveBackendId(user?.preferred_llm_model);
    return {
      backendId,
      generate: (turns) => this.deps.providers.generate(turns, backendId),
    };
  }

  private async snapshot(userId: number): Promise<Snapshot> {
    const items = await this.deps.store.listInventory(userId);
    const all = items.map(toStockLine);
    return {
      all,
      low_stock: all.filter((i) => i.stock < i.safety_stock_level),
      healthy: all.filter((i) => i.stock >= i.safety_stock_level),
    };
  }

  private related(lines: StockLine[]) {
    return findRelated(
      this.deps.catalog,
      lines.map((l) => l.product_name),
      this.deps.catalogLimit
    );
  }

  private async emit(roomId: number, kind: AiEventKind, result: AiResult, confirmation: string | null): Promise<void> {
    this.deps.broadcaster.broadcastEvent(roomId, kind, result.narrative, resultData(result));
    if (confirmation) await this.deps.broadcaster.postAgentMessage(roomId, confirmation);
  }

  async roomHistory(roomId: number): Promise<HistoryLine[]> {
    const [messages, members] = await Promise.all([
      this.deps.store.listRecentMessages(roomId, this.deps.historyLimit ?? 50),
      this.deps.store.listMembers(roomId),
    ]);
    const names = new Map(members.map((m) => [m.id, m.username]));
    return messages.map((m) => ({
      author: m.is_bot ? this.deps.broadcaster.agentName : names.get(m.user_id ?? -1) ?? "unknown",
      content: m.content,
    }));
  }

  // ─────────────────────────────────────────────
  // branches
  // ─────────────────────────────────────────────

  private async runAnalysis(cmd: IncomingCommand): Promise<void> {
    const { backendId, generate } = await this.generatorFor(cmd.userId);
    const snap = await this.snapshot(cmd.userId);
    if (!snap.all.length) {
      await this.deps.broadcaster.postAgentMessage(cmd.roomId, EMPTY_INVENTORY_REPLY);
      return;
    }

    const candidates = await this.related(snap.low_stock);
    console.log("[PIPELINE][analysis]", {
      room_id: cmd.roomId,
      backend: backendId,
      low: snap.low_stock.length,
      healthy: snap.healthy.length,
      candidates: candidates.length,
    });

    const result = await analyzeInventory(generate, {
      low_stock: snap.low_stock,
      healthy: snap.healthy,
      candidates,
    });
    await this.emit(cmd.roomId, "analysis", result, CONFIRMATIONS.analysis);
  }

  private async runMenu(cmd: IncomingCommand): Promise<void> {
    const { backendId, generate } = await this.generatorFor(cmd.userId);
    const snap = await this.snapshot(cmd.userId);
    if (!snap.all.length) {
      await this.deps.broadcaster.postAgentMessage(cmd.roomId, EMPTY_INVENTORY_REPLY);
      return;
    }

    const candidates = await this.related(snap.all);
    console.log("[PIPELINE][menu]", { room_id: cmd.roomId, backend: backendId, items: snap.all.length });

    const result = await generateMenu(generate, { inventory: snap.all, candidates });
    await this.emit(cmd.roomId, "menu", result, CONFIRMATIONS.menu);
  }

  private async runRestock(cmd: IncomingCommand): Promise<void> {
    const { backendId, generate } = await this.generatorFor(cmd.userId);
    const snap = await this.snapshot(cmd.userId);
    if (!snap.all.length) {
      await this.deps.broadcaster.postAgentMessage(cmd.roomId, EMPTY_INVENTORY_REPLY);
      return;
    }
    if (!snap.low_stock.length) {
      await this.deps.broadcaster.postAgentMessage(cmd.roomId, NOTHING_TO_RESTOCK_REPLY);
      return;
    }

    const candidates = await this.related(snap.low_stock);
    console.log("[PIPELINE][restock]", { room_id: cmd.roomId, backend: backendId, low: snap.low_stock.length });

    const result = await generateRestockPlan(generate, { low_stock: snap.low_stock, candidates });
    await this.emit(cmd.roomId, "restock", result, CONFIRMATIONS.restock);
  }

  private async runPlan(cmd: IncomingCommand): Promise<void> {
    const { backendId, generate } = await this.generatorFor(cmd.userId);
    const history = await this.roomHistory(cmd.roomId);
    console.log("[PIPELINE][plan]", { room_id: cmd.roomId, backend: backendId, history: history.length });

    const result = await generateProcurementPlan(generate, history);
    await this.emit(cmd.roomId, "procurement-plan", result, null);
  }

  private async runMention(cmd: IncomingCommand): Promise<void> {
    const question = stripToken(cmd.content, TRIGGERS.mention);
    if (!question) {
      await this.deps.broadcaster.postAgentMessage(cmd.roomId, HELP_TEXT);
      return;
    }

    const { backendId, generate } = await this.generatorFor(cmd.userId);
    let reply: string;
    try {
      reply = await generate([
        { role: "system", content: MENTION_SYSTEM_PROMPT },
        { role: "user", content: question },
      ]);
    } catch (e: unknown) {
      console.error("[PIPELINE][mention] generation failed", { backend: backendId, error: errMsg(e) });
      reply = errorReply(e);
    }
    await this.deps.broadcaster.postAgentMessage(cmd.roomId, reply.trim() || "(empty reply)");
  }
}
