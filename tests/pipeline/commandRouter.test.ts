import { describe, expect, it } from "vitest";
import { RESTOCK_HINT } from "../../src/ai/planners/inventoryAnalyzer";
import { BackendRejected, BackendUnavailable, BLOCKED_REPLY } from "../../src/ai/providers";
import {
  CONFIRMATIONS,
  EMPTY_INVENTORY_REPLY,
  errorReply,
  MENTION_SYSTEM_PROMPT,
  NOTHING_TO_RESTOCK_REPLY,
} from "../../src/pipeline/commandRouter";
import { TaskPool } from "../../src/pipeline/taskPool";
import { HELP_TEXT } from "../../src/pipeline/triggers";
import type { ServerPayload } from "../../src/types";
import { candidate, FakeCatalog, makeRig, ScriptedBackend, seedRoom } from "../helpers/fakes";

function texts(frames: ServerPayload[]): string[] {
  return frames.flatMap((f) => (f.type === "message" ? [f.message.content] : []));
}

function kinds(frames: ServerPayload[]): string[] {
  return frames.map((f) => (f.type === "ai_event" ? `event:${f.event}` : f.type));
}

async function stock(rig: ReturnType<typeof makeRig>, userId: number) {
  await rig.store.upsertInventory(userId, { product_name: "Milk", stock: 1, safety_stock_level: 4 });
  await rig.store.upsertInventory(userId, { product_name: "Rice", stock: 9, safety_stock_level: 2 });
}

describe("CommandRouter", () => {
  it("analysis broadcasts the event before the confirmation", async () => {
    const openai = new ScriptedBackend("openai", ['{"narrative":"Milk is low."}']);
    const catalog = new FakeCatalog({ Milk: [candidate("Whole Milk", "Dairy")] });
    const rig = makeRig({ backends: [openai], catalog });
    const { user, room, conn } = await seedRoom(rig);
    await stock(rig, user.id);

    expect(await rig.router.handle({ roomId: room.id, userId: user.id, content: "@gro analyze" })).toBe("analysis");

    const frames = conn.payloads();
    expect(kinds(frames)).toEqual(["event:analysis", "message"]);
    expect(frames[0]).toEqual({
      type: "ai_event",
      event: "analysis",
      room_id: room.id,
      narrative: "Milk is low." + RESTOCK_HINT,
      payload: {
        low_stock: [{ product_name: "Milk", stock: 1, safety_stock_level: 4 }],
        healthy: [{ product_name: "Rice", stock: 9, safety_stock_level: 2 }],
      },
    });
    expect(texts(frames)).toEqual([CONFIRMATIONS.analysis]);
    // only low-stock items are looked up
    expect(catalog.terms).toEqual(["Milk"]);
  });

  it.each(["@gro analyze", "@gro menu", "@gro restock"])("%s with no inventory asks for items first", async (content) => {
    const openai = new ScriptedBackend("openai", ["{}"]);
    const rig = makeRig({ backends: [openai] });
    const { user, room, conn } = await seedRoom(rig);

    await rig.router.handle({ roomId: room.id, userId: user.id, content });

    expect(texts(conn.payloads())).toEqual([EMPTY_INVENTORY_REPLY]);
    expect(openai.calls).toHaveLength(0);
  });

  it("restock with nothing below safety stock says so without calling the model", async () => {
    const openai = new ScriptedBackend("openai", ["{}"]);
    const rig = makeRig({ backends: [openai] });
    const { user, room, conn } = await seedRoom(rig);
    await rig.store.upsertInventory(user.id, { product_name: "Rice", stock: 9, safety_stock_level: 2 });

    await rig.router.handle({ roomId: room.id, userId: user.id, content: "@gro restock" });

    expect(texts(conn.payloads())).toEqual([NOTHING_TO_RESTOCK_REPLY]);
    expect(openai.calls).toHaveLength(0);
  });

  it("restock sends the plan event then the confirmation", async () => {
    const reply = JSON.stringify({
      narrative: "Order milk.",
      restock_plan: [{ product_name: "Milk", needed_qty: 3, recommended_supplier: "Whole Milk", price_estimate: 1.5 }],
    });
    const rig = makeRig({ backends: [new ScriptedBackend("openai", [reply])] });
    const { user, room, conn } = await seedRoom(rig);
    await stock(rig, user.id);

    await rig.router.handle({ roomId: room.id, userId: user.id, content: "@gro restock" });

    const frames = conn.payloads();
    expect(kinds(frames)).toEqual(["event:restock", "message"]);
    expect(frames[0]).toMatchObject({
      narrative: "Order milk.",
      payload: {
        restock_plan: [{ product_name: "Milk", needed_qty: 3, recommended_supplier: "Whole Milk", price_estimate: 1.5 }],
      },
    });
    expect(texts(frames)).toEqual([CONFIRMATIONS.restock]);
  });

  it("menu looks up every item and confirms after the event", async () => {
    const catalog = new FakeCatalog();
    const rig = makeRig({ backends: [new ScriptedBackend("openai", ['{"narrative":"Rice pudding!","dishes":[]}'])], catalog });
    const { user, room, conn } = await seedRoom(rig);
    await stock(rig, user.id);

    await rig.router.handle({ roomId: room.id, userId: user.id, content: "@gro menu" });

    expect(kinds(conn.payloads())).toEqual(["event:menu", "message"]);
    expect(texts(conn.payloads())).toEqual([CONFIRMATIONS.menu]);
    expect(catalog.terms).toEqual(["Milk", "Rice"]);
  });

  it("plan reads the chat history and sends only the event", async () => {
    const openai = new ScriptedBackend("openai", [
      '{"goal":"BBQ"}',
      '{"summary":"Buns","narrative":"Got it","items":[{"name":"Buns","quantity":"12","category":"Bakery"}]}',
    ]);
    const rig = makeRig({ backends: [openai] });
    const { user, room, conn } = await seedRoom(rig);
    await rig.store.insertMessage({ room_id: room.id, user_id: user.id, content: "we need 12 buns", is_bot: false });
    await rig.store.insertMessage({ room_id: room.id, user_id: null, content: "ok", is_bot: true });

    await rig.router.handle({ roomId: room.id, userId: user.id, content: "@gro plan" });

    expect(openai.calls[0]?.turns[1]?.content).toBe("Chat history:\n- alice: we need 12 buns\n- Gro Bot: ok\n\nExtract the goal.");
    expect(conn.payloads()).toEqual([
      {
        type: "ai_event",
        event: "procurement-plan",
        room_id: room.id,
        narrative: "Got it",
        payload: {
          goal: "BBQ",
          summary: "Buns",
          items: [{ name: "Buns", quantity: "12", category: "Bakery", notes: "" }],
        },
      },
    ]);
  });

  it("mention answers the question with the stored backend", async () => {
    const openai = new ScriptedBackend("openai", ["wrong backend"]);
    const gemini = new ScriptedBackend("gemini", ["  Basil loves tomatoes.  "]);
    const rig = makeRig({ backends: [openai, gemini] });
    const { user, room, conn } = await seedRoom(rig, "bob", "gemini");

    await rig.router.handle({ roomId: room.id, userId: user.id, content: "@gro what goes with basil?" });

    expect(gemini.calls[0]?.turns).toEqual([
      { role: "system", content: MENTION_SYSTEM_PROMPT },
      { role: "user", content: "what goes with basil?" },
    ]);
    expect(openai.calls).toHaveLength(0);
    expect(texts(conn.payloads())).toEqual(["Basil loves tomatoes."]);
  });

  it("mention without a question posts the help text", async () => {
    const rig = makeRig();
    const { user, room, conn } = await seedRoom(rig);

    await rig.router.handle({ roomId: room.id, userId: user.id, content: "@gro" });

    expect(texts(conn.payloads())).toEqual([HELP_TEXT]);
  });

  it("mention turns failures and blocks into a room message", async () => {
    const down = makeRig({ backends: [new ScriptedBackend("openai", [new BackendUnavailable("openai", "HTTP 500")])] });
    const a = await seedRoom(down);
    await down.router.handle({ roomId: a.room.id, userId: a.user.id, content: "@gro hi" });
    expect(texts(a.conn.payloads())).toEqual(["⚠️ (openai error) HTTP 500"]);

    const blocked = makeRig({ backends: [new ScriptedBackend("openai", [new BackendRejected("openai", "SAFETY")])] });
    const b = await seedRoom(blocked);
    await blocked.router.handle({ roomId: b.room.id, userId: b.user.id, content: "@gro hi" });
    expect(texts(b.conn.payloads())).toEqual([BLOCKED_REPLY]);
  });

  it("dispatch runs in the pool and reports a failing branch in the room", async () => {
    const rig = makeRig({ backends: [new ScriptedBackend("openai", [new BackendUnavailable("openai", "timed out after 1000ms")])] });
    const { user, room, conn } = await seedRoom(rig);
    await stock(rig, user.id);
    const pool = new TaskPool(2);

    expect(rig.router.dispatch(pool, { roomId: room.id, userId: user.id, content: "@gro analyze" })).toBe("analysis");
    await pool.idle();

    expect(texts(conn.payloads())).toEqual(["⚠️ (openai error) timed out after 1000ms"]);
  });

  it("dispatch ignores plain chat", async () => {
    const rig = makeRig();
    const { user, room, conn } = await seedRoom(rig);
    const pool = new TaskPool(1);

    expect(rig.router.dispatch(pool, { roomId: room.id, userId: user.id, content: "hello all" })).toBe("none");
    expect(pool.stats()).toEqual({ active: 0, queued: 0 });
    expect(conn.frames).toEqual([]);
  });
});

describe("errorReply", () => {
  it("names the backend for generation errors", () => {
    expect(errorReply(new BackendUnavailable("gemini", "HTTP 429"))).toBe("⚠️ (gemini error) HTTP 429");
    expect(errorReply(new Error("db down"))).toBe("⚠️ (error) db down");
  });
});
