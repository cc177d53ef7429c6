// src/realtime/broadcast.ts
import type { RecordStore } from "../store/recordStore";
import type { AiEventKind, AiEventPayload, ChatMessage, MessagePayload } from "../types";
import type { RoomRegistry } from "./roomRegistry";

/**
 * Shapes the outbound frames and pushes them through the registry.
 * Everything the pipeline shows to a room goes through here.
 */
export class RoomBroadcaster {
  constructor(
    private readonly registry: RoomRegistry,
    private readonly store: RecordStore,
    readonly agentName: string
  ) {}

  async toWire(msg: ChatMessage): Promise<MessagePayload> {
    let username = this.agentName;
    if (!msg.is_bot) {
      const author = msg.user_id != null ? await this.store.getUser(msg.user_id) : null;
      username = author?.username ?? "unknown";
    }
    return {
      type: "message",
      room_id: msg.room_id,
      message: {
        id: msg.id,
        username,
        content: msg.content,
        is_bot: msg.is_bot,
        created_at: msg.created_at,
      },
    };
  }

  async broadcastMessage(msg: ChatMessage): Promise<number> {
    const payload = await this.toWire(msg);
    return this.registry.broadcast(msg.room_id, payload);
  }

  broadcastEvent(roomId: number, kind: AiEventKind, narrative: string, payload: unknown): number {
    const frame: AiEventPayload = { type: "ai_event", event: kind, room_id: roomId, narrative, payload };
    const sent = this.registry.broadcast(roomId, frame);
    console.log("[WS][EMIT][ai_event]", { room_id: roomId, event: kind, clients: sent });
    return sent;
  }

  /** Persists an agent-authored message, then shows it to the room. */
  async postAgentMessage(roomId: number, content: string): Promise<ChatMessage> {
    const msg = await this.store.insertMessage({ room_id: roomId, user_id: null, content, is_bot: true });
    await this.broadcastMessage(msg);
    return msg;
  }
}
