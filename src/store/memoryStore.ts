// src/store/memoryStore.ts
import type { ChatMessage, InventoryItem, InventoryUpsert, Room, RoomMember, User } from "../types";
import type { RecordStore } from "./recordStore";

/**
 * In-process store used when Supabase is not configured (local dev) and by tests.
 * Same contract as SupabaseStore, including unique (user, product_name) upserts.
 */
export class MemoryStore implements RecordStore {
  private users = new Map<number, User>();
  private rooms = new Map<number, Room>();
  private members = new Map<number, Set<number>>();
  private messages: ChatMessage[] = [];
  private inventory = new Map<number, InventoryItem>();
  private seq = { user: 0, room: 0, message: 0, product: 0 };

  constructor(private readonly clock: () => Date = () => new Date()) {}

  private now(): string {
    return this.clock().toISOString();
  }

  async getUser(id: number): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findUserByUsername(username: string): Promise<User | null> {
    for (const u of this.users.values()) if (u.username === username) return u;
    return null;
  }

  async createUser(input: { username: string; password_hash: string; preferred_llm_model: string }): Promise<User> {
    const user: User = { id: ++this.seq.user, created_at: this.now(), ...input };
    this.users.set(user.id, user);
    return user;
  }

  async setPreferredModel(userId: number, model: string): Promise<void> {
    const u = this.users.get(userId);
    if (u) this.users.set(userId, { ...u, preferred_llm_model: model });
  }

  async getRoom(id: number): Promise<Room | null> {
    return this.rooms.get(id) ?? null;
  }

  async findRoomByName(name: string): Promise<Room | null> {
    for (const r of this.rooms.values()) if (r.name === name) return r;
    return null;
  }

  async createRoom(input: { name: string; owner_id: number }): Promise<Room> {
    const room: Room = { id: ++this.seq.room, created_at: this.now(), ...input };
    this.rooms.set(room.id, room);
    return room;
  }

  async listRoomsForUser(userId: number): Promise<Room[]> {
    const out: Room[] = [];
    for (const [roomId, set] of this.members) {
      const room = this.rooms.get(roomId);
      if (room && set.has(userId)) out.push(room);
    }
    return out;
  }

  async isMember(roomId: number, userId: number): Promise<boolean> {
    return this.members.get(roomId)?.has(userId) ?? false;
  }

  async addMember(roomId: number, userId: number): Promise<void> {
    let set = this.members.get(roomId);
    if (!set) {
      set = new Set();
      this.members.set(roomId, set);
    }
    set.add(userId);
  }

  async listMembers(roomId: number): Promise<RoomMember[]> {
    const out: RoomMember[] = [];
    for (const id of this.members.get(roomId) ?? []) {
      const u = this.users.get(id);
      if (u) out.push({ id: u.id, username: u.username });
    }
    return out;
  }

  async insertMessage(input: { room_id: number; user_id: number | null; content: string; is_bot: boolean }): Promise<ChatMessage> {
    const msg: ChatMessage = Object.freeze({ id: ++this.seq.message, created_at: this.now(), ...input });
    this.messages.push(msg);
    return msg;
  }

  async listRecentMessages(roomId: number, limit: number): Promise<ChatMessage[]> {
    const inRoom = this.messages.filter((m) => m.room_id === roomId);
    return inRoom.slice(Math.max(0, inRoom.length - limit));
  }

  async listInventory(userId: number): Promise<InventoryItem[]> {
    return [...this.inventory.values()]
      .filter((i) => i.user_id === userId)
      .sort((a, b) => a.product_name.localeCompare(b.product_name));
  }

  async upsertInventory(userId: number, item: InventoryUpsert): Promise<InventoryItem> {
    for (const existing of this.inventory.values()) {
      if (existing.user_id === userId && existing.product_name === item.product_name) {
        const next = { ...existing, stock: item.stock, safety_stock_level: item.safety_stock_level };
        this.inventory.set(existing.product_id, next);
        return next;
      }
    }
    const created: InventoryItem = { product_id: ++this.seq.product, user_id: userId, ...item };
    this.inventory.set(created.product_id, created);
    return created;
  }

  async deleteInventory(userId: number, productId: number): Promise<boolean> {
    const item = this.inventory.get(productId);
    if (!item || item.user_id !== userId) return false;
    return this.inventory.delete(productId);
  }
}
