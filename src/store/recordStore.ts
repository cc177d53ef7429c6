// src/store/recordStore.ts
import type {
  ChatMessage,
  InventoryItem,
  InventoryUpsert,
  Room,
  RoomMember,
  User,
} from "../types";

/**
 * Everything the service persists goes through this interface.
 * Only point lookups and single-row upserts are relied on; no
 * multi-statement transactions.
 */
export interface RecordStore {
  // users
  getUser(id: number): Promise<User | null>;
  findUserByUsername(username: string): Promise<User | null>;
  createUser(input: { username: string; password_hash: string; preferred_llm_model: string }): Promise<User>;
  setPreferredModel(userId: number, model: string): Promise<void>;

  // rooms + membership
  getRoom(id: number): Promise<Room | null>;
  findRoomByName(name: string): Promise<Room | null>;
  createRoom(input: { name: string; owner_id: number }): Promise<Room>;
  listRoomsForUser(userId: number): Promise<Room[]>;
  isMember(roomId: number, userId: number): Promise<boolean>;
  addMember(roomId: number, userId: number): Promise<void>;
  listMembers(roomId: number): Promise<RoomMember[]>;

  // messages
  insertMessage(input: { room_id: number; user_id: number | null; content: string; is_bot: boolean }): Promise<ChatMessage>;
  /** Most recent `limit` messages, oldest first. */
  listRecentMessages(roomId: number, limit: number): Promise<ChatMessage[]>;

  // inventory
  listInventory(userId: number): Promise<InventoryItem[]>;
  upsertInventory(userId: number, item: InventoryUpsert): Promise<InventoryItem>;
  deleteInventory(userId: number, productId: number): Promise<boolean>;
}

export class StoreError extends Error {
  constructor(
    public readonly op: string,
    message: string,
    public readonly code: string | null = null
  ) {
    super(`${op}: ${message}`);
    this.name = "StoreError";
  }
}
