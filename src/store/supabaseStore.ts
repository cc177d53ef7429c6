// src/store/supabaseStore.ts
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ChatMessage, InventoryItem, InventoryUpsert, Room, RoomMember, User } from "../types";
import { StoreError, type RecordStore } from "./recordStore";

// Rows are decoded with zod so nothing untyped leaks out of this file.
const UserRow = z.object({
  id: z.coerce.number(),
  username: z.string(),
  password_hash: z.string(),
  preferred_llm_model: z.string().nullable().default(null),
  created_at: z.coerce.string(),
});

const RoomRow = z.object({
  id: z.coerce.number(),
  name: z.string(),
  owner_id: z.coerce.number(),
  created_at: z.coerce.string(),
});

const MessageRow = z.object({
  id: z.coerce.number(),
  room_id: z.coerce.number(),
  user_id: z.coerce.number().nullable(),
  content: z.string(),
  is_bot: z.boolean(),
  created_at: z.coerce.string(),
});

const InventoryRow = z.object({
  product_id: z.coerce.number(),
  user_id: z.coerce.number(),
  product_name: z.string(),
  stock: z.coerce.number().int(),
  safety_stock_level: z.coerce.number().int(),
});

const IdRow = z.object({ id: z.coerce.number(), username: z.string() });

type PgError = { message: string; code?: string } | null;

function check(op: string, error: PgError): void {
  if (error) throw new StoreError(op, error.message, error.code ?? null);
}

export class SupabaseStore implements RecordStore {
  constructor(private readonly supa: SupabaseClient) {}

  async getUser(id: number): Promise<User | null> {
    const { data, error } = await this.supa.from("users").select("*").eq("id", id).maybeSingle();
    check("users.get", error);
    return data ? UserRow.parse(data) : null;
  }

  async findUserByUsername(username: string): Promise<User | null> {
    const { data, error } = await this.supa
      .from("users")
      .select("*")
      .eq("username", username)
      .maybeSingle();
    check("users.by_username", error);
    return data ? UserRow.parse(data) : null;
  }

  async createUser(input: { username: string; password_hash: string; preferred_llm_model: string }): Promise<User> {
    const { data, error } = await this.supa.from("users").insert(input).select("*").single();
    check("users.insert", error);
    return UserRow.parse(data);
  }

  async setPreferredModel(userId: number, model: string): Promise<void> {
    const { error } = await this.supa
      .from("users")
      .update({ preferred_llm_model: model })
      .eq("id", userId);
    check("users.set_model", error);
  }

  async getRoom(id: number): Promise<Room | null> {
    const { data, error } = await this.supa.from("rooms").select("*").eq("id", id).maybeSingle();
    check("rooms.get", error);
    return data ? RoomRow.parse(data) : null;
  }

  async findRoomByName(name: string): Promise<Room | null> {
    const { data, error } = await this.supa.from("rooms").select("*").eq("name", name).maybeSingle();
    check("rooms.by_name", error);
    return data ? RoomRow.parse(data) : null;
  }

  async createRoom(input: { name: string; owner_id: number }): Promise<Room> {
    const { data, error } = await this.supa.from("rooms").insert(input).select("*").single();
    check("rooms.insert", error);
    return RoomRow.parse(data);
  }

  async listRoomsForUser(userId: number): Promise<Room[]> {
    const { data: links, error } = await this.supa
      .from("room_members")
      .select("room_id")
      .eq("user_id", userId);
    check("room_members.by_user", error);

    const ids = z.array(z.object({ room_id: z.coerce.number() })).parse(links ?? []).map((l) => l.room_id);
    if (!ids.length) return [];

    const { data: rooms, error: roomsErr } = await this.supa
      .from("rooms")
      .select("*")
      .in("id", ids)
      .order("created_at", { ascending: true });
    check("rooms.in", roomsErr);
    return z.array(RoomRow).parse(rooms ?? []);
  }

  async isMember(roomId: number, userId: number): Promise<boolean> {
    const { data, error } = await this.supa
      .from("room_members")
      .select("id")
      .eq("room_id", roomId)
      .eq("user_id", userId)
      .maybeSingle();
    check("room_members.check", error);
    return !!data;
  }

  async addMember(roomId: number, userId: number): Promise<void> {
    const { error } = await this.supa
      .from("room_members")
      .upsert({ room_id: roomId, user_id: userId }, { onConflict: "room_id,user_id" });
    check("room_members.upsert", error);
  }

  async listMembers(roomId: number): Promise<RoomMember[]> {
    const { data: links, error } = await this.supa
      .from("room_members")
      .select("user_id")
      .eq("room_id", roomId);
    check("room_members.by_room", error);

    const ids = z.array(z.object({ user_id: z.coerce.number() })).parse(links ?? []).map((l) => l.user_id);
    if (!ids.length) return [];

    const { data: users, error: usersErr } = await this.supa
      .from("users")
      .select("id, username")
      .in("id", ids);
    check("users.in", usersErr);
    return z.array(IdRow).parse(users ?? []);
  }

  async insertMessage(input: { room_id: number; user_id: number | null; content: string; is_bot: boolean }): Promise<ChatMessage> {
    const { data, error } = await this.supa.from("messages").insert(input).select("*").single();
    check("messages.insert", error);
    return MessageRow.parse(data);
  }

  async listRecentMessages(roomId: number, limit: number): Promise<ChatMessage[]> {
    const { data, error } = await this.supa
      .from("messages")
      .select("*")
      .eq("room_id", roomId)
      .order("created_at", { ascending: false })
      .limit(limit);
    check("messages.recent", error);
    return z.array(MessageRow).parse(data ?? []).reverse();
  }

  async listInventory(userId: number): Promise<InventoryItem[]> {
    const { data, error } = await this.supa
      .from("inventory")
      .select("product_id, user_id, product_name, stock, safety_stock_level")
      .eq("user_id", userId)
      .order("product_name", { ascending: true });
    check("inventory.list", error);
    return z.array(InventoryRow).parse(data ?? []);
  }

  async upsertInventory(userId: number, item: InventoryUpsert): Promise<InventoryItem> {
    const { data, error } = await this.supa
      .from("inventory")
      .upsert(
        { user_id: userId, ...item, updated_at: new Date().toISOString() },
        { onConflict: "user_id,product_name" }
      )
      .select("product_id, user_id, product_name, stock, safety_stock_level")
      .single();
    check("inventory.upsert", error);
    return InventoryRow.parse(data);
  }

  async deleteInventory(userId: number, productId: number): Promise<boolean> {
    const { data, error } = await this.supa
      .from("inventory")
      .delete()
      .eq("user_id", userId)
      .eq("product_id", productId)
      .select("product_id");
    check("inventory.delete", error);
    return (data ?? []).length > 0;
  }
}
