// src/types.ts

// ─────────────────────────────────────────────
// Stored records (snake_case mirrors the tables)
// ─────────────────────────────────────────────

export type User = {
  id: number;
  username: string;
  password_hash: string;
  preferred_llm_model: string | null;
  created_at: string;
};

export type Room = {
  id: number;
  name: string;
  owner_id: number;
  created_at: string;
};

export type RoomMember = {
  id: number;
  username: string;
};

// user_id null ⇒ authored by the agent
export type ChatMessage = {
  readonly id: number;
  readonly room_id: number;
  readonly user_id: number | null;
  readonly content: string;
  readonly is_bot: boolean;
  readonly created_at: string;
};

export type InventoryItem = {
  product_id: number;
  user_id: number;
  product_name: string;
  stock: number;
  safety_stock_level: number;
};

export type InventoryUpsert = {
  product_name: string;
  stock: number;
  safety_stock_level: number;
};

// Read-only projection from the catalog service; never persisted here.
export type CatalogCandidate = {
  title: string;
  category: string;
  price: number;
  rating: number | null;
};

// ─────────────────────────────────────────────
// Outbound realtime payloads
// ─────────────────────────────────────────────

export type AiEventKind = "analysis" | "menu" | "restock" | "procurement-plan";

export type WireMessage = {
  id: number;
  username: string;
  content: string;
  is_bot: boolean;
  created_at: string;
};

export type MessagePayload = {
  type: "message";
  room_id: number;
  message: WireMessage;
};

export type AiEventPayload = {
  type: "ai_event";
  event: AiEventKind;
  room_id: number;
  narrative: string;
  payload: unknown;
};

export type ServerPayload = MessagePayload | AiEventPayload | { type: "pong" };
