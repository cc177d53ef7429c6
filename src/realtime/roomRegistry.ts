// src/realtime/roomRegistry.ts

/**
 * One client's duplex channel as seen by the registry.
 *
 * `send` throws when the frame cannot even be queued; a failure that only
 * shows up once the frame is flushed is reported through `onError`.
 */
export interface RoomConnection {
  readonly id: string;
  isOpen(): boolean;
  send(data: string, onError: (err: Error) => void): void;
}

export class RoomRegistryError extends Error {
  readonly code = "InvalidRoom";
  constructor(public readonly roomId: unknown) {
    super(`invalid room id: ${String(roomId)}`);
    this.name = "RoomRegistryError";
  }
}

export function isValidRoomId(roomId: unknown): roomId is number {
  return typeof roomId === "number" && Number.isInteger(roomId) && roomId > 0;
}

/**
 * In-memory room → connections map. Nothing here is persisted: after a restart
 * clients re-subscribe and anything broadcast meanwhile is simply missed.
 *
 * All methods are synchronous, so on the event loop a broadcast always iterates
 * a snapshot that no connect/disconnect can interleave with.
 */
export class RoomRegistry {
  private readonly rooms = new Map<number, Set<RoomConnection>>();
  private readonly roomOfConn = new Map<RoomConnection, number>();

  subscribe(conn: RoomConnection, roomId: number): void {
    if (!isValidRoomId(roomId)) throw new RoomRegistryError(roomId);

    // a connection lives in at most one room
    const current = this.roomOfConn.get(conn);
    if (current !== undefined && current !== roomId) this.unsubscribe(conn, current);

    let set = this.rooms.get(roomId);
    if (!set) {
      set = new Set();
      this.rooms.set(roomId, set);
    }
    set.add(conn);
    this.roomOfConn.set(conn, roomId);

    console.log("[WS][SUBSCRIBE]", { room_id: roomId, conn: conn.id, clients: set.size });
  }

  /** Idempotent. Returns whether the connection was actually removed. */
  unsubscribe(conn: RoomConnection, roomId: number): boolean {
    const set = this.rooms.get(roomId);
    if (!set || !set.delete(conn)) return false;

    if (set.size === 0) this.rooms.delete(roomId);
    if (this.roomOfConn.get(conn) === roomId) this.roomOfConn.delete(conn);

    console.log("[WS][UNSUBSCRIBE]", { room_id: roomId, conn: conn.id, clients: set.size });
    return true;
  }

  /**
   * Serialises once and hands the frame to every connection subscribed at call
   * time. Dead connections are dropped on the way. Returns how many sends were
   * accepted.
   */
  broadcast(roomId: number, payload: unknown): number {
    const set = this.rooms.get(roomId);
    if (!set?.size) return 0;

    const data = JSON.stringify(payload);
    const snapshot = Array.from(set);
    let delivered = 0;

    for (const conn of snapshot) {
      if (!conn.isOpen()) {
        this.drop(conn, roomId, "not_open");
        continue;
      }
      try {
        conn.send(data, (err) => this.drop(conn, roomId, err.message));
        delivered++;
      } catch (e: unknown) {
        this.drop(conn, roomId, e instanceof Error ? e.message : String(e));
      }
    }

    return delivered;
  }

  roomSize(roomId: number): number {
    return this.rooms.get(roomId)?.size ?? 0;
  }

  roomOf(conn: RoomConnection): number | null {
    return this.roomOfConn.get(conn) ?? null;
  }

  stats(): { rooms: number; connections: number } {
    return { rooms: this.rooms.size, connections: this.roomOfConn.size };
  }

  private drop(conn: RoomConnection, roomId: number, reason: string): void {
    if (this.unsubscribe(conn, roomId)) {
      console.warn("[WS][DROP_DEAD]", { room_id: roomId, conn: conn.id, reason });
    }
  }
}
