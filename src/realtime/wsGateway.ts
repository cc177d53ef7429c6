// src/realtime/wsGateway.ts
import type { IncomingMessage, Server as HttpServer } from "http";
import { v4 as uuidv4 } from "uuid";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import { RoomRegistry, type RoomConnection } from "./roomRegistry";

// close code for "policy violation"
const WS_POLICY_VIOLATION = 1008;

class WsConnection implements RoomConnection {
  readonly id = uuidv4();
  alive = true;

  constructor(readonly ws: WebSocket) {}

  isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(data: string, onError: (err: Error) => void): void {
    this.ws.send(data, (err) => {
      if (err) onError(err);
    });
  }
}

export type RoomIdParse = { ok: true; roomId: number } | { ok: false; reason: string };

export function parseRoomIdParam(raw: string | null): RoomIdParse {
  if (raw == null || raw.trim() === "") return { ok: false, reason: "room_id required" };
  const t = raw.trim();
  if (!/^\d+$/.test(t)) return { ok: false, reason: "room_id must be a positive integer" };
  const n = Number(t);
  if (!Number.isSafeInteger(n) || n <= 0) {
    return { ok: false, reason: "room_id must be a positive integer" };
  }
  return { ok: true, roomId: n };
}

function roomIdFromRequest(req: IncomingMessage): RoomIdParse {
  const url = new URL(req.url ?? "/", "http://localhost");
  return parseRoomIdParam(url.searchParams.get("room_id"));
}

function isPingFrame(raw: RawData): boolean {
  try {
    const parsed: unknown = JSON.parse(raw.toString());
    return typeof parsed === "object" && parsed !== null && "type" in parsed && parsed.type === "ping";
  } catch {
    return false;
  }
}

export type WsGateway = {
  wss: WebSocketServer;
  close(): Promise<void>;
};

export function attachWsGateway(opts: {
  server: HttpServer;
  registry: RoomRegistry;
  heartbeatMs: number;
  path?: string;
}): WsGateway {
  const { server, registry, heartbeatMs } = opts;
  const wss = new WebSocketServer({ server, path: opts.path ?? "/ws" });
  const live = new Map<WebSocket, WsConnection>();

  wss.on("connection", (ws, req) => {
    const parsed = roomIdFromRequest(req);
    if (!parsed.ok) {
      console.warn("[WS][REJECT]", { url: req.url, reason: parsed.reason });
      ws.close(WS_POLICY_VIOLATION, parsed.reason);
      return;
    }

    const roomId = parsed.roomId;
    const conn = new WsConnection(ws);
    live.set(ws, conn);
    console.log("[WS][CONNECT]", { room_id: roomId, conn: conn.id });
    registry.subscribe(conn, roomId);

    ws.on("pong", () => {
      conn.alive = true;
    });

    // clients mostly listen; frames other than ping are ignored
    ws.on("message", (raw) => {
      if (isPingFrame(raw) && conn.isOpen()) {
        ws.send(JSON.stringify({ type: "pong" }));
      }
    });

    ws.on("error", (err) => {
      console.warn("[WS][ERROR]", { room_id: roomId, conn: conn.id, error: err.message });
    });

    ws.on("close", () => {
      live.delete(ws);
      registry.unsubscribe(conn, roomId);
    });
  });

  const heartbeat = setInterval(() => {
    for (const [ws, conn] of live) {
      if (!conn.alive) {
        const roomId = registry.roomOf(conn);
        if (roomId !== null) registry.unsubscribe(conn, roomId);
        live.delete(ws);
        ws.terminate();
        continue;
      }
      conn.alive = false;
      ws.ping();
    }
  }, heartbeatMs);
  heartbeat.unref();

  return {
    wss,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(heartbeat);
        for (const ws of live.keys()) ws.terminate();
        live.clear();
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
