import { describe, expect, it } from "vitest";
import { RoomRegistry, RoomRegistryError } from "../../src/realtime/roomRegistry";
import { FakeConnection } from "../helpers/fakes";

describe("RoomRegistry", () => {
  it("delivers a broadcast only to connections in that room", () => {
    const reg = new RoomRegistry();
    const a = new FakeConnection();
    const b = new FakeConnection();
    const other = new FakeConnection();
    reg.subscribe(a, 1);
    reg.subscribe(b, 1);
    reg.subscribe(other, 2);

    const sent = reg.broadcast(1, { type: "pong" });

    expect(sent).toBe(2);
    expect(a.frames).toEqual(['{"type":"pong"}']);
    expect(b.frames).toEqual(['{"type":"pong"}']);
    expect(other.frames).toEqual([]);
  });

  it("returns 0 for a room nobody listens to", () => {
    expect(new RoomRegistry().broadcast(9, { type: "pong" })).toBe(0);
  });

  it("rejects non-positive and non-integer room ids", () => {
    const reg = new RoomRegistry();
    const c = new FakeConnection();
    expect(() => reg.subscribe(c, 0)).toThrow(RoomRegistryError);
    expect(() => reg.subscribe(c, -3)).toThrow(RoomRegistryError);
    expect(() => reg.subscribe(c, 1.5)).toThrow(RoomRegistryError);
    expect(reg.stats()).toEqual({ rooms: 0, connections: 0 });
  });

  it("moves a connection that subscribes to a second room", () => {
    const reg = new RoomRegistry();
    const c = new FakeConnection();
    reg.subscribe(c, 1);
    reg.subscribe(c, 2);

    expect(reg.roomSize(1)).toBe(0);
    expect(reg.roomSize(2)).toBe(1);
    expect(reg.roomOf(c)).toBe(2);
  });

  it("unsubscribe is idempotent", () => {
    const reg = new RoomRegistry();
    const c = new FakeConnection();
    reg.subscribe(c, 4);

    expect(reg.unsubscribe(c, 4)).toBe(true);
    expect(reg.unsubscribe(c, 4)).toBe(false);
    expect(reg.roomOf(c)).toBeNull();
    expect(reg.stats()).toEqual({ rooms: 0, connections: 0 });
  });

  it("drops closed, throwing and later-failing connections but still serves the rest", () => {
    const reg = new RoomRegistry();
    const healthy = new FakeConnection();
    const closed = new FakeConnection();
    const throwing = new FakeConnection();
    const flaky = new FakeConnection();
    closed.open = false;
    throwing.throwOnSend = true;
    flaky.failLater = true;
    for (const c of [healthy, closed, throwing, flaky]) reg.subscribe(c, 7);

    const sent = reg.broadcast(7, { type: "pong" });

    // flaky's send was accepted before its error came back
    expect(sent).toBe(2);
    expect(healthy.frames).toHaveLength(1);
    expect(reg.roomSize(7)).toBe(1);
    expect(reg.roomOf(healthy)).toBe(7);

    expect(reg.broadcast(7, { type: "pong" })).toBe(1);
    expect(healthy.frames).toHaveLength(2);
    expect(flaky.frames).toHaveLength(1);
  });
});
