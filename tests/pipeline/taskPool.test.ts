import { describe, expect, it, vi } from "vitest";
import { TaskPool } from "../../src/pipeline/taskPool";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("TaskPool", () => {
  it("never runs more than its concurrency at once", async () => {
    const pool = new TaskPool(2);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    gates.forEach((g, i) =>
      pool.submit(`job${i}`, async () => {
        started.push(i);
        await g.promise;
      }, () => undefined)
    );

    expect(started).toEqual([0, 1]);
    expect(pool.stats()).toEqual({ active: 2, queued: 1 });

    gates[0]?.resolve();
    await vi.waitFor(() => expect(started).toEqual([0, 1, 2]));

    gates[1]?.resolve();
    gates[2]?.resolve();
    await pool.idle();
    expect(pool.stats()).toEqual({ active: 0, queued: 0 });
  });

  it("hands a failure to onError and keeps going", async () => {
    const pool = new TaskPool(1);
    const onError = vi.fn();
    const ran = vi.fn();

    pool.submit("bad", async () => {
      throw new Error("nope");
    }, onError);
    pool.submit("good", async () => ran(), () => undefined);
    await pool.idle();

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toEqual(new Error("nope"));
    expect(ran).toHaveBeenCalledTimes(1);
  });

  it("survives an onError that throws", async () => {
    const pool = new TaskPool(1);
    pool.submit("bad", async () => {
      throw new Error("first");
    }, () => {
      throw new Error("second");
    });
    await expect(pool.idle()).resolves.toBeUndefined();
  });

  it("rejects a non-positive concurrency", () => {
    expect(() => new TaskPool(0)).toThrow("TaskPool concurrency must be a positive integer, got 0");
  });
});
