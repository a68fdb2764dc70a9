import { describe, expect, it } from "vitest";

import { Broadcaster } from "../src/broadcaster.js";

describe("Broadcaster", () => {
  it("delivers every value to every subscriber in emission order", async () => {
    const broadcaster = new Broadcaster<number>();
    const fast = broadcaster.subscribe();
    const slow = broadcaster.subscribe();
    const other = broadcaster.subscribe();

    const fastSeen: number[] = [];
    const fastReader = (async () => {
      for await (const value of fast) {
        fastSeen.push(value);
        if (fastSeen.length === 3) break;
      }
    })();

    broadcaster.broadcast(1);
    broadcaster.broadcast(2);
    broadcaster.broadcast(3);

    // The slow subscriber has not read anything yet; the fast one is not held up
    await fastReader;
    expect(fastSeen).toEqual([1, 2, 3]);
    expect(slow.pending).toBe(3);

    const slowSeen: number[] = [];
    for (let i = 0; i < 3; i++) {
      const result = await slow.next();
      if (!result.done) slowSeen.push(result.value);
    }
    expect(slowSeen).toEqual([1, 2, 3]);
    expect(other.pending).toBe(3);
  });

  it("only reaches subscribers registered at broadcast time", async () => {
    const broadcaster = new Broadcaster<string>();
    const early = broadcaster.subscribe();
    broadcaster.broadcast("first");
    const late = broadcaster.subscribe();
    broadcaster.broadcast("second");

    expect(early.pending).toBe(2);
    expect(late.pending).toBe(1);
    expect(await late.next()).toEqual({ value: "second", done: false });
  });

  it("removes a subscription once it is closed", () => {
    const broadcaster = new Broadcaster<number>();
    const a = broadcaster.subscribe();
    const b = broadcaster.subscribe();
    expect(broadcaster.size).toBe(2);

    a.close();
    broadcaster.broadcast(1);

    expect(broadcaster.size).toBe(1);
    expect(a.pending).toBe(0);
    expect(b.pending).toBe(1);
  });

  it("ends subscriptions on close and hands out ended ones afterwards", async () => {
    const broadcaster = new Broadcaster<number>();
    const sub = broadcaster.subscribe();
    broadcaster.broadcast(5);
    broadcaster.close();

    expect(broadcaster.isClosed).toBe(true);
    expect(broadcaster.size).toBe(0);
    expect(await sub.next()).toEqual({ value: 5, done: false });
    expect(await sub.next()).toEqual({ value: undefined, done: true });

    const afterClose = broadcaster.subscribe();
    expect(afterClose.isClosed).toBe(true);
    expect(broadcaster.size).toBe(0);
  });
});
