import { describe, expect, it } from "vitest";

import { BuildQueue } from "./build-queue.js";

describe("BuildQueue", () => {
  it("hands out ids in FIFO order", async () => {
    const queue = new BuildQueue();
    queue.enqueue("b-1");
    queue.enqueue("b-2");

    expect(await queue.take()).toBe("b-1");
    expect(await queue.take()).toBe("b-2");
    expect(queue.size).toBe(0);
  });

  it("wakes waiting takers in arrival order", async () => {
    const queue = new BuildQueue();
    const first = queue.take();
    const second = queue.take();

    queue.enqueue("b-1");
    queue.enqueue("b-2");

    expect(await first).toBe("b-1");
    expect(await second).toBe("b-2");
    expect(queue.size).toBe(0);
  });

  it("removes queued ids", () => {
    const queue = new BuildQueue();
    queue.enqueue("b-1");
    queue.enqueue("b-2");

    expect(queue.remove("b-1")).toBe(true);
    expect(queue.remove("b-1")).toBe(false);
    expect(queue.snapshot()).toEqual(["b-2"]);
  });

  it("rejects takers when their signal aborts", async () => {
    const queue = new BuildQueue();
    const controller = new AbortController();

    const waiting = queue.take(controller.signal);
    controller.abort(new Error("shutting down"));

    await expect(waiting).rejects.toThrowError("shutting down");

    queue.enqueue("b-1");
    expect(queue.snapshot()).toEqual(["b-1"]);
  });
});
