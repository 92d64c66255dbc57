import { describe, it, expect, vi } from "vitest";
import { MessageQueue } from "../message-queue.js";
import { CancellationToken, CancellationError, onAbort } from "../cancellation-token.js";

describe("MessageQueue", () => {
  it("delivers items in push order", async () => {
    const queue = new MessageQueue<number, string>();
    queue.push(1);
    queue.push(2);
    queue.push(3);

    expect(await queue.next()).toEqual({ type: "item", item: 1 });
    expect(await queue.next()).toEqual({ type: "item", item: 2 });
    expect(await queue.next()).toEqual({ type: "item", item: 3 });
  });

  it("hands an item straight to a waiting consumer", async () => {
    const queue = new MessageQueue<string, string>();
    const pending = queue.next();
    queue.push("a");

    expect(await pending).toEqual({ type: "item", item: "a" });
    expect(queue.getMetrics().depth).toBe(0);
  });

  it("drains queued items before reporting the end", async () => {
    const queue = new MessageQueue<number, string>();
    queue.push(1);
    queue.end("done");
    queue.push(2);

    expect(await queue.next()).toEqual({ type: "item", item: 1 });
    expect(await queue.next()).toEqual({ type: "ended", final: "done" });
    expect(await queue.next()).toEqual({ type: "ended", final: "done" });
  });

  it("keeps the first end value", async () => {
    const queue = new MessageQueue<number, string>();
    queue.end("first");
    queue.end("second");

    expect(await queue.next()).toEqual({ type: "ended", final: "first" });
  });

  it("wakes a waiting consumer on end", async () => {
    const queue = new MessageQueue<number, string>();
    const pending = queue.next();
    queue.end("closed");

    expect(await pending).toEqual({ type: "ended", final: "closed" });
  });

  it("resolves cancelled when the signal aborts while waiting", async () => {
    const queue = new MessageQueue<number, string>();
    const controller = new AbortController();
    const pending = queue.next(controller.signal);

    controller.abort();
    expect(await pending).toEqual({ type: "cancelled" });

    // The next push is not lost to the cancelled waiter
    queue.push(7);
    expect(await queue.next()).toEqual({ type: "item", item: 7 });
  });

  it("resolves cancelled immediately for an aborted signal on an empty queue", async () => {
    const queue = new MessageQueue<number, string>();
    const controller = new AbortController();
    controller.abort();

    expect(await queue.next(controller.signal)).toEqual({ type: "cancelled" });
  });

  it("rejects a second concurrent consumer", async () => {
    const queue = new MessageQueue<number, string>();
    const first = queue.next();

    await expect(queue.next()).rejects.toThrow("MessageQueue supports a single consumer");

    queue.push(1);
    expect(await first).toEqual({ type: "item", item: 1 });
  });

  it("signals high and low watermarks", async () => {
    const onHigh = vi.fn();
    const onLow = vi.fn();
    const queue = new MessageQueue<number, string>({ highWaterMark: 4, onHigh, onLow });

    for (let i = 0; i < 4; i++) queue.push(i);
    expect(onHigh).toHaveBeenCalledTimes(1);
    expect(queue.getMetrics().paused).toBe(true);

    queue.push(4);
    expect(onHigh).toHaveBeenCalledTimes(1);

    // 5 queued; low watermark is 2
    await queue.next();
    await queue.next();
    expect(onLow).not.toHaveBeenCalled();
    await queue.next();
    expect(onLow).toHaveBeenCalledTimes(1);
    expect(queue.getMetrics()).toEqual({ depth: 2, paused: false, ended: false, delivered: 3 });
  });
});

describe("CancellationToken", () => {
  it("records the first reason only", () => {
    const token = new CancellationToken<string>();

    expect(token.cancel("first")).toBe(true);
    expect(token.cancel("second")).toBe(false);
    expect(token.reason).toBe("first");
    expect(token.isCancelled()).toBe(true);
    expect(token.signal.aborted).toBe(true);
  });

  it("recognizes cancellation and abort errors", () => {
    const abortError = new Error("aborted");
    abortError.name = "AbortError";

    expect(CancellationError.isCancellation(new CancellationError())).toBe(true);
    expect(CancellationError.isCancellation(abortError)).toBe(true);
    expect(CancellationError.isCancellation(new Error("other"))).toBe(false);
  });
});

describe("onAbort", () => {
  it("runs the callback once on abort", () => {
    const controller = new AbortController();
    const fn = vi.fn();
    onAbort(controller.signal, fn);

    controller.abort();
    controller.abort();
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("runs immediately for an aborted signal", () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn();

    onAbort(controller.signal, fn);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not run after detaching", () => {
    const controller = new AbortController();
    const fn = vi.fn();
    const detach = onAbort(controller.signal, fn);

    detach();
    controller.abort();
    expect(fn).not.toHaveBeenCalled();
  });
});
