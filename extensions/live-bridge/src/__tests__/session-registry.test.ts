import { describe, it, expect } from "vitest";
import { SessionRegistry } from "../session-registry.js";
import { BridgeSession } from "../session-bridge.js";
import { CapacityExceededError } from "../errors.js";
import { FakeClient, FakeUpstream } from "./fakes.js";

function createSession(id: string) {
  const client = new FakeClient(id);
  const upstream = new FakeUpstream(id);
  return { client, upstream, session: new BridgeSession({ id, client, upstream }) };
}

describe("SessionRegistry", () => {
  it("rejects every reservation when the limit is zero", () => {
    const registry = new SessionRegistry({ maxSessions: 0 });

    expect(() => registry.reserve("a")).toThrow(CapacityExceededError);
    expect(() => registry.reserve("a")).toThrow("Session limit reached (0)");
    expect(registry.pendingCount()).toBe(0);
  });

  it("counts pending reservations against the limit", () => {
    const registry = new SessionRegistry({ maxSessions: 2 });
    registry.reserve("a");
    registry.reserve("b");

    expect(registry.pendingCount()).toBe(2);
    expect(registry.size()).toBe(0);
    expect(() => registry.reserve("c")).toThrow(CapacityExceededError);
  });

  it("frees the slot when a reservation is released", () => {
    const registry = new SessionRegistry({ maxSessions: 1 });
    const reservation = registry.reserve("a");

    reservation.release();
    reservation.release();

    expect(registry.pendingCount()).toBe(0);
    expect(() => registry.reserve("b")).not.toThrow();
  });

  it("moves a committed reservation into the live set", () => {
    const registry = new SessionRegistry({ maxSessions: 1 });
    const { session } = createSession("a");

    const reservation = registry.reserve("a");
    reservation.commit(session);
    reservation.release();

    expect(registry.get("a")).toBe(session);
    expect(registry.size()).toBe(1);
    expect(registry.pendingCount()).toBe(0);
    expect(() => registry.reserve("b")).toThrow(CapacityExceededError);
  });

  it("rejects a duplicate id", () => {
    const registry = new SessionRegistry({ maxSessions: 5 });
    registry.register(createSession("a").session);

    expect(() => registry.reserve("a")).toThrow("Session id already in use: a");
  });

  it("treats unregistering an unknown id as a no-op", () => {
    const registry = new SessionRegistry({ maxSessions: 5 });
    const { session } = createSession("a");
    registry.register(session);

    expect(registry.unregister("a")).toBe(true);
    expect(registry.unregister("a")).toBe(false);
    expect(registry.unregister("missing")).toBe(false);
    expect(registry.size()).toBe(0);
  });

  it("rejects an invalid limit", () => {
    expect(() => new SessionRegistry({ maxSessions: -1 })).toThrow(
      "maxSessions must be a non-negative integer, got -1",
    );
  });

  it("returns snapshots of live sessions", () => {
    const registry = new SessionRegistry({ maxSessions: 5 });
    registry.register(createSession("a").session);
    registry.register(createSession("b").session);

    const snapshots = registry.snapshots();
    expect(snapshots.map((s) => s.id)).toEqual(["a", "b"]);
    expect(snapshots.every((s) => s.state === "active")).toBe(true);
  });

  it("shuts down every session while sessions unregister themselves", async () => {
    const registry = new SessionRegistry({ maxSessions: 5 });
    const sessions = [createSession("a"), createSession("b"), createSession("c")];

    for (const { session } of sessions) {
      registry.register(session);
      // Mirror the server: a session leaves the registry once it has run
      void session.run().then(() => registry.unregister(session.id));
    }

    const ended = await registry.shutdownAll();

    expect(ended.map((s) => s.endReason)).toEqual([
      "server-shutdown",
      "server-shutdown",
      "server-shutdown",
    ]);
    for (const { client, upstream } of sessions) {
      expect(upstream.closeCalls).toBe(1);
      expect(client.closeCalls).toEqual([{ code: 1001, reason: "server_shutdown" }]);
    }
    await Promise.resolve();
    expect(registry.size()).toBe(0);
  });

  it("resolves immediately with no sessions", async () => {
    const registry = new SessionRegistry({ maxSessions: 5 });
    expect(await registry.shutdownAll()).toEqual([]);
  });
});
