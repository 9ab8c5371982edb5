import { describe, it, expect } from "vitest";
import { InMemoryCheckpointStore } from "../../../../lib/services/ticket-triage/checkpoint-store";
import type { TicketState } from "../../../../lib/services/ticket-triage/types";

const HOUR = 60 * 60 * 1000;

function suspendedTicket(threadId: string): TicketState {
  return {
    description: "it doesn't work",
    threadId,
    kbMatches: [
      { id: "ISSUE-101", title: "Checkout error 500 on mobile", category: "Bug", score: 0.25, recommendedAction: "Escalate" },
    ],
    needsClarification: true,
    clarifyingQuestion: "Which page fails?",
  };
}

function createStore(maxEntries = 1000) {
  let now = 0;
  const store = new InMemoryCheckpointStore({ ttlMs: 24 * HOUR, maxEntries }, () => now);
  return {
    store,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("InMemoryCheckpointStore", () => {
  it("loads an equal snapshot after save", async () => {
    const { store } = createStore();
    const ticket = suspendedTicket("thread-1");

    await store.save("thread-1", ticket);

    await expect(store.load("thread-1")).resolves.toEqual(ticket);
    expect(store.size()).toBe(1);
  });

  it("isolates stored snapshots from later changes", async () => {
    const { store } = createStore();
    const ticket = suspendedTicket("thread-1");
    await store.save("thread-1", ticket);

    ticket.kbMatches.push({ id: "X", title: "x", category: "Bug", score: 0, recommendedAction: "" });
    const loaded = await store.load("thread-1");
    loaded?.kbMatches.pop();

    const again = await store.load("thread-1");
    expect(again?.kbMatches).toHaveLength(1);
  });

  it("returns undefined for an unknown thread", async () => {
    const { store } = createStore();
    await expect(store.load("missing")).resolves.toBeUndefined();
    await expect(store.take("missing")).resolves.toBeUndefined();
  });

  it("hands a checkpoint to only one of two concurrent takers", async () => {
    const { store } = createStore();
    await store.save("thread-1", suspendedTicket("thread-1"));

    const [first, second] = await Promise.all([store.take("thread-1"), store.take("thread-1")]);

    expect(first?.threadId).toBe("thread-1");
    expect(second).toBeUndefined();
    expect(store.size()).toBe(0);
  });

  it("expires checkpoints older than the TTL", async () => {
    const { store, advance } = createStore();
    await store.save("thread-1", suspendedTicket("thread-1"));

    advance(24 * HOUR);
    await expect(store.load("thread-1")).resolves.toBeDefined();

    advance(1);
    await expect(store.load("thread-1")).resolves.toBeUndefined();
    expect(store.size()).toBe(0);
  });

  it("evicts the oldest checkpoint when full", async () => {
    const { store } = createStore(2);
    await store.save("a", suspendedTicket("a"));
    await store.save("b", suspendedTicket("b"));
    await store.save("c", suspendedTicket("c"));

    expect(store.size()).toBe(2);
    await expect(store.load("a")).resolves.toBeUndefined();
    await expect(store.load("c")).resolves.toBeDefined();
  });

  it("moves a re-saved checkpoint to the back of the eviction order", async () => {
    const { store } = createStore(2);
    await store.save("a", suspendedTicket("a"));
    await store.save("b", suspendedTicket("b"));
    await store.save("a", suspendedTicket("a"));
    await store.save("c", suspendedTicket("c"));

    await expect(store.load("a")).resolves.toBeDefined();
    await expect(store.load("b")).resolves.toBeUndefined();
  });

  it("removes expired checkpoints in a cleanup pass", async () => {
    const { store, advance } = createStore();
    await store.save("old", suspendedTicket("old"));
    advance(25 * HOUR);
    await store.save("fresh", suspendedTicket("fresh"));

    expect(store.cleanupExpired()).toBe(1);
    expect(store.size()).toBe(1);
  });

  it("deletes a checkpoint", async () => {
    const { store } = createStore();
    await store.save("thread-1", suspendedTicket("thread-1"));

    await expect(store.delete("thread-1")).resolves.toBe(true);
    await expect(store.delete("thread-1")).resolves.toBe(false);
  });
});
