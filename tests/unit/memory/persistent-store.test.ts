/**
 * Unit tests for the persistent memory store over the in-memory document store.
 */

import { PersistentMemoryStore } from "../../../src/memory/persistent-store";
import { createScope } from "../../../src/memory/scope";
import { InMemoryDocumentStore } from "../../../src/store/in-memory";
import { FakeClock, FlakyDocumentStore, makeTurn } from "../../helpers/fixtures";

const scope = createScope({ botName: "Lynae", guildId: "1", channelId: "10", userId: "100" });
const sibling = createScope({ botName: "Lynae", guildId: "1", channelId: "10", userId: "200" });
const otherBot = createScope({ botName: "Rook", guildId: "1", channelId: "10", userId: "100" });

function setup(store: InMemoryDocumentStore = new InMemoryDocumentStore()): {
  store: InMemoryDocumentStore;
  memory: PersistentMemoryStore;
  clock: FakeClock;
} {
  const clock = new FakeClock();
  return { store, memory: new PersistentMemoryStore(store, { clock: clock.clock }), clock };
}

describe("PersistentMemoryStore.append", () => {
  it("creates the scope document and counts new turns", async () => {
    const { memory, store } = setup();
    expect(await memory.append(scope, makeTurn(1, "hello"))).toEqual({ ok: true, value: { created: true } });
    await memory.append(scope, makeTurn(2, "again"));

    const doc = await store.get("bot_memory/channel_memory_lynae_1_10_100");
    expect(doc).toMatchObject({ recent_count: 2, last_turn_id: "2", bot_key: "lynae", channel_id: "10" });
  });

  it("overwrites a repeated turn id without counting it twice", async () => {
    const { memory, store } = setup();
    await memory.append(scope, makeTurn(1, "first"));
    const again = await memory.append(scope, makeTurn(1, "edited"));

    expect(again).toEqual({ ok: true, value: { created: false } });
    expect((await store.get("bot_memory/channel_memory_lynae_1_10_100"))?.recent_count).toBe(1);
    const mem = await memory.getMemory(scope, 10);
    expect(mem.ok && mem.value?.recentTurns.map((t) => t.content)).toEqual(["edited"]);
  });

  it("rejects invalid ids and blank content without writing", async () => {
    const { memory, store } = setup();
    const badId = await memory.append(scope, makeTurn("abc", "hello"));
    const blank = await memory.append(scope, makeTurn(3, "  "));
    expect(badId.ok).toBe(false);
    expect(blank.ok).toBe(false);
    expect(store.size).toBe(0);
  });

  it("returns a failure instead of throwing when the store is down", async () => {
    const store = new FlakyDocumentStore();
    store.failing.add("create");
    const { memory } = setup(store);
    const result = await memory.append(scope, makeTurn(1, "hello"));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Memory store append failed: create unavailable");
  });
});

describe("PersistentMemoryStore.getMemory", () => {
  it("resolves undefined for a scope never written", async () => {
    const { memory } = setup();
    expect(await memory.getMemory(scope, 10)).toEqual({ ok: true, value: undefined });
  });

  it("returns the newest turns oldest first with numeric ordering", async () => {
    const { memory } = setup();
    for (const id of [9, 10, 100, 11]) await memory.append(scope, makeTurn(id, `m${id}`));
    const mem = await memory.getMemory(scope, 3);
    expect(mem.ok && mem.value?.recentTurns.map((t) => t.turnId)).toEqual(["10", "11", "100"]);
    expect(mem.ok && mem.value?.recentCount).toBe(4);
  });

  it("isolates users and bots", async () => {
    const { memory } = setup();
    await memory.append(scope, makeTurn(1, "mine"));
    await memory.append(sibling, makeTurn(2, "sibling"));
    await memory.append(otherBot, makeTurn(3, "other bot"));
    const mem = await memory.getMemory(scope, 10);
    expect(mem.ok && mem.value?.recentTurns.map((t) => t.content)).toEqual(["mine"]);
  });
});

describe("PersistentMemoryStore.setSummaryAndCompact", () => {
  it("writes the summary and deletes every turn not kept", async () => {
    const { memory } = setup();
    for (let i = 1; i <= 6; i++) await memory.append(scope, makeTurn(i, `m${i}`));

    const result = await memory.setSummaryAndCompact(scope, "They talked about trains.", ["5", "6"]);

    expect(result).toEqual({ ok: true, value: { deleted: 4, failedDeletes: 0 } });
    const ids = await memory.listRecentTurnIds(scope, 100);
    expect(ids).toEqual({ ok: true, value: ["5", "6"] });
    const mem = await memory.getMemory(scope, 10);
    expect(mem.ok && mem.value?.summary).toBe("They talked about trains.");
    expect(mem.ok && mem.value?.recentCount).toBe(2);
  });

  it("deletes nothing when the summary write fails", async () => {
    const store = new FlakyDocumentStore();
    const { memory } = setup(store);
    for (let i = 1; i <= 3; i++) await memory.append(scope, makeTurn(i, `m${i}`));
    store.failing.add("set");

    const result = await memory.setSummaryAndCompact(scope, "summary", ["3"]);

    expect(result.ok).toBe(false);
    expect(await memory.listRecentTurnIds(scope, 10)).toEqual({ ok: true, value: ["1", "2", "3"] });
  });

  it("counts failed deletes and keeps going", async () => {
    const store = new FlakyDocumentStore();
    const { memory } = setup(store);
    for (let i = 1; i <= 4; i++) await memory.append(scope, makeTurn(i, `m${i}`));
    store.failingDeleteIds.add("2");

    const result = await memory.setSummaryAndCompact(scope, "summary", ["4"]);

    expect(result).toEqual({ ok: true, value: { deleted: 2, failedDeletes: 1 } });
    expect(await memory.listRecentTurnIds(scope, 10)).toEqual({ ok: true, value: ["2", "4"] });
  });
});

describe("PersistentMemoryStore.clearMemory", () => {
  it("removes turns and summary and records the cutoff", async () => {
    const { memory } = setup();
    for (let i = 1; i <= 3; i++) await memory.append(scope, makeTurn(i, `m${i}`));
    await memory.setSummaryAndCompact(scope, "old summary", ["1", "2", "3"]);

    expect(await memory.clearMemory(scope, "3")).toEqual({ ok: true, value: { deleted: 3 } });

    const mem = await memory.getMemory(scope, 10);
    expect(mem.ok && mem.value).toMatchObject({ summary: "", recentTurns: [], recentCount: 0, cutoffTurnId: "3" });
  });

  it("never moves the cutoff backwards", async () => {
    const { memory } = setup();
    await memory.append(scope, makeTurn(5, "m5"));
    await memory.clearMemory(scope, "50");
    await memory.clearMemory(scope, "20");
    const mem = await memory.getMemory(scope, 10);
    expect(mem.ok && mem.value?.cutoffTurnId).toBe("50");
  });

  it("leaves other scopes alone", async () => {
    const { memory } = setup();
    await memory.append(scope, makeTurn(1, "mine"));
    await memory.append(sibling, makeTurn(2, "sibling"));
    await memory.clearMemory(scope);
    const mem = await memory.getMemory(sibling, 10);
    expect(mem.ok && mem.value?.recentTurns.map((t) => t.content)).toEqual(["sibling"]);
  });

  it("rejects a malformed cutoff", async () => {
    const { memory } = setup();
    const result = await memory.clearMemory(scope, "later");
    expect(result.ok).toBe(false);
  });
});

describe("PersistentMemoryStore scope enumeration", () => {
  it("finds and clears every scope of one bot only", async () => {
    const { memory, store } = setup();
    await memory.append(scope, makeTurn(1, "a"));
    await memory.append(sibling, makeTurn(2, "b"));
    await memory.append(otherBot, makeTurn(3, "c"));
    await store.set("bot_memory/admin_keys", { keys: {} });

    const found = await memory.findScopes({ botName: "Lynae" });
    expect(found).toEqual({
      ok: true,
      value: ["channel_memory_lynae_1_10_100", "channel_memory_lynae_1_10_200"],
    });

    expect(await memory.clearAllScopesUnderPrefix("Lynae", "9")).toEqual({ ok: true, value: 2 });
    const rook = await memory.getMemory(otherBot, 10);
    expect(rook.ok && rook.value?.recentTurns.map((t) => t.content)).toEqual(["c"]);
    expect(await store.get("bot_memory/admin_keys")).toEqual({ keys: {} });
  });
});
