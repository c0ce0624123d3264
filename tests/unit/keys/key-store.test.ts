/**
 * Unit tests for stored provider keys and the runtime model override.
 */

import { KeyStore, keyId } from "../../../src/keys/key-store";
import { InMemoryDocumentStore } from "../../../src/store/in-memory";
import { FakeClock, FlakyDocumentStore } from "../../helpers/fixtures";

function setup(store: InMemoryDocumentStore = new InMemoryDocumentStore()): { keys: KeyStore; clock: FakeClock; store: InMemoryDocumentStore } {
  const clock = new FakeClock();
  return { keys: new KeyStore(store, { collection: "bot_memory", clock: clock.clock }), clock, store };
}

describe("keyId", () => {
  it("is a stable 24-character hex digest of the trimmed key", () => {
    expect(keyId("test-key-1")).toMatch(/^[0-9a-f]{24}$/);
    expect(keyId(" test-key-1 ")).toBe(keyId("test-key-1"));
    expect(keyId("test-key-1")).not.toBe(keyId("test-key-2"));
  });
});

describe("KeyStore", () => {
  it("adds keys once and lists them oldest first", async () => {
    const { keys, clock } = setup();
    const first = await keys.addKeys("generation", ["test-key-1"], { source: "cli" });
    clock.advance(10);
    const second = await keys.addKeys("generation", ["test-key-1", " test-key-2 ", ""], {
      source: "chat",
      addedBy: { id: "42", name: "admin" },
    });

    expect(first).toEqual({ ok: true, value: { added: [keyId("test-key-1")], skipped: [], total: 1 } });
    expect(second).toEqual({ ok: true, value: { added: [keyId("test-key-2")], skipped: [keyId("test-key-1")], total: 2 } });
    const listed = await keys.listKeys("generation");
    expect(listed.ok && listed.value.map((k) => [k.apiKey, k.source])).toEqual([
      ["test-key-1", "cli"],
      ["test-key-2", "chat"],
    ]);
  });

  it("keeps generation and speech keys apart", async () => {
    const { keys } = setup();
    await keys.addKeys("speech", ["test-speech-key"], { source: "cli" });
    expect(await keys.listKeys("generation")).toEqual({ ok: true, value: [] });
    const speech = await keys.listKeys("speech");
    expect(speech.ok && speech.value.map((k) => k.apiKey)).toEqual(["test-speech-key"]);
  });

  it("skips malformed stored entries", async () => {
    const { keys, store } = setup();
    await store.set("bot_memory/admin_keys", {
      keys: { a: { api_key: "test-key-1", added_at: 1 }, b: { api_key: "" }, c: "junk" },
    });
    const listed = await keys.listKeys("generation");
    expect(listed.ok && listed.value.map((k) => k.apiKey)).toEqual(["test-key-1"]);
  });

  it("serves configured keys first, then stored keys, without duplicates", async () => {
    const { keys } = setup();
    await keys.addKeys("generation", ["test-key-2", "test-key-3"], { source: "cli" });
    const source = keys.keySource("generation", ["test-key-1", "test-key-2"]);
    expect(await source()).toEqual(["test-key-1", "test-key-2", "test-key-3"]);
    await keys.addKeys("generation", ["test-key-4"], { source: "cli" });
    expect(await source()).toEqual(["test-key-1", "test-key-2", "test-key-3", "test-key-4"]);
  });

  it("falls back to configured keys when the store is unavailable", async () => {
    const store = new FlakyDocumentStore();
    const { keys } = setup(store);
    store.failing.add("get");
    expect(await keys.keySource("speech", ["test-speech-key"])()).toEqual(["test-speech-key"]);
  });

  it("sets, reads and clears the model override", async () => {
    const { keys } = setup();
    expect(await keys.getModelOverride()).toBeUndefined();
    expect(await keys.setModelOverride("  qwen3:32b ")).toEqual({ ok: true, value: "qwen3:32b" });
    expect(await keys.getModelOverride()).toBe("qwen3:32b");
    expect(await keys.clearModelOverride()).toEqual({ ok: true, value: undefined });
    expect(await keys.getModelOverride()).toBeUndefined();
  });

  it("rejects an empty model name", async () => {
    const { keys } = setup();
    const result = await keys.setModelOverride("   ");
    expect(result.ok).toBe(false);
  });

  it("keeps keys when the override changes", async () => {
    const { keys } = setup();
    await keys.addKeys("generation", ["test-key-1"], { source: "cli" });
    await keys.setModelOverride("model-a");
    const listed = await keys.listKeys("generation");
    expect(listed.ok && listed.value).toHaveLength(1);
  });
});
