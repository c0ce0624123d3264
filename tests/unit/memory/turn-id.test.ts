/**
 * Unit tests for turn ids, scope identity and stored record decoding.
 */

import { decodeScopeRecord, decodeTurn, encodeTurn, turnIdFromDoc } from "../../../src/memory/records";
import { buildScopeMatcher, createScope, sanitizeBotKey, scopeDocId } from "../../../src/memory/scope";
import { compareTurnIds, isAfterCutoff, isTurnId, normalizeTurnId, turnIdOrderKey } from "../../../src/memory/turn-id";

describe("turn ids", () => {
  it("accepts decimal strings only", () => {
    expect(isTurnId("1234567890123456789")).toBe(true);
    expect(isTurnId("12a")).toBe(false);
    expect(isTurnId("")).toBe(false);
    expect(isTurnId(12)).toBe(false);
  });

  it("compares numerically beyond the safe integer range", () => {
    expect(compareTurnIds("9007199254740993", "9007199254740992")).toBeGreaterThan(0);
    expect(compareTurnIds("99", "100")).toBeLessThan(0);
    expect(compareTurnIds("007", "7")).toBe(0);
    expect(normalizeTurnId("000")).toBe("0");
  });

  it("builds order keys whose text order matches numeric order", () => {
    expect(turnIdOrderKey("99") < turnIdOrderKey("100")).toBe(true);
    expect(turnIdOrderKey("42")).toBe("00000000000000000042");
  });

  it("treats the cutoff itself as excluded", () => {
    expect(isAfterCutoff("10", undefined)).toBe(true);
    expect(isAfterCutoff("10", "10")).toBe(false);
    expect(isAfterCutoff("11", "10")).toBe(true);
  });
});

describe("scope identity", () => {
  it("sanitizes bot names into keys", () => {
    expect(sanitizeBotKey("  Big Lynae!  ")).toBe("big_lynae");
    expect(sanitizeBotKey("???")).toBe("bot");
  });

  it("uses guild 0 for direct messages", () => {
    const scope = createScope({ botName: "Lynae", channelId: "5", userId: "6" });
    expect(scopeDocId(scope)).toBe("channel_memory_lynae_0_5_6");
  });

  it("matches scope documents by filter and never the admin document", () => {
    const match = buildScopeMatcher("channel_memory_", { botName: "Lynae", channelId: "5" });
    expect(match("channel_memory_lynae_0_5_6")).toBe(true);
    expect(match("channel_memory_lynae_0_7_6")).toBe(false);
    expect(match("channel_memory_other_0_5_6")).toBe(false);
    expect(buildScopeMatcher("channel_memory_")("admin_keys")).toBe(false);
  });

  it("keeps bot keys containing underscores distinct", () => {
    const match = buildScopeMatcher("channel_memory_", { botName: "big_bot" });
    expect(match("channel_memory_big_bot_1_2_3")).toBe(true);
    expect(match("channel_memory_bot_1_2_3")).toBe(false);
  });
});

describe("turn records", () => {
  it("encodes a versioned record with an order key", () => {
    const record = encodeTurn({ turnId: "0042", role: "user", speakerName: "Sam", content: " hi ", createdAt: 5 });
    expect(record).toEqual({
      v: 1,
      turn_id: "42",
      order_key: "00000000000000000042",
      role: "user",
      speaker_name: "Sam",
      content: "hi",
      created_at: 5,
    });
  });

  it("decodes older records using the document id and defaults", () => {
    expect(decodeTurn("77", { content: "legacy", role: "moderator" })).toEqual({
      turnId: "77",
      role: "user",
      speakerName: "",
      speakerId: undefined,
      content: "legacy",
      createdAt: 0,
    });
  });

  it("drops records without usable content or id", () => {
    expect(decodeTurn("1", { content: "   " })).toBeUndefined();
    expect(decodeTurn("abc", { content: "text" })).toBeUndefined();
    expect(turnIdFromDoc("abc", {})).toBeUndefined();
    expect(turnIdFromDoc("abc", { turn_id: 12 })).toBe("12");
  });

  it("decodes scope records with defaults for malformed fields", () => {
    expect(decodeScopeRecord({ summary: 5, recent_count: "x", cutoff_turn_id: "nope" })).toEqual({
      summary: "",
      recent_count: 0,
      cutoff_turn_id: undefined,
      updated_at: 0,
    });
  });
});
