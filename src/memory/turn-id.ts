import type { TurnId } from "./types";

const TURN_ID_RE = /^\d{1,20}$/;
const ORDER_KEY_WIDTH = 20;

export function isTurnId(value: unknown): value is TurnId {
  return typeof value === "string" && TURN_ID_RE.test(value);
}

/** Strip leading zeros so "007" and "7" compare and key identically. */
export function normalizeTurnId(id: TurnId): TurnId {
  return id.replace(/^0+(?=\d)/, "");
}

/** Numeric comparison of two decimal ids without converting to number. */
export function compareTurnIds(a: TurnId, b: TurnId): number {
  const x = normalizeTurnId(a);
  const y = normalizeTurnId(b);
  if (x.length !== y.length) return x.length - y.length;
  return x < y ? -1 : x > y ? 1 : 0;
}

/** Fixed-width key whose lexical order equals numeric order (used for store queries). */
export function turnIdOrderKey(id: TurnId): string {
  return normalizeTurnId(id).padStart(ORDER_KEY_WIDTH, "0");
}

export function isAfterCutoff(id: TurnId, cutoff: TurnId | undefined): boolean {
  return cutoff === undefined || compareTurnIds(id, cutoff) > 0;
}
