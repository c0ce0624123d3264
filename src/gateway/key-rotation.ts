/**
 * Key rotation gateway: runs one provider request against an ordered key list,
 * moving to the next key on auth, rate-limit, server and transport failures.
 * Holds no state between calls; callers fetch keys fresh so additions apply immediately.
 */

import type { Logger } from "pino";
import { logger as defaultLogger, logKeyRotation } from "../logging";
import {
  ProviderError,
  classifyProviderError,
  type GatewayResult,
  type RotatableFailureKind,
} from "./types";

export const DEFAULT_PROVIDER_TIMEOUT_MS = 60_000;

/** One provider call made with a single key. Must honour the abort signal where it can. */
export type KeyAttempt<T> = (apiKey: string, signal: AbortSignal) => Promise<T>;

export interface KeyRotationOptions {
  /** Provider label for logs and failures (e.g. "ollama", "elevenlabs"). */
  provider: string;
  /** Per-attempt timeout; expiry counts as a transport failure. */
  timeoutMs?: number;
  logger?: Logger;
}

function withTimeout<T>(p: Promise<T>, timeoutMs: number, controller: AbortController): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new ProviderError(`Request timed out after ${timeoutMs}ms`, "transport_error"));
    }, timeoutMs);
    p.then(
      (v) => {
        clearTimeout(timer);
        resolve(v);
      },
      (e) => {
        clearTimeout(timer);
        reject(e);
      }
    );
  });
}

/** Trim keys and drop blanks, keeping caller order. */
export function normalizeKeys(keys: readonly string[]): string[] {
  return keys.map((k) => k.trim()).filter((k) => k.length > 0);
}

export async function executeWithKeyRotation<T>(
  keys: readonly string[],
  attempt: KeyAttempt<T>,
  options: KeyRotationOptions
): Promise<GatewayResult<T>> {
  const log = options.logger ?? defaultLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  const usable = normalizeKeys(keys);
  if (usable.length === 0) {
    return { ok: false, failure: { kind: "no_credentials", provider: options.provider, attempts: 0 } };
  }

  let lastError: Error | undefined;
  let lastErrorKind: RotatableFailureKind | undefined;
  for (let i = 0; i < usable.length; i++) {
    const controller = new AbortController();
    try {
      const value = await withTimeout(attempt(usable[i], controller.signal), timeoutMs, controller);
      return { ok: true, value, keyIndex: i, attempts: i + 1 };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const kind = classifyProviderError(err);
      if (kind === null) {
        return {
          ok: false,
          failure: { kind: "request_rejected", provider: options.provider, attempts: i + 1, lastError: error },
        };
      }
      lastError = error;
      lastErrorKind = kind;
      logKeyRotation(log, options.provider, i, usable.length, kind);
    }
  }

  return {
    ok: false,
    failure: {
      kind: "exhausted",
      provider: options.provider,
      attempts: usable.length,
      lastErrorKind,
      lastError,
    },
  };
}
