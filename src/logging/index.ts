/**
 * Structured logging for the bot processes.
 * Logs provider calls, key rotation, memory compaction and errors. JSON output for shipping.
 *
 * Env:
 *   LOG_LEVEL   - debug | info | warn | error | silent (default: info; silent under Jest)
 *   LOG_FILE    - If set, append all logs to this path (creates dirs if needed).
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const isTest = process.env.NODE_ENV === "test";
const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function envLevel(): LogLevel | undefined {
  const v = process.env.LOG_LEVEL?.trim().toLowerCase();
  return LEVELS.find((l) => l === v);
}

const defaultConfig: LoggerConfig = {
  level: envLevel() ?? (isTest ? "silent" : "info"),
  pretty: process.env.NODE_ENV !== "production" && !isTest,
};

export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const opts: pino.LoggerOptions = {
    level: config.level ?? defaultConfig.level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pretty = config.pretty ?? defaultConfig.pretty;
  const logFile = process.env.LOG_FILE?.trim();

  const streams: pino.StreamEntry[] = [];
  if (pretty) {
    streams.push({
      stream: pino.transport({ target: "pino-pretty", options: { colorize: true } }),
    });
  } else {
    streams.push({ stream: process.stdout });
  }
  if (logFile) {
    streams.push({
      stream: pino.destination({ dest: logFile, append: true, mkdir: true }),
    });
  }

  if (streams.length === 1) {
    return pino(opts, streams[0].stream);
  }
  return pino(opts, pino.multistream(streams));
}

export const logger = createLogger();

/** Log a generation call (summary only; never message content or keys). */
export function logLlmCall(
  log: pino.Logger,
  provider: string,
  messageCount: number,
  responseLength: number,
  durationMs?: number,
  attempts?: number
): void {
  log.info({ event: "LLM_CALL", provider, messageCount, responseLength, durationMs, attempts }, "LLM completed");
}

/** Log a speech synthesis call. */
export function logTtsCall(log: pino.Logger, textLength: number, audioBytes: number, durationMs?: number): void {
  log.info({ event: "TTS_CALL", textLength, audioBytes, durationMs }, "TTS completed");
}

/** Log one key rotation step. Only the key's position is logged. */
export function logKeyRotation(
  log: pino.Logger,
  provider: string,
  keyIndex: number,
  keyCount: number,
  failureKind: string
): void {
  log.warn({ event: "KEY_ROTATION", provider, keyIndex, keyCount, failureKind }, "Provider key failed; rotating");
}

/** Log the end of one compaction pass for a scope. */
export function logCompaction(log: pino.Logger, scopeId: string, outcome: string, details?: Record<string, unknown>): void {
  log.info({ event: "COMPACTION", scopeId, outcome, ...details }, "Compaction pass finished");
}

/** Log error. */
export function logError(log: pino.Logger, err: Error, context?: Record<string, unknown>): void {
  log.error({ err: err.message, stack: err.stack, ...context }, "Error");
}
