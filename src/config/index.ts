/**
 * Env-based configuration for the chat bots and the admin CLI.
 * Loads .env.local then .env from the working directory. Do not commit secrets.
 *
 * Values already in the process env win unless DOTENV_OVERRIDE=1 (process managers
 * can keep stale variables across restarts).
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

export type LlmProvider = "ollama" | "openai" | "anthropic" | "stub";
export type TtsProvider = "elevenlabs" | "stub";
export type StoreBackend = "firestore" | "memory";

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface VoiceSettings {
  stability: number;
  similarityBoost: number;
  style: number;
  useSpeakerBoost: boolean;
}

export interface AppConfig {
  /** Bot identity and where it listens */
  bot: {
    /** Identity used for memory namespacing. */
    name: string;
    /** Character the bot plays (persona lookup, voice id). Defaults to the bot name. */
    characterName: string;
    /** Channels the bot answers in; empty = every channel it sees. */
    channelIds: string[];
    /** Side channel for operator diagnostics. */
    diagnosticsChannelId?: string;
    /** characters.json with persona blocks. */
    charactersPath: string;
  };

  /** LLM provider and options */
  llm: {
    provider: LlmProvider;
    model: string;
    ollamaApiUrl: string;
    openaiBaseUrl?: string;
    /** Keys from env for the selected provider, in order. */
    envKeys: string[];
    timeoutMs: number;
    maxTokens: number;
  };

  /** TTS (text-to-speech) provider and options */
  tts: {
    provider: TtsProvider;
    apiBase: string;
    modelId: string;
    outputFormat: string;
    /** Voice for this character; voice replies are off without one. */
    voiceId?: string;
    voiceSettings: VoiceSettings;
    envKeys: string[];
    timeoutMs: number;
  };

  /** Voice reply routing */
  voice: {
    enabled: boolean;
    cooldownMs: number;
    funProbability: number;
    maxChars: number;
  };

  /** Document store holding memory scopes and the admin keys document */
  store: {
    backend: StoreBackend;
    projectId?: string;
    credentialsPath?: string;
    collection: string;
    prefix: string;
  };

  /** Memory tuning */
  memory: {
    bufferCapacity: number;
    compactionEnabled: boolean;
    compactionConcurrency: number;
  };

  /** Liveness/readiness server; off when unset */
  health: {
    port?: number;
  };
}

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

let envFilesLoaded = false;

/** Load .env.local then .env once per process. */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  if (envFilesLoaded) return;
  envFilesLoaded = true;
  const override = TRUE_VALUES.has((process.env.DOTENV_OVERRIDE ?? "").trim().toLowerCase());
  loadEnv({ path: path.resolve(cwd, ".env.local"), override });
  loadEnv({ path: path.resolve(cwd, ".env"), override });
}

function getEnv(env: Env, key: string): string | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return undefined;
  return v.trim();
}

function getEnvOr(env: Env, key: string, defaultValue: string): string {
  return getEnv(env, key) ?? defaultValue;
}

function getBool(env: Env, key: string, defaultValue: boolean): boolean {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  return TRUE_VALUES.has(v.toLowerCase());
}

function getInt(env: Env, key: string, defaultValue: number, min = 0): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  const n = Number(v);
  if (!Number.isInteger(n) || n < min) {
    throw new ConfigError(`Env ${key} must be an integer >= ${min}, got "${v}"`);
  }
  return n;
}

function getNumber(env: Env, key: string, defaultValue: number, min: number, max: number): number {
  const v = getEnv(env, key);
  if (v === undefined) return defaultValue;
  const n = Number(v);
  if (!Number.isFinite(n) || n < min || n > max) {
    throw new ConfigError(`Env ${key} must be a number in [${min}, ${max}], got "${v}"`);
  }
  return n;
}

function getChoice<T extends string>(env: Env, key: string, choices: readonly T[], defaultValue: T): T {
  const v = getEnv(env, key)?.toLowerCase();
  if (v === undefined) return defaultValue;
  const match = choices.find((c) => c === v);
  if (!match) throw new ConfigError(`Env ${key} must be one of ${choices.join(", ")}, got "${v}"`);
  return match;
}

/** Comma/whitespace separated list. */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(/[\s,]+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function getIdList(env: Env, key: string): string[] {
  const ids = parseList(getEnv(env, key));
  const bad = ids.find((id) => !/^\d+$/.test(id));
  if (bad) throw new ConfigError(`Env ${key} must list numeric ids, got "${bad}"`);
  return ids;
}

/** ELEVENLABS_VOICE_ID_<CHARACTER>: alphanumerics, "_" and "-" kept, "-" becomes "_", uppercased. */
export function voiceIdEnvKey(characterName: string): string {
  const clean = characterName
    .trim()
    .replace(/[^A-Za-z0-9_-]/g, "")
    .replace(/-/g, "_");
  return `ELEVENLABS_VOICE_ID_${clean.toUpperCase()}`;
}

const LLM_PROVIDERS: readonly LlmProvider[] = ["ollama", "openai", "anthropic", "stub"];
const TTS_PROVIDERS: readonly TtsProvider[] = ["elevenlabs", "stub"];
const STORE_BACKENDS: readonly StoreBackend[] = ["firestore", "memory"];

function llmSettings(env: Env, provider: LlmProvider): { model: string; envKeys: string[] } {
  switch (provider) {
    case "ollama":
      return {
        model: getEnvOr(env, "OLLAMA_MODEL", "gpt-oss:120b"),
        envKeys: [...parseList(getEnv(env, "OLLAMA_API_KEYS")), ...parseList(getEnv(env, "OLLAMA_API_KEY"))],
      };
    case "openai":
      return {
        model: getEnvOr(env, "OPENAI_MODEL_NAME", "gpt-4o-mini"),
        envKeys: [...parseList(getEnv(env, "OPENAI_API_KEYS")), ...parseList(getEnv(env, "OPENAI_API_KEY"))],
      };
    case "anthropic":
      return {
        model: getEnvOr(env, "ANTHROPIC_MODEL_NAME", "claude-3-5-sonnet-20241022"),
        envKeys: [...parseList(getEnv(env, "ANTHROPIC_API_KEYS")), ...parseList(getEnv(env, "ANTHROPIC_API_KEY"))],
      };
    case "stub":
      return { model: "stub", envKeys: [] };
  }
}

export interface LoadConfigOptions {
  /** Bot identity; falls back to BOT_NAME. */
  botName?: string;
  /** Character name; falls back to CHARACTER_NAME, then the bot name. */
  characterName?: string;
  /** Environment to read; process.env (after loading .env files) when omitted. */
  env?: Env;
}

/**
 * Build config from environment variables.
 * LLM_PROVIDER, TTS_PROVIDER and STORE_BACKEND select adapters.
 * Throws ConfigError on missing or malformed values.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  if (!options.env) loadEnvFiles();
  const env: Env = options.env ?? process.env;

  const botName = options.botName?.trim() || getEnv(env, "BOT_NAME");
  if (!botName) throw new ConfigError("Missing bot name (pass --bot or set BOT_NAME)");
  const characterName = options.characterName?.trim() || getEnv(env, "CHARACTER_NAME") || botName;

  const llmProvider = getChoice(env, "LLM_PROVIDER", LLM_PROVIDERS, "ollama");
  const llm = llmSettings(env, llmProvider);
  const ttsProvider = getChoice(env, "TTS_PROVIDER", TTS_PROVIDERS, "stub");
  const backend = getChoice(env, "STORE_BACKEND", STORE_BACKENDS, "memory");
  const voiceId = getEnv(env, voiceIdEnvKey(characterName)) ?? getEnv(env, "ELEVENLABS_DEFAULT_VOICE_ID");
  const healthPort = getEnv(env, "HEALTH_PORT");

  return {
    bot: {
      name: botName,
      characterName,
      channelIds: getIdList(env, "BOT_CHANNEL_IDS"),
      diagnosticsChannelId: getEnv(env, "DIAGNOSTICS_CHANNEL_ID"),
      charactersPath: getEnvOr(env, "CHARACTERS_PATH", "characters.json"),
    },
    llm: {
      provider: llmProvider,
      model: llm.model,
      ollamaApiUrl: getEnvOr(env, "OLLAMA_API_URL", "https://ollama.com/api/chat"),
      openaiBaseUrl: getEnv(env, "OPENAI_BASE_URL"),
      envKeys: llm.envKeys,
      timeoutMs: getInt(env, "LLM_TIMEOUT_MS", 60_000, 1),
      maxTokens: getInt(env, "LLM_MAX_TOKENS", 512, 1),
    },
    tts: {
      provider: ttsProvider,
      apiBase: getEnvOr(env, "ELEVENLABS_API_BASE", "https://api.elevenlabs.io"),
      modelId: getEnvOr(env, "ELEVENLABS_MODEL_ID", "eleven_multilingual_v2"),
      outputFormat: getEnvOr(env, "ELEVENLABS_OUTPUT_FORMAT", "mp3_44100_128"),
      voiceId,
      voiceSettings: {
        stability: getNumber(env, "ELEVENLABS_STABILITY", 0.5, 0, 1),
        similarityBoost: getNumber(env, "ELEVENLABS_SIMILARITY_BOOST", 0.75, 0, 1),
        style: getNumber(env, "ELEVENLABS_STYLE", 0, 0, 1),
        useSpeakerBoost: getBool(env, "ELEVENLABS_SPEAKER_BOOST", true),
      },
      envKeys: [...parseList(getEnv(env, "ELEVENLABS_API_KEYS")), ...parseList(getEnv(env, "ELEVENLABS_API_KEY"))],
      timeoutMs: getInt(env, "TTS_TIMEOUT_MS", 60_000, 1),
    },
    voice: {
      enabled: getBool(env, "VOICE_ENABLED", false),
      cooldownMs: getInt(env, "VOICE_COOLDOWN_SECONDS", 300) * 1000,
      funProbability: getNumber(env, "VOICE_FUN_PROBABILITY", 0.1, 0, 1),
      maxChars: getInt(env, "VOICE_MAX_CHARS", 400, 1),
    },
    store: {
      backend,
      projectId: getEnv(env, "FIRESTORE_PROJECT_ID"),
      credentialsPath: getEnv(env, "FIRESTORE_CREDENTIALS_PATH"),
      collection: getEnvOr(env, "FIRESTORE_COLLECTION", "bot_memory"),
      prefix: getEnvOr(env, "MEMORY_PREFIX", "channel_memory_"),
    },
    memory: {
      bufferCapacity: getInt(env, "MEMORY_BUFFER_CAPACITY", 30, 1),
      compactionEnabled: getBool(env, "MEMORY_COMPACTION_ENABLED", true),
      compactionConcurrency: getInt(env, "MEMORY_COMPACTION_CONCURRENCY", 2, 1),
    },
    health: {
      port: healthPort === undefined ? undefined : getInt(env, "HEALTH_PORT", 0, 1),
    },
  };
}
