/**
 * TTS adapter factory: returns implementation based on config.
 */

import type { Logger } from "pino";
import type { AppConfig } from "../../config";
import type { KeySource } from "../llm/types";
import type { ITTS } from "./types";
import { StubTTS } from "./stub";
import { ElevenLabsTTS } from "./elevenlabs";

export type { ITTS, SpeechRequest, VoiceSettings } from "./types";
export { StubTTS } from "./stub";
export {
  ElevenLabsTTS,
  DEFAULT_ELEVENLABS_API_BASE,
  DEFAULT_ELEVENLABS_MODEL_ID,
  DEFAULT_ELEVENLABS_OUTPUT_FORMAT,
  DEFAULT_VOICE_SETTINGS,
} from "./elevenlabs";

export interface TtsDeps {
  /** Speech keys; defaults to the env keys from config. */
  keys?: KeySource;
  logger?: Logger;
}

export function createTTS(config: AppConfig, deps: TtsDeps = {}): ITTS {
  const { provider, apiBase, modelId, outputFormat, voiceSettings, envKeys, timeoutMs } = config.tts;
  if (provider === "elevenlabs") {
    return new ElevenLabsTTS({
      keys: deps.keys ?? (async () => envKeys),
      apiBase,
      modelId,
      outputFormat,
      voiceSettings,
      timeoutMs,
      logger: deps.logger,
    });
  }
  return new StubTTS();
}
