/**
 * ElevenLabs text-to-speech adapter.
 * POST {apiBase}/v1/text-to-speech/{voiceId}?output_format=... with header xi-api-key.
 * Uses its own key list, independent of the generation provider.
 */

import type { Logger } from "pino";
import { executeWithKeyRotation, ProviderError, SpeechError } from "../../gateway";
import { logger as rootLogger, logTtsCall } from "../../logging";
import type { KeySource } from "../llm/types";
import type { ITTS, SpeechRequest, VoiceSettings } from "./types";

export const DEFAULT_ELEVENLABS_API_BASE = "https://api.elevenlabs.io";
export const DEFAULT_ELEVENLABS_MODEL_ID = "eleven_multilingual_v2";
export const DEFAULT_ELEVENLABS_OUTPUT_FORMAT = "mp3_44100_128";

export const DEFAULT_VOICE_SETTINGS: VoiceSettings = {
  stability: 0.5,
  similarityBoost: 0.75,
  style: 0,
  useSpeakerBoost: true,
};

export interface ElevenLabsTtsConfig {
  keys: KeySource;
  apiBase?: string;
  modelId?: string;
  outputFormat?: string;
  voiceSettings?: VoiceSettings;
  timeoutMs?: number;
  logger?: Logger;
}

export class ElevenLabsTTS implements ITTS {
  private readonly apiBase: string;
  private readonly log: Logger;

  constructor(private readonly cfg: ElevenLabsTtsConfig) {
    this.apiBase = (cfg.apiBase ?? DEFAULT_ELEVENLABS_API_BASE).replace(/\/+$/, "");
    this.log = cfg.logger ?? rootLogger;
  }

  async synthesize(request: SpeechRequest): Promise<Buffer> {
    const text = request.text.trim();
    if (!text) return Buffer.alloc(0);
    const start = Date.now();
    const outputFormat = request.outputFormat ?? this.cfg.outputFormat ?? DEFAULT_ELEVENLABS_OUTPUT_FORMAT;
    const settings = request.voiceSettings ?? this.cfg.voiceSettings ?? DEFAULT_VOICE_SETTINGS;
    const url = `${this.apiBase}/v1/text-to-speech/${encodeURIComponent(request.voiceId)}?output_format=${encodeURIComponent(outputFormat)}`;
    const body = JSON.stringify({
      text,
      model_id: request.modelId ?? this.cfg.modelId ?? DEFAULT_ELEVENLABS_MODEL_ID,
      voice_settings: {
        stability: settings.stability,
        similarity_boost: settings.similarityBoost,
        style: settings.style,
        use_speaker_boost: settings.useSpeakerBoost,
      },
    });

    const keys = await this.cfg.keys();
    const result = await executeWithKeyRotation(
      keys,
      async (apiKey, signal) => {
        const res = await fetch(url, {
          method: "POST",
          headers: {
            "xi-api-key": apiKey,
            "Content-Type": "application/json",
            Accept: "audio/mpeg",
          },
          body,
          signal,
        });
        if (!res.ok) {
          throw ProviderError.fromStatus(res.status, await res.text());
        }
        return Buffer.from(await res.arrayBuffer());
      },
      { provider: "elevenlabs", timeoutMs: this.cfg.timeoutMs, logger: this.log }
    );
    if (!result.ok) {
      throw new SpeechError(result.failure);
    }
    logTtsCall(this.log, text.length, result.value.length, Date.now() - start);
    return result.value;
  }
}
