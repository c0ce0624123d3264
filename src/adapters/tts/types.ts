/**
 * TTS (Text-to-Speech) adapter types.
 * Implementations can be swapped via config (ElevenLabs, stub).
 */

import type { VoiceSettings } from "../../config";

export type { VoiceSettings } from "../../config";

export interface SpeechRequest {
  /** Provider voice id (per character). */
  voiceId: string;
  text: string;
  modelId?: string;
  /** e.g. mp3_44100_128 */
  outputFormat?: string;
  voiceSettings?: VoiceSettings;
}

/**
 * TTS adapter interface: text in, one audio buffer out.
 * Remote adapters throw SpeechError once every key has failed or the request was rejected.
 */
export interface ITTS {
  synthesize(request: SpeechRequest): Promise<Buffer>;
}
