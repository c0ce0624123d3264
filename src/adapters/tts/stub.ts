/**
 * Stub TTS adapter for testing or when no provider is configured.
 * Returns empty audio buffer (silence).
 */

import type { ITTS, SpeechRequest } from "./types";

export class StubTTS implements ITTS {
  async synthesize(_request: SpeechRequest): Promise<Buffer> {
    return Buffer.alloc(0);
  }
}
