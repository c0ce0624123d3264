/**
 * Unit tests for TTS adapters (ElevenLabs over fetch, stub and factory).
 */

import { ElevenLabsTTS, StubTTS, createTTS } from "../../../src/adapters/tts";
import { loadConfig } from "../../../src/config";
import { SpeechError } from "../../../src/gateway";

function audioResponse(bytes: number[]): Response {
  return new Response(new Uint8Array(bytes), { status: 200, headers: { "Content-Type": "audio/mpeg" } });
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe("StubTTS", () => {
  it("returns empty buffer", async () => {
    const tts = new StubTTS();
    const result = await tts.synthesize({ voiceId: "voice-1", text: "Hello" });
    expect(Buffer.isBuffer(result)).toBe(true);
    expect(result.length).toBe(0);
  });
});

describe("ElevenLabsTTS", () => {
  it("posts text and voice settings to the voice endpoint", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch").mockImplementation(async () => audioResponse([1, 2, 3]));
    const tts = new ElevenLabsTTS({ keys: async () => ["test-speech-key"], apiBase: "http://tts.test/" });

    const audio = await tts.synthesize({ voiceId: "voice-1", text: " Hi there " });

    expect([...audio]).toEqual([1, 2, 3]);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("http://tts.test/v1/text-to-speech/voice-1?output_format=mp3_44100_128");
    expect(new Headers(init?.headers).get("xi-api-key")).toBe("test-speech-key");
    expect(JSON.parse(String(init?.body))).toEqual({
      text: "Hi there",
      model_id: "eleven_multilingual_v2",
      voice_settings: { stability: 0.5, similarity_boost: 0.75, style: 0, use_speaker_boost: true },
    });
  });

  it("prefers the request's model, format and settings", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch").mockImplementation(async () => audioResponse([9]));
    const tts = new ElevenLabsTTS({ keys: async () => ["test-speech-key"], apiBase: "http://tts.test" });

    await tts.synthesize({
      voiceId: "voice-2",
      text: "Hey",
      modelId: "custom-model",
      outputFormat: "pcm_16000",
      voiceSettings: { stability: 0.2, similarityBoost: 0.9, style: 0.3, useSpeakerBoost: false },
    });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe("http://tts.test/v1/text-to-speech/voice-2?output_format=pcm_16000");
    expect(JSON.parse(String(init?.body))).toEqual({
      text: "Hey",
      model_id: "custom-model",
      voice_settings: { stability: 0.2, similarity_boost: 0.9, style: 0.3, use_speaker_boost: false },
    });
  });

  it("returns empty audio for blank text without calling the provider", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch");
    const tts = new ElevenLabsTTS({ keys: async () => ["test-speech-key"] });

    const audio = await tts.synthesize({ voiceId: "voice-1", text: "   " });

    expect(audio.length).toBe(0);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("rotates speech keys on server errors", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockImplementationOnce(async () => new Response("busy", { status: 503 }))
      .mockImplementationOnce(async () => audioResponse([7]));
    const tts = new ElevenLabsTTS({ keys: async () => ["test-speech-key-1", "test-speech-key-2"] });

    const audio = await tts.synthesize({ voiceId: "voice-1", text: "Hi" });

    expect([...audio]).toEqual([7]);
    expect(new Headers(fetchSpy.mock.calls[1][1]?.headers).get("xi-api-key")).toBe("test-speech-key-2");
  });

  it("throws SpeechError when every key fails", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => new Response("quota", { status: 429 }));
    const tts = new ElevenLabsTTS({ keys: async () => ["test-speech-key-1"] });

    const error = await tts.synthesize({ voiceId: "voice-1", text: "Hi" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SpeechError);
    if (error instanceof SpeechError) expect(error.failure.lastErrorKind).toBe("rate_limited");
  });
});

describe("createTTS", () => {
  it("returns StubTTS when provider is stub", () => {
    const config = loadConfig({ botName: "test-bot", env: { TTS_PROVIDER: "stub" } });
    expect(createTTS(config)).toBeInstanceOf(StubTTS);
  });

  it("returns ElevenLabsTTS when provider is elevenlabs", () => {
    const config = loadConfig({ botName: "test-bot", env: { TTS_PROVIDER: "elevenlabs" } });
    expect(createTTS(config)).toBeInstanceOf(ElevenLabsTTS);
  });
});
