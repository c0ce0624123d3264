/**
 * Unit tests for LLM adapters (Ollama over fetch, reply extraction, stub and factory).
 */

import { OllamaLLM, StubLLM, createLLM, extractReplyContent } from "../../../src/adapters/llm";
import { loadConfig } from "../../../src/config";
import { GenerationError } from "../../../src/gateway";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function requestBody(spy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>, call = 0): Record<string, unknown> {
  const init: RequestInit | undefined = spy.mock.calls[call][1];
  return JSON.parse(String(init?.body));
}

function requestHeaders(spy: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>, call = 0): Record<string, string> {
  const init: RequestInit | undefined = spy.mock.calls[call][1];
  return Object.fromEntries(new Headers(init?.headers).entries());
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe("extractReplyContent", () => {
  it("reads the native message.content shape", () => {
    expect(extractReplyContent({ message: { role: "assistant", content: "hi there" } })).toBe("hi there");
  });

  it("reads a flat content field", () => {
    expect(extractReplyContent({ content: "flat" })).toBe("flat");
  });

  it("reads an OpenAI-style choices list", () => {
    expect(extractReplyContent({ choices: [{ message: { content: "from choices" } }] })).toBe("from choices");
  });

  it("returns an empty string for anything else", () => {
    expect(extractReplyContent({ choices: [] })).toBe("");
    expect(extractReplyContent(null)).toBe("");
    expect(extractReplyContent({ message: { content: 42 } })).toBe("");
  });
});

describe("OllamaLLM", () => {
  it("posts the conversation with a bearer key and trims the reply", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => jsonResponse({ message: { content: "  Hello back!  " } }));
    const llm = new OllamaLLM({ keys: async () => ["test-key-1"], model: "test-model", apiUrl: "http://ollama.test/api/chat" });

    const result = await llm.chat([{ role: "user", content: "Hello" }], { maxTokens: 64 });

    expect(result).toEqual({ text: "Hello back!", model: "test-model", attempts: 1 });
    expect(fetchSpy.mock.calls[0][0]).toBe("http://ollama.test/api/chat");
    expect(requestHeaders(fetchSpy).authorization).toBe("Bearer test-key-1");
    expect(requestBody(fetchSpy)).toEqual({
      model: "test-model",
      messages: [{ role: "user", content: "Hello" }],
      stream: false,
      options: { num_predict: 64 },
    });
  });

  it("rotates to the next key after a rate limit", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockImplementationOnce(async () => new Response("slow down", { status: 429 }))
      .mockImplementationOnce(async () => jsonResponse({ message: { content: "second key worked" } }));
    const llm = new OllamaLLM({ keys: async () => ["test-key-1", "test-key-2"], model: "test-model" });

    const result = await llm.chat([{ role: "user", content: "Hi" }]);

    expect(result.text).toBe("second key worked");
    expect(result.attempts).toBe(2);
    expect(requestHeaders(fetchSpy, 1).authorization).toBe("Bearer test-key-2");
  });

  it("throws GenerationError when every key fails", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => new Response("nope", { status: 401 }));
    const llm = new OllamaLLM({ keys: async () => ["test-key-1", "test-key-2"], model: "test-model" });

    const error = await llm.chat([{ role: "user", content: "Hi" }]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GenerationError);
    if (!(error instanceof GenerationError)) return;
    expect(error.failure.kind).toBe("exhausted");
    expect(error.failure.attempts).toBe(2);
    expect(error.failure.lastErrorKind).toBe("auth_error");
  });

  it("fails with no_credentials and makes no request when no keys exist", async () => {
    const fetchSpy = jest.spyOn(globalThis, "fetch");
    const llm = new OllamaLLM({ keys: async () => [], model: "test-model" });

    const error = await llm.chat([{ role: "user", content: "Hi" }]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GenerationError);
    if (error instanceof GenerationError) expect(error.failure.kind).toBe("no_credentials");
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("uses the runtime model override on every call", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => jsonResponse({ message: { content: "ok" } }));
    let override: string | undefined = "override-model";
    const llm = new OllamaLLM({
      keys: async () => ["test-key-1"],
      model: "default-model",
      modelOverride: { getModelOverride: async () => override },
    });

    const first = await llm.chat([{ role: "user", content: "Hi" }]);
    override = undefined;
    const second = await llm.chat([{ role: "user", content: "Hi" }]);

    expect(first.model).toBe("override-model");
    expect(requestBody(fetchSpy, 0).model).toBe("override-model");
    expect(second.model).toBe("default-model");
  });

  it("falls back to the default model when the override cannot be read", async () => {
    const fetchSpy = jest
      .spyOn(globalThis, "fetch")
      .mockImplementation(async () => jsonResponse({ message: { content: "ok" } }));
    const llm = new OllamaLLM({
      keys: async () => ["test-key-1"],
      model: "default-model",
      modelOverride: {
        getModelOverride: async () => {
          throw new Error("store down");
        },
      },
    });

    await llm.chat([{ role: "user", content: "Hi" }]);

    expect(requestBody(fetchSpy).model).toBe("default-model");
  });

  it("reads keys again for each call", async () => {
    jest.spyOn(globalThis, "fetch").mockImplementation(async () => jsonResponse({ message: { content: "ok" } }));
    const keys = jest.fn(async () => ["test-key-1"]);
    const llm = new OllamaLLM({ keys, model: "test-model" });

    await llm.chat([{ role: "user", content: "one" }]);
    await llm.chat([{ role: "user", content: "two" }]);

    expect(keys).toHaveBeenCalledTimes(2);
  });
});

describe("StubLLM", () => {
  it("echoes the last user message", async () => {
    const llm = new StubLLM();
    const result = await llm.chat([
      { role: "system", content: "persona" },
      { role: "user", content: "Hello" },
    ]);
    expect(result.text).toBe("(stub) Hello");
  });

  it("returns the fixed reply when one is set", async () => {
    const llm = new StubLLM("fixed");
    const result = await llm.chat([{ role: "user", content: "Hello" }]);
    expect(result).toEqual({ text: "fixed", model: "stub", attempts: 1 });
  });
});

describe("createLLM", () => {
  it("returns StubLLM when provider is stub", () => {
    const config = loadConfig({ botName: "test-bot", env: { LLM_PROVIDER: "stub" } });
    expect(createLLM(config)).toBeInstanceOf(StubLLM);
  });

  it("returns OllamaLLM by default", () => {
    const config = loadConfig({ botName: "test-bot", env: {} });
    expect(createLLM(config)).toBeInstanceOf(OllamaLLM);
  });
});
