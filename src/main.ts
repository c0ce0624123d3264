/**
 * Entry point: load config, wire memory, providers and the orchestrator, then run the
 * console platform. One process runs one bot identity.
 */

import { createLLM } from "./adapters/llm";
import { createTTS } from "./adapters/tts";
import { loadConfig } from "./config";
import { ContextAssembler } from "./context/assembler";
import { startHealthServer } from "./health-server";
import { KeyStore } from "./keys/key-store";
import { logError, logger } from "./logging";
import { CompactionScheduler } from "./memory/compaction";
import { PersistentMemoryStore } from "./memory/persistent-store";
import { RollingContextBuffer } from "./memory/rolling-buffer";
import { BackgroundTaskQueue } from "./memory/task-queue";
import { Orchestrator } from "./pipeline/orchestrator";
import { VoiceRouter } from "./pipeline/voice-router";
import { ConsolePlatform } from "./platform/console";
import { loadPersona } from "./prompts/persona";
import { PromptManager } from "./prompts/prompt-manager";
import { createRuntimeContext } from "./runtime/context";
import { createDocumentStore } from "./store";

async function main(): Promise<void> {
  const config = loadConfig({ botName: process.argv[2] });
  const store = createDocumentStore(config);
  const keyStore = new KeyStore(store, { collection: config.store.collection });
  const runtime = createRuntimeContext({ botName: config.bot.name, modelOverride: keyStore });

  const llm = createLLM(config, {
    keys: keyStore.keySource("generation", config.llm.envKeys),
    modelOverride: keyStore,
    logger: runtime.logger,
  });
  const tts = createTTS(config, { keys: keyStore.keySource("speech", config.tts.envKeys), logger: runtime.logger });

  const memory = new PersistentMemoryStore(store, {
    collection: config.store.collection,
    prefix: config.store.prefix,
    logger: runtime.logger,
  });
  const buffer = new RollingContextBuffer({ capacity: config.memory.bufferCapacity });
  const queue = new BackgroundTaskQueue({ concurrency: config.memory.compactionConcurrency, logger: runtime.logger });
  const compaction = config.memory.compactionEnabled
    ? new CompactionScheduler(memory, llm, queue, runtime)
    : undefined;

  const persona = loadPersona(config.bot.charactersPath, config.bot.characterName);
  const platform = new ConsolePlatform({
    botName: config.bot.name,
    channelId: config.bot.channelIds[0],
    diagnosticsChannelId: config.bot.diagnosticsChannelId,
    logger: runtime.logger,
  });
  const assembler = new ContextAssembler(memory, runtime, { history: platform });
  const voiceId = config.tts.voiceId;
  const voiceRouter = new VoiceRouter({
    enabled: config.voice.enabled && config.tts.provider !== "stub",
    voiceConfigured: voiceId !== undefined,
    maxChars: config.voice.maxChars,
    cooldownMs: config.voice.cooldownMs,
    funProbability: config.voice.funProbability,
  });

  const orchestrator = new Orchestrator(
    {
      platform,
      llm,
      tts,
      buffer,
      memory,
      assembler,
      prompts: new PromptManager(persona),
      runtime,
      compaction,
      voiceRouter,
    },
    {
      channelIds: config.bot.channelIds,
      triggerNames: [config.bot.name, persona.characterName],
      characterName: persona.characterName,
      voice: voiceId
        ? {
            voiceId,
            modelId: config.tts.modelId,
            outputFormat: config.tts.outputFormat,
            voiceSettings: config.tts.voiceSettings,
          }
        : undefined,
      maxReplyTokens: config.llm.maxTokens,
    }
  );

  let ready = false;
  platform.onMessage(async (message) => {
    try {
      await orchestrator.handleMessage(message);
    } catch (err) {
      logError(runtime.logger, err instanceof Error ? err : new Error(String(err)), { turnId: message.id });
    }
  });
  await platform.start();
  ready = true;
  logger.info(
    { event: "BOT_STARTED", bot: config.bot.name, character: persona.characterName, llm: config.llm.provider, store: config.store.backend },
    "Bot ready"
  );

  const health = config.health.port !== undefined ? startHealthServer({ port: config.health.port, getReady: () => ready }) : undefined;

  process.on("SIGINT", async () => {
    ready = false;
    await platform.stop();
    await orchestrator.idle();
    await queue.stop();
    health?.close();
    process.exit(0);
  });
}

main().catch((err: unknown) => {
  logError(logger, err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
