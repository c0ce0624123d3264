/**
 * Operator CLI: memory clearing, provider key management and the runtime model override.
 *
 *   bot-admin memory clear --bot alice --channel 123 [--cutoff 456] [--yes]
 *   bot-admin keys add generation <key...>
 *   bot-admin keys list speech
 *   bot-admin model set|clear|show
 *
 * Memory clearing is a dry run unless --yes is given.
 */

import { Command, CommanderError, InvalidArgumentError } from "commander";
import { ConfigError, loadConfig, loadEnvFiles } from "../config";
import { KeyStore, type KeyProvider } from "../keys/key-store";
import { logError, logger } from "../logging";
import { PersistentMemoryStore } from "../memory/persistent-store";
import type { ScopeFilter } from "../memory/scope";
import { isTurnId, normalizeTurnId } from "../memory/turn-id";
import { createDocumentStore } from "../store";

export interface AdminIO {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface AdminDeps {
  memory: PersistentMemoryStore;
  keys: KeyStore;
  io: AdminIO;
}

/** A command that ran but could not complete; exit code 1. */
export class CommandFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandFailedError";
  }
}

const PROVIDER_ALIASES: Record<string, KeyProvider> = {
  generation: "generation",
  llm: "generation",
  ollama: "generation",
  speech: "speech",
  tts: "speech",
  elevenlabs: "speech",
};

function parseProvider(value: string): KeyProvider {
  const provider = PROVIDER_ALIASES[value.trim().toLowerCase()];
  if (!provider) {
    throw new InvalidArgumentError(`Provider must be one of: ${Object.keys(PROVIDER_ALIASES).join(", ")}`);
  }
  return provider;
}

function parseNumericId(value: string): string {
  if (!isTurnId(value.trim())) throw new InvalidArgumentError("Must be a numeric id.");
  return normalizeTurnId(value.trim());
}

interface ClearOptions {
  bot?: string;
  guild?: string;
  channel?: string;
  user?: string;
  cutoff?: string;
  yes?: boolean;
}

async function clearMemory(deps: AdminDeps, options: ClearOptions): Promise<void> {
  const { memory, io } = deps;
  const filter: ScopeFilter = {
    botName: options.bot,
    guildId: options.guild,
    channelId: options.channel,
    userId: options.user,
  };
  const found = await memory.findScopes(filter);
  if (!found.ok) throw new CommandFailedError(`Cannot list scopes: ${found.error.message}`);

  if (!options.yes) {
    for (const docId of found.value) io.stdout.write(`${docId}\n`);
    io.stdout.write(`Dry run: ${found.value.length} scope(s) would be cleared. Re-run with --yes to clear.\n`);
    return;
  }

  if (options.bot && !options.guild && !options.channel && !options.user) {
    const cleared = await memory.clearAllScopesUnderPrefix(options.bot, options.cutoff);
    if (!cleared.ok) throw new CommandFailedError(`Clear failed: ${cleared.error.message}`);
    io.stdout.write(`Cleared ${cleared.value} scope(s).\n`);
    return;
  }

  let cleared = 0;
  let failed = 0;
  for (const docId of found.value) {
    const result = await memory.clearScopeDocument(docId, options.cutoff);
    if (result.ok) {
      cleared++;
    } else {
      failed++;
      io.stderr.write(`Failed to clear ${docId}: ${result.error.message}\n`);
    }
  }
  io.stdout.write(`Cleared ${cleared} scope(s).\n`);
  if (failed > 0) throw new CommandFailedError(`${failed} scope(s) could not be cleared`);
}

function registerMemoryCommands(program: Command, deps: AdminDeps): void {
  const memory = program.command("memory").description("Conversation memory maintenance");
  memory
    .command("clear")
    .description("Clear stored turns and summaries for matching scopes")
    .option("--bot <name>", "Bot name")
    .option("--guild <id>", "Guild id", parseNumericId)
    .option("--channel <id>", "Channel id", parseNumericId)
    .option("--user <id>", "User id", parseNumericId)
    .option("--cutoff <turnId>", "Ignore turns at or before this id from now on", parseNumericId)
    .option("-y, --yes", "Apply the clear (default is a dry run)")
    .action(async (options: ClearOptions) => {
      await clearMemory(deps, options);
    });
}

function registerKeyCommands(program: Command, deps: AdminDeps): void {
  const keys = program.command("keys").description("Stored provider API keys");
  keys
    .command("add")
    .description("Add API keys for a provider (already stored keys are skipped)")
    .argument("<provider>", "generation | speech", parseProvider)
    .argument("<keys...>", "API keys")
    .action(async (provider: KeyProvider, apiKeys: string[]) => {
      const result = await deps.keys.addKeys(provider, apiKeys, { source: "cli" });
      if (!result.ok) throw new CommandFailedError(`Cannot store keys: ${result.error.message}`);
      const { added, skipped, total } = result.value;
      for (const id of added) deps.io.stdout.write(`added ${id}\n`);
      for (const id of skipped) deps.io.stdout.write(`skipped ${id}\n`);
      deps.io.stdout.write(`${total} ${provider} key(s) stored.\n`);
    });
  keys
    .command("list")
    .description("List stored key ids for a provider")
    .argument("<provider>", "generation | speech", parseProvider)
    .action(async (provider: KeyProvider) => {
      const result = await deps.keys.listKeys(provider);
      if (!result.ok) throw new CommandFailedError(`Cannot read keys: ${result.error.message}`);
      for (const key of result.value) deps.io.stdout.write(`${key.keyId}\n`);
    });
}

function registerModelCommands(program: Command, deps: AdminDeps): void {
  const model = program.command("model").description("Runtime generation model override");
  model
    .command("show")
    .description("Show the current override")
    .action(async () => {
      const result = await deps.keys.readModelOverride();
      if (!result.ok) throw new CommandFailedError(`Cannot read override: ${result.error.message}`);
      deps.io.stdout.write(`${result.value ?? "(none)"}\n`);
    });
  model
    .command("set")
    .description("Use this model for every generation call")
    .argument("<model>", "Model name")
    .action(async (name: string) => {
      const result = await deps.keys.setModelOverride(name);
      if (!result.ok) throw new CommandFailedError(`Cannot set override: ${result.error.message}`);
      deps.io.stdout.write(`Model override set to ${result.value}.\n`);
    });
  model
    .command("clear")
    .description("Go back to the configured model")
    .action(async () => {
      const result = await deps.keys.clearModelOverride();
      if (!result.ok) throw new CommandFailedError(`Cannot clear override: ${result.error.message}`);
      deps.io.stdout.write("Model override cleared.\n");
    });
}

export function buildProgram(deps: AdminDeps): Command {
  const program = new Command();
  program
    .name("bot-admin")
    .description("Administer bot memory, provider keys and the model override")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.io.stdout.write(str),
      writeErr: (str) => deps.io.stderr.write(str),
    });
  registerMemoryCommands(program, deps);
  registerKeyCommands(program, deps);
  registerModelCommands(program, deps);
  return program;
}

/** Parse and run one command against prepared dependencies. Resolves with the exit code. */
export async function runWithDeps(argv: readonly string[], deps: AdminDeps): Promise<number> {
  try {
    await buildProgram(deps).parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof CommandFailedError) {
      deps.io.stderr.write(`${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

/** Entry point: build dependencies from config, then run. */
export async function runAdmin(argv: readonly string[], io: AdminIO = process): Promise<number> {
  let deps: AdminDeps;
  try {
    loadEnvFiles();
    const config = loadConfig({ botName: process.env.BOT_NAME?.trim() || "admin" });
    const store = createDocumentStore(config);
    deps = {
      memory: new PersistentMemoryStore(store, { collection: config.store.collection, prefix: config.store.prefix }),
      keys: new KeyStore(store, { collection: config.store.collection }),
      io,
    };
  } catch (err) {
    if (err instanceof ConfigError) {
      io.stderr.write(`Configuration error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
  return runWithDeps(argv, deps);
}

if (require.main === module) {
  runAdmin(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logError(logger, err instanceof Error ? err : new Error(String(err)));
      process.exitCode = 1;
    }
  );
}
