/**
 * Character personas. A persona block comes from characters.json when present:
 *
 *   { "aliases": { "linae": "Lynae" }, "characters": { "Lynae": { "prompt_block": "..." } } }
 *
 * Without the file, a generic in-character prompt is used.
 */

import * as fs from "fs";
import { z } from "zod";
import { ConfigError } from "../config";

export interface Persona {
  id: string;
  characterName: string;
  systemPrompt: string;
}

const charactersFileSchema = z.object({
  aliases: z.record(z.string()).catch({}),
  characters: z.record(z.object({ prompt_block: z.string() }).passthrough()),
});

export function makeSystemPrompt(characterBlock: string): string {
  return [
    "You are a chat character roleplaying exactly as described below.",
    "Stay in character, be helpful, and sound like a real person chatting (natural, not robotic).",
    "Keep replies concise unless asked for detail.",
    "",
    "CHARACTER PROFILE:",
    characterBlock.trim(),
  ].join("\n");
}

export function defaultPersona(characterName: string): Persona {
  return {
    id: "default",
    characterName,
    systemPrompt: makeSystemPrompt(`Name: ${characterName}\nA friendly regular in this chat server.`),
  };
}

/** Resolve a name through the alias table (exact, then lowercase). */
function resolveAlias(aliases: Record<string, string>, name: string): string {
  return aliases[name] ?? aliases[name.toLowerCase()] ?? name;
}

/**
 * Load the persona for a character. Missing file → default persona.
 * Unreadable file or unknown character → ConfigError.
 */
export function loadPersona(charactersPath: string, characterName: string): Persona {
  if (!fs.existsSync(charactersPath)) return defaultPersona(characterName);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(charactersPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Cannot read ${charactersPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = charactersFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${charactersPath} has no "characters" map with prompt_block entries`);
  }
  const name = resolveAlias(parsed.data.aliases, characterName.trim());
  const entry = parsed.data.characters[name];
  if (!entry || !entry.prompt_block.trim()) {
    throw new ConfigError(`Character "${name}" not found in ${charactersPath}`);
  }
  return { id: name.toLowerCase(), characterName: name, systemPrompt: makeSystemPrompt(entry.prompt_block) };
}
