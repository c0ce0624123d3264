/**
 * Console platform for local testing: no chat service connection.
 * Each input line is a message from the local user in one channel; replies are
 * printed, voice replies are written to files. "@Name" in a line counts as a mention.
 */

import * as fs from "fs";
import * as path from "path";
import * as readline from "readline";
import type { Logger } from "pino";
import type { Readable, Writable } from "stream";
import { DEEP_HISTORY_LIMIT } from "../context/assembler";
import { logger as rootLogger } from "../logging";
import { compareTurnIds } from "../memory/turn-id";
import type { Turn, TurnId } from "../memory/types";
import type { ChatPlatform, InboundMessage, MessageHandler, OutboundReply } from "./types";

export interface ConsolePlatformConfig {
  /** Name the bot answers to in "@Name" mentions. */
  botName: string;
  userName?: string;
  channelId?: string;
  /** Shown on diagnostic lines when set. */
  diagnosticsChannelId?: string;
  /** Directory for voice reply files (default ./data/voice). */
  audioDir?: string;
  input?: Readable;
  output?: Writable;
  clock?: () => number;
  logger?: Logger;
}

const SELF_ID = "1000";
const USER_ID = "2000";
/** Turns kept for history lookups; no caller asks for more. */
export const HISTORY_LOG_LIMIT = DEEP_HISTORY_LIMIT;

export class ConsolePlatform implements ChatPlatform {
  readonly selfId = SELF_ID;
  private handler: MessageHandler | undefined;
  private rl: readline.Interface | undefined;
  private readonly history: Turn[] = [];
  private nextId: bigint;
  private readonly channelId: string;
  private readonly userName: string;
  private readonly audioDir: string;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly clock: () => number;
  private readonly log: Logger;
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly cfg: ConsolePlatformConfig) {
    this.clock = cfg.clock ?? Date.now;
    this.nextId = BigInt(this.clock()) * 1000n;
    this.channelId = cfg.channelId ?? "1";
    this.userName = cfg.userName ?? "you";
    this.audioDir = cfg.audioDir ?? path.join(process.cwd(), "data", "voice");
    this.input = cfg.input ?? process.stdin;
    this.output = cfg.output ?? process.stdout;
    this.log = cfg.logger ?? rootLogger;
  }

  onMessage(handler: MessageHandler): void {
    this.handler = handler;
  }

  async start(): Promise<void> {
    this.rl = readline.createInterface({ input: this.input, terminal: false });
    this.rl.on("line", (line) => {
      // Lines are handled in order; a failed line does not stop the ones after it.
      this.pending = this.pending
        .then(() => this.receive(line))
        .catch((err: unknown) => {
          this.log.error(
            { event: "CONSOLE_LINE_FAILED", err: err instanceof Error ? err.message : String(err) },
            "Input line handler failed"
          );
        });
    });
    this.write(`Chatting with ${this.cfg.botName}. Mention @${this.cfg.botName} or say their name. /forget clears memory.\n`);
  }

  async stop(): Promise<void> {
    this.rl?.close();
    this.rl = undefined;
    await this.pending;
  }

  /** Feed one line as if typed; resolves when the handler is done. */
  async receive(line: string): Promise<void> {
    const content = line.trim();
    if (!content || !this.handler) return;
    const message: InboundMessage = {
      id: this.allocateId(),
      channelId: this.channelId,
      authorId: USER_ID,
      authorName: this.userName,
      authorIsBot: false,
      content,
      createdAt: this.clock(),
      mentionsBot: content.toLowerCase().includes(`@${this.cfg.botName.toLowerCase()}`),
      repliesToBot: false,
    };
    this.remember({
      turnId: message.id,
      role: "user",
      speakerName: message.authorName,
      speakerId: USER_ID,
      content,
      createdAt: message.createdAt,
    });
    await this.handler(message);
  }

  async send(reply: OutboundReply): Promise<TurnId> {
    const id = this.allocateId();
    let suffix = "";
    if (reply.audio) {
      fs.mkdirSync(this.audioDir, { recursive: true });
      const file = path.join(this.audioDir, reply.audio.filename);
      fs.writeFileSync(file, reply.audio.data);
      suffix = ` [voice: ${file}]`;
    }
    this.write(`${this.cfg.botName}: ${reply.text}${suffix}\n`);
    this.remember({
      turnId: id,
      role: "assistant",
      speakerName: this.cfg.botName,
      speakerId: SELF_ID,
      content: reply.text,
      createdAt: this.clock(),
    });
    return id;
  }

  async sendDiagnostic(text: string): Promise<void> {
    const target = this.cfg.diagnosticsChannelId ? ` #${this.cfg.diagnosticsChannelId}` : "";
    this.write(`[diagnostic${target}] ${text}\n`);
  }

  async fetchHistory(channelId: string, beforeTurnId: TurnId, limit: number): Promise<Turn[]> {
    if (channelId !== this.channelId || limit <= 0) return [];
    return this.history.filter((t) => compareTurnIds(t.turnId, beforeTurnId) < 0).slice(-limit);
  }

  private remember(turn: Turn): void {
    this.history.push(turn);
    if (this.history.length > HISTORY_LOG_LIMIT) this.history.splice(0, this.history.length - HISTORY_LOG_LIMIT);
  }

  private allocateId(): TurnId {
    this.nextId += 1n;
    return this.nextId.toString();
  }

  private write(text: string): void {
    this.output.write(text);
  }
}
