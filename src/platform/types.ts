/**
 * Chat platform contract: event delivery, sending, history and a side channel
 * for operator diagnostics. A console implementation ships for local runs.
 */

import type { HistoryFetcher } from "../context/assembler";
import type { TurnId } from "../memory/types";

export interface InboundMessage {
  id: TurnId;
  /** Absent for direct messages. */
  guildId?: string;
  channelId: string;
  authorId: string;
  authorName: string;
  authorIsBot: boolean;
  content: string;
  /** Epoch ms. */
  createdAt: number;
  mentionsBot: boolean;
  repliesToBot: boolean;
}

export interface OutboundAudio {
  data: Buffer;
  filename: string;
}

export interface OutboundReply {
  channelId: string;
  text: string;
  audio?: OutboundAudio;
  /** Message being answered. */
  replyToId?: TurnId;
}

export type MessageHandler = (message: InboundMessage) => Promise<void>;

export interface ChatPlatform extends HistoryFetcher {
  /** The bot's own user id on the platform. */
  readonly selfId: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  onMessage(handler: MessageHandler): void;
  /** Resolves with the id of the sent message. */
  send(reply: OutboundReply): Promise<TurnId>;
  /** Operator side channel; never the conversation itself. */
  sendDiagnostic(text: string): Promise<void>;
}
