/**
 * Stored record shapes for scope documents and turn records.
 * Decoding never throws: malformed optional fields fall back to defaults,
 * and turn records without a usable id or content are dropped.
 */

import { z } from "zod";
import type { DocumentData } from "../store/types";
import type { ConversationScope, Turn, TurnId } from "./types";
import { isTurnId, normalizeTurnId, turnIdOrderKey } from "./turn-id";

export const RECORD_VERSION = 1;

const turnIdSchema = z
  .union([z.string().trim(), z.number().int().nonnegative().transform((n) => n.toFixed(0))])
  .refine(isTurnId, { message: "turn id must be a decimal integer" })
  .transform(normalizeTurnId);

const turnRecordSchema = z.object({
  turn_id: turnIdSchema,
  content: z.string().trim().min(1),
  role: z.enum(["user", "assistant", "other_bot"]).catch("user"),
  speaker_name: z.string().catch(""),
  speaker_id: z.string().optional().catch(undefined),
  created_at: z.number().finite().catch(0),
});

const scopeRecordSchema = z.object({
  summary: z.string().catch(""),
  recent_count: z.number().int().nonnegative().catch(0),
  cutoff_turn_id: turnIdSchema.optional().catch(undefined),
  updated_at: z.number().finite().catch(0),
});

export type ScopeRecord = z.infer<typeof scopeRecordSchema>;

export function encodeTurn(turn: Turn): DocumentData {
  const turnId = normalizeTurnId(turn.turnId);
  const record: DocumentData = {
    v: RECORD_VERSION,
    turn_id: turnId,
    order_key: turnIdOrderKey(turnId),
    role: turn.role,
    speaker_name: turn.speakerName,
    content: turn.content.trim(),
    created_at: turn.createdAt,
  };
  if (turn.speakerId !== undefined) record.speaker_id = turn.speakerId;
  return record;
}

/** Records written before turn_id was stored carry the id only as the document id. */
export function decodeTurn(docId: string, data: DocumentData): Turn | undefined {
  const parsed = turnRecordSchema.safeParse({ turn_id: docId, ...data });
  if (!parsed.success) return undefined;
  const r = parsed.data;
  return {
    turnId: r.turn_id,
    role: r.role,
    speakerName: r.speaker_name,
    speakerId: r.speaker_id,
    content: r.content,
    createdAt: r.created_at,
  };
}

export function decodeScopeRecord(data: DocumentData): ScopeRecord {
  const parsed = scopeRecordSchema.safeParse(data);
  return parsed.success ? parsed.data : { summary: "", recent_count: 0, updated_at: 0 };
}

export function scopeFields(scope: ConversationScope): DocumentData {
  return {
    v: RECORD_VERSION,
    bot_key: scope.botKey,
    guild_id: scope.guildId,
    channel_id: scope.channelId,
    user_id: scope.userId,
  };
}

export function turnIdFromDoc(docId: string, data: DocumentData): TurnId | undefined {
  const parsed = turnIdSchema.safeParse(data.turn_id ?? docId);
  return parsed.success ? parsed.data : undefined;
}
