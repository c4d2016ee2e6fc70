export const TONES = ['formal', 'casual'] as const;

export type Tone = (typeof TONES)[number];

export const DEFAULT_TONE: Tone = 'formal';

/**
 * Result of a generate-reply call when persistence is disabled.
 */
export interface GeneratedReply {
  emailText: string;
  tone: Tone;
  replyText: string;
}

/**
 * A stored exchange. `id` and `createdAt` are assigned by the store.
 */
export interface EmailReplyRecord extends GeneratedReply {
  id: number;
  createdAt: Date;
}

export type NewEmailReply = GeneratedReply;

/**
 * JSON shape returned by the HTTP surface
 */
export interface ReplyResponse {
  id?: number;
  received_email: string;
  tone: Tone;
  reply: string;
  created_at?: string;
}

export function isPersistedReply(reply: GeneratedReply | EmailReplyRecord): reply is EmailReplyRecord {
  return 'id' in reply && 'createdAt' in reply;
}

export function toReplyResponse(reply: GeneratedReply | EmailReplyRecord): ReplyResponse {
  const response: ReplyResponse = {
    received_email: reply.emailText,
    tone: reply.tone,
    reply: reply.replyText,
  };

  if (isPersistedReply(reply)) {
    return {
      id: reply.id,
      ...response,
      created_at: reply.createdAt.toISOString(),
    };
  }

  return response;
}
