import { DEFAULT_TONE, TONES, Tone } from './EmailReply';
import { InvalidArgumentError } from './errors';
import { Result, err, ok } from './Result';

export const DEFAULT_HISTORY_LIMIT = 10;

export interface GenerateReplyRequest {
  emailText: string;
  /** Not yet checked against the known tones; the service layer does that. */
  tone: string;
}

/**
 * Type guard for Tone. Case-sensitive, no trimming.
 */
export function isTone(value: unknown): value is Tone {
  return typeof value === 'string' && TONES.some((tone) => tone === value);
}

/**
 * Validates the POST /generate-reply body: `email_text` is a required string,
 * `tone` an optional string defaulting to "formal".
 */
export function parseGenerateReplyRequest(body: unknown): Result<GenerateReplyRequest, InvalidArgumentError> {
  if (body === null || typeof body !== 'object' || Array.isArray(body)) {
    return err(new InvalidArgumentError('Request body must be a JSON object'));
  }

  const emailText = 'email_text' in body ? body.email_text : undefined;
  if (typeof emailText !== 'string') {
    return err(new InvalidArgumentError('Invalid email_text: must be a string'));
  }

  const tone = 'tone' in body ? body.tone : undefined;
  if (tone !== undefined && typeof tone !== 'string') {
    return err(new InvalidArgumentError('Invalid tone: must be a string'));
  }

  return ok({ emailText, tone: tone ?? DEFAULT_TONE });
}

/**
 * Parses the `limit` query parameter. Missing means the default; values above
 * `maxLimit` are clamped.
 */
export function parseHistoryLimit(value: unknown, maxLimit: number): Result<number, InvalidArgumentError> {
  if (value === undefined) {
    return ok(Math.min(DEFAULT_HISTORY_LIMIT, maxLimit));
  }

  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return err(new InvalidArgumentError('Invalid limit: must be a positive integer'));
  }

  const limit = parseInt(value, 10);
  if (limit < 1) {
    return err(new InvalidArgumentError('Invalid limit: must be a positive integer'));
  }

  return ok(Math.min(limit, maxLimit));
}

export function parseReplyId(value: unknown): Result<number, InvalidArgumentError> {
  if (typeof value !== 'string' || !/^-?\d+$/.test(value)) {
    return err(new InvalidArgumentError('Invalid id: must be an integer'));
  }

  const id = parseInt(value, 10);
  if (!Number.isSafeInteger(id)) {
    return err(new InvalidArgumentError('Invalid id: must be an integer'));
  }

  return ok(id);
}
