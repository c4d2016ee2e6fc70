import { Tone } from '../models';

const REPLY_RULES = [
  'Start with a short greeting.',
  "Answer the user's questions clearly.",
  'If something is unclear, ask 1-2 clarifying questions.',
  'End with a friendly sign-off.',
  'Keep the reply under 8 sentences.',
];

/**
 * Builds the instruction sent to the model. The email text is inserted as-is.
 */
export function buildReplyPrompt(emailText: string, tone: Tone): string {
  return [
    '',
    'You are a polite, professional email assistant.',
    '',
    `Write the reply in a ${tone} tone. Follow these rules:`,
    ...REPLY_RULES.map(rule => `- ${rule}`),
    '',
    'EMAIL:',
    emailText,
    '',
  ].join('\n');
}
