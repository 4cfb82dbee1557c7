import type { CompletionGateway } from '../ai/gateway';
import { logEvent } from '../logging/log';
import { normalizeText } from '../text/normalize';
import { repairLeadOutput } from './repair';
import {
  GATEWAY_FAILURE_REPLY,
  LEAD_TYPES,
  PRIORITIES,
  fallbackLeadRecord,
  type LeadRecord,
} from './types';

export const EMAIL_START_MARKER = '<<<EMAIL';
export const EMAIL_END_MARKER = 'EMAIL>>>';

const TONE_RULES = [
  'Write plain, professional English.',
  'Do not use emoji.',
  'Do not use marketing language, hype or exclamation-heavy phrasing.',
  'Use ASCII punctuation only: straight quotes, plain hyphens, three dots instead of an ellipsis.',
].join(' ');

export function buildSystemPrompt(persona: string): string {
  return `${persona.trim()}\n\n${TONE_RULES}`;
}

export function buildExtractionPrompt(emailText: string): string {
  return [
    'Read the inbound message below and return a single JSON object with exactly these keys:',
    '- "name": the sender\'s name, or null if unknown',
    '- "email": the sender\'s email address, or null if unknown',
    '- "phone": the sender\'s phone number, or null if unknown',
    `- "lead_type": one of ${LEAD_TYPES.map((type) => `"${type}"`).join(', ')}`,
    `- "priority": one of ${PRIORITIES.map((priority) => `"${priority}"`).join(', ')}`,
    '- "summary": one or two sentences describing what the sender wants',
    '- "reply": a short professional reply to the sender, paragraphs separated by a blank line, without a signature',
    'Respond with JSON only. No code fences, no commentary.',
    '',
    `The message is between ${EMAIL_START_MARKER} and ${EMAIL_END_MARKER}.`,
    EMAIL_START_MARKER,
    emailText,
    EMAIL_END_MARKER,
  ].join('\n');
}

/** Only human-facing text is normalized; lead_type and priority are left alone. */
function normalizeLeadText(record: LeadRecord): LeadRecord {
  return {
    ...record,
    name: normalizeText(record.name),
    email: normalizeText(record.email),
    phone: normalizeText(record.phone),
    summary: normalizeText(record.summary),
    reply: normalizeText(record.reply),
  };
}

export interface LeadExtractorDeps {
  gateway: CompletionGateway;
  persona: string;
}

/**
 * Ask the model for lead fields and a draft reply. Always resolves to a full
 * record; a gateway failure is reported through `error`.
 */
export async function extractLead(emailText: string, deps: LeadExtractorDeps): Promise<LeadRecord> {
  const completion = await deps.gateway.complete(
    buildSystemPrompt(deps.persona),
    buildExtractionPrompt(emailText),
  );

  if (!completion.ok) {
    logEvent('intake.gateway_failed', { message: completion.error.message });
    return {
      ...fallbackLeadRecord(emailText, GATEWAY_FAILURE_REPLY),
      error: completion.error.message,
    };
  }

  const { record, parseError } = repairLeadOutput(completion.value, emailText);
  if (parseError) {
    logEvent('intake.parse_fallback', { message: parseError.message, length: parseError.raw.length });
  }
  return normalizeLeadText(record);
}
