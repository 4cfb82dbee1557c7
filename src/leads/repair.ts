import { z } from 'zod';
import { err, ok, ParseError, type Result } from '../errors';
import {
  CANNED_REPLY,
  DEFAULT_LEAD_TYPE,
  DEFAULT_PRIORITY,
  LEAD_TYPES,
  PRIORITIES,
  fallbackLeadRecord,
  truncateSummary,
  type LeadRecord,
  type LeadType,
  type Priority,
} from './types';

const CODE_FENCE_PATTERN = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/;

function canonicalKey(value: string): string {
  return value.replace(/[\s_-]+/g, '').toLowerCase();
}

function matchEnum<T extends string>(values: readonly T[], input: unknown): T | undefined {
  if (typeof input !== 'string') {
    return undefined;
  }
  const key = canonicalKey(input);
  return values.find((value) => canonicalKey(value) === key);
}

const identityField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    const text = String(value).trim();
    return text ? text : null;
  })
  .catch(null);

const textField = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .catch(undefined);

const decodedLeadSchema = z.object({
  name: identityField,
  email: identityField,
  phone: identityField,
  lead_type: z.unknown().transform((value): LeadType => matchEnum(LEAD_TYPES, value) ?? DEFAULT_LEAD_TYPE),
  priority: z.unknown().transform((value): Priority => matchEnum(PRIORITIES, value) ?? DEFAULT_PRIORITY),
  summary: textField,
  reply: textField,
});

function stripCodeFence(rawText: string): string {
  const trimmed = rawText.trim();
  const fenced = CODE_FENCE_PATTERN.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

/**
 * Decode model output as a JSON object. Arrays and scalars are rejected:
 * a lead is always an object.
 */
export function decodeLeadJson(rawText: string): Result<Record<string, unknown>, ParseError> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(stripCodeFence(rawText));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unable to parse model output as JSON';
    return err(new ParseError(message, rawText));
  }
  if (typeof decoded !== 'object' || decoded === null || Array.isArray(decoded)) {
    return err(new ParseError('Model output is not a JSON object', rawText));
  }
  return ok(Object.fromEntries(Object.entries(decoded)));
}

/**
 * Turn raw model output into a complete LeadRecord. Output that does not
 * decode is kept as the reply text so the drafted answer is not lost.
 */
export function repairLeadRecord(rawText: string, fallbackSummarySource: string): LeadRecord {
  return repairLeadOutput(rawText, fallbackSummarySource).record;
}

export interface RepairOutcome {
  record: LeadRecord;
  parseError?: ParseError;
}

export function repairLeadOutput(rawText: string, fallbackSummarySource: string): RepairOutcome {
  const decoded = decodeLeadJson(rawText);
  if (!decoded.ok) {
    return {
      record: fallbackLeadRecord(fallbackSummarySource, rawText),
      parseError: decoded.error,
    };
  }

  const fields = decodedLeadSchema.parse(decoded.value);
  return {
    record: {
      name: fields.name,
      email: fields.email,
      phone: fields.phone,
      lead_type: fields.lead_type,
      priority: fields.priority,
      summary: fields.summary || truncateSummary(fallbackSummarySource),
      reply: fields.reply || CANNED_REPLY,
    },
  };
}
