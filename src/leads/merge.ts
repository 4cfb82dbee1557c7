import type { IntakeRequest, LeadRecord } from './types';

export const DEFAULT_SOURCE = 'gmail';
export const NAME_PLACEHOLDER = 'there';

export type CallerMetadata = Pick<IntakeRequest, 'from_name' | 'from_email' | 'phone' | 'source'>;

export interface MergedLead extends LeadRecord {
  name: string;
  source: string;
}

export function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * Model-extracted identity fields win when present; caller metadata fills the
 * gaps. Name always ends up with something to greet.
 */
export function mergeLeadFields(extracted: LeadRecord, caller: CallerMetadata): MergedLead {
  return {
    ...extracted,
    name: nonEmpty(extracted.name) ?? nonEmpty(caller.from_name) ?? NAME_PLACEHOLDER,
    email: nonEmpty(extracted.email) ?? nonEmpty(caller.from_email),
    phone: nonEmpty(extracted.phone) ?? nonEmpty(caller.phone),
    source: nonEmpty(caller.source) ?? DEFAULT_SOURCE,
  };
}
