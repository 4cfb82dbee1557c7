export const LEAD_TYPES = ['Buyer', 'Seller', 'Foreclosure', 'VIPMA', 'HomeEvaluation', 'Other'] as const;
export const PRIORITIES = ['High', 'Medium', 'Low'] as const;

export type LeadType = (typeof LEAD_TYPES)[number];
export type Priority = (typeof PRIORITIES)[number];

export interface LeadRecord {
  name: string | null;
  email: string | null;
  phone: string | null;
  lead_type: LeadType;
  priority: Priority;
  summary: string;
  reply: string;
  error?: string;
}

export const LEAD_FIELDS = ['name', 'email', 'phone', 'lead_type', 'priority', 'summary', 'reply'] as const;

export const SUMMARY_MAX_CHARS = 500;

export const DEFAULT_LEAD_TYPE: LeadType = 'Other';
export const DEFAULT_PRIORITY: Priority = 'Medium';

export const CANNED_REPLY =
  'Thank you for reaching out. I have received your message and will follow up with you personally as soon as possible.';

export const GATEWAY_FAILURE_REPLY =
  'Thank you for your message, and I am sorry for the delay. I was not able to review it in full just now, but I will get back to you personally very soon.';

/** First characters of the body, counted by code point so emoji stay whole. */
export function truncateSummary(source: string): string {
  return Array.from(source).slice(0, SUMMARY_MAX_CHARS).join('');
}

/** Record used whenever the model gave nothing usable to build on. */
export function fallbackLeadRecord(summarySource: string, reply: string): LeadRecord {
  return {
    name: null,
    email: null,
    phone: null,
    lead_type: DEFAULT_LEAD_TYPE,
    priority: DEFAULT_PRIORITY,
    summary: truncateSummary(summarySource),
    reply,
  };
}

export interface IntakeFormData {
  form_name?: string | null;
  first_name?: string | null;
  [field: string]: string | null | undefined;
}

export interface IntakeRequest {
  body: string;
  from_name?: string | null;
  from_email?: string | null;
  subject?: string | null;
  phone?: string | null;
  source?: string | null;
  task_type?: string | null;
  form_data?: IntakeFormData | null;
}

export interface RenderedReply extends LeadRecord {
  reply_html: string;
  source: string;
}
