import type { AgentProfile } from '../config/profile';
import { escapeHtml } from '../text/html';
import { DEFAULT_SOURCE, NAME_PLACEHOLDER, nonEmpty } from './merge';
import { signatureHtmlLines, signatureText } from './signature';
import { truncateSummary, type IntakeRequest, type LeadType, type Priority, type RenderedReply } from './types';

export type TemplateId = 'harrison-updates';

export interface TemplateRule {
  keyword: string;
  templateId: TemplateId;
}

export type MatchSource = 'form_name' | 'subject' | 'body';

interface TemplateContent {
  text: string;
  html: string;
}

interface TemplateDefinition {
  leadType: LeadType;
  priority: Priority;
  build(firstName: string, profile: AgentProfile): TemplateContent;
}

export const TEMPLATE_RULES: readonly TemplateRule[] = [{ keyword: 'harrison', templateId: 'harrison-updates' }];

// Text and HTML are written out in parallel; edit both together.
const TEMPLATES: Record<TemplateId, TemplateDefinition> = {
  'harrison-updates': {
    leadType: 'Buyer',
    priority: 'Medium',
    build(firstName, profile) {
      const text = [
        `Hi ${firstName},`,
        'Thanks for reaching out about Harrison Lake. I keep a running list of everyone who wants updates on the area, and I have added you to it.',
        'As new listings, price changes and lot releases around Harrison come up, I will send them to you directly, usually before they are posted publicly.',
        'If you have something specific in mind, such as waterfront, a recreational cabin or a full-time home, reply with what you are looking for and a rough budget and I will tailor what I send.',
        `Talk soon,\n${signatureText(profile)}`,
      ].join('\n\n');

      const html = [
        `<p>Hi ${escapeHtml(firstName)},</p>`,
        '<p>Thanks for reaching out about Harrison Lake. I keep a running list of everyone who wants updates on the area, and I have added you to it.</p>',
        '<p>As new listings, price changes and lot releases around Harrison come up, I will send them to you directly, usually before they are posted publicly.</p>',
        '<p>If you have something specific in mind, such as waterfront, a recreational cabin or a full-time home, reply with what you are looking for and a rough budget and I will tailor what I send.</p>',
        `<p>Talk soon,<br>${signatureHtmlLines(profile)}</p>`,
      ].join('\n');

      return { text, html };
    },
  },
};

export interface TemplateMatch {
  templateId: TemplateId;
  matchedOn: MatchSource;
  reply: RenderedReply;
}

export function resolveFirstName(request: IntakeRequest): string {
  const formFirstName = nonEmpty(request.form_data?.first_name);
  if (formFirstName) {
    return formFirstName;
  }
  const callerName = nonEmpty(request.from_name);
  if (callerName) {
    return callerName.split(/\s+/)[0];
  }
  return NAME_PLACEHOLDER;
}

function resolveFullName(request: IntakeRequest): string | null {
  const callerName = nonEmpty(request.from_name);
  if (callerName) {
    return callerName;
  }
  const formName = [request.form_data?.first_name, request.form_data?.last_name]
    .map(nonEmpty)
    .filter((part): part is string => part !== null)
    .join(' ');
  return formName || null;
}

function findRule(request: IntakeRequest): { rule: TemplateRule; matchedOn: MatchSource } | null {
  const sources: Array<[MatchSource, string | null | undefined]> = [
    ['form_name', request.form_data?.form_name],
    ['subject', request.subject],
    ['body', request.body],
  ];

  for (const rule of TEMPLATE_RULES) {
    const keyword = rule.keyword.toLowerCase();
    for (const [matchedOn, value] of sources) {
      if (value && value.toLowerCase().includes(keyword)) {
        return { rule, matchedOn };
      }
    }
  }
  return null;
}

/**
 * Look for a topic that has a fixed reply. A hit yields a finished record and
 * the model is never called; `null` means the request goes through extraction.
 */
export function matchTemplate(request: IntakeRequest, profile: AgentProfile): TemplateMatch | null {
  const found = findRule(request);
  if (!found) {
    return null;
  }

  const template = TEMPLATES[found.rule.templateId];
  const content = template.build(resolveFirstName(request), profile);

  return {
    templateId: found.rule.templateId,
    matchedOn: found.matchedOn,
    reply: {
      name: resolveFullName(request),
      email: nonEmpty(request.from_email) ?? nonEmpty(request.form_data?.email),
      phone: nonEmpty(request.phone) ?? nonEmpty(request.form_data?.phone),
      lead_type: template.leadType,
      priority: template.priority,
      summary: truncateSummary(request.body),
      reply: content.text,
      reply_html: content.html,
      source: nonEmpty(request.source) ?? DEFAULT_SOURCE,
    },
  };
}
