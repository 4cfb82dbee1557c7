import type { AgentProfile } from '../config/profile';
import { escapeHtml } from '../text/html';
import { signatureHtml } from './signature';

export const DEFAULT_REPLY_BODY =
  'Thank you for reaching out, and I apologize that I do not have a full answer for you yet. I will follow up with you personally shortly.';

export function splitParagraphs(replyText: string): string[] {
  return replyText
    .replace(/\r\n/g, '\n')
    .split(/\n[ \t]*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

function paragraphHtml(paragraph: string): string {
  const lines = paragraph.split('\n').map((line) => escapeHtml(line.trim()));
  return `<p>${lines.join('<br>')}</p>`;
}

export function renderReplyBody(replyText: string): string {
  const paragraphs = splitParagraphs(replyText);
  if (paragraphs.length === 0) {
    return paragraphHtml(DEFAULT_REPLY_BODY);
  }
  return paragraphs.map(paragraphHtml).join('\n');
}

/**
 * Plain-text reply to HTML: one <p> per blank-line separated paragraph,
 * followed by the agent signature.
 */
export function renderReplyHtml(replyText: string, profile: AgentProfile): string {
  return `${renderReplyBody(replyText)}\n${signatureHtml(profile)}`;
}
