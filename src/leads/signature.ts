import type { AgentProfile } from '../config/profile';
import { escapeHtml } from '../text/html';

function signatureLines(profile: AgentProfile): string[] {
  const { agent } = profile;
  const affiliation = agent.title ? `${agent.title}, ${agent.brokerage}` : agent.brokerage;
  return [agent.name, affiliation, agent.phone];
}

export function signatureText(profile: AgentProfile): string {
  return [...signatureLines(profile), profile.agent.link].join('\n');
}

/** Inner HTML of the signature: lines joined by <br>, ending in the profile link. */
export function signatureHtmlLines(profile: AgentProfile): string {
  const link = escapeHtml(profile.agent.link);
  return [...signatureLines(profile).map(escapeHtml), `<a href="${link}">${link}</a>`].join('<br>');
}

export function signatureHtml(profile: AgentProfile): string {
  return `<p>${signatureHtmlLines(profile)}</p>`;
}
