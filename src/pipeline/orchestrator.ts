import type { AuthError, ValidationError } from '../errors';
import { extractLead } from '../leads/extractor';
import { mergeLeadFields, nonEmpty } from '../leads/merge';
import { renderReplyHtml } from '../leads/render';
import { matchTemplate } from '../leads/templates';
import type { IntakeRequest, RenderedReply } from '../leads/types';
import { logEvent } from '../logging/log';
import { authorizeCaller } from './auth';
import type { PipelineContext } from './context';
import { parseIntakeRequest } from './request';
import { runFreeTextTask, type TaskResponse } from './task';

export type IntakeStage =
  | 'Received'
  | 'Validated'
  | 'TemplateChecked'
  | 'TemplateShortCircuited'
  | 'ModelInvoked'
  | 'Merged'
  | 'Rendered'
  | 'TaskInvoked'
  | 'Responded'
  | 'RejectedUnauthenticated'
  | 'RejectedEmptyBody';

/** task_type values (and absence) that mean "draft a lead reply". */
export const LEAD_TASK_TYPES: readonly string[] = ['lead', 'lead_reply', 'reply'];

export interface IntakeInvocation {
  payload: unknown;
  authToken?: string;
}

export type IntakeOutcome =
  | { status: 'responded'; path: 'template' | 'model'; response: RenderedReply; stages: IntakeStage[] }
  | { status: 'responded'; path: 'task'; response: TaskResponse; stages: IntakeStage[] }
  | {
      status: 'rejected';
      stage: 'RejectedUnauthenticated';
      error: AuthError;
      stages: IntakeStage[];
    }
  | {
      status: 'rejected';
      stage: 'RejectedEmptyBody';
      error: ValidationError;
      stages: IntakeStage[];
    };

export function isLeadTask(taskType: string | null | undefined): boolean {
  const normalized = nonEmpty(taskType)?.toLowerCase();
  return normalized === undefined || LEAD_TASK_TYPES.includes(normalized);
}

/**
 * Lead flow once a request is validated: template short-circuit, otherwise
 * extraction, merge with caller metadata and HTML rendering.
 */
export async function processLead(
  request: IntakeRequest,
  context: PipelineContext,
  stages: IntakeStage[] = [],
): Promise<{ path: 'template' | 'model'; response: RenderedReply }> {
  const { profile } = context.config;

  const template = matchTemplate(request, profile);
  stages.push('TemplateChecked');
  if (template) {
    stages.push('TemplateShortCircuited');
    logEvent('intake.template_matched', { templateId: template.templateId, matchedOn: template.matchedOn });
    return { path: 'template', response: template.reply };
  }

  stages.push('ModelInvoked');
  const extracted = await extractLead(request.body, { gateway: context.gateway, persona: profile.persona });

  const merged = mergeLeadFields(extracted, request);
  stages.push('Merged');

  const response: RenderedReply = { ...merged, reply_html: renderReplyHtml(merged.reply, profile) };
  stages.push('Rendered');
  return { path: 'model', response };
}

export async function handleIntake(invocation: IntakeInvocation, context: PipelineContext): Promise<IntakeOutcome> {
  const stages: IntakeStage[] = ['Received'];

  const auth = authorizeCaller(invocation.authToken, context.config.webhookSecret);
  if (!auth.ok) {
    stages.push('RejectedUnauthenticated');
    logEvent('intake.rejected', { reason: auth.error.message });
    return { status: 'rejected', stage: 'RejectedUnauthenticated', error: auth.error, stages };
  }

  const parsed = parseIntakeRequest(invocation.payload);
  if (!parsed.ok) {
    stages.push('RejectedEmptyBody');
    logEvent('intake.rejected', { reason: parsed.error.message });
    return { status: 'rejected', stage: 'RejectedEmptyBody', error: parsed.error, stages };
  }
  const request = parsed.value;
  stages.push('Validated');
  logEvent('intake.request', {
    subject: request.subject ?? null,
    source: request.source ?? null,
    task_type: request.task_type ?? null,
    bodyLength: request.body.length,
  });

  if (!isLeadTask(request.task_type)) {
    const taskType = nonEmpty(request.task_type) ?? '';
    stages.push('TaskInvoked');
    const response = await runFreeTextTask(taskType, request, context);
    stages.push('Responded');
    return { status: 'responded', path: 'task', response, stages };
  }

  const { path, response } = await processLead(request, context, stages);
  stages.push('Responded');
  logEvent('intake.response', {
    path,
    lead_type: response.lead_type,
    priority: response.priority,
    source: response.source,
    error: response.error ?? null,
  });
  return { status: 'responded', path, response, stages };
}
