import { buildSystemPrompt } from '../leads/extractor';
import type { IntakeRequest } from '../leads/types';
import { logEvent } from '../logging/log';
import { normalizeText } from '../text/normalize';
import type { PipelineContext } from './context';

export const INPUT_PREVIEW_CHARS = 200;

export interface TaskMeta {
  from_name: string | null;
  from_email: string | null;
  subject: string | null;
  source: string | null;
}

export interface TaskResponse {
  timestamp: string;
  task_type: string;
  input_preview: string;
  meta: TaskMeta;
  result: string | null;
  error?: string;
}

export function buildTaskPrompt(taskType: string, request: IntakeRequest): string {
  const lines = [
    `Task: ${taskType}`,
    'Complete the task using the input below. Respond with plain text only, no JSON and no signature.',
    '',
  ];
  if (request.subject?.trim()) {
    lines.push(`Subject: ${request.subject.trim()}`);
  }
  lines.push('Input:', request.body);
  return lines.join('\n');
}

/**
 * Free-text completion for anything that is not a lead reply. The model's
 * text is returned as-is apart from punctuation normalization.
 */
export async function runFreeTextTask(
  taskType: string,
  request: IntakeRequest,
  context: PipelineContext,
  now: () => Date = () => new Date(),
): Promise<TaskResponse> {
  const completion = await context.gateway.complete(
    buildSystemPrompt(context.config.profile.persona),
    buildTaskPrompt(taskType, request),
  );

  const base = {
    timestamp: now().toISOString(),
    task_type: taskType,
    input_preview: Array.from(request.body).slice(0, INPUT_PREVIEW_CHARS).join(''),
    meta: {
      from_name: request.from_name ?? null,
      from_email: request.from_email ?? null,
      subject: request.subject ?? null,
      source: request.source ?? null,
    },
  };

  if (!completion.ok) {
    logEvent('intake.gateway_failed', { task_type: taskType, message: completion.error.message });
    return { ...base, result: null, error: completion.error.message };
  }

  const response: TaskResponse = { ...base, result: normalizeText(completion.value.trim()) };
  logEvent('task.response', { task_type: taskType, length: response.result?.length ?? 0 });
  return response;
}
