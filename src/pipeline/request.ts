import { z } from 'zod';
import { err, ok, ValidationError, type Result } from '../errors';
import type { IntakeFormData, IntakeRequest } from '../leads/types';

const scalarText = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

// Objects and arrays (repeated urlencoded keys) become null instead of failing the request.
const metadataText = scalarText.nullish().catch(null);

const formData = z
  .record(z.unknown())
  .transform((fields) => {
    const result: IntakeFormData = {};
    for (const [key, value] of Object.entries(fields)) {
      const text = scalarText.safeParse(value);
      if (text.success) {
        result[key] = text.data;
      } else if (value === null) {
        result[key] = null;
      }
    }
    return result;
  })
  .nullish()
  .catch(null);

const intakePayloadSchema = z.object({
  body: metadataText,
  body_text: metadataText,
  from_name: metadataText,
  from_email: metadataText,
  subject: metadataText,
  phone: metadataText,
  source: metadataText,
  task_type: metadataText,
  form_data: formData,
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the inbound payload. The body may arrive as `body` or `body_text`;
 * either way it must contain something other than whitespace. Other fields
 * are best effort: scalars are stringified, anything else is dropped.
 */
export function parseIntakeRequest(payload: unknown): Result<IntakeRequest, ValidationError> {
  const { body, body_text: bodyText, form_data: fields, ...meta } = intakePayloadSchema.parse(
    isPlainObject(payload) ? payload : {},
  );

  const text = body?.trim() ? body : bodyText;
  if (!text || !text.trim()) {
    return err(new ValidationError('body is required'));
  }

  const request: IntakeRequest = {
    ...meta,
    body: text,
    form_data: fields,
  };
  return ok(Object.freeze(request));
}
