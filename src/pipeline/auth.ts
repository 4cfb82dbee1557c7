import { createHash, timingSafeEqual } from 'node:crypto';
import { AuthError, err, ok, type Result } from '../errors';

export const WEBHOOK_SECRET_HEADER = 'x-webhook-secret';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/** With no secret configured every caller is accepted. */
export function authorizeCaller(provided: string | undefined, secret: string | undefined): Result<true, AuthError> {
  if (!secret) {
    return ok(true);
  }
  if (!provided) {
    return err(new AuthError(`Missing ${WEBHOOK_SECRET_HEADER} header`));
  }
  if (!timingSafeEqual(digest(provided), digest(secret))) {
    return err(new AuthError('Invalid webhook secret'));
  }
  return ok(true);
}
