const SENSITIVE_KEY_TERMS = ['email', 'phone', 'token', 'secret', 'key', 'authorization'];

function maskSensitiveValue(value: string): string {
  let redacted = value;
  redacted = redacted.replace(
    /([A-Za-z0-9._%+-]+)@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/g,
    (_match: string, user: string, domain: string) => `${user.slice(0, 1)}***@${domain}`,
  );
  redacted = redacted.replace(/\b(?:\+?\d[\d\s().-]{6,}\d)\b/g, '[redacted-phone]');
  redacted = redacted.replace(/(sk|pk|rk|api|secret)[-_][a-z0-9]{8,}/gi, '[redacted-secret]');
  return redacted;
}

export function redactForLog(payload: unknown): unknown {
  if (payload === null || payload === undefined) {
    return payload;
  }
  if (typeof payload === 'string') {
    return maskSensitiveValue(payload);
  }
  if (Array.isArray(payload)) {
    return payload.map(redactForLog);
  }
  if (typeof payload === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      const keyLower = key.toLowerCase();
      const isSensitiveKey = SENSITIVE_KEY_TERMS.some((term) => keyLower.includes(term));
      if (typeof value === 'string' && isSensitiveKey) {
        result[key] = `[redacted-${key}]`;
      } else {
        result[key] = redactForLog(value);
      }
    }
    return result;
  }
  return payload;
}

export function formatLogLine(event: string, payload: unknown, now: Date = new Date()): string {
  return `[${now.toISOString()}] ${event} ${JSON.stringify(redactForLog(payload))}`;
}

export function logEvent(event: string, payload: unknown): void {
  console.log(formatLogLine(event, payload));
}

export function logError(event: string, error: unknown): void {
  const payload =
    error instanceof Error ? { name: error.name, message: error.message } : { message: String(error) };
  console.error(formatLogLine(event, payload));
}
