import type { EnvConfig } from './env';
import type { AgentProfile } from './profile';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
}

/** Process-wide settings, read-only after startup. */
export interface AppConfig {
  readonly webhookSecret?: string;
  readonly profile: Readonly<AgentProfile>;
  readonly rateLimit: Readonly<RateLimitConfig>;
}

export function buildAppConfig(env: EnvConfig, profile: AgentProfile): AppConfig {
  return Object.freeze({
    webhookSecret: env.WEBHOOK_SECRET,
    profile: Object.freeze(profile),
    rateLimit: Object.freeze({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
    }),
  });
}
