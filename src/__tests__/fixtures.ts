import { vi } from 'vitest';
import type { CompletionGateway } from '../ai/gateway';
import { buildAppConfig, type AppConfig } from '../config/app';
import { parseEnv } from '../config/env';
import type { AgentProfile } from '../config/profile';
import type { PipelineContext } from '../pipeline/context';

export const testProfile: AgentProfile = {
  service: 'lead-intake-webhook',
  agent: {
    name: 'Dave Whitfield',
    title: 'REALTOR',
    brokerage: 'Lakeside Realty Group',
    phone: '604-555-0142',
    link: 'https://www.example.com/dave',
  },
  persona: 'You are a test persona for a realtor.',
};

export const TEST_SIGNATURE_HTML =
  '<p>Dave Whitfield<br>REALTOR, Lakeside Realty Group<br>604-555-0142<br><a href="https://www.example.com/dave">https://www.example.com/dave</a></p>';

export function createTestConfig(overrides: Record<string, string> = {}): AppConfig {
  return buildAppConfig(parseEnv({ OPENAI_API_KEY: 'test-key', ...overrides }), testProfile);
}

export function createFakeGateway() {
  const complete = vi.fn<CompletionGateway['complete']>();
  const gateway: CompletionGateway = { complete };
  return { gateway, complete };
}

export function createTestContext(overrides: Record<string, string> = {}): PipelineContext & {
  complete: ReturnType<typeof createFakeGateway>['complete'];
} {
  const { gateway, complete } = createFakeGateway();
  return { config: createTestConfig(overrides), gateway, complete };
}
