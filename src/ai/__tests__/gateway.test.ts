import { describe, expect, it, vi } from 'vitest';
import { GatewayError } from '../../errors';
import type { CompletionService } from '../completion';
import { COMPLETION_TEMPERATURE, createCompletionGateway } from '../gateway';

function serviceWith(createCompletion: CompletionService['createCompletion']): CompletionService {
  return { createCompletion };
}

describe('createCompletionGateway', () => {
  it('sends a system message then a user message at the fixed temperature', async () => {
    const createCompletion = vi.fn<CompletionService['createCompletion']>().mockResolvedValue('generated');
    const gateway = createCompletionGateway(serviceWith(createCompletion));

    const result = await gateway.complete('system text', 'user text');

    expect(result).toEqual({ ok: true, value: 'generated' });
    expect(createCompletion).toHaveBeenCalledWith({
      messages: [
        { role: 'system', content: 'system text' },
        { role: 'user', content: 'user text' },
      ],
      temperature: COMPLETION_TEMPERATURE,
    });
  });

  it('converts a thrown error into a GatewayError', async () => {
    const gateway = createCompletionGateway(
      serviceWith(vi.fn<CompletionService['createCompletion']>().mockRejectedValue(new Error('429 Rate limit reached'))),
    );

    const result = await gateway.complete('s', 'u');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(GatewayError);
      expect(result.error.message).toBe('429 Rate limit reached');
    }
  });

  it('uses a generic message when the failure carries none', async () => {
    const gateway = createCompletionGateway(
      serviceWith(vi.fn<CompletionService['createCompletion']>().mockRejectedValue(undefined)),
    );

    const result = await gateway.complete('s', 'u');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Completion service request failed');
    }
  });

  it('makes a single attempt', async () => {
    const createCompletion = vi.fn<CompletionService['createCompletion']>().mockRejectedValue(new Error('timeout'));
    const gateway = createCompletionGateway(serviceWith(createCompletion));

    await gateway.complete('s', 'u');

    expect(createCompletion).toHaveBeenCalledTimes(1);
  });
});
