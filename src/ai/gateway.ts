import { err, errorMessage, GatewayError, ok, type Result } from '../errors';
import type { CompletionService } from './completion';

/** Low so the model stays literal; the JSON it returns is parsed downstream. */
export const COMPLETION_TEMPERATURE = 0.2;

export interface CompletionGateway {
  complete(systemPrompt: string, userPrompt: string): Promise<Result<string, GatewayError>>;
}

export function createCompletionGateway(service: CompletionService): CompletionGateway {
  return {
    async complete(systemPrompt, userPrompt) {
      try {
        const text = await service.createCompletion({
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: COMPLETION_TEMPERATURE,
        });
        return ok(text);
      } catch (error) {
        return err(new GatewayError(errorMessage(error, 'Completion service request failed')));
      }
    },
  };
}
