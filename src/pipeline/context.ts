import type { CompletionGateway } from '../ai/gateway';
import type { AppConfig } from '../config/app';

export interface PipelineContext {
  config: AppConfig;
  gateway: CompletionGateway;
}
