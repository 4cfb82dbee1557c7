import { createOpenAICompletionService } from './ai/completion';
import { createCompletionGateway } from './ai/gateway';
import { buildAppConfig } from './config/app';
import { loadEnv } from './config/env';
import { loadAgentProfile } from './config/profile';
import { createApp, logStartup } from './server/app';

const env = loadEnv();
const config = buildAppConfig(env, loadAgentProfile(env.AGENT_PROFILE_PATH));
const gateway = createCompletionGateway(
  createOpenAICompletionService({
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    timeoutMs: env.OPENAI_TIMEOUT_MS,
  }),
);

const app = createApp({ config, gateway });

app.listen(env.PORT, () => {
  logStartup(env.PORT, config.profile.service);
});
