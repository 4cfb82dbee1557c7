import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { parse } from 'yaml';

const PROFILE_FILENAME = 'agent-profile.yml';
export const DEFAULT_PROFILE_PATH = resolve(__dirname, PROFILE_FILENAME);

const agentProfileSchema = z.object({
  service: z.string().min(1),
  agent: z.object({
    name: z.string().min(1),
    title: z.string().min(1).optional(),
    brokerage: z.string().min(1),
    phone: z.string().min(1),
    link: z.string().url(),
  }),
  persona: z.string().min(1),
});

export type AgentProfile = z.infer<typeof agentProfileSchema>;

export function parseAgentProfile(contents: string, origin = 'agent profile'): AgentProfile {
  const parsedResult = agentProfileSchema.safeParse(parse(contents));

  if (!parsedResult.success) {
    const messages = parsedResult.error.errors
      .map((issue) => `${issue.path.length ? issue.path.join('.') : 'root'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Failed to load ${origin}: ${messages}`);
  }

  return parsedResult.data;
}

/**
 * Read and validate the agent profile. Called once at startup; the result is
 * frozen into the app config.
 */
export function loadAgentProfile(path: string = DEFAULT_PROFILE_PATH): AgentProfile {
  return parseAgentProfile(readFileSync(path, 'utf8'), path);
}
