/**
 * LLM settings loaded from environment variables.
 * The extraction pipeline runs against a local Ollama server by default; set
 * AWARDS_LLM_PROVIDER=none to run the deterministic path only.
 */

import { z } from 'zod';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

export const DEFAULT_EXTRACTION_MODEL = 'qwen2.5:14b-instruct-q4_K_M';

export const llmProviderEnum = z.enum(['ollama', 'none']);
export type LlmProvider = z.infer<typeof llmProviderEnum>;

const llmSettingsSchema = z.object({
  provider: llmProviderEnum.catch('ollama'),
  baseUrl: z.string().url().catch(DEFAULT_OLLAMA_BASE_URL),
  model: z.string().min(1).catch(DEFAULT_EXTRACTION_MODEL),
  temperature: z.coerce.number().min(0).max(2).catch(0.1),
  maxTokens: z.coerce.number().int().positive().catch(2048),
  timeout: z.coerce.number().int().positive().catch(120000), // 2 minutes per chunk
});

export type LlmSettings = z.infer<typeof llmSettingsSchema>;

/**
 * Read LLM settings from the environment. Unset or invalid values fall back
 * to defaults; this never throws.
 */
export function loadLlmSettings(env: NodeJS.ProcessEnv = process.env): LlmSettings {
  return llmSettingsSchema.parse({
    provider: env.AWARDS_LLM_PROVIDER?.trim().toLowerCase(),
    baseUrl: env.OLLAMA_BASE_URL,
    model: env.AWARDS_LLM_MODEL,
    temperature: env.AWARDS_LLM_TEMPERATURE,
    maxTokens: env.AWARDS_LLM_MAX_TOKENS,
    timeout: env.AWARDS_LLM_TIMEOUT_MS,
  });
}
