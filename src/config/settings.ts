/**
 * UAE Mortgage Advisor - Settings
 * Environment configuration, parsed once at boot
 */

import { z } from 'zod';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : value.toLowerCase() === 'true'));

const EnvSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  DEBUG: flag(true),
  OPENAI_API_KEY: optionalString,
  GROQ_API_KEY: optionalString,
  LLM_BASE_URL: optionalString.pipe(z.string().url().optional()),
  MODEL_NAME: z.string().min(1).default('llama-3.3-70b-versatile'),
  MAX_TOOL_ROUNDS: z.coerce.number().int().positive().default(5),
  DATABASE_URL: optionalString,
  ADMIN_API_KEY: optionalString,
  CHAT_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(30),
});

export interface Settings {
  host: string;
  port: number;
  debug: boolean;
  openaiApiKey?: string;
  groqApiKey?: string;
  llmBaseUrl?: string;
  modelName: string;
  maxToolRounds: number;
  databaseUrl?: string;
  adminApiKey?: string;
  chatRateLimitPerMinute: number;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    debug: e.DEBUG,
    openaiApiKey: e.OPENAI_API_KEY,
    groqApiKey: e.GROQ_API_KEY,
    llmBaseUrl: e.LLM_BASE_URL,
    modelName: e.MODEL_NAME,
    maxToolRounds: e.MAX_TOOL_ROUNDS,
    databaseUrl: e.DATABASE_URL,
    adminApiKey: e.ADMIN_API_KEY,
    chatRateLimitPerMinute: e.CHAT_RATE_LIMIT_PER_MINUTE,
  };
}

export function isModelConfigured(settings: Settings): boolean {
  return Boolean(settings.openaiApiKey || settings.groqApiKey);
}

/**
 * Credentials for the chat model, or null when none are configured.
 * A Groq key alone targets Groq's OpenAI-compatible endpoint.
 */
export function resolveModelEndpoint(settings: Settings): { apiKey: string; baseURL?: string } | null {
  if (settings.openaiApiKey) {
    return { apiKey: settings.openaiApiKey, baseURL: settings.llmBaseUrl };
  }
  if (settings.groqApiKey) {
    return { apiKey: settings.groqApiKey, baseURL: settings.llmBaseUrl ?? GROQ_BASE_URL };
  }
  return null;
}
