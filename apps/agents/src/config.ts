import { z } from "zod";

export const LLM_PROVIDERS = ["ollama", "openai"] as const;

// Blank env vars behave as unset.
export function fromEnv<T extends z.ZodType>(schema: T) {
  return z.preprocess(
    (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    schema
  );
}

export const LlmConfigSchema = z.object({
  provider: fromEnv(z.enum(LLM_PROVIDERS).default("ollama")),
  baseUrl: fromEnv(z.url().default("http://localhost:11434")),
  model: fromEnv(z.string().min(1).default("qwen2.5:7b")),
  apiKey: fromEnv(z.string().min(1).optional()),
  temperature: fromEnv(z.coerce.number().min(0).max(2).default(0.7)),
  maxTokens: fromEnv(z.coerce.number().int().positive().default(8000)),
  timeoutMs: fromEnv(z.coerce.number().int().positive().default(600_000)),
});

export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export interface LlmConfig {
  provider: LlmProvider;
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export function loadLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig {
  return LlmConfigSchema.parse({
    provider: env.LLM_PROVIDER,
    baseUrl: env.LLM_BASE_URL,
    model: env.LLM_MODEL,
    apiKey: env.LLM_API_KEY,
    temperature: env.LLM_TEMPERATURE,
    maxTokens: env.LLM_MAX_TOKENS,
    timeoutMs: env.LLM_TIMEOUT_MS,
  });
}
