/**
 * LLM Provider Types
 *
 * Abstractions for the vision and text providers (OpenAI-compatible, Ollama).
 */

import { z } from "zod";

/**
 * Message content for vision requests
 */
export type VisionContent =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

/**
 * Chat message format (OpenAI-compatible)
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string | VisionContent[];
}

/**
 * Chat request options
 */
export interface ChatRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Aborts the underlying HTTP request */
  signal?: AbortSignal;
}

/**
 * Chat response
 */
export interface ChatResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * LLM Provider interface
 */
export interface LLMProvider {
  name: string;

  vision(
    systemPrompt: string,
    image: Uint8Array,
    imageMimeType: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;

  text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;
}

export const providerKindSchema = z.enum(["ollama", "openai"]);
export type ProviderKind = z.infer<typeof providerKindSchema>;

/**
 * specific provider configuration
 */
export interface ModelConfig {
  provider: ProviderKind;
  endpoint: string;
  model: string;
  numCtx: number;
}

/**
 * Global LLM configuration
 */
export interface LLMConfig {
  /** Bearer token for OpenAI-compatible endpoints */
  apiKey?: string;
  vision: ModelConfig;
  text: ModelConfig;
}

const DEFAULT_ENDPOINTS: Record<ProviderKind, string> = {
  ollama: "http://localhost:11434/v1/chat/completions",
  openai: "https://api.openai.com/v1/chat/completions",
};

const DEFAULT_MODELS: Record<"vision" | "text", Record<ProviderKind, string>> =
  {
    vision: { ollama: "llama3.2-vision", openai: "gpt-4o-mini" },
    text: { ollama: "llama3.2", openai: "gpt-4o-mini" },
  };

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  LLM_VISION_PROVIDER: providerKindSchema.default("ollama"),
  LLM_VISION_MODEL: optionalString,
  LLM_VISION_ENDPOINT: optionalString.pipe(z.string().url().optional()),
  LLM_TEXT_PROVIDER: providerKindSchema.default("ollama"),
  LLM_TEXT_MODEL: optionalString,
  LLM_TEXT_ENDPOINT: optionalString.pipe(z.string().url().optional()),
  LLM_NUM_CTX: z.coerce.number().int().positive().default(8192),
  LLM_API_KEY: optionalString,
});

/**
 * Get default configuration from environment
 *
 * @throws ZodError when a variable is set to an unusable value
 */
export function getDefaultConfig(
  env: Record<string, string | undefined> = process.env,
): LLMConfig {
  const parsed = envSchema.parse(env);

  return {
    apiKey: parsed.LLM_API_KEY,
    vision: {
      provider: parsed.LLM_VISION_PROVIDER,
      endpoint:
        parsed.LLM_VISION_ENDPOINT ??
        DEFAULT_ENDPOINTS[parsed.LLM_VISION_PROVIDER],
      model:
        parsed.LLM_VISION_MODEL ??
        DEFAULT_MODELS.vision[parsed.LLM_VISION_PROVIDER],
      numCtx: parsed.LLM_NUM_CTX,
    },
    text: {
      provider: parsed.LLM_TEXT_PROVIDER,
      endpoint:
        parsed.LLM_TEXT_ENDPOINT ?? DEFAULT_ENDPOINTS[parsed.LLM_TEXT_PROVIDER],
      model:
        parsed.LLM_TEXT_MODEL ?? DEFAULT_MODELS.text[parsed.LLM_TEXT_PROVIDER],
      numCtx: parsed.LLM_NUM_CTX,
    },
  };
}
