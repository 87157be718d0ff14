/**
 * Unified interface for all external LLM interactions.
 * Routes OCR (vision) and structured extraction (text) calls to their
 * configured providers.
 */

import type {
  LLMProvider,
  ChatRequestOptions,
  ChatResponse,
  LLMConfig,
  ModelConfig,
} from "./types.js";
import { getDefaultConfig } from "./types.js";
import { GenericProvider } from "./providers/generic.js";
import { OllamaProvider } from "./providers/ollama.js";

/**
 * Instantiates the provider client for one model configuration.
 */
export function createProvider(
  modelConfig: ModelConfig,
  apiKey?: string,
): LLMProvider {
  switch (modelConfig.provider) {
    case "ollama":
      return new OllamaProvider(
        modelConfig.endpoint,
        modelConfig.model,
        modelConfig.numCtx,
      );
    case "openai":
      if (!apiKey) {
        throw new Error("LLM_API_KEY is required for the openai provider");
      }
      return new GenericProvider(modelConfig.endpoint, modelConfig.model, apiKey);
  }
}

export class LLMClient {
  private visionProvider: LLMProvider;
  private textProvider: LLMProvider;
  private config: LLMConfig;

  constructor(config?: Partial<LLMConfig>) {
    this.config = { ...getDefaultConfig(), ...config };

    this.visionProvider = createProvider(this.config.vision, this.config.apiKey);
    this.textProvider = createProvider(this.config.text, this.config.apiKey);
  }

  get visionModel(): string {
    return this.config.vision.model;
  }

  get textModel(): string {
    return this.config.text.model;
  }

  /**
   * Sends an image with an instruction prompt to the vision model.
   */
  async vision(
    systemPrompt: string,
    image: Uint8Array,
    imageMimeType: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.config.vision.model;
    const response = await this.visionProvider.vision(
      systemPrompt,
      image,
      imageMimeType,
      { ...options, model },
    );
    logUsage(this.visionProvider.name, response);
    return response;
  }

  /**
   * Sends a text-only prompt to the text model.
   */
  async chat(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.config.text.model;
    const response = await this.textProvider.text(systemPrompt, userPrompt, {
      ...options,
      model,
    });
    logUsage(this.textProvider.name, response);
    return response;
  }
}

function logUsage(provider: string, response: ChatResponse): void {
  console.log(
    `[LLMClient] ${provider}/${response.model} returned ${response.content.length} chars` +
      (response.usage ? ` (${response.usage.totalTokens} tokens)` : ""),
  );
}

// Re-export types
export type {
  ChatMessage,
  ChatResponse,
  ChatRequestOptions,
  LLMConfig,
} from "./types.js";
