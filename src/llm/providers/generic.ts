/**
 * OpenAI-compatible chat-completions provider.
 *
 * Works against any endpoint speaking the `/v1/chat/completions` dialect
 * (OpenAI, vLLM, LM Studio, Ollama's compatibility layer).
 */

import { z } from "zod";
import type {
  LLMProvider,
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
} from "../types.js";

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullish(),
      }),
    }),
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export class GenericProvider implements LLMProvider {
  name = "generic";

  constructor(
    protected endpoint: string,
    protected defaultModel: string,
    protected apiKey: string,
  ) {}

  async vision(
    systemPrompt: string,
    image: Uint8Array,
    imageMimeType: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      {
        role: "user",
        content: [
          {
            type: "image_url",
            image_url: {
              url: `data:${imageMimeType};base64,${Buffer.from(image).toString("base64")}`,
            },
          },
        ],
      },
    ];
    return this._chat(messages, options);
  }

  async text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      { role: "user", content: userPrompt },
    ];
    return this._chat(messages, options);
  }

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    return {
      model: options?.model || this.defaultModel,
      messages,
      temperature: options?.temperature ?? 0.1,
      max_tokens: options?.maxTokens ?? 4096,
    };
  }

  protected _getRequestHeaders(): Record<string, string> {
    const requestHeaders: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.apiKey) {
      requestHeaders["Authorization"] = `Bearer ${this.apiKey}`;
    }

    return requestHeaders;
  }

  protected async _chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return this._doChat(messages, options);
  }

  protected async _doChat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.defaultModel;

    const response = await fetch(this.endpoint, {
      method: "POST",
      headers: this._getRequestHeaders(),
      body: JSON.stringify(this._getRequestBody(messages, options)),
      signal: options?.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.name} API error (${response.status}): ${error}`);
    }

    const parsed = chatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(
        `${this.name} API returned an unexpected payload: ${parsed.error.message}`,
      );
    }
    const data = parsed.data;

    return {
      content: data.choices[0]?.message.content ?? "",
      model: data.model || model,
      usage: data.usage
        ? {
            promptTokens: data.usage.prompt_tokens,
            completionTokens: data.usage.completion_tokens,
            totalTokens: data.usage.total_tokens,
          }
        : undefined,
    };
  }
}
