/**
 * Local provider targeting an Ollama instance through its OpenAI-compatible endpoint.
 * Adds Ollama-specific options (num_ctx, keep_alive) to manage local VRAM constraints.
 */

import type {
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
} from "../types.js";
import { GenericProvider } from "./generic.js";

export class OllamaProvider extends GenericProvider {
  name = "ollama";

  /** Serializes API calls so a local instance never handles concurrent requests */
  private chatQueue: Promise<void> = Promise.resolve();

  constructor(
    endpoint: string,
    defaultModel: string,
    protected defaultNumCtx: number,
  ) {
    super(endpoint, defaultModel, "");
  }

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    return {
      ...super._getRequestBody(messages, options),
      stream: false,
      keep_alive: "5m",
      options: {
        num_ctx: this.defaultNumCtx,
      },
    };
  }

  protected async _chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return new Promise<ChatResponse>((resolve, reject) => {
      this.chatQueue = this.chatQueue.then(async () => {
        try {
          resolve(await this._doChat(messages, options));
        } catch (err) {
          reject(err);
        }
      });
    });
  }
}
