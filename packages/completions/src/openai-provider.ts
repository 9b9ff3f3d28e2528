import OpenAI from "openai";
import type { CompletionRequest, CompletionResult, ProviderCallOptions } from "@docchat/types";
import { PermanentProviderError } from "@docchat/errors";
import type { ICompletionProvider } from "./completion-provider.interface.js";
import { renderPrompt } from "./prompt.js";

const DEFAULT_MODEL = "gpt-4o-mini";

export interface OpenAICompletionConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  baseURL?: string;
}

export class OpenAICompletionProvider implements ICompletionProvider {
  readonly name = "openai";
  readonly model: string;
  readonly contextFormat = "markdown";
  private client: OpenAI;
  private temperature: number;
  private maxTokens: number | undefined;

  constructor(config: OpenAICompletionConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? 0.2;
    this.maxTokens = config.maxTokens;
  }

  async complete(request: CompletionRequest, options?: ProviderCallOptions): Promise<CompletionResult> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: this.toMessages(request),
        temperature: this.temperature,
        ...(this.maxTokens !== undefined ? { max_tokens: this.maxTokens } : {}),
      },
      { signal: options?.signal },
    );

    const choice = response.choices[0];
    if (choice?.finish_reason === "content_filter") {
      throw this.rejected();
    }

    return {
      text: choice?.message.content ?? "",
      model: response.model,
      finishReason: choice?.finish_reason ?? null,
    };
  }

  async *stream(request: CompletionRequest, options?: ProviderCallOptions): AsyncGenerator<string> {
    const stream = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: this.toMessages(request),
        temperature: this.temperature,
        stream: true,
        ...(this.maxTokens !== undefined ? { max_tokens: this.maxTokens } : {}),
      },
      { signal: options?.signal },
    );

    for await (const chunk of stream) {
      const choice = chunk.choices[0];
      const content = choice?.delta.content;
      if (content) {
        yield content;
      }
      if (choice?.finish_reason === "content_filter") {
        throw this.rejected();
      }
    }
  }

  private toMessages(request: CompletionRequest): OpenAI.Chat.ChatCompletionMessageParam[] {
    const { system, turns } = renderPrompt(request);
    return [
      { role: "system", content: system },
      ...turns.map((turn): OpenAI.Chat.ChatCompletionMessageParam =>
        turn.role === "user"
          ? { role: "user", content: turn.content }
          : { role: "assistant", content: turn.content },
      ),
    ];
  }

  private rejected(): PermanentProviderError {
    return new PermanentProviderError(
      "The answer was withheld by the provider's content filter",
      this.name,
      "content-rejected",
    );
  }
}
