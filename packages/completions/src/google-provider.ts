import { GoogleGenAI } from "@google/genai";
import type { GenerateContentResponse } from "@google/genai";
import type { CompletionRequest, CompletionResult, ProviderCallOptions } from "@docchat/types";
import { PermanentProviderError } from "@docchat/errors";
import type { ICompletionProvider } from "./completion-provider.interface.js";
import { renderPrompt } from "./prompt.js";

const DEFAULT_MODEL = "gemini-2.0-flash";

const BLOCKED_FINISH_REASONS = new Set(["SAFETY", "PROHIBITED_CONTENT", "BLOCKLIST", "SPII"]);

export interface GoogleCompletionConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Model ids are addressed as `models/<id>`; accept either form. */
export function withModelsPrefix(model: string): string {
  return model.startsWith("models/") ? model : `models/${model}`;
}

export class GoogleCompletionProvider implements ICompletionProvider {
  readonly name = "google";
  readonly model: string;
  readonly contextFormat = "plain";
  private client: GoogleGenAI;
  private temperature: number;
  private maxTokens: number | undefined;

  constructor(config: GoogleCompletionConfig) {
    this.client = new GoogleGenAI({ apiKey: config.apiKey });
    this.model = (config.model ?? DEFAULT_MODEL).replace(/^models\//, "");
    this.temperature = config.temperature ?? 0.2;
    this.maxTokens = config.maxTokens;
  }

  async complete(request: CompletionRequest, options?: ProviderCallOptions): Promise<CompletionResult> {
    const response = await this.client.models.generateContent(this.toParams(request, options));
    this.assertNotBlocked(response);

    const finishReason: string | undefined = response.candidates?.[0]?.finishReason;
    return {
      text: response.text ?? "",
      model: this.model,
      finishReason: finishReason ?? null,
    };
  }

  async *stream(request: CompletionRequest, options?: ProviderCallOptions): AsyncGenerator<string> {
    const stream = await this.client.models.generateContentStream(this.toParams(request, options));

    for await (const chunk of stream) {
      this.assertNotBlocked(chunk);
      const text = chunk.text;
      if (text) {
        yield text;
      }
    }
  }

  private toParams(request: CompletionRequest, options?: ProviderCallOptions) {
    const { system, turns } = renderPrompt(request);
    return {
      model: withModelsPrefix(this.model),
      contents: turns.map((turn) => ({
        role: turn.role === "assistant" ? "model" : "user",
        parts: [{ text: turn.content }],
      })),
      config: {
        systemInstruction: system,
        temperature: this.temperature,
        maxOutputTokens: this.maxTokens,
        abortSignal: options?.signal,
      },
    };
  }

  private assertNotBlocked(response: GenerateContentResponse): void {
    const blockReason: string | undefined = response.promptFeedback?.blockReason;
    const finishReason: string | undefined = response.candidates?.[0]?.finishReason;
    if (blockReason || (finishReason && BLOCKED_FINISH_REASONS.has(finishReason))) {
      throw new PermanentProviderError(
        `The request was blocked by the provider (${blockReason ?? finishReason ?? "unknown"})`,
        this.name,
        "content-rejected",
      );
    }
  }
}
