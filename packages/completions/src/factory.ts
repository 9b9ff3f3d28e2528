import type { CompletionProviderName } from "@docchat/types";
import type { ICompletionProvider } from "./completion-provider.interface.js";
import { OpenAICompletionProvider } from "./openai-provider.js";
import { GoogleCompletionProvider } from "./google-provider.js";

export interface CompletionFactoryConfig {
  provider: CompletionProviderName;
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export function createCompletionProvider(config: CompletionFactoryConfig): ICompletionProvider {
  const { provider, ...settings } = config;
  switch (provider) {
    case "openai":
      return new OpenAICompletionProvider(settings);
    case "google":
      return new GoogleCompletionProvider(settings);
    default:
      throw new Error(`Unknown completion provider: ${String(provider)}`);
  }
}
