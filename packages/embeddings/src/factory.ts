import type { EmbeddingProviderName } from "@docchat/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";
import { GoogleEmbeddingProvider } from "./google-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderName;
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  const { provider, ...settings } = config;
  switch (provider) {
    case "openai":
      return new OpenAIEmbeddingProvider(settings);
    case "google":
      return new GoogleEmbeddingProvider(settings);
    case "cohere":
      return new CohereEmbeddingProvider(settings);
    default:
      throw new Error(`Unknown embedding provider: ${String(provider)}`);
  }
}
