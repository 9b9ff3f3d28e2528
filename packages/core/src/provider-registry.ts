import type {
  CompletionProviderName,
  CredentialProvider,
  EmbeddingProviderName,
  ModelPreferenceSource,
} from "@docchat/types";
import type { IEmbeddingProvider, ResilienceOptions } from "@docchat/embeddings";
import { ResilientEmbeddingProvider, createEmbeddingProvider } from "@docchat/embeddings";
import type { ICompletionProvider } from "@docchat/completions";
import { ResilientCompletionProvider, createCompletionProvider } from "@docchat/completions";

export interface ProviderRegistry {
  /** The owner's configured embedding backend, wrapped with retries and timeouts. */
  embeddingFor(ownerId: string): Promise<IEmbeddingProvider>;
  /** The owner's completion backend; `chatModel` overrides the preferred model. */
  completionFor(ownerId: string, chatModel?: string | null): Promise<ICompletionProvider>;
}

export type EmbeddingFactory = (config: {
  provider: EmbeddingProviderName;
  apiKey: string;
  model: string;
}) => IEmbeddingProvider;

export type CompletionFactory = (config: {
  provider: CompletionProviderName;
  apiKey: string;
  model: string;
}) => ICompletionProvider;

export interface ProviderRegistryDeps {
  preferences: ModelPreferenceSource;
  credentials: CredentialProvider;
  resilience: ResilienceOptions;
  embeddingBatchSize: number;
  embeddingFactory?: EmbeddingFactory;
  completionFactory?: CompletionFactory;
}

/**
 * Builds providers per owner from their stored preferences and credentials.
 * Keys are fetched on every call and never kept.
 */
export class ConfiguredProviderRegistry implements ProviderRegistry {
  private readonly embeddingFactory: EmbeddingFactory;
  private readonly completionFactory: CompletionFactory;

  constructor(private readonly deps: ProviderRegistryDeps) {
    this.embeddingFactory = deps.embeddingFactory ?? createEmbeddingProvider;
    this.completionFactory = deps.completionFactory ?? createCompletionProvider;
  }

  async embeddingFor(ownerId: string): Promise<IEmbeddingProvider> {
    const preferences = await this.deps.preferences.getPreferences(ownerId);
    const apiKey = await this.deps.credentials.getCredential(ownerId, preferences.embeddingProvider);
    const inner = this.embeddingFactory({
      provider: preferences.embeddingProvider,
      apiKey,
      model: preferences.embeddingModel,
    });
    return new ResilientEmbeddingProvider(inner, {
      ...this.deps.resilience,
      batchSize: this.deps.embeddingBatchSize,
    });
  }

  async completionFor(ownerId: string, chatModel?: string | null): Promise<ICompletionProvider> {
    const preferences = await this.deps.preferences.getPreferences(ownerId);
    const apiKey = await this.deps.credentials.getCredential(ownerId, preferences.completionProvider);
    const inner = this.completionFactory({
      provider: preferences.completionProvider,
      apiKey,
      model: chatModel ?? preferences.chatModel,
    });
    return new ResilientCompletionProvider(inner, this.deps.resilience);
  }
}
