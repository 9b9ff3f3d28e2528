export type ProviderName = "openai" | "google" | "cohere";

export type EmbeddingProviderName = ProviderName;

/** Providers that also offer chat completion. */
export type CompletionProviderName = Exclude<ProviderName, "cohere">;

export interface ModelPreferences {
  embeddingProvider: EmbeddingProviderName;
  embeddingModel: string;
  completionProvider: CompletionProviderName;
  chatModel: string;
}

export const DEFAULT_MODEL_PREFERENCES: ModelPreferences = {
  embeddingProvider: "openai",
  embeddingModel: "text-embedding-3-small",
  completionProvider: "openai",
  chatModel: "gpt-4o-mini",
};

export type ContextFormat = "xml" | "markdown" | "plain";

export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  system: string;
  /** Conversation so far; the last entry is the user's question. */
  messages: ChatTurn[];
  /** Formatted context block, empty when nothing was retrieved. */
  context: string;
}

export interface CompletionResult {
  text: string;
  model: string;
  finishReason: string | null;
}

export interface ProviderCallOptions {
  signal?: AbortSignal;
}

export interface EmbedOptions extends ProviderCallOptions {
  /** Some backends embed queries and documents differently. */
  inputType?: "document" | "query";
}

/**
 * Read-only access to provider key material owned by another service.
 * Implementations must never log or persist the returned value.
 */
export interface CredentialProvider {
  getCredential(ownerId: string, provider: ProviderName): Promise<string>;
}

export interface ModelPreferenceSource {
  getPreferences(ownerId: string): Promise<ModelPreferences>;
}
