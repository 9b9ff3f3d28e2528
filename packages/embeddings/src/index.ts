export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { embeddingModelKey } from "./embedding-provider.interface.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIEmbeddingConfig } from "./openai-provider.js";
export { GoogleEmbeddingProvider, withModelsPrefix } from "./google-provider.js";
export type { GoogleEmbeddingConfig } from "./google-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { ResilientEmbeddingProvider } from "./resilient-provider.js";
export type { ResilienceOptions, ResilientEmbeddingOptions } from "./resilient-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
