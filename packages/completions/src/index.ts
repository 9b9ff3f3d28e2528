export type { ICompletionProvider } from "./completion-provider.interface.js";
export {
  renderPrompt,
  DEFAULT_SYSTEM_PROMPT,
  GROUNDING_INSTRUCTION,
  NO_CONTEXT_INSTRUCTION,
} from "./prompt.js";
export type { RenderedPrompt } from "./prompt.js";
export { OpenAICompletionProvider } from "./openai-provider.js";
export type { OpenAICompletionConfig } from "./openai-provider.js";
export { GoogleCompletionProvider } from "./google-provider.js";
export type { GoogleCompletionConfig } from "./google-provider.js";
export { ResilientCompletionProvider } from "./resilient-provider.js";
export type { CompletionResilienceOptions } from "./resilient-provider.js";
export { createCompletionProvider } from "./factory.js";
export type { CompletionFactoryConfig } from "./factory.js";
