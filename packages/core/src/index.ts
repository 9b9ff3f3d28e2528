export { DocumentPipeline } from "./document-pipeline.js";
export type { DocumentPipelineDeps, ProcessOptions } from "./document-pipeline.js";

export { ChatOrchestrator, errorReply } from "./chat-orchestrator.js";
export type {
  AskOptions,
  ChatOrchestratorDeps,
  ChatOrchestratorSettings,
} from "./chat-orchestrator.js";

export { retrieve } from "./retrieval.js";
export type { RetrievalDependencies, RetrievalRequest } from "./retrieval.js";

export {
  assembleContext,
  computeContextBudget,
  countTurns,
  fitHistory,
  formatContext,
} from "./context-assembler.js";
export type { AssembledContext, ContextBlock, ContextBudgetInput } from "./context-assembler.js";

export { ConfiguredProviderRegistry } from "./provider-registry.js";
export type {
  CompletionFactory,
  EmbeddingFactory,
  ProviderRegistry,
  ProviderRegistryDeps,
} from "./provider-registry.js";

export { KeyedMutex } from "./keyed-mutex.js";
export type { Release } from "./keyed-mutex.js";

export { assertTransition, canTransition, isSettled } from "./state-machine.js";
