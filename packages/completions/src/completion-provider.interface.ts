import type {
  CompletionProviderName,
  CompletionRequest,
  CompletionResult,
  ContextFormat,
  ProviderCallOptions,
} from "@docchat/types";

/**
 * A chat model backend. `stream` yields text fragments in order; abandoning
 * the iteration must release the underlying request.
 */
export interface ICompletionProvider {
  readonly name: CompletionProviderName;
  readonly model: string;
  /** Context block layout this model family follows best. */
  readonly contextFormat: ContextFormat;

  complete(request: CompletionRequest, options?: ProviderCallOptions): Promise<CompletionResult>;
  stream(request: CompletionRequest, options?: ProviderCallOptions): AsyncIterable<string>;
}
