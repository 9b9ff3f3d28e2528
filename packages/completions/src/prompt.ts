import type { ChatTurn, CompletionRequest } from "@docchat/types";
import { ValidationError } from "@docchat/errors";

export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful AI assistant that provides accurate answers based on the given context.";

export const GROUNDING_INSTRUCTION =
  "Please answer the question based on the provided context. If the answer cannot be found in the context, say so. Include relevant quotes from the context to support your answer.";

export const NO_CONTEXT_INSTRUCTION =
  "No documents are available for this question. Say that no documents were consulted, answer only if you can do so reliably, and do not cite sources.";

export interface RenderedPrompt {
  system: string;
  turns: ChatTurn[];
}

/**
 * Folds the retrieved context and the grounding instruction into the final
 * user turn. Earlier turns are passed through untouched.
 */
export function renderPrompt(request: CompletionRequest): RenderedPrompt {
  const question = request.messages.at(-1);
  if (!question || question.role !== "user") {
    throw new ValidationError("The last message of a completion request must be the user's question", {
      messages: "last message must have role user",
    });
  }

  const context = request.context.trim();
  const content =
    context.length > 0
      ? `Context: ${context}\n\nQuestion: ${question.content}\n\n${GROUNDING_INSTRUCTION}`
      : `Question: ${question.content}\n\n${NO_CONTEXT_INSTRUCTION}`;

  return {
    system: request.system,
    turns: [...request.messages.slice(0, -1), { role: "user", content }],
  };
}
