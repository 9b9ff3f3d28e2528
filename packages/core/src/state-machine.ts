import type { ProcessingState } from "@docchat/types";
import { InvalidTransitionError } from "@docchat/errors";

/**
 * Allowed moves of the document processing state machine. Processing only
 * goes forward; `failed` and `indexed` return to `uploaded` through an
 * explicit reprocess and never on their own.
 */
const TRANSITIONS: Readonly<Record<ProcessingState, readonly ProcessingState[]>> = {
  uploaded: ["extracting", "failed"],
  extracting: ["chunking", "failed"],
  chunking: ["embedding", "failed"],
  embedding: ["indexed", "failed"],
  indexed: ["uploaded"],
  failed: ["uploaded"],
};

export function canTransition(from: ProcessingState, to: ProcessingState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: ProcessingState, to: ProcessingState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/** States in which no processing is running for the document. */
export function isSettled(state: ProcessingState): boolean {
  return state === "indexed" || state === "failed";
}
