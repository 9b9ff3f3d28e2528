import type { ErrorKind } from "./document.js";

export type MessageRole = "user" | "assistant";

export type MessageStatus = "complete" | "partial" | "error";

export interface Citation {
  chunkId: string;
  documentId: string;
  filename: string;
  chunkIndex: number;
  score: number;
  /** The chunk was truncated to fit the context budget. */
  partial: boolean;
}

export interface Message {
  id: string;
  sessionId: string;
  role: MessageRole;
  text: string;
  ordinal: number;
  status: MessageStatus;
  errorKind: ErrorKind | null;
  citations: Citation[];
  createdAt: Date;
}

export interface MessageDraft {
  role: MessageRole;
  text: string;
  status?: MessageStatus;
  errorKind?: ErrorKind | null;
  citations?: Citation[];
}

export interface ChatSession {
  id: string;
  ownerId: string;
  title: string;
  /** Documents the session is scoped to; `null` means every indexed document of the owner. */
  documentIds: string[] | null;
  /** Overrides the owner's preferred chat model for this session. */
  chatModel: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewChatSession {
  title?: string;
  documentIds?: string[] | null;
  chatModel?: string | null;
}

export interface ChatSessionSummary extends ChatSession {
  messageCount: number;
  lastMessage: string | null;
}

export type ChatStreamEvent =
  | { type: "delta"; text: string }
  | { type: "done"; message: Message };
