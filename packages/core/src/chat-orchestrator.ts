import type {
  ChatSession,
  ChatSessionSummary,
  ChatSettings,
  ChatStreamEvent,
  Citation,
  CompletionRequest,
  DocumentRepository,
  ErrorKind,
  Message,
  MessageDraft,
  NewChatSession,
  SessionRepository,
} from "@docchat/types";
import { CancelledError, NotFoundError, ValidationError, describeError } from "@docchat/errors";
import type { ITokenizer } from "@docchat/chunker";
import { defaultTokenizer } from "@docchat/chunker";
import type { ICompletionProvider } from "@docchat/completions";
import { DEFAULT_SYSTEM_PROMPT, GROUNDING_INSTRUCTION } from "@docchat/completions";
import type { IVectorIndex } from "@docchat/vector-store";
import type { Logger } from "@docchat/logger";
import { createChildLogger, createSilentLogger, describeText } from "@docchat/logger";
import type { ProviderRegistry } from "./provider-registry.js";
import { KeyedMutex } from "./keyed-mutex.js";
import { retrieve } from "./retrieval.js";
import {
  assembleContext,
  computeContextBudget,
  countTurns,
  fitHistory,
  formatContext,
} from "./context-assembler.js";

export interface ChatOrchestratorSettings extends ChatSettings {
  topK: number;
}

export interface ChatOrchestratorDeps {
  sessions: SessionRepository;
  documents: DocumentRepository;
  vectorIndex: IVectorIndex;
  providers: ProviderRegistry;
  settings: ChatOrchestratorSettings;
  tokenizer?: ITokenizer;
  logger?: Logger;
  /** Shared when several orchestrators serve the same sessions in one process. */
  mutex?: KeyedMutex;
  systemPrompt?: string;
}

export interface AskOptions {
  signal?: AbortSignal;
}

interface Turn {
  session: ChatSession;
  question: string;
  /** Messages before this turn's question. */
  prior: Message[];
  log: Logger;
}

interface PreparedTurn {
  provider: ICompletionProvider;
  request: CompletionRequest;
  citations: Citation[];
}

/**
 * Runs chat turns against a session's documents. Each turn holds the
 * session's lock from the moment the question is appended until the answer,
 * partial answer or error reply is recorded, so ordinals never interleave.
 */
export class ChatOrchestrator {
  private readonly mutex: KeyedMutex;
  private readonly tokenizer: ITokenizer;
  private readonly logger: Logger;
  private readonly systemPrompt: string;

  constructor(private readonly deps: ChatOrchestratorDeps) {
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.tokenizer = deps.tokenizer ?? defaultTokenizer;
    this.logger = deps.logger ?? createSilentLogger();
    this.systemPrompt = deps.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
  }

  // ── Sessions ──────────────────────────────────────────────────────

  async createSession(ownerId: string, input: NewChatSession = {}): Promise<ChatSession> {
    if (ownerId.length === 0) {
      throw new ValidationError("An owner is required", { ownerId: "required" });
    }
    const documentIds =
      input.documentIds == null ? null : await this.checkDocuments(ownerId, input.documentIds);
    const title = input.title?.trim();

    const session = await this.deps.sessions.create(ownerId, {
      title: title && title.length > 0 ? title : undefined,
      documentIds,
      chatModel: input.chatModel ?? null,
    });
    this.logger.info(
      { sessionId: session.id, scoped: documentIds !== null },
      "Chat session created",
    );
    return session;
  }

  async getSession(sessionId: string): Promise<ChatSession> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError(`Chat session ${sessionId} not found`);
    }
    return session;
  }

  listSessions(ownerId: string): Promise<ChatSessionSummary[]> {
    return this.deps.sessions.listByOwner(ownerId);
  }

  /** `null` widens the session to every indexed document of the owner. */
  setSessionDocuments(sessionId: string, documentIds: string[] | null): Promise<ChatSession> {
    return this.mutex.runExclusive(sessionId, async () => {
      const session = await this.getSession(sessionId);
      const scope =
        documentIds === null ? null : await this.checkDocuments(session.ownerId, documentIds);
      const updated = await this.deps.sessions.update(sessionId, { documentIds: scope });
      if (!updated) {
        throw new NotFoundError(`Chat session ${sessionId} not found`);
      }
      return updated;
    });
  }

  deleteSession(sessionId: string): Promise<void> {
    return this.mutex.runExclusive(sessionId, async () => {
      const deleted = await this.deps.sessions.delete(sessionId);
      if (!deleted) {
        throw new NotFoundError(`Chat session ${sessionId} not found`);
      }
      this.logger.info({ sessionId }, "Chat session deleted");
    });
  }

  async getMessages(sessionId: string): Promise<Message[]> {
    await this.getSession(sessionId);
    return this.deps.sessions.listMessages(sessionId);
  }

  // ── Turns ─────────────────────────────────────────────────────────

  /**
   * Answers `text` and returns the assistant message. Retrieval and provider
   * failures are recorded as an error reply and returned, not thrown.
   */
  async ask(sessionId: string, text: string, options: AskOptions = {}): Promise<Message> {
    const question = this.checkQuestion(text);

    return this.mutex.runExclusive(
      sessionId,
      async () => {
        const turn = await this.beginTurn(sessionId, question);
        let citations: Citation[] = [];
        try {
          const prepared = await this.prepare(turn, options.signal);
          citations = prepared.citations;
          const result = await prepared.provider.complete(prepared.request, {
            signal: options.signal,
          });
          return await this.reply(turn, {
            role: "assistant",
            text: result.text,
            status: "complete",
            citations,
          });
        } catch (error) {
          return this.recordFailure(turn, error, "", citations);
        }
      },
      options.signal,
    );
  }

  /**
   * Streaming variant of `ask`: `delta` events carry text fragments as they
   * arrive, then one `done` event carries the stored message. Abandoning the
   * iteration cancels the completion and still closes the turn.
   */
  async *askStream(
    sessionId: string,
    text: string,
    options: AskOptions = {},
  ): AsyncGenerator<ChatStreamEvent, void, undefined> {
    const question = this.checkQuestion(text);
    const release = await this.mutex.acquire(sessionId, options.signal);
    try {
      const turn = await this.beginTurn(sessionId, question);
      const controller = new AbortController();
      const onAbort = (): void => controller.abort();
      options.signal?.addEventListener("abort", onAbort, { once: true });
      if (options.signal?.aborted) controller.abort();

      let streamed = "";
      let citations: Citation[] = [];
      let closed = false;
      try {
        const prepared = await this.prepare(turn, controller.signal);
        citations = prepared.citations;
        const fragments = prepared.provider.stream(prepared.request, {
          signal: controller.signal,
        });
        for await (const fragment of fragments) {
          streamed += fragment;
          yield { type: "delta", text: fragment };
        }
        const message = await this.reply(turn, {
          role: "assistant",
          text: streamed,
          status: "complete",
          citations,
        });
        closed = true;
        yield { type: "done", message };
      } catch (error) {
        const message = await this.recordFailure(turn, error, streamed, citations);
        closed = true;
        yield { type: "done", message };
      } finally {
        options.signal?.removeEventListener("abort", onAbort);
        if (!closed) {
          // The consumer stopped iterating before the turn was recorded.
          controller.abort();
          await this.closeAbandoned(turn, streamed, citations);
        }
      }
    } finally {
      release();
    }
  }

  private checkQuestion(text: string): string {
    const question = text.trim();
    if (question.length === 0) {
      throw new ValidationError("Message text must not be empty", { text: "required" });
    }
    return question;
  }

  private async checkDocuments(ownerId: string, documentIds: string[]): Promise<string[]> {
    const unique = [...new Set(documentIds)];
    const found = await this.deps.documents.getMany(unique);
    const owned = new Set(found.filter((d) => d.ownerId === ownerId).map((d) => d.id));
    const unknown = unique.filter((id) => !owned.has(id));
    if (unknown.length > 0) {
      throw new ValidationError(
        "Sessions can only be scoped to the owner's documents",
        { documentIds: `unknown documents: ${unknown.join(", ")}` },
        { details: { unknown } },
      );
    }
    return unique;
  }

  private async beginTurn(sessionId: string, question: string): Promise<Turn> {
    const session = await this.getSession(sessionId);
    const prior = await this.deps.sessions.listMessages(sessionId);
    await this.deps.sessions.appendMessage(sessionId, { role: "user", text: question });

    const log = createChildLogger(this.logger, { sessionId });
    log.debug(
      { question: describeText(question), priorMessages: prior.length },
      "Chat turn started",
    );
    return { session, question, prior, log };
  }

  private async prepare(turn: Turn, signal?: AbortSignal): Promise<PreparedTurn> {
    const { settings } = this.deps;
    const ranked = await retrieve(
      {
        ownerId: turn.session.ownerId,
        documentIds: turn.session.documentIds,
        query: turn.question,
        topK: settings.topK,
        signal,
      },
      {
        documents: this.deps.documents,
        vectorIndex: this.deps.vectorIndex,
        providers: this.deps.providers,
        logger: turn.log,
      },
    );
    const provider = await this.deps.providers.completionFor(
      turn.session.ownerId,
      turn.session.chatModel,
    );
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const history = fitHistory(turn.prior, settings.historyMaxTokens, this.tokenizer);
    const budget = computeContextBudget({
      contextWindow: settings.contextWindowTokens,
      systemTokens:
        this.tokenizer.count(this.systemPrompt) + this.tokenizer.count(GROUNDING_INSTRUCTION),
      historyTokens: countTurns(history, this.tokenizer),
      questionTokens: this.tokenizer.count(turn.question),
      answerReserve: settings.answerReserveTokens,
    });
    const format =
      settings.contextFormat === "auto" ? provider.contextFormat : settings.contextFormat;
    const assembled = assembleContext(ranked, budget, this.tokenizer, format);

    turn.log.info(
      {
        retrieved: ranked.length,
        included: assembled.blocks.length,
        contextTokens: assembled.tokensUsed,
        budget,
        partial: assembled.partial,
        historyTurns: history.length,
        model: provider.model,
      },
      "Context assembled",
    );

    return {
      provider,
      citations: assembled.citations,
      request: {
        system: this.systemPrompt,
        messages: [...history, { role: "user", content: turn.question }],
        context: formatContext(assembled.blocks, format),
      },
    };
  }

  private async reply(turn: Turn, draft: MessageDraft): Promise<Message> {
    const message = await this.deps.sessions.appendMessage(turn.session.id, draft);
    turn.log.info(
      { status: message.status, ordinal: message.ordinal, citations: message.citations.length },
      "Chat turn completed",
    );
    return message;
  }

  /**
   * Closes a turn that did not finish. Text already produced is kept as a
   * partial answer; otherwise the reply explains what went wrong.
   */
  private recordFailure(
    turn: Turn,
    error: unknown,
    streamed: string,
    citations: Citation[],
  ): Promise<Message> {
    const { kind, message } = describeError(error);
    const fields = { kind, error: message, streamedChars: streamed.length };
    if (kind === "cancelled") {
      turn.log.info(fields, "Chat turn cancelled");
    } else {
      turn.log.warn(fields, "Chat turn failed");
    }

    if (streamed.length > 0) {
      return this.reply(turn, {
        role: "assistant",
        text: streamed,
        status: "partial",
        errorKind: kind,
        citations,
      });
    }
    return this.reply(turn, {
      role: "assistant",
      text: errorReply(kind, message),
      status: "error",
      errorKind: kind,
    });
  }

  private async closeAbandoned(turn: Turn, streamed: string, citations: Citation[]): Promise<void> {
    try {
      await this.recordFailure(turn, new CancelledError(), streamed, citations);
    } catch (error) {
      turn.log.error(
        { error: describeError(error).message },
        "Could not record the end of an abandoned chat turn",
      );
    }
  }
}

/** Text shown to the user in place of an answer. */
export function errorReply(kind: ErrorKind, message: string): string {
  switch (kind) {
    case "cancelled":
      return "The request was cancelled before an answer was produced.";
    case "permanent-provider":
      return `The AI provider rejected the request: ${message}`;
    case "transient-provider":
    case "transient-provider-exhausted":
      return "The AI provider is not responding right now. Please try again in a moment.";
    case "resource-exhausted":
      return "The AI provider quota or index capacity has been reached. Please try again later.";
    case "dimension-mismatch":
      return "Your documents were indexed with a different embedding model. Reprocess them to chat with the current model.";
    default:
      return `Something went wrong while answering: ${message}`;
  }
}
