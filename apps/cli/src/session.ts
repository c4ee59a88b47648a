import { randomUUID } from "node:crypto";
import {
  ChatCompletionCitationParser,
  extractAnswerText,
  type ChatDataSource,
  type ChatMessage,
  type ChatTransport,
  type Citation,
  type CitationParser
} from "@rag-client/core";
import { EmptyAnswerError, serializeError } from "./errors.js";
import {
  noopEventLogger,
  toStructuredLogEvent,
  type ChatStage,
  type EventLogger,
  type StructuredLogContext
} from "./logging.js";

export const DEFAULT_SYSTEM_PROMPT = [
  "You are a helpful assistant.",
  "Answer questions based on the provided documents.",
  "Be accurate, helpful, and cite your sources."
].join(" ");

export const CONNECTION_CHECK_PROMPT = "Say hello in one word";

export type ChatAnswer = {
  answer: string;
  citations: Citation[];
};

export type ChatSessionDeps = {
  transport: ChatTransport;
  dataSource?: ChatDataSource;
  citationParser?: CitationParser;
  systemPrompt?: string;
  deployment?: string;
  sessionId?: string;
  logger?: EventLogger;
};

/**
 * Conversation state for one process run. Every question is sent with the full history
 * and, when configured, the retrieval data source.
 */
export class ChatSession {
  private readonly transport: ChatTransport;
  private readonly dataSource?: ChatDataSource;
  private readonly citationParser: CitationParser;
  private readonly logger: EventLogger;
  private readonly baseLogContext: StructuredLogContext;
  private readonly messages: ChatMessage[];
  private turn = 0;

  constructor(deps: ChatSessionDeps) {
    this.transport = deps.transport;
    this.dataSource = deps.dataSource;
    this.citationParser = deps.citationParser ?? new ChatCompletionCitationParser();
    this.logger = deps.logger ?? noopEventLogger;
    this.baseLogContext = {
      sessionId: deps.sessionId ?? randomUUID(),
      deployment: deps.deployment
    };
    this.messages = [{ role: "system", content: deps.systemPrompt ?? DEFAULT_SYSTEM_PROMPT }];
  }

  get history(): readonly ChatMessage[] {
    return this.messages;
  }

  /** Plain round trip without history or data source. */
  async checkConnection(): Promise<string> {
    const { answer } = await this.exchange("connection_check", [{ role: "user", content: CONNECTION_CHECK_PROMPT }]);
    return answer;
  }

  async ask(query: string): Promise<ChatAnswer> {
    this.messages.push({ role: "user", content: query });
    this.turn += 1;

    const result = await this.exchange(
      "rag_query",
      [...this.messages],
      this.dataSource ? [this.dataSource] : undefined
    );

    this.messages.push({ role: "assistant", content: result.answer });
    return result;
  }

  private async exchange(
    stage: ChatStage,
    messages: ChatMessage[],
    dataSources?: ChatDataSource[]
  ): Promise<ChatAnswer> {
    const logContext: StructuredLogContext = {
      ...this.baseLogContext,
      stage,
      correlationId: randomUUID(),
      turn: stage === "rag_query" ? this.turn : undefined
    };
    const startedAt = Date.now();
    this.logger(toStructuredLogEvent(logContext, "chat.request.start", { startedAt: new Date(startedAt).toISOString() }));

    try {
      const rawDocument = await this.transport.send({ messages, dataSources });
      const answer = extractAnswerText(rawDocument);
      if (!answer) {
        throw new EmptyAnswerError({ correlationId: logContext.correlationId });
      }

      const citations = stage === "rag_query" ? this.readCitations(rawDocument, logContext) : [];

      this.logger(
        toStructuredLogEvent(logContext, "chat.request.done", {
          elapsedMs: Date.now() - startedAt,
          citationCount: citations.length
        })
      );
      return { answer, citations };
    } catch (error) {
      const serialized = serializeError(error);
      this.logger(
        toStructuredLogEvent(logContext, "chat.request.failed", {
          elapsedMs: Date.now() - startedAt,
          status: serialized.status,
          errorName: serialized.name,
          errorCode: serialized.code,
          errorMessage: serialized.message,
          errorStack: serialized.stack
        })
      );
      throw error;
    }
  }

  // Citations never block the answer: a parser failure degrades to none.
  private readCitations(rawDocument: string, logContext: StructuredLogContext): Citation[] {
    try {
      return this.citationParser.parseCitations(rawDocument);
    } catch (error) {
      const serialized = serializeError(error);
      this.logger(
        toStructuredLogEvent(logContext, "chat.citations.failed", {
          errorName: serialized.name,
          errorMessage: serialized.message
        })
      );
      return [];
    }
  }
}
