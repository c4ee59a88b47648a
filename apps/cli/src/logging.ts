export const ENV_LOG_EVENTS = "RAG_CLIENT_LOG_EVENTS";

export type ChatStage = "connection_check" | "rag_query";

export type StructuredLogContext = {
  sessionId?: string;
  deployment?: string;
  stage?: ChatStage;
  correlationId?: string;
  turn?: number;
};

export type StructuredLogEvent = StructuredLogContext & {
  event: string;
  elapsedMs?: number;
  startedAt?: string;
  citationCount?: number;
  status?: number;
  errorName?: string;
  errorCode?: string;
  errorMessage?: string;
  errorStack?: string;
};

export type EventLogger = (event: StructuredLogEvent) => void;

export function toStructuredLogContext(context: StructuredLogContext): StructuredLogContext {
  return {
    sessionId: context.sessionId,
    deployment: context.deployment,
    stage: context.stage,
    correlationId: context.correlationId,
    turn: context.turn
  };
}

export function toStructuredLogEvent(
  context: StructuredLogContext,
  event: string,
  extra?: {
    elapsedMs?: number;
    startedAt?: string;
    citationCount?: number;
    status?: number;
    errorName?: string;
    errorCode?: string;
    errorMessage?: string;
    errorStack?: string;
  }
): StructuredLogEvent {
  return {
    ...toStructuredLogContext(context),
    event,
    elapsedMs: extra?.elapsedMs,
    startedAt: extra?.startedAt,
    citationCount: extra?.citationCount,
    status: extra?.status,
    errorName: extra?.errorName,
    errorCode: extra?.errorCode,
    errorMessage: extra?.errorMessage,
    errorStack: extra?.errorStack
  };
}

export function isTruthyEnv(value?: string): boolean {
  if (!value) {
    return false;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function isEventLoggingEnabled(env: Record<string, string | undefined> = process.env): boolean {
  return isTruthyEnv(env[ENV_LOG_EVENTS]);
}

export const noopEventLogger: EventLogger = () => {};

/**
 * One JSON line per event on stderr, keeping stdout for the conversation.
 * Returns a no-op logger unless RAG_CLIENT_LOG_EVENTS is set.
 */
export function createEventLogger(options: {
  env?: Record<string, string | undefined>;
  write?: (line: string) => void;
} = {}): EventLogger {
  if (!isEventLoggingEnabled(options.env)) {
    return noopEventLogger;
  }

  const write =
    options.write ??
    ((line: string) => {
      // eslint-disable-next-line no-console
      console.error(line);
    });

  return (event) => {
    write(JSON.stringify(event));
  };
}
