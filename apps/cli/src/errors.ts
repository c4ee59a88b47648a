const MAX_MESSAGE_CHARS = 500;
const MAX_STACK_CHARS = 2000;
export const MAX_RESPONSE_BODY_CHARS = 500;

export type SerializedError = {
  name: string;
  message: string;
  code?: string;
  status?: number;
  stack?: string;
};

export class ChatRequestFailedError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(input: { status: number; body: string; message?: string }) {
    super(input.message ?? `Chat completions request failed with status ${input.status}`);
    this.name = "ChatRequestFailedError";
    this.status = input.status;
    this.body = input.body;
  }
}

export class EmptyAnswerError extends Error {
  readonly correlationId?: string;

  constructor(input: { correlationId?: string; message?: string } = {}) {
    super(input.message ?? "Chat completions response carried no answer text");
    this.name = "EmptyAnswerError";
    this.correlationId = input.correlationId;
  }
}

export function truncate(value: string | undefined, maxChars: number): string | undefined {
  if (!value) {
    return undefined;
  }
  return value.length > maxChars ? `${value.slice(0, maxChars)}…` : value;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof ChatRequestFailedError) {
    return {
      name: error.name,
      message: truncate(error.message, MAX_MESSAGE_CHARS) ?? "Unknown error",
      status: error.status,
      stack: truncate(error.stack, MAX_STACK_CHARS)
    };
  }

  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return {
      name: error.name,
      message: truncate(error.message, MAX_MESSAGE_CHARS) ?? "Unknown error",
      code: typeof code === "string" ? code : undefined,
      stack: truncate(error.stack, MAX_STACK_CHARS)
    };
  }

  return {
    name: "UnknownError",
    message: truncate(String(error), MAX_MESSAGE_CHARS) ?? "Unknown error"
  };
}
