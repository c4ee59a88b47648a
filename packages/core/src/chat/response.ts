import { isRecord, tryParseJson } from "../json.js";

/** `choices[0].message` of a parsed chat-completions document, when it has that shape. */
export function readFirstChoiceMessage(document: unknown): Record<string, unknown> | undefined {
  if (!isRecord(document)) {
    return undefined;
  }

  const choices = document.choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    return undefined;
  }

  const firstChoice: unknown = choices[0];
  if (!isRecord(firstChoice)) {
    return undefined;
  }

  const message = firstChoice.message;
  return isRecord(message) ? message : undefined;
}

export function extractAnswerText(rawDocument: string | null | undefined): string | undefined {
  const message = readFirstChoiceMessage(tryParseJson(rawDocument));
  const content = message?.content;
  return typeof content === "string" ? content : undefined;
}
