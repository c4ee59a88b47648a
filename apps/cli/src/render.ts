import { formatCitations } from "@rag-client/core";
import { ChatRequestFailedError } from "./errors.js";
import type { ChatAnswer } from "./session.js";

export const EXIT_COMMAND = "exit";

export function isExitCommand(input: string): boolean {
  return input.length === 0 || input.toLowerCase() === EXIT_COMMAND;
}

export function renderAnswer(result: ChatAnswer): string[] {
  const lines = ["", `Answer: ${result.answer}`, ""];
  const citationLines = formatCitations(result.citations);
  if (citationLines.length > 0) {
    lines.push(...citationLines, "");
  }
  return lines;
}

export function renderMissingSettings(missingSettings: readonly string[]): string[] {
  return [
    "Please configure required settings in appsettings.json, .env file or environment variables.",
    `Missing: ${missingSettings.join(", ")}`
  ];
}

export function renderRequestError(error: unknown): string[] {
  if (error instanceof ChatRequestFailedError) {
    const lines = [`Error: ${error.message}`, `Status: ${error.status}`];
    if (error.body) {
      lines.push(`Details: ${error.body}`);
    }
    lines.push("");
    return lines;
  }

  if (error instanceof Error) {
    const lines = [`Error: ${error.name}: ${error.message}`];
    if (error.cause instanceof Error) {
      lines.push(`Inner: ${error.cause.message}`);
    }
    lines.push("");
    return lines;
  }

  return [`Error: ${String(error)}`, ""];
}
