import { readFirstChoiceMessage } from "../chat/response.js";
import { isRecord, tryParseJson } from "../json.js";
import { Citation } from "./citation.js";

export const DEFAULT_CONTENT_PREVIEW_CHARS = 150;

const ELLIPSIS = "...";
const TITLE_INDENT = "  ";
const CONTENT_INDENT = "      ";

export const CITATIONS_HEADING = "Citations:";

export interface CitationParser {
  parseCitations(rawDocument: string | null | undefined): Citation[];
  formatCitation(citation: Citation, ordinal: number): string;
  truncateContent(content: string | null | undefined, maxLength?: number): string;
}

// Missing and null both read as absent; anything else non-string is a shape failure.
type OptionalField = { ok: true; value?: string } | { ok: false };

function readOptionalString(record: Record<string, unknown>, key: string): OptionalField {
  const value = record[key];
  if (value === undefined || value === null) {
    return { ok: true };
  }
  return typeof value === "string" ? { ok: true, value } : { ok: false };
}

function readCitationEntries(document: unknown): unknown[] | undefined {
  const message = readFirstChoiceMessage(document);
  if (!message) {
    return undefined;
  }

  const context = message.context;
  if (!isRecord(context)) {
    return undefined;
  }

  const citations = context.citations;
  return Array.isArray(citations) ? citations : undefined;
}

function toCitation(entry: unknown): Citation | undefined {
  if (!isRecord(entry)) {
    return undefined;
  }

  const title = readOptionalString(entry, "title");
  const filepath = readOptionalString(entry, "filepath");
  const content = readOptionalString(entry, "content");
  if (!title.ok || !filepath.ok || !content.ok) {
    return undefined;
  }

  return new Citation({
    title: title.value,
    sourcePath: filepath.value,
    content: content.value
  });
}

/**
 * Reads `choices[0].message.context.citations` out of a raw chat-completions document.
 * Best effort: empty input, malformed JSON, a missing level or a wrongly shaped entry
 * all give an empty list.
 */
export function parseCitations(rawDocument: string | null | undefined): Citation[] {
  const entries = readCitationEntries(tryParseJson(rawDocument));
  if (!entries) {
    return [];
  }

  const citations: Citation[] = [];
  for (const entry of entries) {
    const citation = toCitation(entry);
    if (!citation) {
      return [];
    }
    citations.push(citation);
  }
  return citations;
}

export function truncateContent(
  content: string | null | undefined,
  maxLength: number = DEFAULT_CONTENT_PREVIEW_CHARS
): string {
  if (!content) {
    return "";
  }
  if (content.length <= maxLength) {
    return content;
  }
  return `${content.slice(0, maxLength)}${ELLIPSIS}`;
}

export function formatCitation(citation: Citation, ordinal: number): string {
  const title = citation.title || citation.sourcePath || `Document ${ordinal}`;
  const heading = `${TITLE_INDENT}[${ordinal}] ${title}`;

  if (!citation.content) {
    return heading;
  }
  return `${heading}\n${CONTENT_INDENT}${truncateContent(citation.content)}`;
}

export function formatCitations(citations: readonly Citation[]): string[] {
  if (citations.length === 0) {
    return [];
  }
  return [CITATIONS_HEADING, ...citations.map((citation, index) => formatCitation(citation, index + 1))];
}

export class ChatCompletionCitationParser implements CitationParser {
  parseCitations(rawDocument: string | null | undefined): Citation[] {
    return parseCitations(rawDocument);
  }

  formatCitation(citation: Citation, ordinal: number): string {
    return formatCitation(citation, ordinal);
  }

  truncateContent(content: string | null | undefined, maxLength?: number): string {
    return truncateContent(content, maxLength);
  }
}
