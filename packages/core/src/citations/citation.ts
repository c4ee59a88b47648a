export const UNKNOWN_DOCUMENT_TITLE = "Unknown Document";

export type CitationInput = {
  title?: string;
  sourcePath?: string;
  content?: string;
};

/** One source document backing part of an answer. */
export class Citation {
  readonly title?: string;
  readonly sourcePath?: string;
  readonly content?: string;

  constructor(input: CitationInput = {}) {
    this.title = input.title;
    this.sourcePath = input.sourcePath;
    this.content = input.content;
    Object.freeze(this);
  }

  get displayTitle(): string {
    if (this.title) {
      return this.title;
    }
    if (this.sourcePath) {
      return this.sourcePath;
    }
    return UNKNOWN_DOCUMENT_TITLE;
  }
}
