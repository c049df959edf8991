export type ErrorCategory =
  | "configuration"
  | "feed"
  | "article-fetch"
  | "summarization"
  | "mail";

/**
 * Base class for every failure the digest run knows how to report.
 * The category decides whether the run aborts or only the entry is skipped.
 */
export abstract class DigestError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends DigestError {
  readonly category = "configuration";
}

export class FeedError extends DigestError {
  readonly category = "feed";
}

export class ArticleFetchError extends DigestError {
  readonly category = "article-fetch";
}

export class SummarizationError extends DigestError {
  readonly category = "summarization";
}

export class MailError extends DigestError {
  readonly category = "mail";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
