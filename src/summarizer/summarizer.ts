import type { FeedEntry } from "../feed/index.js";
import {
  ArticleFetchError,
  SummarizationError,
  describeError,
} from "../errors.js";
import { fetchArticle, ARTICLE_TIMEOUT_MS } from "./article-fetcher.js";
import { extractText } from "./text-extractor.js";
import {
  SUMMARY_INSTRUCTION,
  SUMMARY_TEMPERATURE,
  type SummaryModel,
} from "./model.js";

export const MAX_ARTICLE_CHARS = 50_000;

/** Cuts to at most `limit` UTF-16 units without splitting a surrogate pair. */
export function capText(text: string, limit: number): string {
  if (text.length <= limit) return text;

  const last = text.charCodeAt(limit - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? limit - 1 : limit;
  return text.slice(0, end);
}

export interface ArticleSummary {
  title: string;
  /** Publish date as the feed wrote it. */
  published: string;
  link: string;
  summary: string;
}

export type FailedStage = "fetch" | "summarize";

export type ArticleOutcome =
  | { status: "summarized"; summary: ArticleSummary }
  | { status: "failed"; entry: FeedEntry; stage: FailedStage; reason: string };

export interface SummarizerConfig {
  maxTokens: number;
  articleTimeoutMs?: number;
}

export class ArticleSummarizer {
  constructor(
    private readonly model: SummaryModel,
    private readonly config: SummarizerConfig,
    private readonly fetchPage: typeof fetchArticle = fetchArticle,
    private readonly extractPage: typeof extractText = extractText
  ) {}

  async summarize(entry: FeedEntry): Promise<ArticleSummary> {
    const html = await this.fetchPage(entry.link, {
      timeoutMs: this.config.articleTimeoutMs ?? ARTICLE_TIMEOUT_MS,
    });

    let text: string;
    try {
      text = this.extractPage(html);
    } catch (error) {
      throw new ArticleFetchError(`Could not read ${entry.link}: ${describeError(error)}`, {
        cause: error,
      });
    }
    if (!text) {
      throw new ArticleFetchError(`No readable text at ${entry.link}`);
    }

    const summary = await this.model.complete({
      instruction: SUMMARY_INSTRUCTION,
      text: capText(text, MAX_ARTICLE_CHARS),
      maxTokens: this.config.maxTokens,
      temperature: SUMMARY_TEMPERATURE,
    });

    return {
      title: entry.title,
      published: entry.published,
      link: entry.link,
      summary: summary.trim(),
    };
  }

  /**
   * Summarizes entries one at a time, in order. A failed fetch or summary
   * only drops that entry; anything else aborts the batch.
   */
  async summarizeAll(entries: FeedEntry[]): Promise<ArticleOutcome[]> {
    const outcomes: ArticleOutcome[] = [];

    for (const [index, entry] of entries.entries()) {
      console.log(`Summarizing ${index + 1}/${entries.length}: ${entry.title}`);

      try {
        const summary = await this.summarize(entry);
        outcomes.push({ status: "summarized", summary });
      } catch (error) {
        if (error instanceof ArticleFetchError || error instanceof SummarizationError) {
          const stage: FailedStage = error instanceof ArticleFetchError ? "fetch" : "summarize";
          console.error(`Failed to summarize "${entry.title}" (${entry.link}): ${describeError(error)}`);
          outcomes.push({ status: "failed", entry, stage, reason: error.message });
          continue;
        }
        throw error;
      }
    }

    return outcomes;
  }
}
