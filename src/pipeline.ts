import type { Settings } from "./config/index.js";
import { FeedSelector, yesterdayIn, type FeedEntry } from "./feed/index.js";
import {
  AnthropicSummaryModel,
  ArticleSummarizer,
  type ArticleOutcome,
  type FailedStage,
} from "./summarizer/index.js";
import { DigestGenerator, DigestMailer, type Digest } from "./digest/index.js";

export interface EntrySource {
  select(feedUrl: string, now?: Date): Promise<FeedEntry[]>;
}

export interface EntrySummarizer {
  summarizeAll(entries: FeedEntry[]): Promise<ArticleOutcome[]>;
}

export interface DigestSender {
  send(digest: Digest): Promise<string>;
}

export interface PipelineServices {
  selector: EntrySource;
  summarizer: EntrySummarizer;
  mailer: DigestSender;
}

export interface EntryFailure {
  title: string;
  link: string;
  stage: FailedStage;
  reason: string;
}

export interface RunReport {
  digestDate: string;
  entryCount: number;
  summarizedCount: number;
  failures: EntryFailure[];
  sent: boolean;
}

export function createPipelineServices(settings: Settings): PipelineServices {
  return {
    selector: new FeedSelector(),
    summarizer: new ArticleSummarizer(new AnthropicSummaryModel(settings.anthropic), {
      maxTokens: settings.feed.maxTokens,
    }),
    mailer: new DigestMailer(settings.mail),
  };
}

function failuresOf(outcomes: ArticleOutcome[]): EntryFailure[] {
  const failures: EntryFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "failed") {
      failures.push({
        title: outcome.entry.title,
        link: outcome.entry.link,
        stage: outcome.stage,
        reason: outcome.reason,
      });
    }
  }
  return failures;
}

/**
 * One pass: select yesterday's entries, summarize each, send one digest.
 * Feed and mail errors propagate; per-entry failures end up in the report.
 */
export async function runDigestPipeline(
  settings: Settings,
  services: PipelineServices,
  now: Date = new Date()
): Promise<RunReport> {
  const digestDate = yesterdayIn(now);
  const entries = await services.selector.select(settings.feed.url, now);

  if (entries.length === 0 && settings.skipEmptyDigest) {
    console.log(`No entries published on ${digestDate}, skipping empty digest`);
    return { digestDate, entryCount: 0, summarizedCount: 0, failures: [], sent: false };
  }

  const outcomes = await services.summarizer.summarizeAll(entries);
  const digest = new DigestGenerator({ feedUrl: settings.feed.url }).generate(outcomes, digestDate);

  await services.mailer.send(digest);

  return {
    digestDate,
    entryCount: entries.length,
    summarizedCount: digest.articles.length,
    failures: failuresOf(outcomes),
    sent: true,
  };
}
