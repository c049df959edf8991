/**
 * Build yesterday's digest without sending it.
 * Selects and summarizes like a real run, then writes the HTML body
 * to the file given as the first argument (digest-preview.html by default).
 *
 * Usage: npx tsx scripts/preview-digest.ts [out.html]
 */

import "dotenv/config";
import { writeFile } from "fs/promises";
import { loadSourceSettings } from "../src/config/index.js";
import { describeError } from "../src/errors.js";
import { FeedSelector, yesterdayIn } from "../src/feed/index.js";
import { AnthropicSummaryModel, ArticleSummarizer } from "../src/summarizer/index.js";
import { DigestGenerator } from "../src/digest/index.js";

async function main(): Promise<void> {
  const settings = loadSourceSettings(process.env);
  const outFile = process.argv[2] ?? "digest-preview.html";
  const now = new Date();

  const entries = await new FeedSelector().select(settings.feed.url, now);
  const summarizer = new ArticleSummarizer(new AnthropicSummaryModel(settings.anthropic), {
    maxTokens: settings.feed.maxTokens,
  });
  const outcomes = await summarizer.summarizeAll(entries);

  const digest = new DigestGenerator({ feedUrl: settings.feed.url }).generate(
    outcomes,
    yesterdayIn(now)
  );

  await writeFile(outFile, digest.htmlBody, "utf8");
  console.log(`Wrote ${digest.articles.length} articles to ${outFile}`);

  if (digest.skipped.length > 0) {
    console.warn(`${digest.skipped.length} articles could not be summarized`);
  }
}

main().catch((error: unknown) => {
  console.error(`Preview failed: ${describeError(error)}`);
  process.exit(1);
});
