export {
  ArticleSummarizer,
  MAX_ARTICLE_CHARS,
  capText,
  type ArticleSummary,
  type ArticleOutcome,
  type FailedStage,
  type SummarizerConfig,
} from "./summarizer.js";
export {
  AnthropicSummaryModel,
  SUMMARY_INSTRUCTION,
  SUMMARY_TEMPERATURE,
  type SummaryModel,
  type SummaryRequest,
} from "./model.js";
export { fetchArticle, ARTICLE_TIMEOUT_MS, type FetchArticleOptions } from "./article-fetcher.js";
export { extractText } from "./text-extractor.js";
