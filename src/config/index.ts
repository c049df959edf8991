export {
  loadSettings,
  loadSourceSettings,
  resolveSummaryLength,
  SUMMARY_LENGTHS,
  type Settings,
  type SourceSettings,
  type AnthropicSettings,
  type FeedSettings,
  type MailSettings,
  type SummaryLengthPreset,
} from "./settings.js";
