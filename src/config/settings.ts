import { ConfigurationError } from "../errors.js";

export type SummaryLengthPreset = "Short" | "Medium" | "Long";

export const SUMMARY_LENGTHS: Record<SummaryLengthPreset, number> = {
  Short: 500,
  Medium: 1000,
  Long: 1500,
};

const DEFAULT_SUMMARY_LENGTH = SUMMARY_LENGTHS.Medium;
const DEFAULT_MODEL = "claude-haiku-4-5";
const DEFAULT_SUMMARY_TIMEOUT_MS = 60_000;
const DEFAULT_SMTP_TIMEOUT_MS = 30_000;

export interface AnthropicSettings {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export interface FeedSettings {
  url: string;
  summaryLength: string;
  maxTokens: number;
}

export interface MailSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  from: string;
  to: string;
  timeoutMs: number;
}

export interface SourceSettings {
  anthropic: AnthropicSettings;
  feed: FeedSettings;
}

export interface Settings extends SourceSettings {
  mail: MailSettings;
  skipEmptyDigest: boolean;
}

type Env = Record<string, string | undefined>;

function missingKeys(env: Env, keys: readonly string[]): string[] {
  return keys.filter((key) => !env[key]?.trim());
}

function requireValue(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigurationError(`Please set ${key} in your .env file.`);
  }
  return value;
}

function parsePositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}".`);
  }
  return value;
}

/**
 * Maps the Short/Medium/Long preset to a token budget.
 * Unknown presets fall back to the Medium budget with a warning.
 */
export function resolveSummaryLength(preset: string | undefined): number {
  const value = preset?.trim();
  if (!value) {
    throw new ConfigurationError(
      "Please set RSS_FEED_SUMMARY_LENGTH to Short, Medium, or Long in your .env file."
    );
  }

  if (value === "Short" || value === "Medium" || value === "Long") {
    return SUMMARY_LENGTHS[value];
  }

  console.warn(
    `Invalid summary length "${value}". Please set RSS_FEED_SUMMARY_LENGTH to Short, Medium, or Long; using ${DEFAULT_SUMMARY_LENGTH}.`
  );
  return DEFAULT_SUMMARY_LENGTH;
}

function loadAnthropicSettings(env: Env): AnthropicSettings {
  return {
    apiKey: requireValue(env, "ANTHROPIC_API_KEY"),
    model: env.ANTHROPIC_MODEL?.trim() || DEFAULT_MODEL,
    timeoutMs: parsePositiveInt(env, "SUMMARY_TIMEOUT_MS", DEFAULT_SUMMARY_TIMEOUT_MS),
  };
}

const FEED_KEYS = ["RSS_FEED_URL", "RSS_FEED_SUMMARY_LENGTH"] as const;

function loadFeedSettings(env: Env): FeedSettings {
  const missing = missingKeys(env, FEED_KEYS);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Please set RSS_FEED_URL and RSS_FEED_SUMMARY_LENGTH in your .env file (missing: ${missing.join(", ")}).`
    );
  }

  const url = requireValue(env, "RSS_FEED_URL");
  const summaryLength = requireValue(env, "RSS_FEED_SUMMARY_LENGTH");

  return {
    url,
    summaryLength,
    maxTokens: resolveSummaryLength(summaryLength),
  };
}

const MAIL_KEYS = [
  "SMTP_SERVER",
  "SMTP_PORT",
  "SMTP_USER",
  "SMTP_PASSWORD",
  "SENDER_EMAIL",
  "RECIPIENT_EMAIL",
] as const;

function loadMailSettings(env: Env): MailSettings {
  const missing = missingKeys(env, MAIL_KEYS);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Please set ${MAIL_KEYS.join(", ")} in your .env file (missing: ${missing.join(", ")}).`
    );
  }

  const rawPort = requireValue(env, "SMTP_PORT");
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`SMTP_PORT must be a port number, got "${rawPort}".`);
  }

  return {
    host: requireValue(env, "SMTP_SERVER"),
    port,
    user: requireValue(env, "SMTP_USER"),
    password: requireValue(env, "SMTP_PASSWORD"),
    from: requireValue(env, "SENDER_EMAIL"),
    to: requireValue(env, "RECIPIENT_EMAIL"),
    timeoutMs: parsePositiveInt(env, "SMTP_TIMEOUT_MS", DEFAULT_SMTP_TIMEOUT_MS),
  };
}

/** Everything needed to select and summarize, without mail settings. */
export function loadSourceSettings(env: Env): SourceSettings {
  const anthropic = loadAnthropicSettings(env);
  const feed = loadFeedSettings(env);
  return { anthropic, feed };
}

export function loadSettings(env: Env): Settings {
  const source = loadSourceSettings(env);
  const mail = loadMailSettings(env);

  return {
    ...source,
    mail,
    skipEmptyDigest: env.DIGEST_SKIP_EMPTY?.trim().toLowerCase() === "true",
  };
}
