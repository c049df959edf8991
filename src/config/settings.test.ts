import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../errors.js";
import { loadSettings, loadSourceSettings, resolveSummaryLength } from "./settings.js";

function fullEnv(): Record<string, string | undefined> {
  return {
    ANTHROPIC_API_KEY: "test-key",
    RSS_FEED_URL: "https://news.example.com/feed.xml",
    RSS_FEED_SUMMARY_LENGTH: "Short",
    SMTP_SERVER: "smtp.example.com",
    SMTP_PORT: "465",
    SMTP_USER: "digest-user",
    SMTP_PASSWORD: "test-password",
    SENDER_EMAIL: "digest@example.com",
    RECIPIENT_EMAIL: "reader@example.com",
  };
}

describe("resolveSummaryLength", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps the presets to token budgets", () => {
    expect(resolveSummaryLength("Short")).toBe(500);
    expect(resolveSummaryLength("Medium")).toBe(1000);
    expect(resolveSummaryLength("Long")).toBe(1500);
  });

  it("falls back to 1000 with a warning for unknown presets", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(resolveSummaryLength("Huge")).toBe(1000);
    expect(resolveSummaryLength("short")).toBe(1000);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("rejects an empty or missing preset", () => {
    expect(() => resolveSummaryLength("")).toThrow(ConfigurationError);
    expect(() => resolveSummaryLength("   ")).toThrow(ConfigurationError);
    expect(() => resolveSummaryLength(undefined)).toThrow(ConfigurationError);
  });
});

describe("loadSettings", () => {
  it("builds settings with defaults for optional values", () => {
    const settings = loadSettings(fullEnv());

    expect(settings).toEqual({
      anthropic: { apiKey: "test-key", model: "claude-haiku-4-5", timeoutMs: 60_000 },
      feed: {
        url: "https://news.example.com/feed.xml",
        summaryLength: "Short",
        maxTokens: 500,
      },
      mail: {
        host: "smtp.example.com",
        port: 465,
        user: "digest-user",
        password: "test-password",
        from: "digest@example.com",
        to: "reader@example.com",
        timeoutMs: 30_000,
      },
      skipEmptyDigest: false,
    });
  });

  it("reads optional overrides", () => {
    const settings = loadSettings({
      ...fullEnv(),
      ANTHROPIC_MODEL: "claude-sonnet-4-5",
      SUMMARY_TIMEOUT_MS: "5000",
      SMTP_TIMEOUT_MS: "7000",
      DIGEST_SKIP_EMPTY: "TRUE",
    });

    expect(settings.anthropic.model).toBe("claude-sonnet-4-5");
    expect(settings.anthropic.timeoutMs).toBe(5000);
    expect(settings.mail.timeoutMs).toBe(7000);
    expect(settings.skipEmptyDigest).toBe(true);
  });

  it("reports a missing API key first", () => {
    const env = { ...fullEnv(), ANTHROPIC_API_KEY: undefined, RSS_FEED_URL: undefined };

    expect(() => loadSettings(env)).toThrow("Please set ANTHROPIC_API_KEY in your .env file.");
  });

  it("reports missing feed settings", () => {
    const env = { ...fullEnv(), RSS_FEED_SUMMARY_LENGTH: "" };

    expect(() => loadSettings(env)).toThrow(
      "Please set RSS_FEED_URL and RSS_FEED_SUMMARY_LENGTH in your .env file (missing: RSS_FEED_SUMMARY_LENGTH)."
    );
  });

  it("reports every missing mail setting", () => {
    const env = { ...fullEnv(), SMTP_PASSWORD: undefined, RECIPIENT_EMAIL: " " };

    expect(() => loadSettings(env)).toThrow(
      "Please set SMTP_SERVER, SMTP_PORT, SMTP_USER, SMTP_PASSWORD, SENDER_EMAIL, RECIPIENT_EMAIL in your .env file (missing: SMTP_PASSWORD, RECIPIENT_EMAIL)."
    );
  });

  it("rejects a non-numeric port", () => {
    const env = { ...fullEnv(), SMTP_PORT: "smtps" };

    expect(() => loadSettings(env)).toThrow('SMTP_PORT must be a port number, got "smtps".');
  });

  it("rejects a non-positive timeout", () => {
    const env = { ...fullEnv(), SMTP_TIMEOUT_MS: "0" };

    expect(() => loadSettings(env)).toThrow(ConfigurationError);
  });
});

describe("loadSourceSettings", () => {
  it("does not require mail settings", () => {
    const settings = loadSourceSettings({
      ANTHROPIC_API_KEY: "test-key",
      RSS_FEED_URL: "https://news.example.com/feed.xml",
      RSS_FEED_SUMMARY_LENGTH: "Long",
    });

    expect(settings.feed.maxTokens).toBe(1500);
  });
});
