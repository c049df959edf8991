import type { ArticleOutcome, ArticleSummary } from "../summarizer/index.js";

export const DIGEST_SUBJECT = "Summary of RSS Feed Articles";

export interface DigestConfig {
  feedUrl: string;
}

export interface SkippedArticle {
  title: string;
  link: string;
  reason: string;
}

export interface Digest {
  subject: string;
  /** YYYY-MM-DD the articles were published on. */
  digestDate: string;
  articles: ArticleSummary[];
  skipped: SkippedArticle[];
  htmlBody: string;
  textBody: string;
}

export class DigestGenerator {
  constructor(private readonly config: DigestConfig) {}

  generate(outcomes: ArticleOutcome[], digestDate: string): Digest {
    const articles: ArticleSummary[] = [];
    const skipped: SkippedArticle[] = [];

    for (const outcome of outcomes) {
      if (outcome.status === "summarized") {
        articles.push(outcome.summary);
      } else {
        skipped.push({
          title: outcome.entry.title,
          link: outcome.entry.link,
          reason: outcome.reason,
        });
      }
    }

    return {
      subject: DIGEST_SUBJECT,
      digestDate,
      articles,
      skipped,
      htmlBody: this.generateHtml(articles, skipped, digestDate),
      textBody: this.generateText(articles, skipped, digestDate),
    };
  }

  private escapeHtml(text: string): string {
    return text
      .replace(/&/g, "&amp;")
      .replace(/</g, "&lt;")
      .replace(/>/g, "&gt;")
      .replace(/"/g, "&quot;")
      .replace(/'/g, "&#39;");
  }

  // Only web links become anchors; feeds can carry javascript: or data: URLs.
  private webHref(link: string): string | null {
    if (!URL.canParse(link)) return null;
    const { protocol } = new URL(link);
    return protocol === "http:" || protocol === "https:" ? this.escapeHtml(link) : null;
  }

  private readMoreHtml(link: string): string {
    const href = this.webHref(link);
    return href
      ? `<p><a href="${href}" style="color: #0066cc; text-decoration: none;">Read more</a></p>`
      : `<p style="color: #666;">Read more: ${this.escapeHtml(link)}</p>`;
  }

  private skippedItemHtml(item: SkippedArticle): string {
    const href = this.webHref(item.link);
    const title = href
      ? `<a href="${href}" style="color: #0066cc;">${this.escapeHtml(item.title)}</a>`
      : `${this.escapeHtml(item.title)} (${this.escapeHtml(item.link)})`;
    return `<li>${title}: ${this.escapeHtml(item.reason)}</li>`;
  }

  private generateHtml(
    articles: ArticleSummary[],
    skipped: SkippedArticle[],
    digestDate: string
  ): string {
    const articleHtml = articles
      .map(
        (article) => `
  <div style="margin-bottom: 24px;">
    <h2 style="font-size: 18px; color: #333; margin-bottom: 4px;">${this.escapeHtml(article.title)}</h2>
    <h3 style="font-size: 13px; font-weight: normal; color: #666; margin-top: 0;">Published on: ${this.escapeHtml(article.published)}</h3>
    <div style="font-size: 14px; color: #444; line-height: 1.5;">${this.escapeHtml(article.summary).replace(/\n/g, "<br>")}</div>
    ${this.readMoreHtml(article.link)}
    <hr style="border: none; border-top: 1px solid #eee;">
  </div>`
      )
      .join("");

    const emptyHtml =
      articles.length === 0 && skipped.length === 0
        ? `
  <p style="color: #666;">No articles were published on ${digestDate}.</p>`
        : "";

    const skippedHtml =
      skipped.length > 0
        ? `
  <div style="margin-top: 24px; padding: 12px; background: #f9f9f9; border-radius: 8px;">
    <h3 style="font-size: 14px; color: #333; margin: 0 0 8px 0;">Not summarized (${skipped.length})</h3>
    <ul style="margin: 0; padding-left: 20px;">${skipped
      .map(
        (item) => `
      ${this.skippedItemHtml(item)}`
      )
      .join("")}
    </ul>
  </div>`
        : "";

    return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 600px; margin: 0 auto; padding: 20px; color: #333;">
  <div style="text-align: center; margin-bottom: 24px;">
    <h1 style="font-size: 24px; margin: 0;">${DIGEST_SUBJECT}</h1>
    <p style="color: #666; margin-top: 8px;">Articles published on ${digestDate}</p>
  </div>${articleHtml}${emptyHtml}${skippedHtml}
  <div style="text-align: center; margin-top: 32px; padding-top: 16px; border-top: 1px solid #eee; color: #999; font-size: 12px;">
    Source: ${this.escapeHtml(this.config.feedUrl)}
  </div>
</body>
</html>`;
  }

  private generateText(
    articles: ArticleSummary[],
    skipped: SkippedArticle[],
    digestDate: string
  ): string {
    const articleText = articles
      .map(
        (article) =>
          `## ${article.title}\nPublished on: ${article.published}\n\n${article.summary}\n\nRead more: ${article.link}`
      )
      .join("\n\n---\n\n");

    let text = `# ${DIGEST_SUBJECT}\nArticles published on ${digestDate}\n\n`;

    if (articles.length > 0) {
      text += articleText;
    } else if (skipped.length === 0) {
      text += `No articles were published on ${digestDate}.`;
    }

    if (skipped.length > 0) {
      if (articles.length > 0) text += "\n\n---\n\n";
      text += `Not summarized (${skipped.length}):`;
      for (const item of skipped) {
        text += `\n* ${item.title} (${item.link}): ${item.reason}`;
      }
    }

    return `${text}\n\n---\nSource: ${this.config.feedUrl}`;
  }
}
