import Parser from "rss-parser";
import { FeedError, describeError } from "../errors.js";
import { REFERENCE_TIME_ZONE, calendarDate, yesterdayIn } from "./calendar.js";

export const EXCLUDED_CATEGORY = "Software";

export interface FeedEntry {
  title: string;
  link: string;
  /** Publish date exactly as the feed wrote it. */
  published: string;
  publishedAt: Date;
  categories: string[];
}

// <category> elements as xml2js hands them over: plain text for RSS,
// { _, $ } when the RSS element has attributes, { $: { term } } for Atom.
export interface FeedItemFields {
  rawCategories?: unknown[];
}

export type FeedItem = Parser.Item & FeedItemFields;

export type FeedParser = Parser<Record<string, unknown>, FeedItemFields>;

export function createFeedParser(): FeedParser {
  return new Parser<Record<string, unknown>, FeedItemFields>({
    timeout: 10_000,
    headers: {
      "User-Agent": "FeedDigest/1.0",
    },
    customFields: {
      item: [["category", "rawCategories", { keepArray: true }]],
    },
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function categoryTerm(raw: unknown): string | null {
  if (typeof raw === "string") {
    return raw.trim() || null;
  }
  if (!isRecord(raw)) return null;

  if (typeof raw._ === "string") {
    return raw._.trim() || null;
  }
  const attributes = raw.$;
  if (isRecord(attributes) && typeof attributes.term === "string") {
    return attributes.term.trim() || null;
  }
  return null;
}

function categoriesOf(item: FeedItem): string[] {
  const raw: unknown[] = item.rawCategories ?? item.categories ?? [];
  return raw
    .map(categoryTerm)
    .filter((term): term is string => term !== null);
}

const ZONELESS_ISO = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const ZONELESS_RFC822 = /\s\d{1,2}:\d{2}(:\d{2})?$/;

/**
 * Reads a feed timestamp that carries no zone as UTC. Returns null when the
 * string names its own zone (or is no timestamp at all).
 */
export function parseZonelessAsUtc(value: string): Date | null {
  const trimmed = value.trim();
  let utc: string;
  if (ZONELESS_ISO.test(trimmed)) {
    utc = `${trimmed.replace(" ", "T")}Z`;
  } else if (ZONELESS_RFC822.test(trimmed)) {
    utc = `${trimmed} GMT`;
  } else {
    return null;
  }

  const instant = new Date(utc);
  return Number.isNaN(instant.getTime()) ? null : instant;
}

function publishedInstant(item: FeedItem): Date | null {
  // rss-parser derives isoDate in the host's zone when pubDate has none.
  if (item.pubDate) {
    const utc = parseZonelessAsUtc(item.pubDate);
    if (utc) return utc;
  }

  const source = item.isoDate ?? item.pubDate;
  if (!source) return null;

  const instant = new Date(source);
  return Number.isNaN(instant.getTime()) ? null : instant;
}

/**
 * Keeps the items published on the previous calendar day in the reference
 * timezone whose first category is not excluded. Feed order is preserved.
 * Items without categories are kept.
 */
export function selectEntries(
  items: FeedItem[],
  now: Date,
  timeZone: string = REFERENCE_TIME_ZONE
): FeedEntry[] {
  const yesterday = yesterdayIn(now, timeZone);
  const entries: FeedEntry[] = [];

  for (const item of items) {
    const publishedAt = publishedInstant(item);
    if (!publishedAt) continue;
    if (calendarDate(publishedAt, timeZone) !== yesterday) continue;

    const categories = categoriesOf(item);
    if (categories[0] === EXCLUDED_CATEGORY) continue;

    const title = item.title?.trim() || "Untitled";
    const link = item.link?.trim();
    if (!link) {
      console.warn(`Skipping "${title}": entry has no link`);
      continue;
    }

    entries.push({
      title,
      link,
      published: item.pubDate ?? publishedAt.toISOString(),
      publishedAt,
      categories,
    });
  }

  return entries;
}

export class FeedSelector {
  constructor(
    private readonly parser: FeedParser = createFeedParser(),
    private readonly timeZone: string = REFERENCE_TIME_ZONE
  ) {}

  async select(feedUrl: string, now: Date = new Date()): Promise<FeedEntry[]> {
    let items: FeedItem[];
    try {
      const feed = await this.parser.parseURL(feedUrl);
      items = feed.items;
    } catch (error) {
      throw new FeedError(`Could not read feed ${feedUrl}: ${describeError(error)}`, {
        cause: error,
      });
    }

    const entries = selectEntries(items, now, this.timeZone);
    console.log(
      `Feed has ${items.length} entries, ${entries.length} published yesterday (${yesterdayIn(now, this.timeZone)}, ${this.timeZone})`
    );
    return entries;
  }
}
