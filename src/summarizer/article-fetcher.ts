import { ArticleFetchError, describeError } from "../errors.js";

export const ARTICLE_TIMEOUT_MS = 10_000;

export interface FetchArticleOptions {
  timeoutMs?: number;
}

export async function fetchArticle(
  url: string,
  options: FetchArticleOptions = {}
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? ARTICLE_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetch(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        "User-Agent": "FeedDigest/1.0",
        Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
      },
    });
  } catch (error) {
    throw new ArticleFetchError(`Could not fetch ${url}: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new ArticleFetchError(`Could not fetch ${url}: HTTP ${response.status}`);
  }

  try {
    return await response.text();
  } catch (error) {
    throw new ArticleFetchError(`Could not read ${url}: ${describeError(error)}`, {
      cause: error,
    });
  }
}
