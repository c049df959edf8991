import { afterEach, describe, expect, it, vi } from "vitest";
import { ArticleFetchError } from "../errors.js";
import { fetchArticle } from "./article-fetcher.js";

describe("fetchArticle", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the page body", async () => {
    const fetchMock = vi.fn(async () => new Response("<p>hello</p>", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(fetchArticle("https://news.example.com/a")).resolves.toBe("<p>hello</p>");
    expect(fetchMock).toHaveBeenCalledWith(
      "https://news.example.com/a",
      expect.objectContaining({ signal: expect.any(AbortSignal) })
    );
  });

  it("fails on an error status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("gone", { status: 404 })));

    const result = fetchArticle("https://news.example.com/missing");

    await expect(result).rejects.toBeInstanceOf(ArticleFetchError);
    await expect(result).rejects.toThrow("Could not fetch https://news.example.com/missing: HTTP 404");
  });

  it("fails when the host is unreachable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(fetchArticle("https://offline.example.com/")).rejects.toThrow(
      "Could not fetch https://offline.example.com/: fetch failed"
    );
  });

  it("gives up after the timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal?.addEventListener("abort", () => reject(init.signal?.reason));
          })
      )
    );

    await expect(fetchArticle("https://slow.example.com/", { timeoutMs: 20 })).rejects.toBeInstanceOf(
      ArticleFetchError
    );
  });
});
