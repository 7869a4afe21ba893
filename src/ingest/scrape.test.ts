import { readFile } from "fs/promises";
import type { Server } from "http";
import { fileURLToPath } from "url";
import express from "express";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { NullLogger } from "../lib/logger.js";
import { cleanContent } from "./clean.js";
import { extractSermonPage, parseUrlList, scrapeSermonPages } from "./scrape.js";
import type { CatalogData } from "./sources.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));

const FAITH_TEXT =
  "Faith is the assurance of things hoped for, the conviction of things not seen. Without faith it is impossible to please God. We walk by faith, not by sight. Each step we take in trust is a step toward the One who called us, and He is faithful to finish the work He began in us.";

const GRACE_TEXT =
  "The Gift Of Grace Grace is the unearned favor of God, given freely to those who could never repay it. We do not work our way into grace; we receive it with open hands, and it teaches us to extend the same mercy to everyone we meet along the way.";

function fixture(name: string): Promise<string> {
  return readFile(`${FIXTURES}${name}`, "utf-8");
}

describe("parseUrlList", () => {
  it("reads URLs with optional categories and skips comments and repeats", () => {
    const pages = parseUrlList(
      [
        "# weekly sermons",
        "https://example.org/walking-by-faith.html Faith",
        "",
        "https://example.org/grace.html   Grace And Mercy",
        "https://example.org/hope.html",
        "https://example.org/grace.html Duplicate",
      ].join("\n")
    );
    expect(pages).toEqual([
      { url: "https://example.org/walking-by-faith.html", category: "Faith" },
      { url: "https://example.org/grace.html", category: "Grace And Mercy" },
      { url: "https://example.org/hope.html", category: "General" },
    ]);
  });

  it("names the line of an invalid URL", () => {
    expect(() => parseUrlList("https://example.org/a.html\nnot-a-url")).toThrow("Invalid URL on line 2: not-a-url");
  });
});

describe("extractSermonPage", () => {
  it("reads the content title and paragraph blocks of a site page", async () => {
    const page = extractSermonPage(await fixture("walking-by-faith.html"), "https://example.org/walking-by-faith.html");
    expect(page.title).toBe("Walking By Faith");
    expect(page.content.split("\n\n")).toHaveLength(2);
    expect(cleanContent(page.content)).toBe(FAITH_TEXT);
  });

  it("falls back to the article of other pages, leaving out navigation", async () => {
    const page = extractSermonPage(await fixture("grace-article.html"), "https://example.org/grace.html");
    expect(page.title).toBe("The Gift Of Grace");
    expect(cleanContent(page.content)).toBe(GRACE_TEXT);
  });

  it("derives a title from the URL when the page has none", () => {
    const page = extractSermonPage("<html><body><p>Short text.</p></body></html>", "https://example.org/love-never-fails.html");
    expect(page).toEqual({ title: "Love Never Fails", content: "Short text." });
  });
});

describe("scrapeSermonPages", () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    const app = express();
    app.use(express.static(FIXTURES));
    server = app.listen(0);
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server has no TCP address");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("adds new pages to the catalog and skips known, short and missing ones", async () => {
    const existing: CatalogData = {
      "Old Sermon": { content: "Already indexed.", url: `${base}/old.html`, category: "General" },
    };
    const result = await scrapeSermonPages(
      [
        { url: `${base}/walking-by-faith.html`, category: "Faith" },
        { url: `${base}/grace-article.html`, category: "General" },
        { url: `${base}/coming-soon.html`, category: "General" },
        { url: `${base}/missing.html`, category: "General" },
        { url: `${base}/old.html`, category: "General" },
      ],
      existing,
      { logger: new NullLogger(), timeoutMs: 5000 }
    );

    expect(result.added).toEqual(["Walking By Faith", "The Gift Of Grace"]);
    expect(result.skippedExisting).toBe(1);
    expect(result.tooShort).toBe(1);
    expect(result.failed).toEqual([
      { key: `${base}/missing.html`, title: `${base}/missing.html`, error: "IngestionError: HTTP 404 Not Found" },
    ]);
    expect(result.catalog["Walking By Faith"]).toEqual({
      content: FAITH_TEXT,
      url: `${base}/walking-by-faith.html`,
      category: "Faith",
    });
    expect(Object.keys(result.catalog)).toEqual(["Old Sermon", "Walking By Faith", "The Gift Of Grace"]);
    expect(Object.keys(existing)).toEqual(["Old Sermon"]);
  });

  it("keeps two pages with the same title apart", async () => {
    const html = await fixture("walking-by-faith.html");
    const result = await scrapeSermonPages(
      [
        { url: "https://example.org/walking-by-faith.html", category: "Faith" },
        { url: "https://example.org/walking-by-faith-part-2.html", category: "Faith" },
      ],
      {},
      { logger: new NullLogger(), timeoutMs: 5000, fetchImpl: async () => new Response(html) }
    );
    expect(result.added).toEqual(["Walking By Faith", "Walking By Faith (walking-by-faith-part-2)"]);
  });
});
