import { readFile } from "fs/promises";
import path from "path";
import * as cheerio from "cheerio";
import { IngestionError, describeError } from "../errors.js";
import type { Logger } from "../lib/logger.js";
import { cleanContent } from "./clean.js";
import type { IngestFailure } from "./pipeline.js";
import { titleFromSlug, type CatalogData } from "./sources.js";

/** Pages with less cleaned text than this are treated as navigation or stubs. */
export const MIN_PAGE_CONTENT_LENGTH = 200;

const TITLE_SELECTORS = ["h1", "h2", ".wsite-content-title", ".wsite-section-title"];
const FALLBACK_ROOTS = ["article", "main", "body"];

export interface PageRequest {
  url: string;
  category: string;
}

/**
 * One URL per line, optionally followed by a category. Blank lines and `#` comments are ignored;
 * repeated URLs are kept once.
 */
export function parseUrlList(text: string): PageRequest[] {
  const seen = new Set<string>();
  const pages: PageRequest[] = [];
  text.split(/\r?\n/).forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) return;
    const [rawUrl, ...rest] = trimmed.split(/\s+/);
    let url: string;
    try {
      url = new URL(rawUrl).toString();
    } catch (err) {
      throw new IngestionError(`Invalid URL on line ${i + 1}: ${rawUrl}`, { cause: err });
    }
    if (seen.has(url)) return;
    seen.add(url);
    pages.push({ url, category: rest.join(" ") || "General" });
  });
  return pages;
}

export async function loadUrlList(filePath: string): Promise<PageRequest[]> {
  const text = await readFile(filePath, "utf-8").catch((err: unknown) => {
    throw new IngestionError(`Could not read URL list ${filePath}`, { cause: err });
  });
  return parseUrlList(text);
}

export interface SermonPage {
  title: string;
  content: string;
}

function slugOf(url: string): string {
  return path.posix.basename(new URL(url).pathname).replace(/\.html?$/i, "");
}

/** Title and body text of a sermon page. */
export function extractSermonPage(html: string, url: string): SermonPage {
  const $ = cheerio.load(html);
  $("script, style, noscript").remove();
  $("br").replaceWith("\n");

  let title = "";
  for (const selector of TITLE_SELECTORS) {
    const text = $(selector).first().text().trim();
    if (text.length > 2) {
      title = text;
      break;
    }
  }
  if (!title) title = titleFromSlug(slugOf(url)) || url;

  const texts = (selector: string): string[] =>
    $(selector)
      .toArray()
      .map((el) => $(el).text().trim())
      .filter((t) => t.length > 0);

  const site = $("#wsite-content").first();
  if (site.length > 0) {
    const paragraphs = texts("#wsite-content div.paragraph");
    if (paragraphs.length > 0) return { title, content: paragraphs.join("\n\n") };
    const elements = texts("#wsite-content .wsite-elements, #wsite-content .wsite-section-elements");
    if (elements.length > 0) return { title, content: elements.join("\n\n") };
    return { title, content: site.text().trim() };
  }

  $("nav, header, footer").remove();
  for (const selector of FALLBACK_ROOTS) {
    const text = $(selector).first().text().trim();
    if (text) return { title, content: text };
  }
  return { title, content: "" };
}

export interface ScrapeDeps {
  logger: Logger;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface ScrapeResult {
  /** The existing catalog plus every page added in this run. */
  catalog: CatalogData;
  added: string[];
  skippedExisting: number;
  tooShort: number;
  failed: IngestFailure[];
}

/**
 * Fetch sermon pages that are not in the catalog yet and add them to a copy of it, keyed by title.
 * A page that fails is reported in `failed`; the others continue.
 */
export async function scrapeSermonPages(
  pages: PageRequest[],
  existing: CatalogData,
  deps: ScrapeDeps
): Promise<ScrapeResult> {
  const { logger, timeoutMs } = deps;
  const fetchPage = deps.fetchImpl ?? fetch;
  const catalog: CatalogData = { ...existing };
  const knownUrls = new Set(Object.values(existing).map((e) => e.url).filter((u) => u.length > 0));
  const result: ScrapeResult = { catalog, added: [], skippedExisting: 0, tooShort: 0, failed: [] };

  for (const page of pages) {
    if (knownUrls.has(page.url)) {
      result.skippedExisting++;
      continue;
    }
    knownUrls.add(page.url);

    let html: string;
    try {
      const res = await fetchPage(page.url, { signal: AbortSignal.timeout(timeoutMs) });
      if (!res.ok) throw new IngestionError(`HTTP ${res.status} ${res.statusText}`.trim());
      html = await res.text();
    } catch (err) {
      const error = describeError(err);
      logger.error("Could not fetch sermon page", { url: page.url, error });
      result.failed.push({ key: page.url, title: page.url, error });
      continue;
    }

    const { title, content: raw } = extractSermonPage(html, page.url);
    const content = cleanContent(raw);
    if (content.length < MIN_PAGE_CONTENT_LENGTH) {
      logger.warn("Page content too short, skipped", { url: page.url, length: content.length });
      result.tooShort++;
      continue;
    }

    let key = title;
    const taken = catalog[key];
    if (taken && taken.url !== page.url) key = `${title} (${slugOf(page.url)})`;
    catalog[key] = { content, url: page.url, category: page.category };
    result.added.push(key);
    logger.info("Scraped sermon page", { title: key, url: page.url, chars: content.length });
  }

  logger.info("Scraping finished", {
    pages: pages.length,
    added: result.added.length,
    skippedExisting: result.skippedExisting,
    tooShort: result.tooShort,
    failed: result.failed.length,
  });
  return result;
}
