import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IngestionError } from "../errors.js";
import {
  loadCatalog,
  loadSourceFolder,
  parseCatalog,
  readCatalogData,
  saveCatalog,
  titleFromSlug,
} from "./sources.js";

describe("parseCatalog", () => {
  it("reads an object keyed by title", () => {
    const sources = parseCatalog({
      "Walking By Faith": { content: " Faith text ", url: "https://example.org/faith.html", category: "Faith" },
      "Untitled Link": { content: "Some text" },
      Empty: { content: "   " },
      Broken: "not an object",
    });
    expect(sources).toEqual([
      {
        key: "Walking By Faith|https://example.org/faith.html",
        title: "Walking By Faith",
        url: "https://example.org/faith.html",
        category: "Faith",
        content: "Faith text",
      },
      { key: "title:Untitled Link", title: "Untitled Link", url: "", category: "General", content: "Some text" },
    ]);
  });

  it("reads a list of page documents", () => {
    const sources = parseCatalog([
      { page_content: "Grace text", metadata: { source: "https://example.org/grace.html" } },
      { page_content: "Hope text", metadata: { title: "Anchored In Hope" } },
      { page_content: "" },
    ]);
    expect(sources).toEqual([
      {
        key: "Sermon 1|https://example.org/grace.html",
        title: "Sermon 1",
        url: "https://example.org/grace.html",
        category: "General",
        content: "Grace text",
      },
      { key: "Anchored In Hope|sermon_2", title: "Anchored In Hope", url: "sermon_2", category: "General", content: "Hope text" },
    ]);
  });

  it("gives documents from the same page distinct keys", () => {
    const sources = parseCatalog([
      { page_content: "First half of the sermon.", metadata: { source: "https://example.org/love.html" } },
      { page_content: "Second half of the sermon.", metadata: { source: "https://example.org/love.html" } },
    ]);
    expect(sources.map((s) => s.key)).toEqual([
      "Sermon 1|https://example.org/love.html",
      "Sermon 2|https://example.org/love.html",
    ]);
  });

  it("gives titles that share a URL distinct keys", () => {
    const sources = parseCatalog({
      "Love Part 1": { content: "Part one.", url: "https://example.org/love.html" },
      "Love Part 2": { content: "Part two.", url: "https://example.org/love.html" },
    });
    expect(new Set(sources.map((s) => s.key)).size).toBe(2);
  });

  it("rejects other shapes", () => {
    expect(() => parseCatalog("sermons")).toThrow(IngestionError);
    expect(() => parseCatalog(null)).toThrow("Unknown sermon catalog format");
  });
});

describe("titleFromSlug", () => {
  it("turns file names into titles", () => {
    expect(titleFromSlug("walking-by-faith")).toBe("Walking By Faith");
    expect(titleFromSlug("grace_and__truth")).toBe("Grace And Truth");
  });
});

describe("transcript files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "sermon-sources-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a catalog file", async () => {
    const file = path.join(dir, "catalog.json");
    await writeFile(file, JSON.stringify({ Love: { content: "Love is patient.", url: "https://example.org/love.html" } }));
    const [source] = await loadCatalog(file);
    expect(source.key).toBe("Love|https://example.org/love.html");
    expect(source.title).toBe("Love");
  });

  it("reports a missing or malformed catalog", async () => {
    await expect(loadCatalog(path.join(dir, "absent.json"))).rejects.toThrow("Could not read sermon catalog");
    const bad = path.join(dir, "bad.json");
    await writeFile(bad, "{ not json");
    await expect(loadCatalog(bad)).rejects.toThrow("is not valid JSON");
  });

  it("reads and saves a catalog keyed by title", async () => {
    const file = path.join(dir, "nested", "sermon_data.json");
    expect(await readCatalogData(file)).toEqual({});
    await saveCatalog(file, { Hope: { content: "Hope anchors.", url: "https://example.org/hope.html", category: "Hope" } });
    expect(await readCatalogData(file)).toEqual({
      Hope: { content: "Hope anchors.", url: "https://example.org/hope.html", category: "Hope" },
    });
  });

  it("refuses to update a document list catalog", async () => {
    const file = path.join(dir, "list.json");
    await writeFile(file, JSON.stringify([{ page_content: "x", metadata: { source: "u" } }]));
    await expect(readCatalogData(file)).rejects.toThrow("is not keyed by title and cannot be updated");
  });

  it("walks a folder, reading front matter and skipping hidden and unsupported files", async () => {
    await writeFile(
      path.join(dir, "faith.md"),
      "---\ntitle: Faith Over Fear\nurl: https://example.org/faith-over-fear.html\ncategory: Faith\n---\nFaith over fear is a choice we make daily.\n"
    );
    await mkdir(path.join(dir, "series"));
    await writeFile(path.join(dir, "series", "walking-in-love.txt"), "Love one another as I have loved you.");
    await writeFile(path.join(dir, ".draft.md"), "hidden draft");
    await writeFile(path.join(dir, "notes.json"), "{}");

    const sources = await loadSourceFolder(dir);
    expect(sources).toHaveLength(2);
    expect(sources[0]).toMatchObject({
      key: "https://example.org/faith-over-fear.html",
      title: "Faith Over Fear",
      url: "https://example.org/faith-over-fear.html",
      category: "Faith",
    });
    expect(sources[0].content.trim()).toBe("Faith over fear is a choice we make daily.");
    expect(sources[1]).toEqual({
      key: "file:series/walking-in-love.txt",
      title: "Walking In Love",
      url: "",
      category: "General",
      content: "Love one another as I have loved you.",
    });
  });

  it("fails on a folder that does not exist", async () => {
    await expect(loadSourceFolder(path.join(dir, "missing"))).rejects.toThrow(IngestionError);
  });
});
