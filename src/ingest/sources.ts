import { mkdir, readdir, readFile, writeFile } from "fs/promises";
import path from "path";
import matter from "gray-matter";
import { IngestionError } from "../errors.js";
import { extractText } from "../extract/office.js";
import { isAllowedExt, isOfficeExt } from "../lib/fileTypes.js";
import type { Logger } from "../lib/logger.js";

/** One sermon before cleaning and chunking. */
export interface SermonSource {
  /** Stable identity, unique per sermon: title plus URL, or a title or file path key. */
  key: string;
  title: string;
  url: string;
  category: string;
  content: string;
}

/** A catalog entry as stored in the sermon catalog file, keyed by title. */
export interface CatalogEntry {
  content: string;
  url: string;
  category: string;
}

export type CatalogData = Record<string, CatalogEntry>;

const DEFAULT_CATEGORY = "General";

function str(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/** "walking-by-faith" -> "Walking By Faith" */
export function titleFromSlug(slug: string): string {
  return slug
    .replace(/[-_]+/g, " ")
    .trim()
    .split(/\s+/)
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1) : w))
    .join(" ");
}

/**
 * Parse a sermon catalog. Two shapes are accepted:
 * - an object keyed by title: `{ "<title>": { content, url, category } }`
 * - a list of documents: `[{ page_content, metadata: { source } }]`
 */
export function parseCatalog(data: unknown): SermonSource[] {
  if (Array.isArray(data)) {
    return data.flatMap((doc: unknown, i): SermonSource[] => {
      if (!doc || typeof doc !== "object") return [];
      const { page_content, metadata } = doc as { page_content?: unknown; metadata?: unknown };
      const content = str(page_content);
      if (!content) return [];
      const meta = metadata && typeof metadata === "object" ? (metadata as Record<string, unknown>) : {};
      // Several documents may come from one page, so the source alone is not unique.
      const url = str(meta.source) || `sermon_${i + 1}`;
      const title = str(meta.title) || `Sermon ${i + 1}`;
      return [{ key: `${title}|${url}`, title, url, category: str(meta.category) || DEFAULT_CATEGORY, content }];
    });
  }
  if (data && typeof data === "object") {
    return Object.entries(data).flatMap(([title, entry]: [string, unknown]): SermonSource[] => {
      if (!entry || typeof entry !== "object") return [];
      const { content, url, category } = entry as { content?: unknown; url?: unknown; category?: unknown };
      const text = str(content);
      if (!text) return [];
      const link = str(url);
      return [
        {
          key: link ? `${title}|${link}` : `title:${title}`,
          title,
          url: link,
          category: str(category) || DEFAULT_CATEGORY,
          content: text,
        },
      ];
    });
  }
  throw new IngestionError("Unknown sermon catalog format: expected an object keyed by title or a list");
}

export async function loadCatalog(filePath: string): Promise<SermonSource[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new IngestionError(`Could not read sermon catalog ${filePath}`, { cause: err });
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new IngestionError(`Sermon catalog ${filePath} is not valid JSON`, { cause: err });
  }
  return parseCatalog(data);
}

/**
 * Read a catalog keyed by title for updating. A missing file is an empty catalog; a document
 * list cannot be updated in place.
 */
export async function readCatalogData(filePath: string): Promise<CatalogData> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") return {};
    throw new IngestionError(`Could not read sermon catalog ${filePath}`, { cause: err });
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new IngestionError(`Sermon catalog ${filePath} is not valid JSON`, { cause: err });
  }
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new IngestionError(`Sermon catalog ${filePath} is not keyed by title and cannot be updated`);
  }
  const catalog: CatalogData = {};
  for (const [title, entry] of Object.entries(data)) {
    if (!entry || typeof entry !== "object") continue;
    const { content, url, category } = entry as { content?: unknown; url?: unknown; category?: unknown };
    catalog[title] = { content: str(content), url: str(url), category: str(category) || DEFAULT_CATEGORY };
  }
  return catalog;
}

export async function saveCatalog(filePath: string, catalog: CatalogData): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(catalog, null, 4), "utf-8");
}

/**
 * Read one transcript file. Markdown front matter may set `title`, `url` and `category`.
 * Returns null when no text could be read.
 */
export async function loadSourceFile(
  fullPath: string,
  rootDir: string,
  logger?: Logger
): Promise<SermonSource | null> {
  const ext = path.extname(fullPath).toLowerCase();
  if (!isAllowedExt(ext)) return null;
  const rel = path.relative(rootDir, fullPath).split(path.sep).join("/");

  const buffer = await readFile(fullPath);
  let body: string;
  let front: Record<string, unknown> = {};
  if (isOfficeExt(ext)) {
    const text = await extractText(buffer);
    if (!text) {
      logger?.warn("No text extracted, skipped", { file: rel });
      return null;
    }
    body = text;
  } else {
    const parsed = matter(buffer.toString("utf-8"));
    body = parsed.content;
    front = parsed.data;
  }

  const url = str(front.url);
  return {
    key: url || `file:${rel}`,
    title: str(front.title) || titleFromSlug(path.basename(rel, ext)),
    url,
    category: str(front.category) || DEFAULT_CATEGORY,
    content: body,
  };
}

/** Walk a folder recursively and read every supported transcript. Hidden entries are skipped. */
export async function loadSourceFolder(rootDir: string, logger?: Logger): Promise<SermonSource[]> {
  const out: SermonSource[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
      throw new IngestionError(`Could not read folder ${dir}`, { cause: err });
    });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const e of entries) {
      if (e.name.startsWith(".")) continue;
      const full = path.join(dir, e.name);
      if (e.isDirectory()) {
        await walk(full);
      } else if (e.isFile() && isAllowedExt(path.extname(e.name))) {
        try {
          const source = await loadSourceFile(full, rootDir, logger);
          if (source) out.push(source);
        } catch (err) {
          logger?.warn("Could not read transcript, skipped", {
            file: full,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }
  }

  await walk(rootDir);
  return out;
}
