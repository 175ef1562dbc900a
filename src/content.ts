import { readdirSync, readFileSync } from "fs";
import { join, posix } from "path";
import { slug } from "github-slugger";
import { parse } from "smol-toml";
import { z } from "zod";

import { FrontmatterError, errorMessage } from "./errors.js";
import { Frontmatter, Page, Section } from "./typings.js";

export const SECTION_FILE = "_index.md";
const COLOCATED_FILE = "index.md";
const DELIMITER = "+++";

const frontmatterSchema = z
  .object({
    title: z.string().optional(),
    // z.date() would clone the TomlDate and lose its precision
    date: z.union([z.string(), z.custom<Date>((v) => v instanceof Date), z.number()]).optional(),
    author: z.string().optional(),
    description: z.string().optional(),
    draft: z.boolean().default(false),
    slug: z.string().min(1).optional(),
    aliases: z.array(z.string()).default([]),
    sort_by: z.enum(["date", "title"]).optional(),
    paginate_by: z.number().int().positive().optional(),
    extra: z.record(z.unknown()).default({}),
  })
  .passthrough();

const KNOWN_KEYS = new Set(Object.keys(frontmatterSchema.shape));

export function defaultFrontmatter(): Frontmatter {
  return { draft: false, aliases: [], extra: {}, rest: {} };
}

/** Dates (TOML datetimes) become their ISO text, recursively. */
export function toPlain(value: unknown): unknown {
  if (value instanceof Date) return dateString(value);
  if (Array.isArray(value)) return value.map(toPlain);
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toPlain(v)]));
  }
  return value;
}

// TOML dates keep their own precision: 2025-01-15, 2025-06-15T10:30:00, ...
function dateString(value: string | Date | number | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (value instanceof Date) return value.toISOString().replace(/\.000(?=Z|[+-]\d|$)/, "");
  return String(value);
}

/**
 * Split `+++` delimited TOML front matter from the body.
 *
 * Content without a leading `+++` has no front matter and is returned whole.
 */
export function splitFrontmatter(text: string, file = "<input>"): [header: string | null, body: string] {
  text = text.replace(/^\uFEFF/, "");
  if (!text.startsWith(DELIMITER)) return [null, text];
  const end = text.indexOf("\n" + DELIMITER, DELIMITER.length);
  if (end === -1) {
    throw new FrontmatterError(file, "unclosed front matter, expected a closing +++ line");
  }
  const header = text.slice(DELIMITER.length, end);
  // the closing line is "+++" plus anything up to the newline
  const lineEnd = text.indexOf("\n", end + 1);
  const body = lineEnd === -1 ? "" : text.slice(lineEnd + 1);
  return [header, body];
}

export function parseFrontmatter(text: string, file = "<input>"): [Frontmatter, string] {
  const [header, body] = splitFrontmatter(text, file);
  if (header === null) return [defaultFrontmatter(), body];

  let raw: unknown;
  try {
    raw = parse(header);
  } catch (e) {
    throw new FrontmatterError(file, errorMessage(e), { cause: e });
  }

  const result = frontmatterSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new FrontmatterError(file, issues.join("; "));
  }

  const fm = result.data;
  const rest: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fm)) {
    if (!KNOWN_KEYS.has(key)) rest[key] = toPlain(value);
  }

  return [
    {
      title: fm.title,
      date: dateString(fm.date),
      author: fm.author,
      description: fm.description,
      draft: fm.draft,
      slug: fm.slug,
      aliases: fm.aliases,
      sortBy: fm.sort_by,
      paginateBy: fm.paginate_by,
      extra: fm.extra,
      rest,
    },
    body,
  ];
}

// "posts/hello.md" -> "posts", "hello.md" -> ""
export function parentDir(relativePath: string): string {
  const dir = posix.dirname(relativePath);
  return dir === "." ? "" : dir;
}

function isColocated(relativePath: string): boolean {
  return posix.basename(relativePath) === COLOCATED_FILE;
}

/** Directory whose `_index.md` owns the page; `a/b/index.md` belongs to `a`. */
function sectionDir(relativePath: string): string {
  return isColocated(relativePath) ? parentDir(parentDir(relativePath)) : parentDir(relativePath);
}

export function sectionKeyFor(relativePath: string): string {
  const dir = sectionDir(relativePath);
  return dir ? `${dir}/${SECTION_FILE}` : SECTION_FILE;
}

export function pageUrlPath(dir: string, slug: string): string {
  return dir ? `/${dir}/${slug}/` : `/${slug}/`;
}

export function sectionUrlPath(dir: string): string {
  return dir ? `/${dir}/` : "/";
}

export function buildPage(fm: Frontmatter, rawContent: string, relativePath: string, baseUrl: string): Page {
  const stem = isColocated(relativePath)
    ? posix.basename(parentDir(relativePath))
    : posix.basename(relativePath, posix.extname(relativePath));
  const pageSlug = fm.slug ?? slug(stem);
  const path = pageUrlPath(sectionDir(relativePath), pageSlug);

  const taxonomies: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(fm.rest)) {
    if (!Array.isArray(value)) continue;
    const terms = value.filter((v): v is string => typeof v === "string");
    if (terms.length > 0) taxonomies[key] = terms;
  }

  const wordCount = rawContent.split(/\s+/).filter(Boolean).length;

  return {
    title: fm.title ?? "",
    date: fm.date,
    author: fm.author,
    description: fm.description,
    draft: fm.draft,
    slug: pageSlug,
    path,
    permalink: baseUrl + path,
    content: "",
    summary: undefined,
    rawContent,
    taxonomies,
    extra: fm.extra,
    aliases: fm.aliases,
    wordCount,
    readingTime: Math.max(1, Math.floor(wordCount / 200)),
    relativePath,
  };
}

export function buildSection(fm: Frontmatter, rawContent: string, relativePath: string, baseUrl: string): Section {
  const path = sectionUrlPath(parentDir(relativePath));
  return {
    title: fm.title ?? "",
    description: fm.description,
    path,
    permalink: baseUrl + path,
    content: "",
    rawContent,
    pages: [],
    sortBy: fm.sortBy,
    paginateBy: fm.paginateBy,
    extra: fm.extra,
    relativePath,
  };
}

export interface LoadedContent {
  sections: Map<string, Section>;
  pages: Map<string, Page>;
  /** content-relative paths of everything that is not markdown */
  assets: string[];
}

/** Relative posix paths of every file under `dir`, sorted. */
export function walkFiles(dir: string, prefix = ""): string[] {
  const files: string[] = [];
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : 1));
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...walkFiles(join(dir, entry.name), rel));
    } else if (entry.isFile()) {
      files.push(rel);
    }
  }
  return files;
}

export function loadContent(contentDir: string, baseUrl: string): LoadedContent {
  const loaded: LoadedContent = { sections: new Map(), pages: new Map(), assets: [] };

  for (const rel of walkFiles(contentDir)) {
    const file = join(contentDir, rel);
    if (posix.basename(rel) === SECTION_FILE) {
      const [fm, body] = parseFrontmatter(readFileSync(file, "utf-8"), rel);
      loaded.sections.set(rel, buildSection(fm, body, rel, baseUrl));
    } else if (rel.endsWith(".md")) {
      const [fm, body] = parseFrontmatter(readFileSync(file, "utf-8"), rel);
      loaded.pages.set(rel, buildPage(fm, body, rel, baseUrl));
    } else {
      loaded.assets.push(rel);
    }
  }

  return loaded;
}

// undated pages compare as "" and so sort last
export function sortPagesByDate(pages: Page[]): Page[] {
  return pages.sort((a, b) => {
    const x = a.date ?? "";
    const y = b.date ?? "";
    return x < y ? 1 : x > y ? -1 : 0;
  });
}

export function sortPagesByTitle(pages: Page[]): Page[] {
  return pages.sort((a, b) => (a.title < b.title ? -1 : a.title > b.title ? 1 : 0));
}

export function assignPagesToSections(sections: Map<string, Section>, pages: Map<string, Page>): void {
  for (const [rel, page] of pages) {
    sections.get(sectionKeyFor(rel))?.pages.push(page);
  }
  for (const section of sections.values()) {
    if (section.sortBy === "title") sortPagesByTitle(section.pages);
    else sortPagesByDate(section.pages);
  }
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
