export type SortBy = "date" | "title";

export type AnchorPlacement = "none" | "left" | "right";

export interface MarkdownConfig {
  highlightCode: boolean;
  highlightTheme: string;
  highlightThemesCss: { theme: string; filename: string }[];
  insertAnchorLinks: AnchorPlacement;
  renderEmoji: boolean;
  externalLinksTargetBlank: boolean;
  externalLinksNoFollow: boolean;
  externalLinksNoReferrer: boolean;
  smartPunctuation: boolean;
}

export interface TaxonomyConfig {
  name: string;
  feed: boolean;
}

export interface Config {
  baseUrl: string; // no trailing slash
  title: string;
  description: string;
  defaultLanguage: string;
  compileSass: boolean;
  generateSitemap: boolean;
  generateFeed: boolean;
  generateLlmsTxt: boolean;
  markdown: MarkdownConfig;
  taxonomies: TaxonomyConfig[];
  extra: Record<string, unknown>;
}

export interface Frontmatter {
  title?: string;
  date?: string;
  author?: string;
  description?: string;
  draft: boolean;
  slug?: string;
  aliases: string[];
  sortBy?: SortBy;
  paginateBy?: number;
  extra: Record<string, unknown>;
  /** unknown top-level keys, array-of-string values become taxonomies */
  rest: Record<string, unknown>;
}

export interface Page {
  title: string;
  date?: string;
  author?: string;
  description?: string;
  draft: boolean;
  slug: string;
  path: string; // "/posts/hello/"
  permalink: string; // base_url + path
  content: string; // rendered html
  summary?: string; // rendered html before <!-- more -->
  rawContent: string; // markdown, rewritten by each build stage
  taxonomies: Record<string, string[]>;
  extra: Record<string, unknown>;
  aliases: string[];
  wordCount: number;
  readingTime: number;
  relativePath: string; // content/{relativePath}
}

export interface Section {
  title: string;
  description?: string;
  path: string;
  permalink: string;
  content: string;
  rawContent: string;
  pages: Page[];
  sortBy?: SortBy;
  paginateBy?: number;
  extra: Record<string, unknown>;
  relativePath: string; // "posts/_index.md"
}

export interface ExecutableBlock {
  language: string;
  source: string;
  fileRef?: string;
  output?: string;
  error?: string;
}

export interface Paginator {
  pages: Page[];
  currentIndex: number; // 1-based
  numberPagers: number;
  previous?: string;
  next?: string;
  first: string;
  last: string;
}

export interface TaxonomyTerm {
  name: string;
  slug: string;
  permalink: string;
  pages: Page[];
}

export interface BuildOptions {
  /** site root, default: process.cwd() */
  root?: string;
  /** default: {root}/public */
  output?: string;
  /** default: false */
  drafts?: boolean;
  /** default: false */
  noExec?: boolean;
  /** default: root */
  sandbox?: string;
}

export interface BuildReport {
  pages: number;
  sections: number;
  warnings: string[];
}
