import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";

import { buildPage, buildSection, defaultFrontmatter } from "../src/content.js";
import { Frontmatter, Page, Section } from "../src/typings.js";

export function tempDir(): { path: string; cleanup(): void } {
  const path = mkdtempSync(join(tmpdir(), "kiln-"));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [file, text] of Object.entries(files)) {
    const dest = join(root, file);
    mkdirSync(dirname(dest), { recursive: true });
    writeFileSync(dest, text);
  }
}

export const BASE_URL = "https://example.com";

export function page(relativePath: string, fm: Partial<Frontmatter> = {}, body = ""): Page {
  return buildPage({ ...defaultFrontmatter(), ...fm }, body, relativePath, BASE_URL);
}

export function section(relativePath: string, fm: Partial<Frontmatter> = {}, body = ""): Section {
  return buildSection({ ...defaultFrontmatter(), ...fm }, body, relativePath, BASE_URL);
}

/** A small site: a home page, a blog with one post and one draft, and templates. */
export const SITE: Record<string, string> = {
  "config.toml": `base_url = "${BASE_URL}"\ntitle = "Test Site"\n`,
  "content/_index.md": `+++\ntitle = "Home"\n+++\nWelcome`,
  "content/posts/_index.md": `+++\ntitle = "Blog"\nsort_by = "date"\n+++\n`,
  "content/posts/hello.md": `+++\ntitle = "Hello World"\ndate = "2025-01-01"\n+++\nHello content`,
  "content/posts/draft.md": `+++\ntitle = "Draft Post"\ndraft = true\n+++\nDraft content`,
  "templates/index.html": `<!DOCTYPE html><html><body>{ section.title }</body></html>`,
  "templates/section.html":
    `<html><body><h1>{ section.title }</h1>` +
    `{#each (paginator ? paginator.pages : section.pages) as p}<a href="{ p.permalink }">{ p.title }</a>{/each}` +
    `</body></html>`,
  "templates/page.html": `<html><body><h1>{ page.title }</h1>{ page.content }</body></html>`,
  "static/robots.txt": "User-agent: *\n",
};
