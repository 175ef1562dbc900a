import { escapeXml, sortPagesByDate } from "./content.js";
import { Config, Page, Section } from "./typings.js";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const LOCAL_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?$/;
const ZONED_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/** RFC 3339 for the feed, `2025-01-15` becomes `2025-01-15T00:00:00Z`. */
export function normalizeDate(s: string): string {
  if (ZONED_DATETIME.test(s)) return s;
  if (LOCAL_DATETIME.test(s)) return `${s}Z`;
  if (DATE_ONLY.test(s)) return `${s}T00:00:00Z`;
  return s;
}

const byPath = <T extends { path: string }>(a: T, b: T) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0);

export function sitemap(sections: Iterable<Section>, pages: Iterable<Page>): string {
  let xml = `<?xml version="1.0" encoding="UTF-8"?>\n`;
  xml += `<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n`;
  for (const section of [...sections].sort(byPath)) {
    xml += `  <url>\n    <loc>${escapeXml(section.permalink)}</loc>\n  </url>\n`;
  }
  for (const page of [...pages].sort(byPath)) {
    xml += `  <url>\n    <loc>${escapeXml(page.permalink)}</loc>\n`;
    if (page.date) xml += `    <lastmod>${page.date}</lastmod>\n`;
    xml += `  </url>\n`;
  }
  xml += `</urlset>\n`;
  return xml;
}

/**
 * Atom feed of every dated page, newest first. `path` is where the feed
 * itself lives, taxonomy term feeds sit under their term.
 */
export function atomFeed(config: Config, pages: Iterable<Page>, path = "/"): string {
  const dated = sortPagesByDate([...pages].filter((p) => p.date));
  const home = config.baseUrl + path;
  const title = escapeXml(config.title);
  const updated = normalizeDate(dated[0]?.date ?? "1970-01-01");

  let xml = `<?xml version="1.0" encoding="UTF-8"?>\n`;
  xml += `<feed xmlns="http://www.w3.org/2005/Atom">\n`;
  xml += `  <title>${title}</title>\n`;
  xml += `  <link href="${home}atom.xml" rel="self"/>\n`;
  xml += `  <link href="${home}"/>\n`;
  xml += `  <updated>${updated}</updated>\n`;
  xml += `  <id>${home}</id>\n`;
  // a feed needs an author, either here or on every entry
  if (config.title) xml += `  <author><name>${title}</name></author>\n`;

  for (const page of dated) {
    const permalink = escapeXml(page.permalink);
    xml += `  <entry>\n`;
    xml += `    <title>${escapeXml(page.title)}</title>\n`;
    xml += `    <link href="${permalink}"/>\n`;
    xml += `    <id>${permalink}</id>\n`;
    xml += `    <updated>${normalizeDate(page.date ?? "1970-01-01")}</updated>\n`;
    if (page.author) xml += `    <author><name>${escapeXml(page.author)}</name></author>\n`;
    if (page.summary) {
      xml += `    <summary type="html">${escapeXml(page.summary)}</summary>\n`;
    } else if (page.description) {
      xml += `    <summary>${escapeXml(page.description)}</summary>\n`;
    }
    xml += `  </entry>\n`;
  }

  xml += `</feed>\n`;
  return xml;
}

function pageLink(page: Page): string {
  return page.description
    ? `- [${page.title}](${page.permalink}): ${page.description}\n`
    : `- [${page.title}](${page.permalink})\n`;
}

function header(config: Config): string {
  let out = `# ${config.title}\n`;
  if (config.description) out += `\n> ${config.description}\n`;
  return out;
}

/** Index of the site for language models, see https://llmstxt.org */
export function llmsTxt(config: Config, sections: Iterable<Section>, pages: Iterable<Page>): string {
  let out = header(config);

  // root first, the rest by path
  const sorted = [...sections].sort((a, b) => (a.path === "/" ? -1 : b.path === "/" ? 1 : byPath(a, b)));
  const listed = new Set<string>();
  for (const section of sorted) {
    out += `\n## ${section.title}\n`;
    if (section.description) out += `\n${section.description}\n`;
    if (section.pages.length > 0) {
      out += "\n";
      for (const page of section.pages) {
        out += pageLink(page);
        listed.add(page.path);
      }
    }
  }

  const orphans = sortPagesByDate([...pages].filter((p) => !listed.has(p.path)));
  if (orphans.length > 0) {
    out += "\n## Pages\n\n";
    for (const page of orphans) out += pageLink(page);
  }
  return out;
}

export function llmsFullTxt(config: Config, pages: Iterable<Page>): string {
  let out = header(config);
  for (const page of sortPagesByDate([...pages])) {
    out += `\n## ${page.title}\n\n${page.rawContent.trim()}\n`;
  }
  return out;
}
