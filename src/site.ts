import { cpSync, existsSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { dirname, join, posix, resolve } from "path";
import { slug } from "github-slugger";
import pc from "picocolors";

import { loadConfig } from "./config.js";
import { assignPagesToSections, escapeXml, loadContent, parentDir, sortPagesByDate } from "./content.js";
import { FrontmatterError, TemplateError, UnresolvedLinksError } from "./errors.js";
import { ExecutionContext, executeBlocks } from "./execute.js";
import { atomFeed, llmsFullTxt, llmsTxt, sitemap } from "./feeds.js";
import { rewriteInternalLinks } from "./links.js";
import { extractSummary, renderMarkdown, replaceExecPlaceholders } from "./marked.js";
import { processShortcodes, ShortcodeContext } from "./shortcodes.js";
import { compileStyles, highlightThemes, STYLE_OUTPUT } from "./styles.js";
import { TemplateSet, templateHelpers } from "./template.js";
import { BuildOptions, BuildReport, Config, ExecutableBlock, Page, Paginator, Section, TaxonomyConfig, TaxonomyTerm } from "./typings.js";

const CONTENT_DIR = "content";
const TEMPLATES_DIR = "templates";
const SASS_DIR = "sass";
const STATIC_DIR = "static";

/** output-relative file -> contents */
type Output = Map<string, string>;

// "/posts/hello/" -> "posts/hello/index.html"
function indexFile(urlPath: string): string {
  const dir = urlPath.replace(/^\/+/, "");
  return dir ? `${dir.replace(/\/?$/, "/")}index.html` : "index.html";
}

function aliasFile(page: Page, alias: string): string {
  if (alias.split(/[\\/]/).some((segment) => segment === "..")) {
    throw new FrontmatterError(page.relativePath, `alias "${alias}" leaves the output directory`);
  }
  return indexFile(posix.normalize(`/${alias}`));
}

function redirectHtml(permalink: string): string {
  return `<!DOCTYPE html><html><head><meta http-equiv="refresh" content="0; url=${escapeXml(permalink)}"></head><body></body></html>`;
}

export function paginate(section: Section, paginateBy: number): Paginator[] {
  const total = section.pages.length;
  const numberPagers = Math.max(1, Math.ceil(total / paginateBy));
  const pagerUrl = (n: number) => (n === 1 ? section.permalink : `${section.permalink}page/${n}/`);
  const pagers: Paginator[] = [];
  for (let i = 1; i <= numberPagers; i++) {
    pagers.push({
      pages: section.pages.slice((i - 1) * paginateBy, i * paginateBy),
      currentIndex: i,
      numberPagers,
      previous: i > 1 ? pagerUrl(i - 1) : undefined,
      next: i < numberPagers ? pagerUrl(i + 1) : undefined,
      first: section.permalink,
      last: pagerUrl(numberPagers),
    });
  }
  return pagers;
}

export function collectTerms(taxonomy: string, pages: Iterable<Page>, baseUrl: string): TaxonomyTerm[] {
  const byName = new Map<string, Page[]>();
  for (const page of pages) {
    for (const name of page.taxonomies[taxonomy] ?? []) {
      const list = byName.get(name);
      if (list) list.push(page);
      else byName.set(name, [page]);
    }
  }
  return [...byName]
    .map(([name, list]) => {
      const termSlug = slug(name);
      return { name, slug: termSlug, permalink: `${baseUrl}/${taxonomy}/${termSlug}/`, pages: sortPagesByDate(list) };
    })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Everything one build knows about a site. Load it, adjust the public
 * fields, then call {@link Site.build} once.
 */
export class Site {
  /** show executable blocks as plain code instead of running them */
  noExec = false;
  /** `include` may not read outside this directory, default: {@link root} */
  sandbox: string | undefined;

  private readonly warnings: string[] = [];

  private constructor(
    public config: Config,
    readonly sections: Map<string, Section>,
    readonly pages: Map<string, Page>,
    readonly assets: string[],
    readonly root: string,
    readonly outputDir: string,
    readonly drafts: boolean,
  ) {}

  static load(root: string, outputDir: string, drafts = false): Site {
    const config = loadConfig(root);
    const { sections, pages, assets } = loadContent(join(root, CONTENT_DIR), config.baseUrl);
    return new Site(config, sections, pages, assets, root, outputDir, drafts);
  }

  /** Point every permalink at another host, such as the preview server. */
  setBaseUrl(url: string): void {
    const next = url.replace(/\/+$/, "");
    const prev = this.config.baseUrl;
    const rebase = (permalink: string) => (permalink.startsWith(prev) ? next + permalink.slice(prev.length) : permalink);
    for (const page of this.pages.values()) page.permalink = rebase(page.permalink);
    for (const section of this.sections.values()) section.permalink = rebase(section.permalink);
    this.config = { ...this.config, baseUrl: next };
  }

  /** Validate the whole pipeline up to templates without writing anything. */
  check(exec: ExecutionContext = ExecutionContext.create(this.root)): BuildReport {
    this.prepare(exec);
    const templates = this.loadTemplates();
    const required: string[] = [];
    if (this.pages.size > 0) required.push("page.html");
    for (const section of this.sections.values()) {
      required.push(section.path === "/" ? "index.html" : "section.html");
    }
    for (const name of new Set(required)) {
      if (!templates.has(name)) throw new TemplateError(name, "template not found");
    }
    return this.report();
  }

  async build(exec: ExecutionContext = ExecutionContext.create(this.root)): Promise<BuildReport> {
    this.prepare(exec);

    // everything that can fail on bad input happens before the old output goes
    const output = this.renderTemplates(this.loadTemplates());
    if (this.config.compileSass && existsSync(join(this.root, SASS_DIR))) {
      const css = await compileStyles(join(this.root, SASS_DIR));
      if (css !== undefined) output.set(STYLE_OUTPUT, css);
    }
    for (const [file, css] of highlightThemes(this.config.markdown)) output.set(file, css);
    this.renderFeeds(output);

    rmSync(this.outputDir, { recursive: true, force: true });
    mkdirSync(this.outputDir, { recursive: true });
    for (const [file, text] of output) {
      const dest = join(this.outputDir, file);
      mkdirSync(dirname(dest), { recursive: true });
      writeFileSync(dest, text);
    }

    const staticDir = join(this.root, STATIC_DIR);
    if (existsSync(staticDir)) {
      cpSync(staticDir, this.outputDir, { recursive: true });
    }
    for (const asset of this.assets) {
      const dest = join(this.outputDir, asset);
      mkdirSync(dirname(dest), { recursive: true });
      cpSync(join(this.root, CONTENT_DIR, asset), dest);
    }

    return this.report();
  }

  private report(): BuildReport {
    return { pages: this.pages.size, sections: this.sections.size, warnings: [...this.warnings] };
  }

  private warn(message: string): void {
    this.warnings.push(message);
    console.warn(pc.yellow(`warning: ${message}`));
  }

  // drafts, links, shortcodes, markdown, sections
  private prepare(exec: ExecutionContext): void {
    if (!this.drafts) {
      for (const [key, page] of this.pages) {
        if (page.draft) this.pages.delete(key);
      }
    }
    this.resolveLinks();
    this.renderAllMarkdown(exec);
    assignPagesToSections(this.sections, this.pages);
  }

  private resolveLinks(): void {
    const unresolved = new Set<string>();
    const targets: { rawContent: string }[] = [...this.pages.values()];
    for (const section of this.sections.values()) {
      if (section.rawContent.trim()) targets.push(section);
    }
    for (const target of targets) {
      const result = rewriteInternalLinks(target.rawContent, this.pages, this.sections);
      target.rawContent = result.content;
      result.unresolved.forEach((link) => unresolved.add(link));
    }
    if (unresolved.size > 0) throw new UnresolvedLinksError([...unresolved]);
  }

  private renderAllMarkdown(exec: ExecutionContext): void {
    const shortcodes: ShortcodeContext = {
      shortcodeDir: join(this.root, TEMPLATES_DIR, "shortcodes"),
      root: this.root,
      sandbox: this.sandbox ?? this.root,
    };
    const markdown = this.config.markdown;

    for (const [key, page] of this.pages) {
      const raw = processShortcodes(page.rawContent, shortcodes);
      page.content = this.renderContent(raw, key, exec);
      const summary = extractSummary(raw);
      if (summary !== undefined) {
        // the summary shows its code but never runs it a second time
        const blocks: ExecutableBlock[] = [];
        const html = renderMarkdown(summary, markdown, blocks, this.config.baseUrl);
        page.summary = replaceExecPlaceholders(html, blocks, markdown);
      }
      page.rawContent = raw;
    }

    for (const [key, section] of this.sections) {
      if (!section.rawContent.trim()) continue;
      const raw = processShortcodes(section.rawContent, shortcodes);
      section.content = this.renderContent(raw, key, exec);
    }
  }

  private renderContent(raw: string, key: string, exec: ExecutionContext): string {
    const blocks: ExecutableBlock[] = [];
    const html = renderMarkdown(raw, this.config.markdown, blocks, this.config.baseUrl);
    if (blocks.length > 0 && !this.noExec) {
      const workingDir = join(this.root, CONTENT_DIR, parentDir(key));
      for (const error of executeBlocks(blocks, workingDir, exec, this.sandbox ?? this.root)) {
        this.warn(`${key}: ${error}`);
      }
    }
    return replaceExecPlaceholders(html, blocks, this.config.markdown);
  }

  private loadTemplates(): TemplateSet {
    return TemplateSet.load(join(this.root, TEMPLATES_DIR), templateHelpers(this.config, this.sections));
  }

  private renderTemplates(templates: TemplateSet): Output {
    const output: Output = new Map();
    const config = this.config;

    for (const page of this.pages.values()) {
      output.set(indexFile(page.path), templates.render("page.html", { config, page }));
    }

    for (const section of this.sections.values()) {
      const template = section.path === "/" ? "index.html" : "section.html";
      if (section.paginateBy === undefined) {
        output.set(indexFile(section.path), templates.render(template, { config, section }));
        continue;
      }
      for (const paginator of paginate(section, section.paginateBy)) {
        const path = paginator.currentIndex === 1 ? section.path : `${section.path}page/${paginator.currentIndex}/`;
        output.set(indexFile(path), templates.render(template, { config, section, paginator }));
      }
    }

    for (const taxonomy of config.taxonomies) {
      this.renderTaxonomy(taxonomy, templates, output);
    }

    if (templates.has("404.html")) {
      output.set("404.html", templates.render("404.html", { config }));
    }

    // aliases go last and may not replace a rendered file
    for (const page of this.pages.values()) {
      for (const alias of page.aliases) {
        const file = aliasFile(page, alias);
        if (output.has(file)) {
          throw new FrontmatterError(page.relativePath, `alias "${alias}" collides with ${file}`);
        }
        output.set(file, redirectHtml(page.permalink));
      }
    }
    return output;
  }

  private renderTaxonomy(taxonomy: TaxonomyConfig, templates: TemplateSet, output: Output): void {
    const config = this.config;
    const terms = collectTerms(taxonomy.name, this.pages.values(), config.baseUrl);
    const list = `${taxonomy.name}/list.html`;
    if (templates.has(list)) {
      output.set(`${taxonomy.name}/index.html`, templates.render(list, { config, taxonomy, terms }));
    }
    const single = `${taxonomy.name}/single.html`;
    for (const term of terms) {
      if (templates.has(single)) {
        output.set(`${taxonomy.name}/${term.slug}/index.html`, templates.render(single, { config, taxonomy, term }));
      }
      if (config.generateFeed && taxonomy.feed) {
        output.set(`${taxonomy.name}/${term.slug}/atom.xml`, atomFeed(config, term.pages, `/${taxonomy.name}/${term.slug}/`));
      }
    }
  }

  private renderFeeds(output: Output): void {
    const { config, pages, sections } = this;
    if (config.generateSitemap) {
      output.set("sitemap.xml", sitemap(sections.values(), pages.values()));
    }
    if (config.generateFeed) {
      output.set("atom.xml", atomFeed(config, pages.values()));
    }
    if (config.generateLlmsTxt) {
      output.set("llms.txt", llmsTxt(config, sections.values(), pages.values()));
      output.set("llms-full.txt", llmsFullTxt(config, pages.values()));
    }
  }
}

/** Load a fresh `Site` from disk and build it, against `baseUrl` when given. */
export async function buildSite(options: BuildOptions, exec?: ExecutionContext, baseUrl?: string): Promise<BuildReport> {
  const root = resolve(options.root ?? ".");
  const site = Site.load(root, resolve(root, options.output ?? "public"), options.drafts);
  site.noExec = options.noExec ?? false;
  site.sandbox = options.sandbox && resolve(options.sandbox);
  if (baseUrl) site.setBaseUrl(baseUrl);
  return site.build(exec ?? ExecutionContext.create(root));
}
