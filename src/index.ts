export * from "./typings.js";
export * from "./errors.js";
export { CONFIG_FILE, loadConfig, parseConfig } from "./config.js";
export {
  assignPagesToSections,
  loadContent,
  parseFrontmatter,
  sectionKeyFor,
  sortPagesByDate,
  sortPagesByTitle,
  splitFrontmatter,
  type LoadedContent,
} from "./content.js";
export { resolveInternalLinks, rewriteInternalLinks, type LinkResolution } from "./links.js";
export { parseArgs, processShortcodes, TAB_SEPARATOR, type ShortcodeContext } from "./shortcodes.js";
export { extractSummary, renderMarkdown, replaceExecPlaceholders, SUMMARY_MARKER } from "./marked.js";
export { ExecutionContext, executeBlocks } from "./execute.js";
export { compile, TemplateSet, templateHelpers, type Render } from "./template.js";
export { Site, buildSite, paginate, collectTerms } from "./site.js";
export { atomFeed, llmsFullTxt, llmsTxt, normalizeDate, sitemap } from "./feeds.js";
export { compileStyles, highlightThemeCss } from "./styles.js";
export { injectReloadScript, Rebuilder, resolveServePath, serve, WatchBridge, type Preview, type ServeOptions } from "./serve.js";
export { initSite } from "./init.js";
