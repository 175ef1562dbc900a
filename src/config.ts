import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { parse } from "smol-toml";
import { z } from "zod";

import { ConfigError, errorMessage } from "./errors.js";
import { Config } from "./typings.js";

export const CONFIG_FILE = "config.toml";

const markdownSchema = z
  .object({
    highlight_code: z.boolean().default(true),
    highlight_theme: z.string().min(1).default("github-dark"),
    highlight_themes_css: z
      .array(z.object({ theme: z.string().min(1), filename: z.string().min(1) }))
      .default([]),
    insert_anchor_links: z.enum(["none", "left", "right"]).default("none"),
    render_emoji: z.boolean().default(false),
    external_links_target_blank: z.boolean().default(false),
    external_links_no_follow: z.boolean().default(false),
    external_links_no_referrer: z.boolean().default(false),
    smart_punctuation: z.boolean().default(false),
  })
  .default({});

const configSchema = z.object({
  base_url: z.string({ required_error: "base_url is required" }),
  title: z.string().default(""),
  description: z.string().default(""),
  default_language: z.string().default("en"),
  compile_sass: z.boolean().default(true),
  generate_sitemap: z.boolean().default(true),
  generate_feed: z.boolean().default(false),
  generate_llms_txt: z.boolean().default(true),
  markdown: markdownSchema,
  taxonomies: z.array(z.object({ name: z.string().min(1), feed: z.boolean().default(false) })).default([]),
  extra: z.record(z.unknown()).default({}),
});

export function parseConfig(text: string, file = CONFIG_FILE): Config {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (e) {
    throw new ConfigError(`${file}: ${errorMessage(e)}`, { cause: e });
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`${file}: ${issues.join("; ")}`);
  }

  const c = result.data;
  const md = c.markdown;
  return {
    baseUrl: c.base_url.replace(/\/+$/, ""),
    title: c.title,
    description: c.description,
    defaultLanguage: c.default_language,
    compileSass: c.compile_sass,
    generateSitemap: c.generate_sitemap,
    generateFeed: c.generate_feed,
    generateLlmsTxt: c.generate_llms_txt,
    markdown: {
      highlightCode: md.highlight_code,
      highlightTheme: md.highlight_theme,
      highlightThemesCss: md.highlight_themes_css,
      insertAnchorLinks: md.insert_anchor_links,
      renderEmoji: md.render_emoji,
      externalLinksTargetBlank: md.external_links_target_blank,
      externalLinksNoFollow: md.external_links_no_follow,
      externalLinksNoReferrer: md.external_links_no_referrer,
      smartPunctuation: md.smart_punctuation,
    },
    // tags unless the site declares its own
    taxonomies: c.taxonomies.length > 0 ? c.taxonomies : [{ name: "tags", feed: false }],
    extra: c.extra,
  };
}

export function loadConfig(root: string): Config {
  const file = join(root, CONFIG_FILE);
  if (!existsSync(file)) {
    throw new ConfigError(`Missing ${CONFIG_FILE} in ${root}`);
  }
  return parseConfig(readFileSync(file, "utf-8"), file);
}

export function defaultMarkdownConfig(): Config["markdown"] {
  return parseConfig(`base_url = ""`).markdown;
}
