import GithubSlugger from "github-slugger";
import hljs from "highlight.js";
import { Marked, type RendererExtension, type Token, type TokenizerExtension } from "marked";
import { markedSmartypants } from "marked-smartypants";
import { createRequire } from "module";

import { ExecutableBlock, MarkdownConfig } from "./typings.js";

const require = /* @__PURE__ */ createRequire(import.meta.url);
const emojis: Record<string, string> = /* @__PURE__ */ require("markdown-it-emoji/lib/data/full.json");

type Extension = TokenizerExtension & RendererExtension;

export const SUMMARY_MARKER = "<!-- more -->";

const FILE_ATTR = /file="([^"]+)"/;

export function execPlaceholder(index: number): string {
  return `<!-- EXEC_BLOCK_${index} -->`;
}

export function escapeHtml(s: string): string {
  return s.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export function highlightCode(code: string, lang: string, config: MarkdownConfig): string {
  const fallback = () => `<pre><code class="language-${escapeHtml(lang)}">${escapeHtml(code)}</code></pre>`;
  if (!config.highlightCode || !lang || !hljs.getLanguage(lang)) {
    return fallback();
  }
  try {
    const { value } = hljs.highlight(code, { language: lang, ignoreIllegals: true });
    return `<pre class="hljs" data-theme="${escapeHtml(config.highlightTheme)}"><code class="language-${escapeHtml(lang)}">${value}</code></pre>`;
  } catch {
    return fallback();
  }
}

/** `{python file="x.py"}` -> ["python", "x.py"], anything not in braces -> undefined */
export function parseExecutableLang(info: string): [language: string, fileRef?: string] | undefined {
  const lang = info.trim();
  if (!lang.startsWith("{") || !lang.endsWith("}")) return;
  const inner = lang.slice(1, -1).trim();
  const space = inner.indexOf(" ");
  if (space === -1) return [inner];
  return [inner.slice(0, space), FILE_ATTR.exec(inner.slice(space + 1))?.[1]];
}

export function isExternalUrl(url: string, baseUrl: string): boolean {
  return /^https?:\/\//.test(url) && !(baseUrl && url.startsWith(baseUrl));
}

const footnoteList: Extension = {
  name: "footnoteList",
  level: "block",
  start(src) {
    return src.match(/^\[\^[^\]\s]+\]:/m)?.index;
  },
  tokenizer(src) {
    const match = /^(?:\[\^[^\]\s]+\]:[^\n]*(?:\n|$))+/.exec(src);
    if (match) {
      const tokens: Token[] = [];
      const token = {
        type: "footnoteList",
        raw: match[0],
        text: match[0].trim(),
        tokens,
      };
      this.lexer.inline(token.text, token.tokens);
      return token;
    }
  },
  renderer(token) {
    const fragment = this.parser.parseInline(token.tokens ?? []);
    return `<section class="footnotes"><ol>${fragment}</ol></section>\n`;
  },
};

const footnote: Extension = {
  name: "footnote",
  level: "inline",
  start(src) {
    return src.match(/\[\^[^\]\s]+\]/)?.index;
  },
  tokenizer(src) {
    const matchDef = /^\[\^([^\]\s]+)\]:([^\n]*)(?:\n|$)/.exec(src);
    if (matchDef) {
      return {
        type: "footnote",
        raw: matchDef[0],
        label: matchDef[1],
        tokens: this.lexer.inlineTokens(matchDef[2].trim()),
        def: true,
      };
    }
    const matchRef = /^\[\^([^\]\s]+)\]/.exec(src);
    if (matchRef) {
      return {
        type: "footnote",
        raw: matchRef[0],
        label: matchRef[1],
        def: false,
      };
    }
  },
  renderer(token) {
    const id = escapeHtml(String(token.label));
    if (!token.def) {
      return `<sup class="footnote-reference"><a href="#fn-${id}" id="fnref-${id}">${id}</a></sup>`;
    }
    const fragment = this.parser.parseInline(token.tokens ?? []);
    return `<li id="fn-${id}">${fragment} <a href="#fnref-${id}" class="footnote-backref" aria-label="Back to content">↩</a></li>`;
  },
};

const emoji: Extension = {
  name: "emoji",
  level: "inline",
  start(src) {
    return src.match(/:[a-zA-Z0-9_\-+]+:/)?.index;
  },
  tokenizer(src) {
    const match = /^:([a-zA-Z0-9_\-+]+):/.exec(src);
    if (match && Object.hasOwn(emojis, match[1])) {
      return {
        type: "emoji",
        raw: match[0],
        name: match[1],
        text: emojis[match[1]],
      };
    }
  },
  renderer(token) {
    return `<span class="emoji" role="img" aria-label="${escapeHtml(String(token.name))}">${token.text}</span>`;
  },
};

/**
 * Render markdown to HTML.
 *
 * Executable code blocks are appended to `blocks` and leave an
 * `<!-- EXEC_BLOCK_n -->` placeholder behind, numbered from the length of
 * `blocks` when rendering starts.
 */
export function renderMarkdown(
  content: string,
  config: MarkdownConfig,
  blocks: ExecutableBlock[],
  baseUrl: string,
): string {
  const slugger = new GithubSlugger();
  const marked = new Marked({ gfm: true });

  const extensions = [footnoteList, footnote];
  if (config.renderEmoji) extensions.push(emoji);

  marked.use({
    extensions,
    renderer: {
      code(code, infostring) {
        const exec = parseExecutableLang(infostring ?? "");
        if (exec) {
          const [language, fileRef] = exec;
          blocks.push({ language, source: code, fileRef });
          return execPlaceholder(blocks.length - 1) + "\n";
        }
        const lang = (infostring ?? "").match(/^\S*/)?.[0] ?? "";
        return highlightCode(code, lang, config) + "\n";
      },
      heading(text, level, raw) {
        if (config.insertAnchorLinks === "none") return false;
        const id = slugger.slug(raw);
        const anchor = `<a class="heading-anchor" href="#${id}" aria-label="Anchor link for: ${escapeHtml(raw)}">#</a>`;
        const inner = config.insertAnchorLinks === "left" ? `${anchor} ${text}` : `${text} ${anchor}`;
        return `<h${level} id="${id}">${inner}</h${level}>\n`;
      },
      link(href, title, text) {
        if (!config.externalLinksTargetBlank || !isExternalUrl(href, baseUrl)) return false;
        const rel: string[] = [];
        if (config.externalLinksNoFollow) rel.push("nofollow");
        if (config.externalLinksNoReferrer) rel.push("noreferrer");
        let attrs = ` target="_blank"`;
        if (rel.length > 0) attrs += ` rel="${rel.join(" ")}"`;
        const titleAttr = title ? ` title="${escapeHtml(title)}"` : "";
        return `<a href="${encodeURI(href).replace(/%25/g, "%")}"${titleAttr}${attrs}>${text}</a>`;
      },
    },
  });

  if (config.smartPunctuation) marked.use(markedSmartypants());

  const html = marked.parse(content);
  if (typeof html !== "string") {
    throw new Error("markdown rendering unexpectedly went async");
  }
  return html;
}

/** Markdown before the `<!-- more -->` marker, if there is one. */
export function extractSummary(content: string): string | undefined {
  const pos = content.indexOf(SUMMARY_MARKER);
  return pos === -1 ? undefined : content.slice(0, pos);
}

/** Swap every placeholder for the block's highlighted source and its captured output. */
export function replaceExecPlaceholders(html: string, blocks: readonly ExecutableBlock[], config: MarkdownConfig): string {
  let result = html;
  blocks.forEach((block, i) => {
    const placeholder = execPlaceholder(i);
    if (!result.includes(placeholder)) return;
    let out = `<div class="code-block-executed">${highlightCode(block.source, block.language, config)}`;
    if (block.output) {
      out += `<div class="code-output"><pre><code>${escapeHtml(block.output)}</code></pre></div>`;
    }
    if (block.error) {
      out += `<div class="code-error"><pre><code>${escapeHtml(block.error)}</code></pre></div>`;
    }
    out += "</div>";
    result = result.split(placeholder).join(out);
  });
  return result;
}
