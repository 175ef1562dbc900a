import { existsSync, readFileSync } from "fs";
import { join, posix } from "path";
import { slug } from "github-slugger";

import { escapeXml, parentDir, walkFiles } from "./content.js";
import { TemplateError, errorMessage } from "./errors.js";
import { Config, Section } from "./typings.js";

export type Render = (data: object) => string;

type Part = { raw: string } | { expr: string };

interface Tag {
  head: string;
  tail: string;
  raw?: string;
  expr?: string;
}

function nextMustacheTag(template: string): Tag | undefined {
  const i = template.indexOf("{");
  // { expr } -> eval(expr)
  // {{ expr }} -> '{ expr }'
  if (i === -1) return;
  if (template[i + 1] === "{") {
    const j = template.indexOf("}}", i + 2);
    if (j !== -1) {
      return { head: template.slice(0, i), tail: template.slice(j + 2), raw: template.slice(i + 1, j + 1) };
    }
  }
  const j = template.indexOf("}", i + 1);
  if (j !== -1) {
    return { head: template.slice(0, i), tail: template.slice(j + 1), expr: template.slice(i + 1, j) };
  }
}

function parse(template: string): Part[] {
  const parts: Part[] = [];
  let indentSize = 4;
  const updateIndentSize = (raw: string) => {
    const l = raw.match(/^ */)?.[0].length;
    if (l) indentSize = Math.min(indentSize, l);
  };
  for (;;) {
    const tag = nextMustacheTag(template);
    if (tag === undefined) {
      parts.push({ raw: template });
      updateIndentSize(template);
      break;
    }
    parts.push({ raw: tag.head });
    updateIndentSize(tag.head);
    if (tag.raw) {
      parts.push({ raw: tag.raw });
      updateIndentSize(tag.raw);
    }
    if (tag.expr) {
      parts.push({ expr: tag.expr });
    }
    template = tag.tail;
  }
  // remove extra newline and indent inside {#block}...{/block}
  let indent = 0;
  const last2: Part[] = [{ raw: "" }, { raw: "" }];
  for (const part of parts) {
    if ("raw" in part && indent) {
      part.raw = part.raw.trimStart().replace(new RegExp(`^ {${indent * indentSize}}`, "gm"), "");
    }
    if ("expr" in part && part.expr[0] === "#" && !part.expr.startsWith("#else")) {
      indent++;
      // remove extra space between {/last}...{#current}
      const [prev, last] = last2;
      if ("expr" in prev && prev.expr[0] === "/" && "raw" in last) {
        last.raw = last.raw.trimEnd();
      }
    }
    if ("expr" in part && part.expr[0] === "/") {
      indent--;
    }
    last2.push(part);
    last2.shift();
  }
  return parts;
}

/**
 * Compile a template into a render function.
 *
 * `argument` is the parameter list of the generated function, usually a
 * destructuring pattern such as `"{ page, config }"`.
 *
 * ```html
 * <h1>{ page.title }</h1>
 * {#each section.pages as p}<li>{ p.title }</li>{/each}
 * {#if page.date}<time>{ page.date }</time>{/if}
 * {@ const n = terms.length}
 * ```
 */
export function compile(template: string, argument: string): Render {
  let code = `let html = '';`;
  for (const p of parse(template)) {
    if ("raw" in p) {
      if (p.raw) code += `html += ${JSON.stringify(p.raw)};`;
      continue;
    }
    const expr = p.expr;
    if (expr.startsWith("#each")) {
      const [list, x] = expr.slice(5).trim().split(" as ");
      code += `for (const ${x} of ${list}) {`;
    } else if (expr.startsWith("#if")) {
      code += `if (${expr.slice(3).trim()}) {`;
    } else if (expr.startsWith("#else if")) {
      code += `} else if (${expr.slice(8).trim()}) {`;
    } else if (expr.startsWith("#else")) {
      code += `} else {`;
    } else if (expr.startsWith("/")) {
      code += "}";
    } else if (expr.startsWith("@")) {
      code += `${expr.slice(1).trim()};`;
    } else {
      code += `html += (${expr.trim()}) ?? '';`;
    }
  }
  code += `return html;`;
  const fn = new Function(argument, code);
  return (data) => String(fn(data));
}

/** Names every site template may reference. */
export const TEMPLATE_ARGUMENT =
  "{ config, page, section, paginator, term, terms, taxonomy, get_url, get_section, get_taxonomy_url, escape, include, now }";

export type TemplateHelpers = Record<string, unknown>;

export class TemplateSet {
  private readonly renders = new Map<string, Render>();

  constructor(private readonly helpers: TemplateHelpers = {}) {}

  /** Compile every `*.html` under `dir`, skipping `shortcodes/`. */
  static load(dir: string, helpers: TemplateHelpers = {}): TemplateSet {
    const set = new TemplateSet(helpers);
    if (!existsSync(dir)) return set;
    for (const rel of walkFiles(dir)) {
      if (!rel.endsWith(".html") || rel.startsWith("shortcodes/")) continue;
      set.add(rel, readFileSync(join(dir, rel), "utf-8"));
    }
    return set;
  }

  add(name: string, source: string, argument = TEMPLATE_ARGUMENT): void {
    try {
      this.renders.set(name, compile(source, argument));
    } catch (e) {
      throw new TemplateError(name, errorMessage(e), { cause: e });
    }
  }

  has(name: string): boolean {
    return this.renders.has(name);
  }

  names(): string[] {
    return [...this.renders.keys()];
  }

  render(name: string, context: object): string {
    const render = this.renders.get(name);
    if (!render) throw new TemplateError(name, "template not found");
    const include = (other: string) => this.render(other, context);
    try {
      return render({ ...this.helpers, ...context, include });
    } catch (e) {
      if (e instanceof TemplateError) throw e;
      throw new TemplateError(name, errorMessage(e), { cause: e });
    }
  }
}

/** Helpers available to every site template. */
export function templateHelpers(config: Config, sections: ReadonlyMap<string, Section>): TemplateHelpers {
  const base = config.baseUrl;
  return {
    get_url(path: string): string {
      if (path.startsWith("@/")) {
        const contentPath = path.slice(2);
        const dir = parentDir(contentPath);
        if (posix.basename(contentPath) === "_index.md") {
          return dir ? `${base}/${dir}/` : `${base}/`;
        }
        const s = slug(posix.basename(contentPath, ".md"));
        return dir ? `${base}/${dir}/${s}/` : `${base}/${s}/`;
      }
      if (/^https?:\/\//.test(path)) return path;
      return `${base}/${path.replace(/^\/+/, "")}`;
    },
    get_section(path: string): Section {
      const section = sections.get(path);
      if (!section) throw new Error(`Section not found: ${path}`);
      return section;
    },
    get_taxonomy_url(kind: string, name: string): string {
      return `${base}/${kind}/${slug(name)}/`;
    },
    escape: escapeXml,
    now: () => new Date().toISOString().slice(0, 19),
  };
}
