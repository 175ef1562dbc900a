import { existsSync, readFileSync, realpathSync } from "fs";
import { join, sep } from "path";

import { splitFrontmatter } from "./content.js";
import { ShortcodeError, errorMessage } from "./errors.js";
import { escapeHtml } from "./marked.js";
import { compile } from "./template.js";

// {% name(args) %}body{% end %}, the body may not open another block shortcode
// so the innermost block always matches first
const BLOCK_SHORTCODE = /\{%\s*(\w+)\s*\(([^)]*)\)\s*%\}((?:(?!\{%\s*\w+\s*\()[\s\S])*?)\{%\s*end\s*%\}/g;
// {{ name(args) }}, but not {{ variable }}
const INLINE_SHORTCODE = /\{\{\s*(\w+)\s*\(([^)]*)\)\s*\}\}/g;
const MAX_BLOCK_PASSES = 10;

export const TAB_SEPARATOR = "<!-- tab -->";

export interface ShortcodeContext {
  /** templates/shortcodes */
  shortcodeDir: string;
  /** site root, `include` paths are relative to it */
  root: string;
  /** reads outside this directory are refused */
  sandbox: string;
}

type Shortcode = { kind: "include" } | { kind: "tabs" } | { kind: "template"; name: string };

function classify(name: string): Shortcode {
  switch (name) {
    case "include":
    case "tabs":
      return { kind: name };
    default:
      return { kind: "template", name };
  }
}

/** `key="value"` and `key='value'` pairs, double quotes win. */
export function parseArgs(args: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const m of args.matchAll(/(\w+)\s*=\s*"([^"]*)"/g)) {
    result[m[1]] = m[2];
  }
  for (const m of args.matchAll(/(\w+)\s*=\s*'([^']*)'/g)) {
    if (!(m[1] in result)) result[m[1]] = m[2];
  }
  return result;
}

function isWithin(dir: string, file: string): boolean {
  return file === dir || file.startsWith(dir.endsWith(sep) ? dir : dir + sep);
}

function include(args: Record<string, string>, ctx: ShortcodeContext): string {
  const path = args.path;
  if (!path) throw new Error(`missing required argument "path"`);
  const file = join(ctx.root, path);
  if (!existsSync(file)) throw new Error(`file not found: ${path}`);
  const canonical = realpathSync(file);
  const sandbox = realpathSync(ctx.sandbox);
  if (!isWithin(sandbox, canonical)) {
    throw new Error(`${path} resolves outside the sandbox ${sandbox}`);
  }
  const text = readFileSync(canonical, "utf-8");
  if (args.strip_frontmatter === "true") {
    return splitFrontmatter(text, path)[1];
  }
  return text;
}

const TABS_SCRIPT =
  "<script>(function(){var root=document.currentScript.parentElement;" +
  "root.querySelectorAll('.tab-button').forEach(function(button){button.addEventListener('click',function(){" +
  "var idx=button.getAttribute('data-tab-idx');" +
  "root.querySelectorAll('.tab-button,.tab-panel').forEach(function(el){" +
  "el.classList.toggle('active',el.getAttribute('data-tab-idx')===idx);});});});})();</script>";

function tabs(args: Record<string, string>, body: string | undefined): string {
  if (args.labels === undefined) throw new Error(`missing required argument "labels"`);
  const labels = args.labels.split("|").map((l) => l.trim());
  const panels = (body ?? "").split(TAB_SEPARATOR);
  if (panels.length !== labels.length) {
    throw new Error(`expected ${labels.length} panels, got ${panels.length}`);
  }

  const active = (i: number) => (i === 0 ? " active" : "");
  const buttons = labels
    .map((label, i) => `<button type="button" class="tab-button${active(i)}" data-tab-idx="${i}">${escapeHtml(label)}</button>`)
    .join("");
  // blank lines around each panel let the markdown inside render
  const content = panels
    .map((panel, i) => `<div class="tab-panel${active(i)}" data-tab-idx="${i}">\n\n${panel.trim()}\n\n</div>`)
    .join("\n");

  return `<div class="tabs">\n<div class="tab-buttons">${buttons}</div>\n${content}\n${TABS_SCRIPT}\n</div>`;
}

// names a template cannot bind as variables, `html` is the compiled template's buffer
const UNBINDABLE = new Set(
  (
    "arguments await break case catch class const continue debugger default delete do else enum eval export " +
    "extends false finally for function if implements import in instanceof interface let new null package " +
    "private protected public return static super switch this throw true try typeof var void while with " +
    "yield args html"
  ).split(" "),
);

function isBindable(key: string): boolean {
  return /^[A-Za-z_$][\w$]*$/.test(key) && !UNBINDABLE.has(key);
}

/**
 * Arguments become template variables where their names allow it; `args`
 * always holds all of them, e.g. `{ args.class }`.
 */
function renderTemplate(name: string, args: Record<string, string>, body: string | undefined, ctx: ShortcodeContext) {
  const file = join(ctx.shortcodeDir, `${name}.html`);
  if (!existsSync(file)) throw new Error(`template not found: ${name}.html`);
  const data: Record<string, unknown> = { ...args, args };
  if (body !== undefined) data.body = body;
  const names = Object.keys(data).filter((key) => key === "args" || isBindable(key));
  const render = compile(readFileSync(file, "utf-8"), `{ ${names.join(", ")} }`);
  return render(data);
}

function renderShortcode(name: string, argString: string, body: string | undefined, ctx: ShortcodeContext): string {
  const args = parseArgs(argString);
  const shortcode = classify(name);
  try {
    switch (shortcode.kind) {
      case "include":
        return include(args, ctx);
      case "tabs":
        return tabs(args, body);
      case "template":
        return renderTemplate(shortcode.name, args, body, ctx);
    }
  } catch (e) {
    throw new ShortcodeError(name, errorMessage(e), { cause: e });
  }
}

/**
 * Expand shortcodes in raw markdown.
 *
 * Block shortcodes go first so their bodies reach them verbatim, inline ones
 * (including any a block produced) after.
 */
export function processShortcodes(content: string, ctx: ShortcodeContext): string {
  let result = content;
  for (let pass = 0; pass < MAX_BLOCK_PASSES && result.search(BLOCK_SHORTCODE) !== -1; pass++) {
    result = result.replace(BLOCK_SHORTCODE, (_, name: string, args: string, body: string) =>
      renderShortcode(name, args, body.trim(), ctx),
    );
  }
  return result.replace(INLINE_SHORTCODE, (_, name: string, args: string) => renderShortcode(name, args, undefined, ctx));
}
