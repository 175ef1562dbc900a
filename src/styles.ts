import { build } from "esbuild";
import { existsSync, readFileSync } from "fs";
import { createRequire } from "module";
import { join } from "path";
import { compile } from "sass";

import { MarkdownConfig } from "./typings.js";

const require = /* @__PURE__ */ createRequire(import.meta.url);

export const STYLE_OUTPUT = "style.css";

/**
 * `sass/style.scss` compiled with sass; without one, a plain `sass/style.css`
 * is bundled with esbuild so its `@import`s get inlined.
 */
export async function compileStyles(sassDir: string): Promise<string | undefined> {
  const scss = join(sassDir, "style.scss");
  const css = join(sassDir, "style.css");
  if (existsSync(scss)) {
    return compile(scss, { style: "compressed", loadPaths: [sassDir] }).css;
  }
  if (existsSync(css)) {
    const result = await build({
      entryPoints: [css],
      bundle: true,
      minify: true,
      write: false,
      outfile: STYLE_OUTPUT,
      logLevel: "silent",
    });
    return result.outputFiles[0]?.text;
  }
}

export function highlightThemeCss(theme: string): string {
  let file: string;
  try {
    file = require.resolve(`highlight.js/styles/${theme}.css`);
  } catch (e) {
    throw new Error(`unknown highlight theme "${theme}"`, { cause: e });
  }
  return readFileSync(file, "utf-8");
}

/** filename -> css for every `markdown.highlight_themes_css` entry */
export function highlightThemes(config: MarkdownConfig): Map<string, string> {
  return new Map(config.highlightThemesCss.map(({ theme, filename }) => [filename, highlightThemeCss(theme)]));
}
