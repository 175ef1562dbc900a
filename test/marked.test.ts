import { describe, expect, it } from "vitest";

import { defaultMarkdownConfig } from "../src/config.js";
import {
  extractSummary,
  highlightCode,
  isExternalUrl,
  parseExecutableLang,
  renderMarkdown,
  replaceExecPlaceholders,
} from "../src/marked.js";
import { ExecutableBlock, MarkdownConfig } from "../src/typings.js";
import { BASE_URL } from "./helpers.js";

function render(content: string, overrides: Partial<MarkdownConfig> = {}, blocks: ExecutableBlock[] = []) {
  return renderMarkdown(content, { ...defaultMarkdownConfig(), ...overrides }, blocks, BASE_URL);
}

describe("renderMarkdown", () => {
  it("renders plain markdown", () => {
    expect(render("Hello *world*")).toBe("<p>Hello <em>world</em></p>\n");
  });

  it("leaves placeholders for executable blocks", () => {
    const blocks: ExecutableBlock[] = [];
    const html = render('```{bash}\necho hi\n```\n\n```{python file="run.py"}\n```', {}, blocks);
    expect(html).toBe("<!-- EXEC_BLOCK_0 -->\n<!-- EXEC_BLOCK_1 -->\n");
    expect(blocks).toEqual([
      { language: "bash", source: "echo hi" },
      { language: "python", source: "", fileRef: "run.py" },
    ]);
  });

  it("numbers placeholders after blocks already collected", () => {
    const blocks: ExecutableBlock[] = [{ language: "sh", source: "true" }];
    expect(render("```{sh}\nfalse\n```", {}, blocks)).toBe("<!-- EXEC_BLOCK_1 -->\n");
    expect(blocks).toHaveLength(2);
  });

  it("escapes code in unknown languages", () => {
    expect(render("```nosuchlang\nx < y\n```")).toBe('<pre><code class="language-nosuchlang">x &lt; y</code></pre>\n');
  });

  it("leaves headings alone without anchors", () => {
    expect(render("## Hello")).toBe("<h2>Hello</h2>\n");
  });

  it("adds anchors on the right or left", () => {
    const anchor = '<a class="heading-anchor" href="#hello-world" aria-label="Anchor link for: Hello World">#</a>';
    expect(render("## Hello World", { insertAnchorLinks: "right" })).toBe(
      `<h2 id="hello-world">Hello World ${anchor}</h2>\n`,
    );
    expect(render("## Hello World", { insertAnchorLinks: "left" })).toBe(
      `<h2 id="hello-world">${anchor} Hello World</h2>\n`,
    );
  });

  it("deduplicates heading ids", () => {
    const html = render("# A\n\n# A", { insertAnchorLinks: "right" });
    expect(html).toContain('<h1 id="a">');
    expect(html).toContain('<h1 id="a-1">');
  });

  it("opens external links in a new tab", () => {
    const options = { externalLinksTargetBlank: true, externalLinksNoFollow: true, externalLinksNoReferrer: true };
    expect(render("[x](https://other.org/)", options)).toBe(
      '<p><a href="https://other.org/" target="_blank" rel="nofollow noreferrer">x</a></p>\n',
    );
    expect(render(`[y](${BASE_URL}/a/)`, options)).toBe(`<p><a href="${BASE_URL}/a/">y</a></p>\n`);
  });

  it("renders footnotes", () => {
    const html = render("Text[^1]\n\n[^1]: Note");
    expect(html).toContain('<sup class="footnote-reference"><a href="#fn-1" id="fnref-1">1</a></sup>');
    expect(html).toContain('<section class="footnotes"><ol><li id="fn-1">Note <a href="#fnref-1"');
  });

  it("renders emoji shortcodes when enabled", () => {
    expect(render(":smile:", { renderEmoji: true })).toBe(
      '<p><span class="emoji" role="img" aria-label="smile">😄</span></p>\n',
    );
    expect(render(":smile:")).toBe("<p>:smile:</p>\n");
  });

  it("uses smart punctuation when enabled", () => {
    expect(render('"quoted"', { smartPunctuation: true })).toBe("<p>&#8220;quoted&#8221;</p>\n");
  });
});

describe("highlightCode", () => {
  it("highlights known languages", () => {
    expect(highlightCode("let x = 1", "js", defaultMarkdownConfig())).toMatch(
      /^<pre class="hljs" data-theme="github-dark"><code class="language-js">/,
    );
  });

  it("falls back when highlighting is off", () => {
    const config = { ...defaultMarkdownConfig(), highlightCode: false };
    expect(highlightCode("a", "js", config)).toBe('<pre><code class="language-js">a</code></pre>');
  });
});

describe("parseExecutableLang", () => {
  it("only accepts braced info strings", () => {
    expect(parseExecutableLang("python")).toBeUndefined();
    expect(parseExecutableLang("{bash}")).toEqual(["bash"]);
    expect(parseExecutableLang('{python file="a.py"}')).toEqual(["python", "a.py"]);
  });
});

describe("isExternalUrl", () => {
  it("excludes the site itself and relative urls", () => {
    expect(isExternalUrl("https://other.org", BASE_URL)).toBe(true);
    expect(isExternalUrl(`${BASE_URL}/x/`, BASE_URL)).toBe(false);
    expect(isExternalUrl("/x/", BASE_URL)).toBe(false);
  });
});

describe("extractSummary", () => {
  it("cuts at the more marker", () => {
    expect(extractSummary("intro\n<!-- more -->\nrest")).toBe("intro\n");
    expect(extractSummary("no marker")).toBeUndefined();
  });
});

describe("replaceExecPlaceholders", () => {
  it("shows source, output and error", () => {
    const blocks = [{ language: "nosuchlang", source: "a", output: "out<", error: "err" }];
    expect(replaceExecPlaceholders("<!-- EXEC_BLOCK_0 -->\n", blocks, defaultMarkdownConfig())).toBe(
      '<div class="code-block-executed"><pre><code class="language-nosuchlang">a</code></pre>' +
        '<div class="code-output"><pre><code>out&lt;</code></pre></div>' +
        '<div class="code-error"><pre><code>err</code></pre></div></div>\n',
    );
  });

  it("omits empty output", () => {
    const blocks = [{ language: "nosuchlang", source: "a", output: "" }];
    expect(replaceExecPlaceholders("<!-- EXEC_BLOCK_0 -->", blocks, defaultMarkdownConfig())).toBe(
      '<div class="code-block-executed"><pre><code class="language-nosuchlang">a</code></pre></div>',
    );
  });
});
