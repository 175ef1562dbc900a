import { realpathSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ShortcodeError } from "../src/errors.js";
import { parseArgs, processShortcodes, ShortcodeContext } from "../src/shortcodes.js";
import { tempDir, writeFiles } from "./helpers.js";

let dir: ReturnType<typeof tempDir>;
let ctx: ShortcodeContext;

beforeEach(() => {
  dir = tempDir();
  const root = join(dir.path, "site");
  writeFiles(dir.path, {
    "outside.md": "from outside",
    "site/snippets/part.md": `+++\ntitle = "x"\n+++\nIncluded text\n`,
    "site/templates/shortcodes/note.html": `<div class="note">{ body }</div>`,
    "site/templates/shortcodes/youtube.html": `<iframe src="https://www.youtube.com/embed/{ id }"></iframe>`,
    "site/templates/shortcodes/callout.html": `<div class="{ args.class } { kind }">{ body }</div>`,
    "site/templates/shortcodes/raw.html": `{ args.html }|{ args["2col"] }`,
  });
  ctx = { shortcodeDir: join(root, "templates/shortcodes"), root, sandbox: root };
});

afterEach(() => dir.cleanup());

describe("parseArgs", () => {
  it("reads both quote styles, double quotes win", () => {
    expect(parseArgs(`a="1" b='2' a='3'`)).toEqual({ a: "1", b: "2" });
  });
});

describe("processShortcodes", () => {
  it("renders inline template shortcodes", () => {
    expect(processShortcodes(`{{ youtube(id="abc") }}`, ctx)).toBe(
      `<iframe src="https://www.youtube.com/embed/abc"></iframe>`,
    );
  });

  it("passes the trimmed body to block shortcodes", () => {
    expect(processShortcodes("{% note() %}\nHello **there**\n{% end %}", ctx)).toBe(
      `<div class="note">Hello **there**</div>`,
    );
  });

  it("expands nested blocks from the inside out", () => {
    expect(processShortcodes("{% note() %}outer {% note() %}inner{% end %}{% end %}", ctx)).toBe(
      `<div class="note">outer <div class="note">inner</div></div>`,
    );
  });

  it("reaches arguments named after keywords through args", () => {
    expect(processShortcodes(`{% callout(class="warn", kind="x") %}hi{% end %}`, ctx)).toBe(
      `<div class="warn x">hi</div>`,
    );
    expect(processShortcodes(`{{ raw(html="<b>x</b>", 2col="yes") }}`, ctx)).toBe("<b>x</b>|yes");
  });

  it("leaves template variables alone", () => {
    expect(processShortcodes("{{ variable }} and {% raw %}", ctx)).toBe("{{ variable }} and {% raw %}");
  });

  it("fails on unknown shortcodes", () => {
    expect(() => processShortcodes(`{{ missing() }}`, ctx)).toThrow(
      new ShortcodeError("missing", "template not found: missing.html"),
    );
  });
});

describe("include", () => {
  it("inlines a file, optionally without its front matter", () => {
    const text = `before\n{{ include(path="snippets/part.md", strip_frontmatter="true") }}\nafter`;
    expect(processShortcodes(text, ctx)).toBe("before\nIncluded text\n\nafter");
    expect(processShortcodes(`{{ include(path="snippets/part.md") }}`, ctx)).toBe(
      `+++\ntitle = "x"\n+++\nIncluded text\n`,
    );
  });

  it("fails on a missing file", () => {
    expect(() => processShortcodes(`{{ include(path="missing.md") }}`, ctx)).toThrow(
      `shortcode "include" failed: file not found: missing.md`,
    );
  });

  it("requires a path", () => {
    expect(() => processShortcodes(`{{ include() }}`, ctx)).toThrow(
      `shortcode "include" failed: missing required argument "path"`,
    );
  });

  it("refuses files outside the sandbox", () => {
    const sandbox = realpathSync(ctx.sandbox);
    expect(() => processShortcodes(`{{ include(path="../outside.md") }}`, ctx)).toThrow(
      `shortcode "include" failed: ../outside.md resolves outside the sandbox ${sandbox}`,
    );
  });

  it("reads them once the sandbox is widened", () => {
    const widened = { ...ctx, sandbox: dir.path };
    expect(processShortcodes(`{{ include(path="../outside.md") }}`, widened)).toBe("from outside");
  });
});

describe("tabs", () => {
  it("fails when panels and labels disagree", () => {
    expect(() => processShortcodes(`{% tabs(labels="A|B") %}only one{% end %}`, ctx)).toThrow(
      `shortcode "tabs" failed: expected 2 panels, got 1`,
    );
  });

  it("renders one button and one panel per label", () => {
    const html = processShortcodes(`{% tabs(labels="A|B") %}\nfirst\n<!-- tab -->\nsecond\n{% end %}`, ctx);
    expect(html.startsWith(`<div class="tabs">\n<div class="tab-buttons">`)).toBe(true);
    expect(html).toContain(
      `<button type="button" class="tab-button active" data-tab-idx="0">A</button>` +
        `<button type="button" class="tab-button" data-tab-idx="1">B</button>`,
    );
    expect(html).toContain(`<div class="tab-panel active" data-tab-idx="0">\n\nfirst\n\n</div>`);
    expect(html).toContain(`<div class="tab-panel" data-tab-idx="1">\n\nsecond\n\n</div>`);
  });

  it("escapes labels", () => {
    const html = processShortcodes(`{% tabs(labels="<b>|A & B") %}\none\n<!-- tab -->\ntwo\n{% end %}`, ctx);
    expect(html).toContain(
      `<button type="button" class="tab-button active" data-tab-idx="0">&lt;b&gt;</button>` +
        `<button type="button" class="tab-button" data-tab-idx="1">A &amp; B</button>`,
    );
  });
});
