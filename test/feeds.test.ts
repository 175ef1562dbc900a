import { describe, expect, it } from "vitest";

import { parseConfig } from "../src/config.js";
import { atomFeed, llmsFullTxt, llmsTxt, normalizeDate, sitemap } from "../src/feeds.js";
import { page, section } from "./helpers.js";

const config = parseConfig(
  `base_url = "https://example.com"\ntitle = "Test Site"\ndescription = "A site for tests"\n`,
);

function fixture() {
  const newer = page("posts/newer.md", { title: "Newer", date: "2025-02-01" }, "Second post\n");
  const hello = page(
    "posts/hello.md",
    { title: "Hello World", date: "2025-01-01", description: "A hello post", author: "Ann" },
    "Hello content",
  );
  const about = page("about.md", { title: "About" }, "About me");
  const home = section("_index.md", { title: "Home" });
  const blog = section("posts/_index.md", { title: "Blog", description: "Posts" });
  blog.pages = [newer, hello];
  return { newer, hello, about, home, blog };
}

describe("normalizeDate", () => {
  it("turns dates into RFC 3339 timestamps", () => {
    expect(normalizeDate("2025-01-15")).toBe("2025-01-15T00:00:00Z");
    expect(normalizeDate("2025-06-15T10:30:00")).toBe("2025-06-15T10:30:00Z");
    expect(normalizeDate("2025-06-15T10:30:00+02:00")).toBe("2025-06-15T10:30:00+02:00");
    expect(normalizeDate("someday")).toBe("someday");
  });
});

describe("sitemap", () => {
  it("lists sections, then pages, each by path", () => {
    const { newer, hello, about, home, blog } = fixture();
    expect(sitemap([blog, home], [newer, hello, about])).toBe(`<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url>
    <loc>https://example.com/</loc>
  </url>
  <url>
    <loc>https://example.com/posts/</loc>
  </url>
  <url>
    <loc>https://example.com/about/</loc>
  </url>
  <url>
    <loc>https://example.com/posts/hello/</loc>
    <lastmod>2025-01-01</lastmod>
  </url>
  <url>
    <loc>https://example.com/posts/newer/</loc>
    <lastmod>2025-02-01</lastmod>
  </url>
</urlset>
`);
  });
});

describe("atomFeed", () => {
  it("lists dated pages, newest first", () => {
    const { newer, hello, about } = fixture();
    hello.summary = "<p>Hi</p>";
    expect(atomFeed(config, [hello, about, newer])).toBe(`<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Test Site</title>
  <link href="https://example.com/atom.xml" rel="self"/>
  <link href="https://example.com/"/>
  <updated>2025-02-01T00:00:00Z</updated>
  <id>https://example.com/</id>
  <author><name>Test Site</name></author>
  <entry>
    <title>Newer</title>
    <link href="https://example.com/posts/newer/"/>
    <id>https://example.com/posts/newer/</id>
    <updated>2025-02-01T00:00:00Z</updated>
  </entry>
  <entry>
    <title>Hello World</title>
    <link href="https://example.com/posts/hello/"/>
    <id>https://example.com/posts/hello/</id>
    <updated>2025-01-01T00:00:00Z</updated>
    <author><name>Ann</name></author>
    <summary type="html">&lt;p&gt;Hi&lt;/p&gt;</summary>
  </entry>
</feed>
`);
  });

  it("falls back to the description as summary", () => {
    const { hello } = fixture();
    expect(atomFeed(config, [hello])).toContain("    <summary>A hello post</summary>\n");
  });

  it("places term feeds under their term", () => {
    const { hello } = fixture();
    const xml = atomFeed(config, [hello], "/tags/zig/");
    expect(xml).toContain(`  <link href="https://example.com/tags/zig/atom.xml" rel="self"/>\n`);
    expect(xml).toContain(`  <id>https://example.com/tags/zig/</id>\n`);
  });

  it("has a fixed timestamp when nothing is dated", () => {
    const untitled = { ...config, title: "" };
    const xml = atomFeed(untitled, []);
    expect(xml).toContain("  <updated>1970-01-01T00:00:00Z</updated>\n");
    expect(xml).not.toContain("<author>");
  });
});

describe("llmsTxt", () => {
  it("lists sections from the root down, then orphaned pages", () => {
    const { newer, hello, about, home, blog } = fixture();
    expect(llmsTxt(config, [blog, home], [newer, hello, about])).toBe(
      "# Test Site\n\n> A site for tests\n" +
        "\n## Home\n" +
        "\n## Blog\n\nPosts\n\n" +
        "- [Newer](https://example.com/posts/newer/)\n" +
        "- [Hello World](https://example.com/posts/hello/): A hello post\n" +
        "\n## Pages\n\n- [About](https://example.com/about/)\n",
    );
  });
});

describe("llmsFullTxt", () => {
  it("inlines every page's markdown, newest first", () => {
    const { newer, hello, about } = fixture();
    expect(llmsFullTxt(config, [about, hello, newer])).toBe(
      "# Test Site\n\n> A site for tests\n" +
        "\n## Newer\n\nSecond post\n" +
        "\n## Hello World\n\nHello content\n" +
        "\n## About\n\nAbout me\n",
    );
  });
});
