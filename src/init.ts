import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";

import { CONFIG_FILE } from "./config.js";

const CONFIG = `base_url = "https://example.com"
title = "My Site"
description = "Notes, with code that runs"
generate_feed = true
`;

const HOME = `+++
title = "Home"
sort_by = "date"
+++
`;

const BLOG = `+++
title = "Blog"
sort_by = "date"
paginate_by = 10
+++
`;

const HELLO = `+++
title = "Hello World"
date = "2025-01-01"
description = "My first post"
tags = ["hello"]
+++
Welcome to my new site.

<!-- more -->

Code fenced as \`{bash}\` runs while the site builds:

\`\`\`{bash}
echo "built on $(uname -s)"
\`\`\`
`;

const HEADER = `<!DOCTYPE html>
<html lang="{ config.defaultLanguage }">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>{ escape(page ? page.title + " | " + config.title : config.title) }</title>
  {#if config.generateFeed}<link rel="alternate" type="application/atom+xml" title="Feed" href="{ config.baseUrl }/atom.xml">{/if}
</head>
<body>
<nav><a href="{ config.baseUrl }/">{ escape(config.title) }</a></nav>
<main>
`;

const FOOTER = `</main>
</body>
</html>
`;

const LISTING = `{ include("partials/header.html") }
<h1>{ escape(section.title) }</h1>
{ section.content }
{#each (paginator ? paginator.pages : section.pages) as p}
<article>
  <h2><a href="{ p.permalink }">{ escape(p.title) }</a></h2>
  {#if p.date}<time>{ p.date }</time>{/if}
  {#if p.description}<p>{ escape(p.description) }</p>{/if}
</article>
{/each}
{#if paginator && paginator.previous}<a rel="prev" href="{ paginator.previous }">Newer</a>{/if}
{#if paginator && paginator.next}<a rel="next" href="{ paginator.next }">Older</a>{/if}
{ include("partials/footer.html") }
`;

const PAGE = `{ include("partials/header.html") }
<article>
<h1>{ escape(page.title) }</h1>
{#if page.date}<time datetime="{ page.date }">{ page.date }</time>{/if}
{ page.content }
{#if page.taxonomies.tags}
<ul class="tags">{#each page.taxonomies.tags as tag}<li><a href="{ get_taxonomy_url('tags', tag) }">{ escape(tag) }</a></li>{/each}</ul>
{/if}
</article>
{ include("partials/footer.html") }
`;

const TAG_LIST = `{ include("partials/header.html") }
<h1>Tags</h1>
<ul>
{#each terms as t}
<li><a href="{ t.permalink }">{ escape(t.name) }</a> ({ t.pages.length })</li>
{/each}
</ul>
{ include("partials/footer.html") }
`;

const TAG_SINGLE = `{ include("partials/header.html") }
<h1>Tagged “{ escape(term.name) }”</h1>
<ul>
{#each term.pages as p}
<li><a href="{ p.permalink }">{ escape(p.title) }</a></li>
{/each}
</ul>
{ include("partials/footer.html") }
`;

const NOT_FOUND = `{ include("partials/header.html") }
<h1>Not Found</h1>
<p><a href="{ config.baseUrl }/">Back home</a></p>
{ include("partials/footer.html") }
`;

const STYLE = `$accent: #0969da;

body {
  max-width: 42rem;
  margin: 0 auto;
  padding: 1rem;
  font-family: system-ui, sans-serif;
}

a {
  color: $accent;
}

.code-output pre,
.code-error pre {
  padding: 0.5rem;
  border-left: 3px solid $accent;
}

.code-error pre {
  border-color: #cf222e;
}
`;

const FILES: Record<string, string> = {
  [CONFIG_FILE]: CONFIG,
  "content/_index.md": HOME,
  "content/posts/_index.md": BLOG,
  "content/posts/hello.md": HELLO,
  "templates/partials/header.html": HEADER,
  "templates/partials/footer.html": FOOTER,
  "templates/index.html": LISTING,
  "templates/section.html": LISTING,
  "templates/page.html": PAGE,
  "templates/tags/list.html": TAG_LIST,
  "templates/tags/single.html": TAG_SINGLE,
  "templates/404.html": NOT_FOUND,
  "sass/style.scss": STYLE,
};

/** Scaffold a new site in `target`, refusing to touch an existing one. */
export function initSite(target: string): string[] {
  if (existsSync(join(target, CONFIG_FILE))) {
    throw new Error(`${CONFIG_FILE} already exists in ${target}`);
  }
  const written: string[] = [];
  for (const [file, text] of Object.entries(FILES)) {
    const dest = join(target, file);
    mkdirSync(dirname(dest), { recursive: true });
    writeFileSync(dest, text);
    written.push(file);
  }
  mkdirSync(join(target, "static"), { recursive: true });
  return written;
}
