import { UnresolvedLinksError } from "./errors.js";
import { Page, Section } from "./typings.js";

const INTERNAL_LINK = /@\/([^)#\s]+\.md)(#[^)\s]+)?/g;

export interface LinkResolution {
  content: string;
  unresolved: string[];
}

/**
 * Rewrite `@/path.md#anchor` references into permalinks.
 *
 * Pages are looked up before sections. Unknown targets are left in place and
 * reported back so the caller can fail once with all of them.
 */
export function rewriteInternalLinks(
  content: string,
  pages: ReadonlyMap<string, Page>,
  sections: ReadonlyMap<string, Section>,
): LinkResolution {
  const unresolved: string[] = [];
  const rewritten = content.replace(INTERNAL_LINK, (match, path: string, anchor: string | undefined) => {
    const target = pages.get(path) ?? sections.get(path);
    if (target) return target.permalink + (anchor ?? "");
    unresolved.push(`@/${path}`);
    return match;
  });
  return { content: rewritten, unresolved };
}

export function resolveInternalLinks(
  content: string,
  pages: ReadonlyMap<string, Page>,
  sections: ReadonlyMap<string, Section>,
): string {
  const { content: rewritten, unresolved } = rewriteInternalLinks(content, pages, sections);
  if (unresolved.length > 0) throw new UnresolvedLinksError(unresolved);
  return rewritten;
}
