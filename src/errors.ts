export class ConfigError extends Error {
  override name = "ConfigError";
}

export class FrontmatterError extends Error {
  override name = "FrontmatterError";
  constructor(
    readonly file: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`${file}: ${message}`, options);
  }
}

/** Every `@/...` reference that matched no page or section, reported at once. */
export class UnresolvedLinksError extends Error {
  override name = "UnresolvedLinksError";
  constructor(readonly links: string[]) {
    super(`unresolved internal links:\n${links.map((l) => `  ${l}`).join("\n")}`);
  }
}

export class ShortcodeError extends Error {
  override name = "ShortcodeError";
  constructor(
    readonly shortcode: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`shortcode "${shortcode}" failed: ${message}`, options);
  }
}

export class TemplateError extends Error {
  override name = "TemplateError";
  constructor(
    readonly template: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`template "${template}": ${message}`, options);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
