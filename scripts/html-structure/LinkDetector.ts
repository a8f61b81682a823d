import type { HtmlIssue, TagEvent, TagEventConsumer } from "./types";

/**
 * True when a `<link>` looks like a stylesheet reference: `rel` is absent or
 * lists "stylesheet", and `href` ends in `.css` once any query or fragment is dropped.
 */
export function isStylesheetLink(attributes: ReadonlyMap<string, string>): boolean {
  const rel = attributes.get("rel");
  if (rel !== undefined && !rel.toLowerCase().split(/\s+/).includes("stylesheet")) {
    return false;
  }

  const href = attributes.get("href");
  if (href === undefined) {
    return false;
  }

  const target = href.trim().replace(/[?#].*$/, "").toLowerCase();
  return target.endsWith(".css");
}

/**
 * Looks for at least one stylesheet `<link>` anywhere in the document, regardless of nesting.
 */
export class LinkDetector implements TagEventConsumer {
  private found: boolean;

  constructor() {
    this.found = false;
  }

  consume(event: TagEvent): readonly HtmlIssue[] {
    if (!this.found && event.kind === "start" && event.name === "link") {
      this.found = isStylesheetLink(event.attributes);
    }
    return [];
  }

  finish(): readonly HtmlIssue[] {
    return this.found ? [] : [{ code: "no-css-link" }];
  }
}
