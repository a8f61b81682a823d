export const VOID_ELEMENTS: ReadonlySet<string> = new Set<string>([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "param",
  "source",
  "track",
  "wbr"
]);

/**
 * Elements whose content is never lexed for tags; the scanner jumps straight to the closing tag.
 */
export const RAW_TEXT_ELEMENTS: ReadonlySet<string> = new Set<string>([
  "script",
  "style"
]);

const EXCERPT_LIMIT = 40;

/** Collapses whitespace and truncates a source slice for use in a message */
export const createExcerpt = (source: string, start: number, end: number): string => {
  const limit = Math.min(end, start + EXCERPT_LIMIT);
  const excerpt = source.slice(start, limit).replace(/\s+/g, " ").trim();
  return limit < end ? `${excerpt}…` : excerpt;
};
